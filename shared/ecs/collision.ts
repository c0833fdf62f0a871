// ============================================
// Collision Contact Types
// Shared so entities and gameplay objects can declare collision hooks
// ============================================

import type { Vec2 } from '../math';

/**
 * Contact data for one participant of a colliding pair.
 *
 * normal points away from the other participant along the axis of least
 * penetration; penetration is the signed overlap on that axis.
 */
export interface CollisionData {
  normal: Vec2;
  penetration: Vec2;
  point: Vec2;
  fromAbove: boolean;
}

/**
 * Capability implemented by anything that reacts to contact.
 * `other` is the counterpart's gameplay object when it has one, else its entity.
 */
export interface CollisionHandler {
  onCollision(other: object, collision: CollisionData): void;
}

export function isCollisionHandler(value: unknown): value is CollisionHandler {
  return (
    typeof value === 'object' &&
    value !== null &&
    'onCollision' in value &&
    typeof value.onCollision === 'function'
  );
}
