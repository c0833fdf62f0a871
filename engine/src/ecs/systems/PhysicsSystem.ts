// ============================================
// Physics System
// Gravity, friction and velocity integration for transform + physics entities
// ============================================

import { Components, type Entity } from '#shared';
import { getConfig } from '../../config';
import { System } from './System';
import { SystemPriority } from './types';

export interface PhysicsSystemOptions {
  /** Gravity in px/s² for components without their own (default: GRAVITY) */
  gravity?: number;
  /** Max downward speed in px/s (default: TERMINAL_VELOCITY) */
  terminalVelocity?: number;
  /** Velocity multiplier for components that don't set their own dampening */
  dampening?: number;
  /** |velocityX| below this snaps to 0 on the ground (default: FRICTION_EPSILON) */
  frictionEpsilon?: number;
}

/**
 * PhysicsSystem - integrates movement for entities with transform + physics.
 * Runs after CollisionSystem, so the isGrounded it reads is this frame's.
 *
 * Per entity:
 * 1. Gravity (clamped to terminal velocity)
 * 2. Ground friction or air resistance on velocityX
 * 3. Position += velocity * dt
 * 4. Clear isGrounded (CollisionSystem sets it again next frame)
 * 5. Dampening
 *
 * Mutates the stored components in place.
 */
export class PhysicsSystem extends System {
  readonly gravity: number;
  readonly terminalVelocity: number;
  readonly dampening: number | undefined;
  readonly frictionEpsilon: number;

  constructor(options: PhysicsSystemOptions = {}) {
    super('PhysicsSystem');
    this.requires(Components.Transform, Components.Physics);
    this.setPriority(SystemPriority.PHYSICS);

    this.gravity = options.gravity ?? getConfig('GRAVITY');
    this.terminalVelocity = options.terminalVelocity ?? getConfig('TERMINAL_VELOCITY');
    this.dampening = options.dampening;
    this.frictionEpsilon = options.frictionEpsilon ?? getConfig('FRICTION_EPSILON');
  }

  protected processEntity(entity: Entity, deltaTime: number): void {
    const transform = entity.getComponent(Components.Transform);
    const physics = entity.getComponent(Components.Physics);
    if (!transform || !physics || physics.disabled) return;

    if (physics.affectedByGravity) {
      physics.velocityY += (physics.gravity ?? this.gravity) * deltaTime;
      if (physics.velocityY > this.terminalVelocity) {
        physics.velocityY = this.terminalVelocity;
      }
    }

    if (physics.isGrounded && physics.friction) {
      physics.velocityX *= 1 - physics.friction;
      if (Math.abs(physics.velocityX) < this.frictionEpsilon) {
        physics.velocityX = 0;
      }
    }

    if (!physics.isGrounded && physics.airResistance) {
      physics.velocityX *= 1 - physics.airResistance;
    }

    transform.x += physics.velocityX * deltaTime;
    transform.y += physics.velocityY * deltaTime;

    physics.isGrounded = false;

    const dampening = physics.dampening ?? this.dampening;
    if (dampening !== undefined) {
      physics.velocityX *= dampening;
      physics.velocityY *= dampening;
    }
  }
}
