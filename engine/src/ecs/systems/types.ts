// ============================================
// ECS System Types
// ============================================

import { ENGINE_CONFIG } from '#shared';

/**
 * System priority - determines update and draw order
 * Lower numbers run first; equal priorities keep registration order.
 *
 * Frame order:
 * 1. Collision (contacts + grounding from last frame's positions)
 * 2. Physics (forces, integration, clears isGrounded)
 * 3. Gameplay (behaviours reacting to both)
 * 4. Render (draw-side bookkeeping) - runs last
 */
export const SystemPriority = {
  COLLISION: ENGINE_CONFIG.COLLISION_PRIORITY,
  PHYSICS: ENGINE_CONFIG.PHYSICS_PRIORITY,
  GAMEPLAY: ENGINE_CONFIG.GAMEPLAY_PRIORITY,
  RENDER: ENGINE_CONFIG.RENDER_PRIORITY,
} as const;

/**
 * Receives collider boxes from CollisionSystem's debug draw pass.
 * Hosts plug their renderer in here.
 */
export interface DebugDrawSink {
  drawRect(x: number, y: number, width: number, height: number, layer: string): void;
}
