// ============================================
// ECS Systems - Public API
// ============================================

export { System } from './System';
export type { EntitySource, SystemContext } from './System';
export { SystemManager } from './SystemManager';
export { PhysicsSystem } from './PhysicsSystem';
export type { PhysicsSystemOptions } from './PhysicsSystem';
export { CollisionSystem, getColliderBox, flipCollision } from './CollisionSystem';
export type { CollisionSystemOptions } from './CollisionSystem';
export { SystemPriority } from './types';
export type { DebugDrawSink } from './types';
