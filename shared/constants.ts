// ============================================
// Engine Constants & Configuration
// Static defaults; runtime overrides live in engine/src/config.ts
// ============================================

// Runtime config that can be modified (subset of ENGINE_CONFIG keys)
export const TUNABLE_CONFIGS = [
  // Physics
  'GRAVITY',
  'TERMINAL_VELOCITY',
  'FRICTION_EPSILON',

  // Spatial index
  'SPATIAL_CELL_SIZE',
  'COLLISION_CELL_SIZE',

  // Diagnostics
  'SLOW_FRAME_MS',
] as const;

export type TunableConfigKey = (typeof TUNABLE_CONFIGS)[number];

export const ENGINE_CONFIG = {
  // ============================================
  // Spatial grid
  // ============================================
  SPATIAL_CELL_SIZE: 100,
  WORLD_MIN_X: -10000,
  WORLD_MIN_Y: -10000,
  WORLD_MAX_X: 10000,
  WORLD_MAX_Y: 10000,

  // Broad-phase grid rebuilt each frame by a spatially accelerated CollisionSystem
  COLLISION_CELL_SIZE: 64,

  // ============================================
  // Physics
  // ============================================
  GRAVITY: 400, // px/s², used for physics components that set no gravity of their own
  TERMINAL_VELOCITY: 1000, // px/s, clamp for downward velocity
  FRICTION_EPSILON: 0.1, // |velocityX| below this snaps to 0 on the ground

  // ============================================
  // System priorities (lower runs first)
  // ============================================
  COLLISION_PRIORITY: 10,
  PHYSICS_PRIORITY: 20,
  GAMEPLAY_PRIORITY: 100,
  RENDER_PRIORITY: 1000,

  // ============================================
  // Diagnostics
  // ============================================
  SLOW_FRAME_MS: 10, // log a per-system breakdown when a frame takes longer
} as const;

export type EngineConfig = typeof ENGINE_CONFIG;
