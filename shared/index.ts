// ============================================
// Shared Types & Constants
// Pure data layer: importable by the engine and by any host
// ============================================

// ECS Module - entities, events, spatial index, templates
export * from './ecs';

// Math utilities - 2D geometry
export * from './math';

// Engine constants (ENGINE_CONFIG, TUNABLE_CONFIGS)
export * from './constants';
