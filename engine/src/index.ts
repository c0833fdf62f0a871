// ============================================
// Engine Entry Point
// ============================================

export * from './ecs';
export {
  getConfig,
  setConfigOverride,
  clearConfigOverrides,
  getConfigOverrides,
  isTunableConfigKey,
  resolveSpatialConfig,
  spatialConfigSchema,
} from './config';
export type { SpatialConfig, SpatialConfigInput } from './config';
export { logger, perfLogger } from './logger';
