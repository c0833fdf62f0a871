// ============================================
// Engine Configuration
// Static defaults from ENGINE_CONFIG plus runtime overrides
// ============================================

import { z } from 'zod';
import {
  ENGINE_CONFIG,
  EcsError,
  TUNABLE_CONFIGS,
  validateGridConfig,
  type TunableConfigKey,
  type WorldBounds,
} from '#shared';

// Runtime config overrides (applied on top of ENGINE_CONFIG)
const configOverrides: Map<string, number> = new Map();

// ============================================
// Config Access (with overrides)
// ============================================

/**
 * Get a config value, checking overrides first
 */
export function getConfig<K extends keyof typeof ENGINE_CONFIG>(key: K): number {
  const override = configOverrides.get(key);
  if (override !== undefined) {
    return override;
  }
  return ENGINE_CONFIG[key];
}

export function isTunableConfigKey(key: string): key is TunableConfigKey {
  return TUNABLE_CONFIGS.some((tunable) => tunable === key);
}

/**
 * Override a tunable value at runtime (tests, tooling).
 * Throws EcsError(CONFIG_INVALID) for unknown keys and non-finite values.
 */
export function setConfigOverride(key: string, value: number): void {
  if (!isTunableConfigKey(key)) {
    throw EcsError.configInvalid(`Config key '${key}' is not tunable`, { key });
  }
  if (!Number.isFinite(value)) {
    throw EcsError.configInvalid(`Config value for '${key}' must be a finite number`, { key, value });
  }
  configOverrides.set(key, value);
}

export function clearConfigOverrides(): void {
  configOverrides.clear();
}

export function getConfigOverrides(): Record<string, number> {
  return Object.fromEntries(configOverrides);
}

// ============================================
// Spatial Config
// ============================================

const worldBoundsSchema = z
  .object({
    minX: z.number(),
    minY: z.number(),
    maxX: z.number(),
    maxY: z.number(),
  })
  .refine((bounds) => bounds.maxX > bounds.minX && bounds.maxY > bounds.minY, {
    message: 'max must be greater than min on both axes',
  });

export const spatialConfigSchema = z.object({
  cellSize: z.number().positive().optional(),
  worldBounds: worldBoundsSchema.optional(),
});

export type SpatialConfigInput = z.input<typeof spatialConfigSchema>;

export interface SpatialConfig {
  cellSize: number;
  worldBounds: WorldBounds;
}

/**
 * Fill in defaults and validate a world's spatial configuration.
 * Throws EcsError(CONFIG_INVALID) when the result is unusable.
 */
export function resolveSpatialConfig(input: unknown = {}): SpatialConfig {
  const parsed = spatialConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw EcsError.configInvalid(`Invalid spatial config: ${issues.join('; ')}`, { issues });
  }

  const config: SpatialConfig = {
    cellSize: parsed.data.cellSize ?? getConfig('SPATIAL_CELL_SIZE'),
    worldBounds: parsed.data.worldBounds ?? {
      minX: ENGINE_CONFIG.WORLD_MIN_X,
      minY: ENGINE_CONFIG.WORLD_MIN_Y,
      maxX: ENGINE_CONFIG.WORLD_MAX_X,
      maxY: ENGINE_CONFIG.WORLD_MAX_Y,
    },
  };

  // An overridden default cell size is checked here too
  validateGridConfig(config.cellSize, config.worldBounds);
  return config;
}
