// ============================================
// ECS Core Types
// ============================================

/**
 * Entity ID - a positive integer allocated by the owning EntityManager.
 * Unique among the entities one World tracks at the same time.
 */
export type EntityId = number;

/**
 * Standard component kinds used by the core systems.
 * Gameplay code is free to use any other string as a kind.
 */
export const Components = {
  // Spatial grid indexes entities by this one
  Position: 'position',

  // Core physics/collision
  Transform: 'transform',
  Physics: 'physics',
  Collider: 'collider',

  // Classification (drives `collision:<type>` event names)
  Type: 'type',

  // Read by external draw passes only
  Renderable: 'renderable',
} as const;

/**
 * Tags the core itself assigns.
 * Pool tags are the pool names chosen by callers.
 */
export const Tags = {
  // Prefix for entities created from (or stamped with) a template
  TemplatePrefix: 'template:',
} as const;

/**
 * Build the tag an entity receives when a template is applied to it.
 */
export function templateTag(templateName: string): string {
  return `${Tags.TemplatePrefix}${templateName}`;
}

// ============================================
// Logging seam
// ============================================

/**
 * Minimal structured logger the shared layer reports through.
 * Signature-compatible with a pino logger, so the engine injects its own.
 */
export interface EcsLogger {
  debug(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

/**
 * Fallback used when no logger is injected (standalone grids, buses, tests).
 */
export const consoleLogger: EcsLogger = {
  debug: () => {},
  warn: (obj, msg) => console.warn(msg ?? '', obj),
  error: (obj, msg) => console.error(msg ?? '', obj),
};

// ============================================
// Result
// ============================================

/**
 * Outcome of an operation that reports failure to the caller instead of throwing.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
