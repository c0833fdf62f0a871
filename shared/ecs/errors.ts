// ============================================
// ECS Errors
// ============================================

/**
 * Error codes for ECS setup and persistence failures.
 *
 * Missing components, absent tags and non-indexable entities are NOT errors:
 * those paths return null/false because components come and go as part of
 * ordinary gameplay.
 */
export type EcsErrorCode =
  | 'CONFIG_INVALID'
  | 'TEMPLATE_EXISTS'
  | 'TEMPLATE_NOT_FOUND'
  | 'SYSTEM_DUPLICATE'
  | 'ENTITY_ID_CONFLICT'
  | 'ENTITY_IDS_EXHAUSTED'
  | 'SNAPSHOT_INVALID'
  | 'SNAPSHOT_UNREADABLE';

/**
 * Unified error type for the ECS runtime.
 *
 * @example
 * ```typescript
 * throw EcsError.configInvalid('cellSize must be positive', { cellSize: 0 });
 * ```
 */
export class EcsError extends Error {
  readonly name = 'EcsError';

  constructor(
    public readonly code: EcsErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EcsError);
    }
  }

  static configInvalid(message: string, details?: Record<string, unknown>): EcsError {
    return new EcsError('CONFIG_INVALID', message, details);
  }

  static templateExists(name: string): EcsError {
    return new EcsError('TEMPLATE_EXISTS', `Component template '${name}' already exists`, { name });
  }

  static templateNotFound(name: string): EcsError {
    return new EcsError('TEMPLATE_NOT_FOUND', `Component template '${name}' does not exist`, { name });
  }

  static systemDuplicate(name: string): EcsError {
    return new EcsError('SYSTEM_DUPLICATE', `System '${name}' is already registered`, { name });
  }

  static entityIdConflict(id: number): EcsError {
    return new EcsError('ENTITY_ID_CONFLICT', `Entity id ${id} is already tracked by this world`, { id });
  }

  static entityIdsExhausted(nextId: number): EcsError {
    return new EcsError(
      'ENTITY_IDS_EXHAUSTED',
      `Entity id counter ${nextId} is past the largest safe integer id`,
      { nextId }
    );
  }

  static snapshotInvalid(message: string, details?: Record<string, unknown>): EcsError {
    return new EcsError('SNAPSHOT_INVALID', message, details);
  }

  static snapshotUnreadable(message: string, details?: Record<string, unknown>): EcsError {
    return new EcsError('SNAPSHOT_UNREADABLE', message, details);
  }
}

export function isEcsError(error: unknown): error is EcsError {
  return error instanceof EcsError;
}
