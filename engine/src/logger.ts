import pino from 'pino';

// ============================================
// Logger Configuration
// ============================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger tagged with a component name.
 * Development: pretty-printed console output via the pino-pretty transport.
 * Production: newline-delimited JSON on stdout.
 * @param component - Component name for filtering (e.g., 'engine', 'perf')
 */
function createLogger(component: string) {
  const options: pino.LoggerOptions = {
    level: LOG_LEVEL,
    base: { component }, // Add component field to all log entries
  };

  if (!IS_DEV) {
    return pino(options);
  }

  return pino(
    options,
    pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    })
  );
}

// ============================================
// Logger Instances
// ============================================

// World lifecycle, system failures, listener failures, snapshot problems
export const logger = createLogger('engine');

// Frame timing breakdowns
export const perfLogger = createLogger('perf');

// ============================================
// Convenience Methods for Engine Events
// ============================================

/**
 * Log world construction
 */
export function logWorldCreated(cellSize: number, columns: number, rows: number) {
  logger.info(
    { cellSize, columns, rows, event: 'world_created' },
    `World created with ${columns}x${rows} spatial grid (cell ${cellSize}px)`
  );
}

/**
 * Log a restored snapshot
 */
export function logWorldLoaded(entityCount: number, templateCount: number) {
  logger.info(
    { entityCount, templateCount, event: 'world_loaded' },
    `World restored: ${entityCount} entities, ${templateCount} templates`
  );
}

/**
 * Log a rejected snapshot
 */
export function logSnapshotRejected(code: string, message: string) {
  logger.warn({ code, event: 'snapshot_rejected' }, `Snapshot rejected: ${message}`);
}

/**
 * Log a frame that was skipped because its delta time was unusable
 */
export function logFrameSkipped(deltaTime: number) {
  logger.warn({ deltaTime, event: 'frame_skipped' }, `Frame skipped: invalid delta time ${deltaTime}`);
}
