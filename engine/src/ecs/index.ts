// ============================================
// Engine ECS - Public API
// ============================================

export { World } from './World';
export type { WorldOptions, WorldStats } from './World';

export * from './systems';

export {
  serializeWorld,
  serializeEntity,
  stringifyWorld,
  deserializeWorld,
  parseWorldSnapshot,
} from './serialization/worldSerializer';
export type {
  WorldSnapshot,
  EntitySnapshot,
  SerializedComponent,
  SerializedComponents,
} from './serialization/worldSerializer';
export { WorldSnapshotSchema, EntitySnapshotSchema } from './serialization/snapshotSchema';
