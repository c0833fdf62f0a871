// ============================================
// World Serialization
// Snapshots of active entities, the id counter and templates
// ============================================

import {
  EcsError,
  Entity,
  err,
  isEcsError,
  ok,
  toSerializable,
  type JsonValue,
  type Result,
} from '#shared';
import { logSnapshotRejected, logWorldLoaded } from '../../logger';
import type { SpatialConfigInput } from '../../config';
import { World } from '../World';
import { WorldSnapshotSchema } from './snapshotSchema';

export type SerializedComponent = { [field: string]: JsonValue };
export type SerializedComponents = Record<string, SerializedComponent>;

export interface EntitySnapshot {
  id: number;
  active: boolean;
  tags: string[];
  components: SerializedComponents;
}

export interface WorldSnapshot {
  entities: EntitySnapshot[];
  nextEntityId: number;
  templates: Record<string, SerializedComponents>;
}

function serializeComponents(entries: Iterable<[string, unknown]>): SerializedComponents {
  const components: SerializedComponents = {};
  for (const [kind, data] of entries) {
    const serialized = toSerializable(data);
    // Components are records; anything else has no snapshot form
    if (serialized !== null && typeof serialized === 'object' && !Array.isArray(serialized)) {
      components[kind] = serialized;
    }
  }
  return components;
}

export function serializeEntity(entity: Entity): EntitySnapshot {
  return {
    id: entity.id,
    active: entity.active,
    tags: entity.getTags(),
    components: serializeComponents(entity.componentEntries()),
  };
}

/**
 * Snapshot a world. Only active entities are kept; functions are dropped at
 * every depth.
 */
export function serializeWorld(world: World): WorldSnapshot {
  const templates: Record<string, SerializedComponents> = {};
  for (const name of world.templates.getTemplateNames()) {
    templates[name] = serializeComponents(Object.entries(world.templates.getComponents(name)));
  }

  return {
    entities: world.entityManager
      .getAllEntities()
      .filter((entity) => entity.active)
      .map(serializeEntity),
    nextEntityId: world.entityManager.nextEntityId,
    templates,
  };
}

/**
 * JSON text for a world. Non-finite numbers become null.
 */
export function stringifyWorld(world: World): string {
  return JSON.stringify(serializeWorld(world));
}

function reject(error: EcsError): Result<never, EcsError> {
  logSnapshotRejected(error.code, error.message);
  return err(error);
}

/**
 * Build a fresh world from a snapshot.
 *
 * Entities keep their ids, tags, components and active flag; the id counter
 * resumes past both the stored counter and the highest restored id. The
 * spatial grid is rebuilt and `worldLoaded` is queued for the first
 * processEvents().
 */
export function deserializeWorld(snapshot: unknown, spatialConfig?: SpatialConfigInput): Result<World, EcsError> {
  const parsed = WorldSnapshotSchema.safeParse(snapshot);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return reject(EcsError.snapshotInvalid(`Invalid world snapshot: ${issues.join('; ')}`, { issues }));
  }
  const data = parsed.data;

  let world: World;
  try {
    world = World.create(spatialConfig);
  } catch (error) {
    if (isEcsError(error)) return reject(error);
    throw error;
  }

  for (const [name, components] of Object.entries(data.templates)) {
    world.templates.restore(name, components);
  }

  // Entities are filled in detached, so restoring them queues no events
  for (const entry of data.entities) {
    const entity = new Entity(entry.id);
    for (const tag of entry.tags) {
      entity.addTag(tag);
    }
    for (const [kind, component] of Object.entries(entry.components)) {
      entity.addComponent(kind, component);
    }
    if (!entry.active) {
      entity.deactivate();
    }
    world.entityManager.addEntity(entity);
  }

  // Setter floors at highest id + 1
  world.entityManager.nextEntityId = data.nextEntityId;

  world.spatialGrid.clear();
  for (const entity of world.entityManager.getAllEntities()) {
    if (entity.active) {
      world.spatialGrid.insertEntity(entity);
    }
  }

  world.emit('worldLoaded', { entityCount: data.entities.length });
  logWorldLoaded(data.entities.length, Object.keys(data.templates).length);

  return ok(world);
}

/**
 * Restore a world from JSON text (stringifyWorld output).
 */
export function parseWorldSnapshot(json: string, spatialConfig?: SpatialConfigInput): Result<World, EcsError> {
  let snapshot: unknown;
  try {
    snapshot = JSON.parse(json);
  } catch (error) {
    return reject(
      EcsError.snapshotUnreadable('World snapshot is not valid JSON', {
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }
  return deserializeWorld(snapshot, spatialConfig);
}
