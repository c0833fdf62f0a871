// ============================================
// Entity Manager
// Owns the entity list, the tag index and the entity pools
// ============================================

import { Entity, type TagObserver } from './Entity';
import type { EventBus } from './EventBus';
import type { ComponentKind } from './components';
import { EcsError } from './errors';
import type { EntityId } from './types';

/**
 * EntityManager - entity bookkeeping for one World.
 *
 * Manages:
 * - Id allocation (per-manager counter, starting at 1)
 * - The master entity list (in creation order)
 * - The tag index (kept current through each entity's tag observer)
 * - Named pools of deactivated entities for reuse
 *
 * Every query returns a fresh array, so callers may create, deactivate or
 * remove entities while iterating a result.
 */
export class EntityManager implements TagObserver {
  private entities: Entity[] = [];
  private entitiesById = new Map<EntityId, Entity>();
  private entitiesByTag = new Map<string, Set<Entity>>();
  private entityPools = new Map<string, Entity[]>();
  private _nextEntityId = 1;

  constructor(private readonly bus: EventBus | null = null) {}

  // ============================================
  // Id allocation
  // ============================================

  get nextEntityId(): number {
    return this._nextEntityId;
  }

  /**
   * Move the id counter (snapshot restore). Never moves it below an id in use.
   */
  set nextEntityId(id: number) {
    let floor = 1;
    for (const entityId of this.entitiesById.keys()) {
      floor = Math.max(floor, entityId + 1);
    }
    this._nextEntityId = Math.max(Math.floor(id), floor);
  }

  // ============================================
  // Creation & registration
  // ============================================

  /**
   * Create a new entity and add it to the master list.
   * Throws EcsError(ENTITY_IDS_EXHAUSTED) once every safe integer id is spent.
   */
  createEntity(): Entity {
    // Past this the counter can no longer step to a distinct id
    if (this._nextEntityId > Number.MAX_SAFE_INTEGER) {
      throw EcsError.entityIdsExhausted(this._nextEntityId);
    }
    const entity = new Entity(this._nextEntityId++);
    this.track(entity);
    return entity;
  }

  /**
   * Create an entity with an explicit id (snapshot replay).
   * Bumps the counter past `id`; throws if the id is already tracked.
   */
  createEntityWithId(id: EntityId): Entity {
    if (this.entitiesById.has(id)) {
      throw EcsError.entityIdConflict(id);
    }
    const entity = new Entity(id);
    if (id >= this._nextEntityId) {
      this._nextEntityId = id + 1;
    }
    this.track(entity);
    return entity;
  }

  /**
   * Register an existing entity, indexing it under the tags it already has.
   */
  addEntity(entity: Entity): Entity {
    const existing = this.entitiesById.get(entity.id);
    if (existing === entity) return entity;
    if (existing) {
      throw EcsError.entityIdConflict(entity.id);
    }
    if (entity.id >= this._nextEntityId) {
      this._nextEntityId = entity.id + 1;
    }
    this.track(entity);
    return entity;
  }

  private track(entity: Entity): void {
    if (this.bus) {
      entity.attach(this.bus);
    }
    entity.observeTags(this);
    this.entities.push(entity);
    this.entitiesById.set(entity.id, entity);
    for (const tag of entity.getTags()) {
      this.indexTag(entity, tag);
    }
  }

  // ============================================
  // Tag index (TagObserver)
  // ============================================

  onTagAdded(entity: Entity, tag: string): void {
    if (this.entitiesById.get(entity.id) === entity) {
      this.indexTag(entity, tag);
    }
  }

  onTagRemoved(entity: Entity, tag: string): void {
    this.unindexTag(entity, tag);
  }

  private indexTag(entity: Entity, tag: string): void {
    let group = this.entitiesByTag.get(tag);
    if (!group) {
      group = new Set();
      this.entitiesByTag.set(tag, group);
    }
    group.add(entity);
  }

  private unindexTag(entity: Entity, tag: string): void {
    const group = this.entitiesByTag.get(tag);
    if (!group) return;
    group.delete(entity);
    if (group.size === 0) {
      this.entitiesByTag.delete(tag);
    }
  }

  /**
   * Tag an entity (indexing follows from the tag observer).
   */
  registerEntityWithTag(entity: Entity, tag: string): void {
    entity.addTag(tag);
  }

  // ============================================
  // Pools
  // ============================================

  /**
   * Take an entity from the named pool, or create one tagged with the pool name.
   * A recycled entity comes back reset (no components), active and carrying
   * only the pool tag.
   */
  getPooledEntity(poolName: string): Entity {
    let pool = this.entityPools.get(poolName);
    if (!pool) {
      pool = [];
      this.entityPools.set(poolName, pool);
    }

    const recycled = pool.pop();
    if (!recycled) {
      const entity = this.createEntity();
      entity.addTag(poolName);
      return entity;
    }

    recycled.reset();
    if (this.entitiesById.get(recycled.id) !== recycled) {
      // cleanup() dropped it while it sat in the pool
      this.track(recycled);
    }
    recycled.addTag(poolName);
    return recycled;
  }

  /**
   * Deactivate an entity and file it under the first of its tags that names a pool.
   * Returns false (after deactivating) when none does.
   */
  returnToPool(entity: Entity): boolean {
    for (const tag of entity.getTags()) {
      const pool = this.entityPools.get(tag);
      if (pool) {
        entity.deactivate();
        if (!pool.includes(entity)) {
          pool.push(entity);
        }
        return true;
      }
    }

    entity.deactivate();
    return false;
  }

  hasPool(poolName: string): boolean {
    return this.entityPools.has(poolName);
  }

  getPoolSize(poolName: string): number {
    return this.entityPools.get(poolName)?.length ?? 0;
  }

  getPoolNames(): string[] {
    return Array.from(this.entityPools.keys());
  }

  // ============================================
  // Queries
  // ============================================

  getEntityById(id: EntityId): Entity | null {
    return this.entitiesById.get(id) ?? null;
  }

  /**
   * Every tracked entity, active or not, in creation order.
   */
  getAllEntities(): Entity[] {
    return [...this.entities];
  }

  getEntitiesWithTag(tag: string): Entity[] {
    const group = this.entitiesByTag.get(tag);
    return group ? Array.from(group) : [];
  }

  /**
   * Active entities carrying one component kind.
   */
  getEntitiesWithComponent(kind: ComponentKind): Entity[] {
    return this.entities.filter((entity) => entity.active && entity.hasComponent(kind));
  }

  /**
   * Active entities carrying EVERY listed component kind.
   */
  getEntitiesWith(...kinds: ComponentKind[]): Entity[] {
    return this.entities.filter((entity) => entity.active && kinds.every((kind) => entity.hasComponent(kind)));
  }

  get count(): number {
    return this.entities.length;
  }

  // ============================================
  // Removal
  // ============================================

  /**
   * Drop an entity from the master list and every tag group.
   * Pooled entities stay in their pool.
   */
  removeEntity(entity: Entity): boolean {
    if (this.entitiesById.get(entity.id) !== entity) return false;

    this.bus?.emit('entityRemoved', { entity });

    const index = this.entities.indexOf(entity);
    if (index !== -1) {
      this.entities.splice(index, 1);
    }
    this.entitiesById.delete(entity.id);
    for (const tag of entity.getTags()) {
      this.unindexTag(entity, tag);
    }
    entity.observeTags(null);

    return true;
  }

  /**
   * Remove every inactive entity. Runs once per frame after the systems.
   * Returns how many were removed.
   */
  cleanup(): number {
    const inactive = this.entities.filter((entity) => !entity.active);
    for (const entity of inactive) {
      this.removeEntity(entity);
    }
    return inactive.length;
  }

  /**
   * Forget every entity and pool and restart ids at 1.
   */
  clear(): void {
    for (const entity of this.entities) {
      entity.observeTags(null);
    }
    this.entities = [];
    this.entitiesById.clear();
    this.entitiesByTag.clear();
    this.entityPools.clear();
    this._nextEntityId = 1;
  }
}
