// ============================================
// ECS World
// ============================================

import {
  EcsError,
  EntityManager,
  EventBus,
  SpatialGrid,
  TemplateRegistry,
  templateTag,
  isFiniteNumber,
  type ComponentBundle,
  type ComponentKind,
  type ComponentOverrides,
  type ComponentTemplate,
  type EcsLogger,
  type Entity,
  type EventCallback,
  type EventPayload,
  type ListenerHandle,
  type Result,
} from '#shared';
import { logger, logFrameSkipped, logWorldCreated } from '../logger';
import { resolveSpatialConfig, type SpatialConfig, type SpatialConfigInput } from '../config';
import { SystemManager, type System } from './systems';
import { deserializeWorld, serializeWorld, type WorldSnapshot } from './serialization/worldSerializer';

export interface WorldOptions {
  /** Logger for listener failures (default: the engine logger) */
  logger?: EcsLogger;
  /** Event timestamp source in seconds (default: performance.now() / 1000) */
  clock?: () => number;
}

export interface WorldStats {
  entityCount: number;
  activeEntityCount: number;
  systemCount: number;
  templateCount: number;
  pools: Record<string, number>;
  indexedEntityCount: number;
  occupiedCellCount: number;
  pendingEventCount: number;
  listenerCount: number;
  resourceCount: number;
}

/**
 * World - the ECS facade a game talks to.
 *
 * Owns:
 * - Entities (EntityManager: ids, tags, pools)
 * - Systems (SystemManager: priority-ordered passes)
 * - Component templates
 * - The spatial grid over entities with a position component
 * - The event bus (queued; delivered once per frame after cleanup)
 * - Resources - singleton data that isn't tied to entities
 *
 * Nothing here is global: two worlds never share ids, templates or events.
 */
export class World {
  readonly spatialConfig: Readonly<SpatialConfig>;
  readonly events: EventBus;
  readonly entityManager: EntityManager;
  readonly systemManager: SystemManager;
  readonly templates = new TemplateRegistry();
  readonly spatialGrid: SpatialGrid;

  private resources = new Map<string, unknown>();

  private constructor(spatialConfig: SpatialConfig, options: WorldOptions) {
    this.spatialConfig = spatialConfig;
    this.events = new EventBus({ logger: options.logger ?? logger, clock: options.clock });
    this.entityManager = new EntityManager(this.events);
    this.systemManager = new SystemManager({ events: this.events });
    this.spatialGrid = new SpatialGrid({
      cellSize: spatialConfig.cellSize,
      bounds: spatialConfig.worldBounds,
    });

    this.trackPositions();
  }

  /**
   * Create a world. Missing spatial settings take the configured defaults.
   * Throws EcsError(CONFIG_INVALID) for an unusable cell size or bounds.
   */
  static create(spatialConfig?: SpatialConfigInput, options: WorldOptions = {}): World {
    const world = new World(resolveSpatialConfig(spatialConfig), options);
    logWorldCreated(world.spatialGrid.cellSize, world.spatialGrid.columns, world.spatialGrid.rows);
    return world;
  }

  /**
   * Rebuild a world from a snapshot (see serializeWorld).
   */
  static deserialize(snapshot: unknown, spatialConfig?: SpatialConfigInput): Result<World, EcsError> {
    return deserializeWorld(snapshot, spatialConfig);
  }

  serialize(): WorldSnapshot {
    return serializeWorld(this);
  }

  // ============================================
  // Frame
  // ============================================

  /**
   * Advance one frame: systems, then cleanup of inactive entities, then
   * delivery of every event queued along the way.
   * A delta that is not a positive finite number skips the frame.
   */
  update(deltaTime: number): void {
    if (!isFiniteNumber(deltaTime) || deltaTime <= 0) {
      logFrameSkipped(deltaTime);
      return;
    }

    this.systemManager.update(deltaTime, this.entityManager);
    this.entityManager.cleanup();
    this.events.processEvents();
  }

  draw(): void {
    this.systemManager.draw(this.entityManager);
  }

  // ============================================
  // Entities
  // ============================================

  createEntity(): Entity {
    const entity = this.entityManager.createEntity();
    this.events.emit('entityCreated', { entity });
    return entity;
  }

  /**
   * Adopt an entity built elsewhere. Throws EcsError(ENTITY_ID_CONFLICT)
   * when another entity already holds its id.
   */
  addEntity(entity: Entity): Entity {
    this.entityManager.addEntity(entity);
    if (entity.active) {
      this.spatialGrid.insertEntity(entity);
    }
    return entity;
  }

  /**
   * Drop an entity now instead of waiting for cleanup.
   */
  removeEntity(entity: Entity): boolean {
    this.spatialGrid.removeEntity(entity);
    return this.entityManager.removeEntity(entity);
  }

  /**
   * Deactivate an entity and take it out of spatial queries.
   * It leaves the entity list at the next cleanup.
   */
  destroyEntity(entity: Entity): void {
    this.spatialGrid.removeEntity(entity);
    entity.destroy();
  }

  getEntityById(id: number): Entity | null {
    return this.entityManager.getEntityById(id);
  }

  // ============================================
  // Templates
  // ============================================

  registerTemplate(name: string, components: ComponentBundle): ComponentTemplate {
    const template = this.templates.register(name, components);
    this.events.emit('templateRegistered', { name, components: template.components });
    return template;
  }

  extendTemplate(
    baseName: string,
    newName: string,
    additionalComponents?: ComponentBundle,
    overrides?: ComponentOverrides
  ): ComponentTemplate {
    const template = this.templates.extend(baseName, newName, additionalComponents, overrides);
    this.events.emit('templateExtended', { baseName, newName });
    return template;
  }

  /**
   * Add a template's components to an existing entity.
   * Throws EcsError(TEMPLATE_NOT_FOUND).
   */
  applyTemplate(entity: Entity, templateName: string, overrides?: ComponentOverrides): Entity {
    this.events.emit('entityTemplateApplying', { entity, templateName, overrides });
    this.templates.applyToEntity(entity, templateName, overrides);
    this.events.emit('entityTemplateApplied', { entity, templateName, overrides });

    this.updateEntityPosition(entity);
    return entity;
  }

  /**
   * Create an entity from a template. It is indexed in the spatial grid
   * right away when it has a position.
   * Throws EcsError(TEMPLATE_NOT_FOUND) before any entity is created.
   */
  createEntityFromTemplate(templateName: string, overrides?: ComponentOverrides): Entity {
    if (!this.templates.exists(templateName)) {
      throw EcsError.templateNotFound(templateName);
    }

    this.events.emit('entityTemplateCreating', { templateName, overrides });
    const entity = this.createEntity();
    this.templates.applyToEntity(entity, templateName, overrides);
    this.events.emit('entityTemplateCreated', { entity, templateName, overrides });

    this.spatialGrid.insertEntity(entity);
    return entity;
  }

  getEntitiesFromTemplate(templateName: string): Entity[] {
    return this.entityManager.getEntitiesWithTag(templateTag(templateName));
  }

  // ============================================
  // Pools
  // ============================================

  getPooledEntity(poolName: string): Entity {
    const entity = this.entityManager.getPooledEntity(poolName);
    this.events.emit('entityCreated', { entity, fromPool: true, poolName });
    this.spatialGrid.insertEntity(entity);
    return entity;
  }

  /**
   * Deactivate an entity and file it in its pool.
   * Returns false when none of its tags names a pool (it is still deactivated).
   */
  returnToPool(entity: Entity): boolean {
    this.spatialGrid.removeEntity(entity);

    const pooled = this.entityManager.returnToPool(entity);
    if (pooled) {
      this.events.emit('entityReturnedToPool', { entity });
    }
    return pooled;
  }

  // ============================================
  // Systems
  // ============================================

  /**
   * Register a system. Throws EcsError(SYSTEM_DUPLICATE) if the name is taken.
   */
  addSystem<T extends System>(system: T): T {
    this.systemManager.addSystem(system);
    this.events.emit('systemAdded', { name: system.name, priority: system.priority });
    return system;
  }

  getSystem(name: string): System | null {
    return this.systemManager.getSystem(name);
  }

  removeSystem(name: string): boolean {
    return this.systemManager.removeSystem(name);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Active entities carrying every listed component kind
   */
  getEntitiesWith(...kinds: ComponentKind[]): Entity[] {
    return this.entityManager.getEntitiesWith(...kinds);
  }

  getEntitiesWithTag(tag: string): Entity[] {
    return this.entityManager.getEntitiesWithTag(tag);
  }

  getEntitiesInRadius(x: number, y: number, radius: number): Entity[] {
    return this.spatialGrid.getEntitiesInRadius(x, y, radius);
  }

  getEntitiesInRect(x: number, y: number, width: number, height: number): Entity[] {
    return this.spatialGrid.getEntitiesInRect(x, y, width, height);
  }

  getPotentialCollisionPairs(): Array<[Entity, Entity]> {
    return this.spatialGrid.getPotentialCollisionPairs();
  }

  /**
   * Re-index an entity after moving its position component.
   * Returns false when it has no usable position (it is then unindexed).
   */
  updateEntityPosition(entity: Entity): boolean {
    if (!entity.hasComponent(this.spatialGrid.positionComponent)) {
      this.spatialGrid.removeEntity(entity);
      return false;
    }
    return this.spatialGrid.updateEntity(entity);
  }

  // ============================================
  // Events
  // ============================================

  on<K extends string, T = EventPayload<K>>(eventType: K, callback: EventCallback<T>): ListenerHandle {
    return this.events.on<K, T>(eventType, callback);
  }

  once<K extends string, T = EventPayload<K>>(eventType: K, callback: EventCallback<T>): ListenerHandle {
    return this.events.once<K, T>(eventType, callback);
  }

  off(handle: ListenerHandle): boolean {
    return this.events.off(handle);
  }

  emit<K extends string>(eventType: K, data: EventPayload<K>): void {
    this.events.emit(eventType, data);
  }

  processEvents(): number {
    return this.events.processEvents();
  }

  // ============================================
  // Resources
  // ============================================

  /**
   * Store a singleton resource (time, input snapshot, level info...)
   */
  setResource<T>(key: string, value: T): void {
    this.resources.set(key, value);
  }

  /**
   * Get a singleton resource.
   * Returns undefined if not set.
   */
  getResource<T>(key: string): T | undefined {
    return this.resources.get(key) as T | undefined;
  }

  hasResource(key: string): boolean {
    return this.resources.has(key);
  }

  deleteResource(key: string): boolean {
    return this.resources.delete(key);
  }

  // ============================================
  // Debug
  // ============================================

  getStats(): WorldStats {
    const all = this.entityManager.getAllEntities();
    const pools: Record<string, number> = {};
    for (const name of this.entityManager.getPoolNames()) {
      pools[name] = this.entityManager.getPoolSize(name);
    }

    return {
      entityCount: all.length,
      activeEntityCount: all.filter((entity) => entity.active).length,
      systemCount: this.systemManager.count,
      templateCount: this.templates.getTemplateNames().length,
      pools,
      indexedEntityCount: this.spatialGrid.size,
      occupiedCellCount: this.spatialGrid.cellCount,
      pendingEventCount: this.events.getPendingEventCount(),
      listenerCount: this.events.getListenerCount(),
      resourceCount: this.resources.size,
    };
  }

  // ============================================
  // Spatial bookkeeping
  // ============================================

  /**
   * Keep the grid in step with position components as their events arrive.
   */
  private trackPositions(): void {
    const positionKind = this.spatialGrid.positionComponent;

    this.events.on('componentAdded', ({ entity, componentType }) => {
      if (componentType !== positionKind) return;
      if (entity.active && this.entityManager.getEntityById(entity.id) === entity) {
        this.spatialGrid.updateEntity(entity);
      }
    });

    this.events.on('componentRemoved', ({ entity, componentType }) => {
      if (componentType === positionKind && !entity.hasComponent(positionKind)) {
        this.spatialGrid.removeEntity(entity);
      }
    });

    this.events.on('entityReset', ({ entity }) => {
      if (!entity.hasComponent(positionKind)) {
        this.spatialGrid.removeEntity(entity);
      }
    });

    this.events.on('entityRemoved', ({ entity }) => {
      this.spatialGrid.removeEntity(entity);
    });

    this.events.on('entityDeactivated', ({ entity }) => {
      if (!entity.active) {
        this.spatialGrid.removeEntity(entity);
      }
    });
  }
}
