// ============================================
// ECS System Base Class
// ============================================

import type { ComponentKind, Entity, EventBus, EventPayload } from '#shared';
import { SystemPriority } from './types';

/**
 * What a World hands each system it registers
 */
export interface SystemContext {
  events: EventBus;
}

/**
 * What a system pass reads entities from. EntityManager satisfies it.
 */
export interface EntitySource {
  getEntitiesWith(...kinds: ComponentKind[]): Entity[];
}

/**
 * System - base class for update/draw passes over entities that carry
 * a fixed set of components.
 *
 * Subclasses either override processEntity()/drawEntity() for per-entity
 * work, or update()/draw() when they need the whole set at once
 * (collision pairs, sorting).
 */
export abstract class System {
  readonly name: string;
  requiredComponents: ComponentKind[] = [];
  priority: number = SystemPriority.GAMEPLAY;
  active = true;

  protected context: SystemContext | null = null;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Called when the system is registered with a World
   */
  init(context: SystemContext): void {
    this.context = context;
  }

  /**
   * Called when the system is removed from its World
   */
  destroy(): void {
    this.context = null;
  }

  /**
   * Set the component kinds an entity needs for this system to see it
   */
  requires(...kinds: ComponentKind[]): this {
    this.requiredComponents = kinds;
    return this;
  }

  /**
   * Lower numbers run first
   */
  setPriority(priority: number): this {
    this.priority = priority;
    return this;
  }

  activate(): this {
    this.active = true;
    return this;
  }

  deactivate(): this {
    this.active = false;
    return this;
  }

  /**
   * Active entities this system operates on (fresh array)
   */
  protected query(entities: EntitySource): Entity[] {
    return entities.getEntitiesWith(...this.requiredComponents);
  }

  /**
   * Run processEntity() for each matching entity
   */
  update(deltaTime: number, entities: EntitySource): void {
    if (!this.active) return;

    for (const entity of this.query(entities)) {
      this.processEntity(entity, deltaTime);
    }
  }

  /**
   * Run drawEntity() for each matching entity
   */
  draw(entities: EntitySource): void {
    if (!this.active) return;

    for (const entity of this.query(entities)) {
      this.drawEntity(entity);
    }
  }

  /**
   * Queue an event on the owning World's bus. No-op before init().
   */
  protected emit<K extends string>(eventType: K, data: EventPayload<K>): void {
    this.context?.events.emit(eventType, data);
  }

  // Override in derived systems
  protected processEntity(_entity: Entity, _deltaTime: number): void {}

  protected drawEntity(_entity: Entity): void {}
}
