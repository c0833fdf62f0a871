// ============================================
// ECS Entity
// ============================================

import { cloneData } from './clone';
import type { CollisionData } from './collision';
import type { ComponentKind, ComponentOf } from './components';
import type { EventBus } from './EventBus';
import type { EntityId } from './types';

/**
 * Notified when an entity's tag set changes, so tag indexes stay current.
 */
export interface TagObserver {
  onTagAdded(entity: Entity, tag: string): void;
  onTagRemoved(entity: Entity, tag: string): void;
}

/**
 * Entity - identity plus an owned bag of components and tags.
 *
 * Component and tag changes are reported as queued events on the bus the
 * entity is attached to (its World's). A detached entity mutates silently.
 */
export class Entity {
  readonly id: EntityId;

  private components = new Map<string, unknown>();
  private tags = new Set<string>();
  private _active = true;
  private bus: EventBus | null = null;
  private tagObserver: TagObserver | null = null;

  /**
   * Gameplay object that owns this entity, if any.
   * Collision hooks are looked up here before the entity itself.
   */
  originalEntity: object | null = null;

  /**
   * Optional per-entity collision hook.
   */
  onCollision?: (other: object, collision: CollisionData) => void;

  constructor(id: EntityId) {
    this.id = id;
  }

  get active(): boolean {
    return this._active;
  }

  // ============================================
  // World wiring
  // ============================================

  /**
   * Route this entity's events to a bus (called by the owning EntityManager).
   */
  attach(bus: EventBus): this {
    this.bus = bus;
    return this;
  }

  detach(): this {
    this.bus = null;
    return this;
  }

  get isAttached(): boolean {
    return this.bus !== null;
  }

  observeTags(observer: TagObserver | null): void {
    this.tagObserver = observer;
  }

  // ============================================
  // Components
  // ============================================

  /**
   * Add (or replace) a component. Stores a deep copy of `data`.
   */
  addComponent<K extends ComponentKind>(kind: K, data: ComponentOf<K>): this {
    const component = cloneData(data);
    const oldComponent = this.components.get(kind);
    this.components.set(kind, component);

    this.bus?.emit('componentAdded', {
      entity: this,
      componentType: kind,
      component,
      oldComponent: oldComponent ?? null,
    });

    return this;
  }

  /**
   * Get a component by kind, or null if absent.
   * The returned object is the stored one: systems mutate it in place.
   */
  getComponent<K extends ComponentKind>(kind: K): ComponentOf<K> | null {
    if (!this.components.has(kind)) return null;
    return this.components.get(kind) as ComponentOf<K>;
  }

  hasComponent(kind: ComponentKind): boolean {
    return this.components.has(kind);
  }

  /**
   * Remove a component. No-op (and no event) when absent.
   */
  removeComponent(kind: ComponentKind): this {
    if (!this.components.has(kind)) return this;

    const component = this.components.get(kind);
    this.components.delete(kind);
    this.bus?.emit('componentRemoved', { entity: this, componentType: kind, component });
    return this;
  }

  getComponentKinds(): string[] {
    return Array.from(this.components.keys());
  }

  /**
   * Iterate (kind, data) pairs. Used by serialization and debugging.
   */
  componentEntries(): IterableIterator<[string, unknown]> {
    return this.components.entries();
  }

  get componentCount(): number {
    return this.components.size;
  }

  // ============================================
  // Tags
  // ============================================

  addTag(tag: string): this {
    if (this.tags.has(tag)) return this;

    this.tags.add(tag);
    this.tagObserver?.onTagAdded(this, tag);
    this.bus?.emit('tagAdded', { entity: this, tag });
    return this;
  }

  hasTag(tag: string): boolean {
    return this.tags.has(tag);
  }

  removeTag(tag: string): this {
    if (!this.tags.has(tag)) return this;

    this.tags.delete(tag);
    this.tagObserver?.onTagRemoved(this, tag);
    this.bus?.emit('tagRemoved', { entity: this, tag });
    return this;
  }

  getTags(): string[] {
    return Array.from(this.tags);
  }

  // ============================================
  // Lifecycle
  // ============================================

  activate(): this {
    if (this._active) return this;

    this._active = true;
    this.bus?.emit('entityActivated', { entity: this });
    return this;
  }

  deactivate(): this {
    if (!this._active) return this;

    this._active = false;
    this.bus?.emit('entityDeactivated', { entity: this });
    return this;
  }

  /**
   * Clear all components and tags and reactivate. Used by pooling.
   * The entityReset event carries what the entity held before the reset.
   */
  reset(): this {
    const oldComponents = Object.fromEntries(this.components);
    const oldTags = Array.from(this.tags);

    this.bus?.emit('entityReset', { entity: this, oldComponents, oldTags });

    this.components = new Map();
    this.tags = new Set();
    for (const tag of oldTags) {
      this.tagObserver?.onTagRemoved(this, tag);
    }
    this._active = true;

    return this;
  }

  /**
   * Deactivate, then announce destruction. Removal happens at the next cleanup.
   */
  destroy(): this {
    this.deactivate();
    this.bus?.emit('entityDestroyed', { entity: this });
    return this;
  }
}
