// ============================================
// Built-in ECS Events
// Payload shapes for the events the core queues on a World's bus
// ============================================

import type { Entity } from './Entity';
import type { CollisionData } from './collision';
import type { ComponentOverrides, ComponentRecords } from './components';

export interface EntityEvent {
  entity: Entity;
}

export interface ComponentAddedEvent extends EntityEvent {
  componentType: string;
  component: unknown;
  oldComponent: unknown;
}

export interface ComponentRemovedEvent extends EntityEvent {
  componentType: string;
  component: unknown;
}

export interface TagEvent extends EntityEvent {
  tag: string;
}

export interface EntityResetEvent extends EntityEvent {
  oldComponents: Record<string, unknown>;
  oldTags: string[];
}

export interface EntityCreatedEvent extends EntityEvent {
  fromPool?: boolean;
  poolName?: string;
}

export interface TemplateEntityEvent {
  templateName: string;
  overrides?: ComponentOverrides;
}

export interface CollisionEvent {
  entityA: Entity;
  entityB: Entity;
  collisionData: CollisionData;
}

/** Payload of `collision:<typeA>` */
export interface TypedCollisionEvent {
  entity: Entity;
  other: Entity;
  collisionData: CollisionData;
}

/**
 * Event name → payload for every event the core emits.
 * Gameplay events use any other name; their payloads are a convention
 * between emitter and listener.
 */
export interface EcsEventMap {
  // Entity
  componentAdded: ComponentAddedEvent;
  componentRemoved: ComponentRemovedEvent;
  tagAdded: TagEvent;
  tagRemoved: TagEvent;
  entityActivated: EntityEvent;
  entityDeactivated: EntityEvent;
  entityReset: EntityResetEvent;
  entityDestroyed: EntityEvent;

  // EntityManager / World
  entityCreated: EntityCreatedEvent;
  entityRemoved: EntityEvent;
  entityReturnedToPool: EntityEvent;

  // Templates
  templateRegistered: { name: string; components: ComponentRecords };
  templateExtended: { baseName: string; newName: string };
  entityTemplateCreating: TemplateEntityEvent;
  entityTemplateCreated: TemplateEntityEvent & EntityEvent;
  entityTemplateApplying: TemplateEntityEvent & EntityEvent;
  entityTemplateApplied: TemplateEntityEvent & EntityEvent;

  // Systems / persistence
  systemAdded: { name: string; priority: number };
  worldLoaded: { entityCount: number };

  // Collision (qualified names carry TypedCollisionEvent / CollisionEvent)
  collision: CollisionEvent;
}

export type EcsEventType = keyof EcsEventMap;

/**
 * Payload for an event name: typed for built-ins, unknown otherwise.
 */
export type EventPayload<K extends string> = K extends EcsEventType ? EcsEventMap[K] : unknown;
