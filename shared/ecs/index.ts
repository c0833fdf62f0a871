// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { Entity } from './Entity';
export type { TagObserver } from './Entity';
export { EventBus } from './EventBus';
export type { EventCallback, ListenerHandle, EventBusOptions } from './EventBus';
export { SpatialGrid, createGrid, validateGridConfig, DEFAULT_WORLD_BOUNDS } from './SpatialGrid';
export type { WorldBounds, SpatialGridOptions } from './SpatialGrid';
export { EntityManager } from './EntityManager';
export { TemplateRegistry } from './ComponentTemplate';
export type { ComponentTemplate } from './ComponentTemplate';

// Errors
export { EcsError, isEcsError } from './errors';
export type { EcsErrorCode } from './errors';

// Types and constants
export { Components, Tags, templateTag, consoleLogger, ok, err } from './types';
export type { EntityId, EcsLogger, Result } from './types';

// Collision contact types
export { isCollisionHandler } from './collision';
export type { CollisionData, CollisionHandler } from './collision';

// Value copying
export { cloneData, toSerializable } from './clone';
export type { JsonValue, JsonPrimitive } from './clone';

// Component interfaces
export type {
  PositionComponent,
  TransformComponent,
  PhysicsComponent,
  ColliderComponent,
  TypeComponent,
  RenderableComponent,
  ComponentData,
  ComponentMap,
  ComponentKind,
  ComponentOf,
  ComponentRecords,
  ComponentBundle,
  ComponentOverrides,
} from './components';

// Event payloads
export type {
  EcsEventMap,
  EcsEventType,
  EventPayload,
  EntityEvent,
  ComponentAddedEvent,
  ComponentRemovedEvent,
  TagEvent,
  EntityResetEvent,
  EntityCreatedEvent,
  TemplateEntityEvent,
  CollisionEvent,
  TypedCollisionEvent,
} from './events';
