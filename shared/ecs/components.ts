// ============================================
// ECS Component Interfaces
// Data shapes for the component kinds the core systems read
// ============================================

// ============================================
// Spatial Components
// ============================================

/**
 * Position - the point the spatial grid indexes.
 * Entities without one are never inserted into the grid.
 */
export interface PositionComponent {
  x: number;
  y: number;
}

/**
 * Transform - box in world space (top-left origin, pixels).
 * Used by: PhysicsSystem (integration), CollisionSystem (AABB)
 */
export interface TransformComponent {
  x: number;
  y: number;
  width: number;
  height: number;
  rotation?: number;
  scaleX?: number;
  scaleY?: number;
}

// ============================================
// Physics & Collision
// ============================================

/**
 * Physics - velocity and per-entity movement tuning.
 * Units: pixels per second (velocity), px/s² (gravity).
 *
 * isGrounded is re-earned every frame: PhysicsSystem clears it after
 * integrating, CollisionSystem sets it again on a verified landing.
 */
export interface PhysicsComponent {
  velocityX: number;
  velocityY: number;
  gravity?: number;       // Falls back to the PhysicsSystem gravity (default: GRAVITY)
  affectedByGravity: boolean;
  isGrounded: boolean;
  friction?: number;      // Fraction of velocityX removed per frame on the ground
  airResistance?: number; // Fraction of velocityX removed per frame in the air
  dampening?: number;     // Multiplier applied to both velocity axes every frame
  disabled?: boolean;
}

/**
 * Collider - collision filtering and box.
 * width/height fall back to the transform's size; offsets shift the box.
 */
export interface ColliderComponent {
  layer: string;
  collidesWithLayers: string[];
  width?: number;
  height?: number;
  offsetX?: number;
  offsetY?: number;
  isSolid?: boolean;   // Defaults to solid
  isTrigger?: boolean; // Triggers report contacts but never land on anything
}

// ============================================
// Classification & Presentation
// ============================================

/**
 * Type - gameplay classification ("player", "slime", "platform", ...).
 * Used in collision event names: collision:<type>, collision:<typeA>:<typeB>
 */
export interface TypeComponent {
  name: string;
}

/**
 * Renderable - hints for external draw passes. The core never reads it.
 */
export interface RenderableComponent {
  layer?: number;
  visible?: boolean;
  [hint: string]: unknown;
}

// ============================================
// Kind → shape registry
// ============================================

/**
 * Open record used for component kinds the core does not know about.
 */
export interface ComponentData {
  [field: string]: unknown;
}

/**
 * Maps each known component kind to its data shape.
 */
export interface ComponentMap {
  position: PositionComponent;
  transform: TransformComponent;
  physics: PhysicsComponent;
  collider: ColliderComponent;
  type: TypeComponent;
  renderable: RenderableComponent;
}

/**
 * Any component kind: a known one, or any other string.
 */
export type ComponentKind = keyof ComponentMap | (string & {});

/**
 * Data shape for a kind: typed for known kinds, open record otherwise.
 */
export type ComponentOf<K extends string> = K extends keyof ComponentMap ? ComponentMap[K] : ComponentData;

/**
 * Loosely-typed set of components keyed by kind (storage, snapshots).
 */
export interface ComponentRecords {
  [kind: string]: object | undefined;
}

/**
 * Component bundle for templates: known kinds are type-checked in full.
 */
export type ComponentBundle = Partial<ComponentMap> & ComponentRecords;

/**
 * Per-kind partial field overrides applied on top of a template.
 */
export type ComponentOverrides = {
  [K in keyof ComponentMap]?: Partial<ComponentMap[K]>;
} & ComponentRecords;
