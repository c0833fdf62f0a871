// ============================================
// Collision System
// AABB contacts between transform + collider entities
// ============================================

import {
  Components,
  isCollisionHandler,
  rectsOverlap,
  type ColliderComponent,
  type CollisionData,
  type Entity,
  type Rect,
} from '#shared';
import { getConfig } from '../../config';
import { System, type EntitySource } from './System';
import { SystemPriority, type DebugDrawSink } from './types';

export interface CollisionSystemOptions {
  /** Use a broad-phase hash grid instead of testing every pair */
  useSpatialGrid?: boolean;
  /** Broad-phase cell size in px (default: COLLISION_CELL_SIZE) */
  cellSize?: number;
  /** Stop solid landings: ground the faller and push it out (default: true) */
  groundOnLanding?: boolean;
  debugDraw?: boolean;
  debugSink?: DebugDrawSink;
}

/**
 * Collider box in world space: transform position plus collider offset,
 * collider size falling back to the transform's.
 */
export function getColliderBox(entity: Entity): Rect | null {
  const transform = entity.getComponent(Components.Transform);
  const collider = entity.getComponent(Components.Collider);
  if (!transform || !collider) return null;

  return {
    x: transform.x + (collider.offsetX ?? 0),
    y: transform.y + (collider.offsetY ?? 0),
    width: collider.width ?? transform.width,
    height: collider.height ?? transform.height,
  };
}

// Keeps zero components at +0
function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

/**
 * Contact data from the other participant's point of view
 */
export function flipCollision(collision: CollisionData): CollisionData {
  return {
    normal: { x: negate(collision.normal.x), y: negate(collision.normal.y) },
    penetration: { x: negate(collision.penetration.x), y: negate(collision.penetration.y) },
    point: collision.point,
    fromAbove: collision.normal.y > 0,
  };
}

function typeName(entity: Entity): string {
  return entity.getComponent(Components.Type)?.name ?? 'entity';
}

// ============================================
// Broad phase
// ============================================

interface CellRange {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

function sameRange(a: CellRange | null, b: CellRange | null): boolean {
  if (!a || !b) return a === b;
  return a.x0 === b.x0 && a.y0 === b.y0 && a.x1 === b.x1 && a.y1 === b.y1;
}

/**
 * Hash of collider boxes by the cells they cover, for one collision pass.
 * Strictly overlapping boxes always share a cell.
 */
class BroadPhaseGrid {
  private cells = new Map<string, Set<number>>();
  private ranges: Array<CellRange | null> = [];

  constructor(
    private readonly list: Entity[],
    private readonly cellSize: number
  ) {
    for (let index = 0; index < list.length; index++) {
      this.ranges.push(null);
      this.refresh(index);
    }
  }

  /**
   * Re-file every entity from `start` on whose box changed cells
   */
  refreshFrom(start: number): void {
    for (let index = start; index < this.list.length; index++) {
      this.refresh(index);
    }
  }

  /**
   * Ascending indices above `after` that share a cell with entity `index`
   */
  partnersOf(index: number, after: number): number[] {
    const range = this.ranges[index];
    if (!range) return [];

    const partners = new Set<number>();
    this.forEachCell(range, (key) => {
      for (const other of this.cells.get(key) ?? []) {
        if (other > after && other !== index) partners.add(other);
      }
    });
    return Array.from(partners).sort((a, b) => a - b);
  }

  private refresh(index: number): void {
    const next = this.rangeOf(this.list[index]);
    const previous = this.ranges[index];
    if (sameRange(previous, next)) return;

    if (previous) {
      this.forEachCell(previous, (key) => {
        const bucket = this.cells.get(key);
        bucket?.delete(index);
        if (bucket && bucket.size === 0) {
          this.cells.delete(key);
        }
      });
    }
    if (next) {
      this.forEachCell(next, (key) => {
        const bucket = this.cells.get(key);
        if (bucket) {
          bucket.add(index);
        } else {
          this.cells.set(key, new Set([index]));
        }
      });
    }
    this.ranges[index] = next;
  }

  private rangeOf(entity: Entity): CellRange | null {
    const box = getColliderBox(entity);
    if (!box || ![box.x, box.y, box.width, box.height].every(Number.isFinite)) return null;

    const right = box.x + box.width;
    const bottom = box.y + box.height;
    return {
      x0: Math.floor(Math.min(box.x, right) / this.cellSize),
      y0: Math.floor(Math.min(box.y, bottom) / this.cellSize),
      x1: Math.floor(Math.max(box.x, right) / this.cellSize),
      y1: Math.floor(Math.max(box.y, bottom) / this.cellSize),
    };
  }

  private forEachCell(range: CellRange, visit: (key: string) => void): void {
    for (let cy = range.y0; cy <= range.y1; cy++) {
      for (let cx = range.x0; cx <= range.x1; cx++) {
        visit(`${cx},${cy}`);
      }
    }
  }
}

/**
 * CollisionSystem - detects overlapping colliders and reports each contact
 * every frame it persists.
 *
 * For each colliding pair (A before B in query order):
 * - queues `collision`, `collision:<typeA>` and `collision:<typeA>:<typeB>`
 * - grounds a mover that landed on a solid collider (groundOnLanding)
 * - calls onCollision on A's gameplay object, B's, then A and B themselves
 *   (B always receives the flipped contact)
 *
 * Runs before PhysicsSystem.
 */
export class CollisionSystem extends System {
  readonly useSpatialGrid: boolean;
  readonly cellSize: number;
  groundOnLanding: boolean;
  debugDraw: boolean;
  private debugSink: DebugDrawSink | null;

  constructor(options: CollisionSystemOptions = {}) {
    super('CollisionSystem');
    this.requires(Components.Transform, Components.Collider);
    this.setPriority(SystemPriority.COLLISION);

    this.useSpatialGrid = options.useSpatialGrid ?? false;
    this.cellSize = options.cellSize ?? getConfig('COLLISION_CELL_SIZE');
    this.groundOnLanding = options.groundOnLanding ?? true;
    this.debugDraw = options.debugDraw ?? false;
    this.debugSink = options.debugSink ?? null;
  }

  update(_deltaTime: number, entities: EntitySource): void {
    if (!this.active) return;

    const list = this.query(entities);
    if (this.useSpatialGrid) {
      this.updateWithGrid(list);
      return;
    }

    for (let i = 0; i < list.length; i++) {
      const entityA = list[i];
      for (let j = i + 1; j < list.length; j++) {
        // Hooks may deactivate either side mid-frame
        if (!entityA.active) break;

        const entityB = list[j];
        if (!entityB.active) continue;

        this.testPair(entityA, entityB);
      }
    }
  }

  /**
   * Same pairs, same order as the all-pairs scan, testing only partners that
   * share a broad-phase cell. Landings and hooks can move bodies, so after
   * each contact the hash is refreshed and A's remaining partners re-read.
   */
  private updateWithGrid(list: Entity[]): void {
    const grid = new BroadPhaseGrid(list, this.cellSize);

    for (let i = 0; i < list.length; i++) {
      const entityA = list[i];
      let partners = grid.partnersOf(i, i);

      for (let k = 0; k < partners.length; k++) {
        if (!entityA.active) break;

        const j = partners[k];
        const entityB = list[j];
        if (!entityB.active) continue;

        if (this.testPair(entityA, entityB)) {
          grid.refreshFrom(i);
          partners = grid.partnersOf(i, j);
          k = -1;
        }
      }
    }
  }

  /**
   * Returns true when the pair collided and was dispatched
   */
  private testPair(entityA: Entity, entityB: Entity): boolean {
    const colliderA = entityA.getComponent(Components.Collider);
    const colliderB = entityB.getComponent(Components.Collider);
    const boxA = getColliderBox(entityA);
    const boxB = getColliderBox(entityB);
    if (!colliderA || !colliderB || !boxA || !boxB) return false;

    if (!this.canLayersCollide(colliderA, colliderB)) return false;

    const collision = this.checkCollision(boxA, boxB);
    if (!collision) return false;

    this.handleCollision(entityA, entityB, collision);
    return true;
  }

  /**
   * True when either collider lists the other's layer
   */
  canLayersCollide(a: ColliderComponent, b: ColliderComponent): boolean {
    return a.collidesWithLayers.includes(b.layer) || b.collidesWithLayers.includes(a.layer);
  }

  /**
   * Strict AABB test. Returns A's contact data, or null when the boxes
   * only touch or are apart.
   */
  checkCollision(a: Rect, b: Rect): CollisionData | null {
    if (!rectsOverlap(a, b)) return null;

    const dx = a.x + a.width / 2 - (b.x + b.width / 2);
    const dy = a.y + a.height / 2 - (b.y + b.height / 2);

    // Overlap on each axis
    const px = (a.width + b.width) / 2 - Math.abs(dx);
    const py = (a.height + b.height) / 2 - Math.abs(dy);

    // Normal along the axis of least penetration (ties resolve vertically)
    let nx = 0;
    let ny = 0;
    if (px < py) {
      nx = dx < 0 ? -1 : 1;
    } else {
      ny = dy < 0 ? -1 : 1;
    }

    return {
      normal: { x: nx, y: ny },
      penetration: { x: px * nx, y: py * ny },
      point: {
        x: dx < 0 ? a.x + a.width : b.x,
        y: dy < 0 ? a.y + a.height : b.y,
      },
      fromAbove: ny < 0,
    };
  }

  private handleCollision(entityA: Entity, entityB: Entity, collision: CollisionData): void {
    const typeA = typeName(entityA);
    const typeB = typeName(entityB);
    const flipped = flipCollision(collision);

    this.emit('collision', { entityA, entityB, collisionData: collision });
    this.emit(`collision:${typeA}`, { entity: entityA, other: entityB, collisionData: collision });
    this.emit(`collision:${typeA}:${typeB}`, { entityA, entityB, collisionData: collision });

    if (this.groundOnLanding) {
      this.landOn(entityA, entityB, collision);
      this.landOn(entityB, entityA, flipped);
    }

    const originalA = entityA.originalEntity;
    const originalB = entityB.originalEntity;

    if (isCollisionHandler(originalA)) {
      originalA.onCollision(originalB ?? entityB, collision);
    }
    if (isCollisionHandler(originalB)) {
      originalB.onCollision(originalA ?? entityA, flipped);
    }
    entityA.onCollision?.(entityB, collision);
    entityB.onCollision?.(entityA, flipped);
  }

  /**
   * Ground `mover` when it came down onto a solid `ground`
   */
  private landOn(mover: Entity, ground: Entity, collision: CollisionData): void {
    if (!collision.fromAbove) return;

    const moverCollider = mover.getComponent(Components.Collider);
    const groundCollider = ground.getComponent(Components.Collider);
    if (!moverCollider || !groundCollider) return;
    if (moverCollider.isTrigger || groundCollider.isSolid === false) return;

    const physics = mover.getComponent(Components.Physics);
    const transform = mover.getComponent(Components.Transform);
    if (!physics || !transform || physics.velocityY < 0) return;

    physics.isGrounded = true;
    physics.velocityY = 0;
    transform.y += collision.penetration.y;
  }

  // ============================================
  // Debug draw
  // ============================================

  setDebugSink(sink: DebugDrawSink | null): void {
    this.debugSink = sink;
  }

  toggleDebugDraw(): boolean {
    this.debugDraw = !this.debugDraw;
    return this.debugDraw;
  }

  draw(entities: EntitySource): void {
    if (!this.active || !this.debugDraw || !this.debugSink) return;
    super.draw(entities);
  }

  protected drawEntity(entity: Entity): void {
    const box = getColliderBox(entity);
    const collider = entity.getComponent(Components.Collider);
    if (!box || !collider || !this.debugSink) return;

    this.debugSink.drawRect(box.x, box.y, box.width, box.height, collider.layer);
  }
}
