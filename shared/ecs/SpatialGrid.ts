// ============================================
// Spatial Grid
// Uniform-cell index over entities that carry a position
// ============================================

import { ENGINE_CONFIG } from '../constants';
import { clamp, distanceSquared, isFiniteNumber, type Vec2 } from '../math';
import { Components, type EntityId } from './types';
import type { Entity } from './Entity';
import { EcsError } from './errors';

export interface WorldBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface SpatialGridOptions {
  cellSize?: number;
  bounds?: WorldBounds;
  /** Component the grid reads x/y from (default: position) */
  positionComponent?: string;
}

export const DEFAULT_WORLD_BOUNDS: WorldBounds = {
  minX: ENGINE_CONFIG.WORLD_MIN_X,
  minY: ENGINE_CONFIG.WORLD_MIN_Y,
  maxX: ENGINE_CONFIG.WORLD_MAX_X,
  maxY: ENGINE_CONFIG.WORLD_MAX_Y,
};

interface CellRef {
  key: number;
  cellX: number;
  cellY: number;
}

/**
 * Throws EcsError(CONFIG_INVALID) for a cell size or bounds the grid cannot use.
 */
export function validateGridConfig(cellSize: number, bounds: WorldBounds): void {
  if (!isFiniteNumber(cellSize) || cellSize <= 0) {
    throw EcsError.configInvalid(`Spatial grid cell size must be a positive number, got ${cellSize}`, { cellSize });
  }
  const { minX, minY, maxX, maxY } = bounds;
  if (![minX, minY, maxX, maxY].every(isFiniteNumber)) {
    throw EcsError.configInvalid('Spatial grid bounds must be finite numbers', { bounds });
  }
  if (maxX <= minX || maxY <= minY) {
    throw EcsError.configInvalid('Spatial grid bounds must have max greater than min on both axes', { bounds });
  }
}

/**
 * SpatialGrid - each indexed entity sits in exactly one cell, the one its
 * position mapped to at the last insert/update. Positions outside the bounds
 * clamp into the edge cells.
 *
 * The grid does not watch entities: callers update/remove at lifecycle points.
 *
 * Without a cellSize option the static ENGINE_CONFIG default is used. Runtime
 * overrides of SPATIAL_CELL_SIZE reach a grid only through World.create, which
 * resolves the cell size from engine config and passes it in.
 */
export class SpatialGrid {
  readonly cellSize: number;
  readonly bounds: Readonly<WorldBounds>;
  readonly columns: number;
  readonly rows: number;
  readonly positionComponent: string;

  private cells = new Map<number, Map<EntityId, Entity>>();
  private entityCells = new Map<EntityId, CellRef>();

  constructor(options: SpatialGridOptions = {}) {
    const cellSize = options.cellSize ?? ENGINE_CONFIG.SPATIAL_CELL_SIZE;
    const bounds = options.bounds ?? DEFAULT_WORLD_BOUNDS;
    validateGridConfig(cellSize, bounds);

    this.cellSize = cellSize;
    this.bounds = { ...bounds };
    this.columns = Math.max(1, Math.ceil((bounds.maxX - bounds.minX) / cellSize));
    this.rows = Math.max(1, Math.ceil((bounds.maxY - bounds.minY) / cellSize));
    this.positionComponent = options.positionComponent ?? Components.Position;
  }

  // ============================================
  // Cell math
  // ============================================

  /**
   * World coordinates → zero-based cell coordinates, clamped into the grid.
   */
  worldToCell(x: number, y: number): { cellX: number; cellY: number } {
    const cellX = clamp(Math.floor((x - this.bounds.minX) / this.cellSize), 0, this.columns - 1);
    const cellY = clamp(Math.floor((y - this.bounds.minY) / this.cellSize), 0, this.rows - 1);
    return { cellX, cellY };
  }

  private cellKey(cellX: number, cellY: number): number {
    return cellY * this.columns + cellX;
  }

  /**
   * Read the indexed position, or null when the entity has none usable.
   */
  private readPosition(entity: Entity): Vec2 | null {
    const position = entity.getComponent(this.positionComponent);
    if (!position) return null;
    const { x, y } = position;
    if (!isFiniteNumber(x) || !isFiniteNumber(y)) return null;
    return { x, y };
  }

  // ============================================
  // Index maintenance
  // ============================================

  /**
   * Index an entity. Returns false when it has no usable position.
   * An entity that is already indexed is moved to its current cell.
   */
  insertEntity(entity: Entity): boolean {
    const position = this.readPosition(entity);
    if (!position) return false;

    if (this.entityCells.has(entity.id)) {
      this.removeEntity(entity);
    }

    const { cellX, cellY } = this.worldToCell(position.x, position.y);
    const key = this.cellKey(cellX, cellY);

    let cell = this.cells.get(key);
    if (!cell) {
      cell = new Map();
      this.cells.set(key, cell);
    }
    cell.set(entity.id, entity);
    this.entityCells.set(entity.id, { key, cellX, cellY });

    return true;
  }

  /**
   * Remove an entity from the index. Returns false if it was not indexed.
   */
  removeEntity(entity: Entity): boolean {
    const ref = this.entityCells.get(entity.id);
    if (!ref) return false;

    const cell = this.cells.get(ref.key);
    if (cell) {
      cell.delete(entity.id);
      if (cell.size === 0) {
        this.cells.delete(ref.key);
      }
    }
    this.entityCells.delete(entity.id);

    return true;
  }

  /**
   * Re-index after a move: remove then insert.
   */
  updateEntity(entity: Entity): boolean {
    this.removeEntity(entity);
    return this.insertEntity(entity);
  }

  clear(): void {
    this.cells.clear();
    this.entityCells.clear();
  }

  isIndexed(entity: Entity): boolean {
    return this.entityCells.has(entity.id);
  }

  /**
   * Cell an entity was filed under at its last insert, or null.
   */
  getCellOf(entity: Entity): { cellX: number; cellY: number } | null {
    const ref = this.entityCells.get(entity.id);
    return ref ? { cellX: ref.cellX, cellY: ref.cellY } : null;
  }

  /** Number of indexed entities */
  get size(): number {
    return this.entityCells.size;
  }

  /** Number of non-empty cells */
  get cellCount(): number {
    return this.cells.size;
  }

  // ============================================
  // Queries
  // ============================================

  getEntitiesInCell(cellX: number, cellY: number): Entity[] {
    if (cellX < 0 || cellX >= this.columns || cellY < 0 || cellY >= this.rows) return [];
    const cell = this.cells.get(this.cellKey(cellX, cellY));
    return cell ? Array.from(cell.values()) : [];
  }

  /**
   * Entities whose position lies within `radius` of (x, y), inclusive.
   */
  getEntitiesInRadius(x: number, y: number, radius: number): Entity[] {
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(radius) || radius < 0) return [];

    const center = { x, y };
    const radiusSq = radius * radius;
    return this.collectInCellRange(x - radius, y - radius, x + radius, y + radius, (position) =>
      distanceSquared(position, center) <= radiusSq
    );
  }

  /**
   * Entities whose position lies inside the rectangle (edges included).
   * A negative width or height extends the rectangle the other way.
   */
  getEntitiesInRect(x: number, y: number, width: number, height: number): Entity[] {
    if (![x, y, width, height].every(isFiniteNumber)) return [];

    const minX = Math.min(x, x + width);
    const maxX = Math.max(x, x + width);
    const minY = Math.min(y, y + height);
    const maxY = Math.max(y, y + height);

    return this.collectInCellRange(
      minX,
      minY,
      maxX,
      maxY,
      (position) => position.x >= minX && position.x <= maxX && position.y >= minY && position.y <= maxY
    );
  }

  /**
   * Broad phase: every unique pair of entities sharing a cell.
   * Candidates only; callers must run an exact overlap test.
   */
  getPotentialCollisionPairs(): Array<[Entity, Entity]> {
    const pairs: Array<[Entity, Entity]> = [];

    for (const cell of this.cells.values()) {
      const entities = Array.from(cell.values());
      for (let i = 0; i < entities.length; i++) {
        for (let j = i + 1; j < entities.length; j++) {
          pairs.push([entities[i], entities[j]]);
        }
      }
    }

    return pairs;
  }

  /**
   * Visit every cell overlapping [minX, maxX] × [minY, maxY] and keep the
   * entities whose current position passes `accept`.
   */
  private collectInCellRange(
    minX: number,
    minY: number,
    maxX: number,
    maxY: number,
    accept: (position: Vec2) => boolean
  ): Entity[] {
    const result: Entity[] = [];
    const from = this.worldToCell(minX, minY);
    const to = this.worldToCell(maxX, maxY);

    for (let cellY = from.cellY; cellY <= to.cellY; cellY++) {
      for (let cellX = from.cellX; cellX <= to.cellX; cellX++) {
        const cell = this.cells.get(this.cellKey(cellX, cellY));
        if (!cell) continue;

        for (const entity of cell.values()) {
          const position = this.readPosition(entity);
          if (position && accept(position)) {
            result.push(entity);
          }
        }
      }
    }

    return result;
  }
}

/**
 * Create a grid with the given cell size and bounds (defaults when omitted).
 */
export function createGrid(cellSize?: number, bounds?: WorldBounds): SpatialGrid {
  return new SpatialGrid({ cellSize, bounds });
}
