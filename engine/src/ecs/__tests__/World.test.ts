// ============================================
// World Integration Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EcsError, Entity, SpatialGrid, isEcsError } from '#shared';
import { World } from '../World';
import { PhysicsSystem, System } from '../systems';
import { logFrameSkipped } from '../../logger';
import { clearConfigOverrides, setConfigOverride } from '../../config';

class DeactivatingSystem extends System {
  constructor(private readonly victim: Entity) {
    super('DeactivatingSystem');
  }

  update(): void {
    this.victim.deactivate();
    this.emit('victimDown', { id: this.victim.id });
  }
}

function expectEcsError(fn: () => unknown, code: string): void {
  try {
    fn();
    expect.unreachable(`expected EcsError ${code}`);
  } catch (error) {
    expect(isEcsError(error) && error.code).toBe(code);
  }
}

describe('World', () => {
  let world: World;

  beforeEach(() => {
    vi.clearAllMocks();
    world = World.create();
  });

  describe('creation', () => {
    it('uses the default spatial configuration', () => {
      expect(world.spatialConfig).toEqual({
        cellSize: 100,
        worldBounds: { minX: -10000, minY: -10000, maxX: 10000, maxY: 10000 },
      });
      expect(world.spatialGrid.columns).toBe(200);
    });

    it('takes the default cell size from config overrides', () => {
      setConfigOverride('SPATIAL_CELL_SIZE', 50);
      try {
        expect(World.create().spatialGrid.cellSize).toBe(50);
        // A grid built without the engine keeps the static default
        expect(new SpatialGrid().cellSize).toBe(100);
      } finally {
        clearConfigOverrides();
      }
    });

    it('accepts a custom grid', () => {
      const small = World.create({ cellSize: 50, worldBounds: { minX: 0, minY: 0, maxX: 1000, maxY: 500 } });

      expect(small.spatialGrid.columns).toBe(20);
      expect(small.spatialGrid.rows).toBe(10);
    });

    it('rejects an unusable grid', () => {
      expectEcsError(() => World.create({ cellSize: 0 }), 'CONFIG_INVALID');
      expectEcsError(
        () => World.create({ worldBounds: { minX: 10, minY: 0, maxX: 10, maxY: 100 } }),
        'CONFIG_INVALID'
      );
    });

    it('keeps ids, templates and events separate per world', () => {
      const other = World.create();
      world.createEntity();
      world.registerTemplate('coin', { type: { name: 'coin' } });
      const seen = vi.fn();
      other.on('entityCreated', seen);

      expect(other.createEntity().id).toBe(1);
      expect(() => other.registerTemplate('coin', {})).not.toThrow();
      world.processEvents();
      expect(seen).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('runs systems, then cleanup, then delivers events', () => {
      const victim = world.createEntity();
      world.addSystem(new DeactivatingSystem(victim));
      let lookupDuringDelivery: Entity | null | undefined;
      world.on('victimDown', () => {
        lookupDuringDelivery = world.getEntityById(victim.id);
      });

      world.update(0.016);

      expect(lookupDuringDelivery).toBeNull();
      expect(world.getEntitiesWith()).toEqual([]);
    });

    it.each([0, -0.5, Number.NaN, Number.POSITIVE_INFINITY])('skips a frame with delta time %s', (deltaTime) => {
      const body = world.createEntity();
      body.addComponent('transform', { x: 0, y: 0, width: 1, height: 1 });
      body.addComponent('physics', { velocityX: 10, velocityY: 0, gravity: 0, affectedByGravity: false, isGrounded: false });
      world.addSystem(new PhysicsSystem());

      world.update(deltaTime);

      expect(body.getComponent('transform')?.x).toBe(0);
      expect(logFrameSkipped).toHaveBeenCalledWith(deltaTime);
      expect(world.events.getPendingEventCount()).toBeGreaterThan(0);
    });

    it('draws active systems', () => {
      const drawn = vi.fn();
      class Drawer extends System {
        draw(): void {
          drawn();
        }
      }
      world.addSystem(new Drawer('Drawer'));
      world.addSystem(new Drawer('Hidden')).deactivate();

      world.draw();

      expect(drawn).toHaveBeenCalledTimes(1);
    });
  });

  describe('entities', () => {
    it('queues entityCreated', () => {
      const created = vi.fn();
      world.on('entityCreated', created);

      const entity = world.createEntity();
      expect(created).not.toHaveBeenCalled();

      world.processEvents();
      expect(created).toHaveBeenCalledWith({ entity }, expect.any(Number));
    });

    it('addEntity adopts an entity and indexes its position', () => {
      const entity = new Entity(42).addComponent('position', { x: 5, y: 5 });

      world.addEntity(entity);

      expect(world.getEntityById(42)).toBe(entity);
      expect(world.getEntitiesInRadius(5, 5, 1)).toEqual([entity]);
      expect(world.createEntity().id).toBe(43);
    });

    it('addEntity rejects an id already in use', () => {
      world.createEntity();

      expectEcsError(() => world.addEntity(new Entity(1)), 'ENTITY_ID_CONFLICT');
    });

    it('removeEntity drops the entity and its grid entry at once', () => {
      const entity = world.createEntity().addComponent('position', { x: 0, y: 0 });
      world.processEvents();
      expect(world.getEntitiesInRadius(0, 0, 1)).toEqual([entity]);

      expect(world.removeEntity(entity)).toBe(true);
      expect(world.getEntitiesInRadius(0, 0, 1)).toEqual([]);
      expect(world.getEntityById(entity.id)).toBeNull();
    });

    it('destroyEntity hides the entity now and drops it at the next update', () => {
      const entity = world.createEntity().addComponent('position', { x: 0, y: 0 });
      world.processEvents();

      world.destroyEntity(entity);
      expect(entity.active).toBe(false);
      expect(world.getEntitiesInRadius(0, 0, 1)).toEqual([]);
      expect(world.getEntityById(entity.id)).toBe(entity);

      world.update(0.016);
      expect(world.getEntityById(entity.id)).toBeNull();
    });
  });

  describe('spatial bookkeeping', () => {
    it('indexes a position once its componentAdded event is delivered', () => {
      const entity = world.createEntity().addComponent('position', { x: 10, y: 10 });
      expect(world.getEntitiesInRadius(10, 10, 1)).toEqual([]);

      world.processEvents();
      expect(world.getEntitiesInRadius(10, 10, 1)).toEqual([entity]);
    });

    it('unindexes on position removal and deactivation', () => {
      const a = world.createEntity().addComponent('position', { x: 0, y: 0 });
      const b = world.createEntity().addComponent('position', { x: 0, y: 0 });
      world.processEvents();

      a.removeComponent('position');
      b.deactivate();
      world.processEvents();

      expect(world.spatialGrid.isIndexed(a)).toBe(false);
      expect(world.spatialGrid.isIndexed(b)).toBe(false);
    });

    it('updateEntityPosition re-indexes a moved entity immediately', () => {
      const entity = world.createEntity().addComponent('position', { x: 0, y: 0 });
      world.processEvents();

      const position = entity.getComponent('position');
      if (position) position.x = 1000;

      expect(world.updateEntityPosition(entity)).toBe(true);
      expect(world.getEntitiesInRect(900, -10, 200, 20)).toEqual([entity]);
      expect(world.getEntitiesInRadius(0, 0, 5)).toEqual([]);
    });

    it('reports broad-phase pairs from the grid', () => {
      const a = world.createEntity().addComponent('position', { x: 1, y: 1 });
      const b = world.createEntity().addComponent('position', { x: 2, y: 2 });
      world.processEvents();

      expect(world.getPotentialCollisionPairs()).toEqual([[a, b]]);
    });
  });

  describe('templates', () => {
    beforeEach(() => {
      world.registerTemplate('coin', {
        position: { x: 5, y: 5 },
        type: { name: 'coin' },
      });
    });

    it('creates entities from a template and indexes them at once', () => {
      const coin = world.createEntityFromTemplate('coin', { position: { x: 50 } });

      expect(coin.getComponent('position')).toEqual({ x: 50, y: 5 });
      expect(world.getEntitiesInRadius(50, 5, 0)).toEqual([coin]);
      expect(world.getEntitiesFromTemplate('coin')).toEqual([coin]);
    });

    it('queues creation events around the new entity', () => {
      const order: string[] = [];
      for (const type of ['entityTemplateCreating', 'entityCreated', 'entityTemplateCreated']) {
        world.on(type, () => order.push(type));
      }

      world.createEntityFromTemplate('coin');
      world.processEvents();

      expect(order).toEqual(['entityTemplateCreating', 'entityCreated', 'entityTemplateCreated']);
    });

    it('fails before creating anything for an unknown template', () => {
      expectEcsError(() => world.createEntityFromTemplate('ghost'), 'TEMPLATE_NOT_FOUND');
      expect(world.entityManager.count).toBe(0);
    });

    it('rejects registering a name twice', () => {
      expectEcsError(() => world.registerTemplate('coin', {}), 'TEMPLATE_EXISTS');
    });

    it('applyTemplate adds components and re-indexes', () => {
      const entity = world.createEntity().addComponent('position', { x: -500, y: -500 });
      world.processEvents();

      world.applyTemplate(entity, 'coin');

      expect(entity.hasTag('template:coin')).toBe(true);
      expect(world.getEntitiesInRadius(5, 5, 0)).toEqual([entity]);
    });

    it('extendTemplate derives a new template', () => {
      world.extendTemplate('coin', 'bigCoin', { renderable: { layer: 2 } }, { type: { name: 'bigCoin' } });

      const big = world.createEntityFromTemplate('bigCoin');
      expect(big.getComponent('type')).toEqual({ name: 'bigCoin' });
      expect(big.getComponent('renderable')).toEqual({ layer: 2 });
    });
  });

  describe('pools', () => {
    it('recycles entities through the pool and the grid', () => {
      const returned = vi.fn();
      world.on('entityReturnedToPool', returned);
      const bullet = world.getPooledEntity('bullets');
      bullet.addComponent('position', { x: 0, y: 0 });
      world.processEvents();
      expect(world.spatialGrid.isIndexed(bullet)).toBe(true);

      expect(world.returnToPool(bullet)).toBe(true);
      expect(world.spatialGrid.isIndexed(bullet)).toBe(false);

      world.update(0.016);
      expect(returned).toHaveBeenCalledTimes(1);
      expect(world.getEntityById(bullet.id)).toBeNull();

      const again = world.getPooledEntity('bullets');
      expect(again).toBe(bullet);
      expect(again.active).toBe(true);
      expect(again.hasComponent('position')).toBe(false);
    });

    it('returnToPool without a pool tag only deactivates', () => {
      const returned = vi.fn();
      world.on('entityReturnedToPool', returned);
      const entity = world.createEntity();

      expect(world.returnToPool(entity)).toBe(false);
      world.processEvents();

      expect(entity.active).toBe(false);
      expect(returned).not.toHaveBeenCalled();
    });
  });

  describe('systems', () => {
    it('registers, finds and removes systems', () => {
      const added = vi.fn();
      world.on('systemAdded', added);
      const physics = world.addSystem(new PhysicsSystem());

      expect(world.getSystem('PhysicsSystem')).toBe(physics);
      expectEcsError(() => world.addSystem(new PhysicsSystem()), 'SYSTEM_DUPLICATE');

      world.processEvents();
      expect(added).toHaveBeenCalledWith({ name: 'PhysicsSystem', priority: 20 }, expect.any(Number));

      expect(world.removeSystem('PhysicsSystem')).toBe(true);
      expect(world.getSystem('PhysicsSystem')).toBeNull();
    });
  });

  describe('events', () => {
    it('supports once and off', () => {
      const onceListener = vi.fn();
      const regular = vi.fn();
      world.once('ping', onceListener);
      const handle = world.on('ping', regular);

      world.emit('ping', 1);
      world.processEvents();
      world.off(handle);
      world.emit('ping', 2);
      world.processEvents();

      expect(onceListener).toHaveBeenCalledTimes(1);
      expect(regular).toHaveBeenCalledTimes(1);
    });
  });

  describe('resources', () => {
    it('stores singleton data by key', () => {
      world.setResource('level', { name: 'meadow' });

      expect(world.hasResource('level')).toBe(true);
      expect(world.getResource<{ name: string }>('level')?.name).toBe('meadow');
      expect(world.deleteResource('level')).toBe(true);
      expect(world.getResource('level')).toBeUndefined();
    });
  });

  describe('getStats', () => {
    it('summarises entities, systems, pools and the grid', () => {
      world.addSystem(new PhysicsSystem());
      world.registerTemplate('coin', { position: { x: 0, y: 0 } });
      world.createEntityFromTemplate('coin');
      const bullet = world.getPooledEntity('bullets');
      world.returnToPool(bullet);
      world.setResource('time', 0);

      expect(world.getStats()).toMatchObject({
        entityCount: 2,
        activeEntityCount: 1,
        systemCount: 1,
        templateCount: 1,
        pools: { bullets: 1 },
        indexedEntityCount: 1,
        occupiedCellCount: 1,
        resourceCount: 1,
      });
    });
  });

  it('EcsError is what configuration failures throw', () => {
    expect(() => World.create({ cellSize: -1 })).toThrow(EcsError);
  });
});
