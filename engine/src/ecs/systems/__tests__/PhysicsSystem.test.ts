// ============================================
// PhysicsSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EntityManager } from '#shared';
import { PhysicsSystem } from '../PhysicsSystem';
import { SystemPriority } from '../types';
import { clearConfigOverrides, setConfigOverride } from '../../../config';
import { createBody, requirePhysics, requireTransform } from './testUtils';

describe('PhysicsSystem', () => {
  let entities: EntityManager;
  let system: PhysicsSystem;

  beforeEach(() => {
    entities = new EntityManager();
    system = new PhysicsSystem();
  });

  afterEach(() => {
    clearConfigOverrides();
  });

  it('requires transform and physics and runs after collision', () => {
    expect(system.name).toBe('PhysicsSystem');
    expect(system.requiredComponents).toEqual(['transform', 'physics']);
    expect(system.priority).toBe(SystemPriority.PHYSICS);
    expect(system.priority).toBeGreaterThan(SystemPriority.COLLISION);
  });

  describe('gravity', () => {
    it('accelerates downward and integrates position', () => {
      const body = createBody(entities, { physics: { gravity: 400, affectedByGravity: true } });

      system.update(0.5, entities);

      expect(requirePhysics(body).velocityY).toBe(200);
      expect(requireTransform(body).y).toBe(100);
    });

    it('falls back to the configured gravity for components without their own', () => {
      setConfigOverride('GRAVITY', 100);
      const tuned = new PhysicsSystem();
      const body = createBody(entities, { physics: { gravity: undefined, affectedByGravity: true } });

      tuned.update(0.5, entities);

      expect(tuned.gravity).toBe(100);
      expect(requirePhysics(body).velocityY).toBe(50);
      expect(requireTransform(body).y).toBe(25);
      expect(new PhysicsSystem({ gravity: 30 }).gravity).toBe(30);
    });

    it('clamps to terminal velocity', () => {
      const body = createBody(entities, { physics: { velocityY: 990, gravity: 400, affectedByGravity: true } });

      system.update(0.1, entities);

      expect(requirePhysics(body).velocityY).toBe(1000);
      expect(requireTransform(body).y).toBeCloseTo(100);
    });

    it('takes terminal velocity from config overrides', () => {
      setConfigOverride('TERMINAL_VELOCITY', 500);
      const tuned = new PhysicsSystem();
      const body = createBody(entities, { physics: { velocityY: 490, gravity: 400, affectedByGravity: true } });

      tuned.update(0.1, entities);

      expect(tuned.terminalVelocity).toBe(500);
      expect(requirePhysics(body).velocityY).toBe(500);
    });

    it('leaves bodies that ignore gravity alone', () => {
      const body = createBody(entities, { physics: { gravity: 400, affectedByGravity: false } });

      system.update(1, entities);

      expect(requirePhysics(body).velocityY).toBe(0);
      expect(requireTransform(body).y).toBe(0);
    });
  });

  describe('horizontal drag', () => {
    it('applies friction on the ground', () => {
      const body = createBody(entities, { physics: { velocityX: 100, friction: 0.5, isGrounded: true } });

      system.update(1, entities);

      expect(requirePhysics(body).velocityX).toBe(50);
      expect(requireTransform(body).x).toBe(50);
    });

    it('snaps tiny ground velocity to zero', () => {
      const body = createBody(entities, { physics: { velocityX: 0.15, friction: 0.5, isGrounded: true } });

      system.update(1, entities);

      expect(requirePhysics(body).velocityX).toBe(0);
      expect(requireTransform(body).x).toBe(0);
    });

    it('applies air resistance instead of friction in the air', () => {
      const body = createBody(entities, {
        physics: { velocityX: 100, friction: 0.5, airResistance: 0.25, isGrounded: false },
      });

      system.update(1, entities);

      expect(requirePhysics(body).velocityX).toBe(75);
      expect(requireTransform(body).x).toBe(75);
    });
  });

  it('clears isGrounded every frame', () => {
    const body = createBody(entities, { physics: { isGrounded: true } });

    system.update(0.016, entities);

    expect(requirePhysics(body).isGrounded).toBe(false);
  });

  describe('dampening', () => {
    it('applies component dampening after integrating', () => {
      const body = createBody(entities, { physics: { velocityX: 10, velocityY: 20, dampening: 0.5 } });

      system.update(1, entities);

      expect(requireTransform(body).x).toBe(10);
      expect(requireTransform(body).y).toBe(20);
      expect(requirePhysics(body).velocityX).toBe(5);
      expect(requirePhysics(body).velocityY).toBe(10);
    });

    it('falls back to the system dampening', () => {
      const damped = new PhysicsSystem({ dampening: 0.5 });
      const plain = createBody(entities, { physics: { velocityX: 10 } });
      const ownSetting = createBody(entities, { physics: { velocityX: 10, dampening: 1 } });

      damped.update(1, entities);

      expect(requirePhysics(plain).velocityX).toBe(5);
      expect(requirePhysics(ownSetting).velocityX).toBe(10);
    });
  });

  describe('skipping', () => {
    it('skips disabled physics', () => {
      const body = createBody(entities, { physics: { velocityX: 10, gravity: 400, affectedByGravity: true, disabled: true } });

      system.update(1, entities);

      expect(requireTransform(body).x).toBe(0);
      expect(requirePhysics(body).velocityY).toBe(0);
    });

    it('skips inactive entities and entities without physics', () => {
      const sleeping = createBody(entities, { physics: { velocityX: 10 } });
      sleeping.deactivate();
      const scenery = createBody(entities);

      system.update(1, entities);

      expect(requireTransform(sleeping).x).toBe(0);
      expect(requireTransform(scenery).x).toBe(0);
    });

    it('does nothing while the system is inactive', () => {
      const body = createBody(entities, { physics: { velocityX: 10 } });

      system.deactivate().update(1, entities);

      expect(requireTransform(body).x).toBe(0);
    });
  });
});
