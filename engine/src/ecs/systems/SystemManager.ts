// ============================================
// ECS System Manager
// Registers systems and runs them in priority order
// ============================================

import { EcsError } from '#shared';
import { logger, perfLogger } from '../../logger';
import { getConfig } from '../../config';
import type { EntitySource, System, SystemContext } from './System';

type SystemPass = 'update' | 'draw';

/**
 * SystemManager - owns a World's systems
 *
 * Systems are executed in priority order (lower numbers first); equal
 * priorities run in registration order. A system that throws is logged and
 * skipped for the rest of that pass.
 */
export class SystemManager {
  private systems: System[] = [];
  private systemsByName = new Map<string, System>();

  constructor(private readonly context: SystemContext | null = null) {}

  /**
   * Register a system. Throws EcsError(SYSTEM_DUPLICATE) if the name is taken.
   */
  addSystem<T extends System>(system: T): T {
    if (this.systemsByName.has(system.name)) {
      throw EcsError.systemDuplicate(system.name);
    }

    this.systems.push(system);
    this.systemsByName.set(system.name, system);
    if (this.context) {
      system.init(this.context);
    }
    return system;
  }

  removeSystem(name: string): boolean {
    const system = this.systemsByName.get(name);
    if (!system) return false;

    this.systems.splice(this.systems.indexOf(system), 1);
    this.systemsByName.delete(name);
    system.destroy();
    return true;
  }

  getSystem(name: string): System | null {
    return this.systemsByName.get(name) ?? null;
  }

  activateSystem(name: string): boolean {
    const system = this.systemsByName.get(name);
    system?.activate();
    return system !== undefined;
  }

  deactivateSystem(name: string): boolean {
    const system = this.systemsByName.get(name);
    system?.deactivate();
    return system !== undefined;
  }

  /**
   * Run every active system's update pass.
   * Tracks per-system timing and logs when the frame is slow.
   */
  update(deltaTime: number, entities: EntitySource): void {
    const frameStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const system of this.ordered()) {
      if (!system.active) continue;

      const systemStart = performance.now();
      this.run(system, 'update', () => system.update(deltaTime, entities));
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - frameStart;

    if (totalMs > getConfig('SLOW_FRAME_MS')) {
      // Slowest first, skip systems under 0.5ms
      const sorted = [...timings].sort((a, b) => b.ms - a.ms).filter((t) => t.ms > 0.5);
      const breakdown = sorted.map((t) => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info(
        {
          event: 'slow_frame_breakdown',
          totalMs: totalMs.toFixed(1),
          breakdown: sorted.map((t) => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
        },
        `Slow frame ${totalMs.toFixed(1)}ms: ${breakdown}`
      );
    }
  }

  /**
   * Run every active system's draw pass
   */
  draw(entities: EntitySource): void {
    for (const system of this.ordered()) {
      if (!system.active) continue;
      this.run(system, 'draw', () => system.draw(entities));
    }
  }

  /**
   * Registered systems in execution order, e.g. "PhysicsSystem (priority: 20)"
   */
  getSystemNames(): string[] {
    return this.ordered().map((system) => `${system.name} (priority: ${system.priority})`);
  }

  get count(): number {
    return this.systems.length;
  }

  // Priorities may change after registration, so order is taken per pass
  private ordered(): System[] {
    return [...this.systems].sort((a, b) => a.priority - b.priority);
  }

  private run(system: System, pass: SystemPass, body: () => void): void {
    try {
      body();
    } catch (error) {
      logger.error(
        {
          event: 'system_error',
          system: system.name,
          pass,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        `System ${system.name} threw an error`
      );
      // Continue with next system - don't crash the game loop
    }
  }
}
