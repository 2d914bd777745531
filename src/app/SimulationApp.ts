/**
 * Simulation Application - fixed-rate tick loop
 *
 * Drives the simulation core at the configured rate and hands a snapshot of
 * the population to the renderer after every completed tick. Frame pacing
 * lives here, never in the core.
 */

import type { Logger } from '../common/Logger.js';
import { snapshot, step, totalKineticEnergy, type Simulation } from '../sim/Simulation.js';
import type { BallSnapshot, TickStats } from '../sim/Types.js';
import type { LoopConfig } from './AppConfig.js';

/**
 * Everything a renderer may read about one completed tick
 */
export interface RenderFrame {
  tick: number;
  balls: readonly BallSnapshot[];
  stats: TickStats;
}

/**
 * Rendering collaborator. Only ever called between ticks.
 */
export interface SimulationRenderer {
  render(frame: RenderFrame): void;
}

/**
 * Application lifecycle states
 */
export enum AppState {
  IDLE = 'idle',
  RUNNING = 'running',
  STOPPED = 'stopped',
  ERROR = 'error'
}

export class SimulationApp {
  private state: AppState = AppState.IDLE;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private settle: { resolve: () => void; reject: (error: unknown) => void } | null = null;
  private readonly tickDuration: number; // milliseconds per tick

  constructor(
    private readonly simulation: Simulation,
    private readonly renderer: SimulationRenderer,
    private readonly loop: LoopConfig,
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now
  ) {
    this.tickDuration = 1000 / loop.ticksPerSecond;
  }

  getState(): AppState {
    return this.state;
  }

  /**
   * Run the loop until stop() is called or maxTicks is reached.
   * The returned promise rejects if a tick or the renderer throws.
   */
  start(): Promise<void> {
    if (this.state === AppState.RUNNING) {
      throw new Error('Simulation loop is already running');
    }

    const { config } = this.simulation;
    this.logger.info(
      `▶️ Simulating ${config.ballCount} balls (radius ${config.ballRadius}) in a ` +
      `${config.arena.width}x${config.arena.height} arena at ${this.loop.ticksPerSecond} ticks/s`
    );
    this.logger.info(`🧮 ${this.simulation.grid.toString()}`);

    this.state = AppState.RUNNING;
    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
      this.schedule(0);
    });
  }

  /**
   * Stop after the current tick. Safe to call in any state.
   */
  stop(): void {
    if (this.state !== AppState.RUNNING) return;
    this.clearTimer();
    this.state = AppState.STOPPED;
    this.logger.info(
      `⏹️ Stopped after ${this.simulation.tick} ticks, kinetic energy ${totalKineticEnergy(this.simulation).toFixed(2)}`
    );
    this.settle?.resolve();
    this.settle = null;
  }

  /**
   * Advance a fixed number of ticks synchronously, without pacing
   */
  runFor(ticks: number): TickStats {
    if (this.state === AppState.RUNNING) {
      throw new Error('Cannot run ticks manually while the loop is running');
    }
    for (let i = 0; i < ticks; i++) {
      this.advance();
    }
    return this.simulation.lastTick;
  }

  private advance(): void {
    step(this.simulation);
    this.renderer.render({
      tick: this.simulation.tick,
      balls: snapshot(this.simulation),
      stats: this.simulation.lastTick,
    });
  }

  private frame(): void {
    this.timer = null;
    const began = this.clock();

    try {
      this.advance();
    } catch (error) {
      this.fail(error);
      return;
    }

    const { maxTicks } = this.loop;
    if (maxTicks > 0 && this.simulation.tick >= maxTicks) {
      this.stop();
      return;
    }

    // Sleep for what is left of the frame
    const elapsed = this.clock() - began;
    this.schedule(Math.max(0, this.tickDuration - elapsed));
  }

  private schedule(delay: number): void {
    this.timer = setTimeout(() => this.frame(), delay);
  }

  private fail(error: unknown): void {
    this.clearTimer();
    this.state = AppState.ERROR;
    this.logger.error(`❌ Simulation loop failed at tick ${this.simulation.tick}:`, error);
    this.settle?.reject(error);
    this.settle = null;
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
