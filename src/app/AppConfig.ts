/**
 * Application configuration
 *
 * Centralized settings for the simulation, the tick loop and diagnostics.
 * Defaults live in DEFAULT_APP_CONFIG; command-line flags override them
 * section by section.
 */

import { parseArgs } from 'node:util';
import { isLogLevel, type LogLevel } from '../common/Logger.js';
import { ConfigurationError } from '../sim/Errors.js';
import { createSimulationConfig } from '../sim/Simulation.js';
import { PhysicsConfig, type SimulationConfig } from '../sim/Types.js';

/**
 * Arena and population settings
 */
export interface SimulationSettings {
  arenaWidth: number; // units
  arenaHeight: number; // units
  ballCount: number;
  ballRadius: number; // units
  targetBallsPerCell: number;
  maxInitialSpeed: number; // units per tick
  wallMargin: number; // units
  seed?: number; // omit for a different population every run
}

/**
 * Tick loop pacing
 */
export interface LoopConfig {
  ticksPerSecond: number; // Hz
  maxTicks: number; // 0 = run until stopped
}

/**
 * Diagnostics
 */
export interface DebugConfig {
  logLevel: LogLevel;
  reportEvery: number; // ticks between status lines, 0 = never
}

export interface AppConfig {
  simulation: SimulationSettings;
  loop: LoopConfig;
  debug: DebugConfig;
}

export type AppConfigOverrides = {
  [Section in keyof AppConfig]?: Partial<AppConfig[Section]>;
};

export interface ParsedArguments {
  help: boolean;
  overrides: AppConfigOverrides;
}

export const USAGE =
  'Usage: ball-arena <count> <radius> [--ticks N] [--fps N] [--seed N] [--density N] ' +
  '[--width N] [--height N] [--max-speed N] [--log-level error|warn|info|debug] [--report-every N]';

/**
 * Default configuration values
 */
export const DEFAULT_APP_CONFIG: AppConfig = {
  simulation: {
    arenaWidth: PhysicsConfig.ARENA_WIDTH,
    arenaHeight: PhysicsConfig.ARENA_HEIGHT,
    ballCount: 100,
    ballRadius: 10,
    targetBallsPerCell: PhysicsConfig.TARGET_BALLS_PER_CELL,
    maxInitialSpeed: PhysicsConfig.MAX_INITIAL_SPEED,
    wallMargin: PhysicsConfig.WALL_MARGIN,
  },

  loop: {
    ticksPerSecond: 24,
    maxTicks: 0,
  },

  debug: {
    logLevel: 'info',
    reportEvery: 24, // once a second at the default rate
  },
};

/**
 * Parse `<count> <radius>` and the optional flags into config overrides
 */
export function parseAppConfigFromArgs(argv: readonly string[]): ParsedArguments {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { help: true, overrides: {} };
  }

  if (positionals.length !== 2) {
    throw new ConfigurationError('arguments', `expected <count> <radius>, got ${positionals.length} positional argument(s)`);
  }

  const simulation: Partial<SimulationSettings> = {
    ballCount: parseNumber('count', positionals[0]),
    ballRadius: parseNumber('radius', positionals[1]),
  };
  const loop: Partial<LoopConfig> = {};
  const debug: Partial<DebugConfig> = {};

  if (values.width !== undefined) simulation.arenaWidth = parseNumber('--width', values.width);
  if (values.height !== undefined) simulation.arenaHeight = parseNumber('--height', values.height);
  if (values.density !== undefined) simulation.targetBallsPerCell = parseNumber('--density', values.density);
  if (values['max-speed'] !== undefined) simulation.maxInitialSpeed = parseNumber('--max-speed', values['max-speed']);
  if (values.seed !== undefined) simulation.seed = parseNumber('--seed', values.seed);

  if (values.fps !== undefined) loop.ticksPerSecond = parseNumber('--fps', values.fps);
  if (values.ticks !== undefined) loop.maxTicks = parseNumber('--ticks', values.ticks);

  const logLevel = values['log-level'];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError('--log-level', `expected error, warn, info or debug, got "${logLevel}"`);
    }
    debug.logLevel = logLevel;
  }
  if (values['report-every'] !== undefined) debug.reportEvery = parseNumber('--report-every', values['report-every']);

  return { help: false, overrides: { simulation, loop, debug } };
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveAppConfig(overrides: AppConfigOverrides = {}): AppConfig {
  const config: AppConfig = {
    simulation: { ...DEFAULT_APP_CONFIG.simulation, ...overrides.simulation },
    loop: { ...DEFAULT_APP_CONFIG.loop, ...overrides.loop },
    debug: { ...DEFAULT_APP_CONFIG.debug, ...overrides.debug },
  };

  // Surfaces arena, population and grid problems before anything runs
  createSimulationConfig(toSimulationConfig(config.simulation));

  const { seed } = config.simulation;
  if (seed !== undefined && !Number.isInteger(seed)) {
    throw new ConfigurationError('seed', `expected an integer, got ${seed}`);
  }
  if (!Number.isFinite(config.loop.ticksPerSecond) || config.loop.ticksPerSecond <= 0) {
    throw new ConfigurationError('ticks per second', `expected a positive number, got ${config.loop.ticksPerSecond}`);
  }
  if (!Number.isInteger(config.loop.maxTicks) || config.loop.maxTicks < 0) {
    throw new ConfigurationError('max ticks', `expected a non-negative integer, got ${config.loop.maxTicks}`);
  }
  if (!Number.isInteger(config.debug.reportEvery) || config.debug.reportEvery < 0) {
    throw new ConfigurationError('report interval', `expected a non-negative integer, got ${config.debug.reportEvery}`);
  }

  return config;
}

export function toSimulationConfig(settings: SimulationSettings): SimulationConfig {
  return {
    arena: { width: settings.arenaWidth, height: settings.arenaHeight },
    ballCount: settings.ballCount,
    ballRadius: settings.ballRadius,
    targetBallsPerCell: settings.targetBallsPerCell,
    maxInitialSpeed: settings.maxInitialSpeed,
    wallMargin: settings.wallMargin,
  };
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        ticks: { type: 'string' },
        fps: { type: 'string' },
        seed: { type: 'string' },
        density: { type: 'string' },
        width: { type: 'string' },
        height: { type: 'string' },
        'max-speed': { type: 'string' },
        'log-level': { type: 'string' },
        'report-every': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    // Unknown flags and missing flag values
    throw new ConfigurationError('arguments', error instanceof Error ? error.message : String(error));
  }
}

function parseNumber(field: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ConfigurationError(field, `expected a number, got "${raw}"`);
  }
  return value;
}
