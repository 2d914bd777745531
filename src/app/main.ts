/**
 * Ball Arena entry point
 *
 *   ball-arena <count> <radius> [options]
 *
 * Builds the simulation from the command line, then runs the tick loop until
 * --ticks is reached or the process receives SIGINT.
 */

import { ConsoleLogger } from '../common/Logger.js';
import { mulberry32 } from '../common/Random.js';
import { ConfigurationError } from '../sim/Errors.js';
import { createSimulationFromConfig } from '../sim/Simulation.js';
import { USAGE, parseAppConfigFromArgs, resolveAppConfig, toSimulationConfig } from './AppConfig.js';
import { ConsoleRenderer } from './ConsoleRenderer.js';
import { SimulationApp } from './SimulationApp.js';

/**
 * Run the application and resolve with the process exit code
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  try {
    const { help, overrides } = parseAppConfigFromArgs(argv);
    if (help) {
      console.log(USAGE);
      return 0;
    }

    const config = resolveAppConfig(overrides);
    const logger = new ConsoleLogger(config.debug.logLevel);
    const { seed } = config.simulation;

    const simulation = createSimulationFromConfig(toSimulationConfig(config.simulation), {
      random: seed !== undefined ? mulberry32(seed) : Math.random,
      logger,
    });
    const app = new SimulationApp(simulation, new ConsoleRenderer(logger, config.debug.reportEvery), config.loop, logger);

    const onInterrupt = (): void => app.stop();
    process.once('SIGINT', onInterrupt);
    try {
      await app.start();
    } finally {
      process.off('SIGINT', onInterrupt);
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      console.error(USAGE);
    } else {
      console.error('❌ Simulation failed:', error);
    }
    return 1;
  }
}
