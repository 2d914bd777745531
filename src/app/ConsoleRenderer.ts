import type { Logger } from '../common/Logger.js';
import type { RenderFrame, SimulationRenderer } from './SimulationApp.js';

/**
 * Headless renderer: reports every `reportEvery` ticks through the logger.
 * At debug level it also lists every ball's position.
 */
export class ConsoleRenderer implements SimulationRenderer {
  constructor(private readonly logger: Logger, private readonly reportEvery: number) {}

  render(frame: RenderFrame): void {
    if (this.reportEvery === 0 || frame.tick % this.reportEvery !== 0) return;

    this.logger.info(ConsoleRenderer.describe(frame));
    for (const ball of frame.balls) {
      this.logger.debug(`  #${ball.id} ${ball.position.toString()} r=${ball.radius}`);
    }
  }

  static describe(frame: RenderFrame): string {
    const { stats } = frame;
    let line = `🎱 Tick ${frame.tick}: ${stats.collisions} collisions, ${stats.wallHits} wall hits, ` +
      `${stats.candidatePairs} candidate pairs`;
    if (stats.degeneratePairs > 0) {
      line += `, ${stats.degeneratePairs} skipped`;
    }
    return line;
  }
}
