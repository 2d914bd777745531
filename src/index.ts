// Public API of the simulation core
export { Vec2 } from './common/Vec2.js';
export { mulberry32 } from './common/Random.js';
export type { RandomSource } from './common/Random.js';
export { ConsoleLogger, SILENT_LOGGER } from './common/Logger.js';
export type { Logger, LogLevel } from './common/Logger.js';
export { ConfigurationError, DegenerateGeometryError } from './sim/Errors.js';
export { SpatialGrid } from './sim/SpatialGrid.js';
export type { CellDimensions } from './sim/SpatialGrid.js';
export { CollisionDetector } from './sim/CollisionDetector.js';
export type { DetectionResult } from './sim/CollisionDetector.js';
export { CollisionResolver } from './sim/CollisionResolver.js';
export {
  createSimulation,
  createSimulationConfig,
  createSimulationFromConfig,
  snapshot,
  step,
  totalKineticEnergy,
} from './sim/Simulation.js';
export type { Simulation, SimulationOptions } from './sim/Simulation.js';
export { PhysicsConfig } from './sim/Types.js';
export type {
  Arena,
  Ball,
  BallId,
  BallSnapshot,
  CellId,
  CollisionPair,
  SimulationConfig,
  TickStats,
} from './sim/Types.js';
