/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationConfig: Symbol.for("SimulationConfig"),
  Grid: Symbol.for("Grid"),
  AgentRuntime: Symbol.for("AgentRuntime"),
  ConflictResolver: Symbol.for("ConflictResolver"),
  TerminationPolicy: Symbol.for("TerminationPolicy"),
  RoundCoordinator: Symbol.for("RoundCoordinator"),
};
