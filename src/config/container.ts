import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";

/**
 * Dependency injection container configuration.
 *
 * One container per run: the configuration, the seeded grid, the agent
 * runtime and the round systems are all singletons of that run.
 *
 * @module config
 */
import type { SimulationConfig } from "./simulationConfig";
import { ExecutionMode } from "../shared/constants/SimulationEnums";
import type { DecisionSettings } from "../shared/types/simulation/agents";
import { SeededRandom } from "../shared/utils/SeededRandom";
import { Grid } from "../domain/simulation/grid/Grid";
import { PopulationSeeder } from "../domain/simulation/grid/PopulationSeeder";
import type { AgentRuntime } from "../domain/simulation/core/runtime/AgentRuntime";
import { InlineAgentRuntime } from "../domain/simulation/core/runtime/InlineAgentRuntime";
import { WorkerAgentRuntime } from "../domain/simulation/core/runtime/WorkerAgentRuntime";
import { ConflictResolver } from "../domain/simulation/systems/ConflictResolver";
import { TerminationPolicy } from "../domain/simulation/systems/TerminationPolicy";
import { RoundCoordinator } from "../domain/simulation/core/RoundCoordinator";

export interface ContainerOverrides {
  /** Start from this grid instead of a seeded random placement. */
  grid?: Grid;
  /** Use this runtime instead of the one `executionMode` selects. */
  runtime?: AgentRuntime;
}

function createRuntime(config: SimulationConfig): AgentRuntime {
  const settings: DecisionSettings = {
    similarityThreshold: config.similarityThreshold,
    neighborhoodRadius: config.neighborhoodRadius,
    boundary: config.boundary,
  };
  return config.executionMode === ExecutionMode.WORKERS
    ? new WorkerAgentRuntime(settings, config.workerCount)
    : new InlineAgentRuntime(settings);
}

export function createSimulationContainer(
  config: SimulationConfig,
  overrides: ContainerOverrides = {},
): Container {
  const container = new Container();

  container
    .bind<SimulationConfig>(TYPES.SimulationConfig)
    .toConstantValue(config);

  if (overrides.grid) {
    container.bind<Grid>(TYPES.Grid).toConstantValue(overrides.grid);
  } else {
    container
      .bind<Grid>(TYPES.Grid)
      .toDynamicValue(() =>
        new PopulationSeeder(
          new SeededRandom(config.randomSeed, "placement"),
        ).populate(config),
      )
      .inSingletonScope();
  }

  const runtime = overrides.runtime;
  if (runtime) {
    container.bind<AgentRuntime>(TYPES.AgentRuntime).toConstantValue(runtime);
  } else {
    container
      .bind<AgentRuntime>(TYPES.AgentRuntime)
      .toDynamicValue(() => createRuntime(config))
      .inSingletonScope();
  }

  container
    .bind<ConflictResolver>(TYPES.ConflictResolver)
    .to(ConflictResolver)
    .inSingletonScope();

  container
    .bind<TerminationPolicy>(TYPES.TerminationPolicy)
    .to(TerminationPolicy)
    .inSingletonScope();

  container
    .bind<RoundCoordinator>(TYPES.RoundCoordinator)
    .to(RoundCoordinator)
    .inSingletonScope();

  return container;
}

/**
 * Builds a coordinator for `config` with a fresh container.
 */
export function createCoordinator(
  config: SimulationConfig,
  overrides: ContainerOverrides = {},
): RoundCoordinator {
  return createSimulationContainer(config, overrides).get<RoundCoordinator>(
    TYPES.RoundCoordinator,
  );
}
