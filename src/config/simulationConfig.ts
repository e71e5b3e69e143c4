import os from "node:os";
import {
  ExecutionMode,
  GroupType,
  NeighborhoodBoundary,
} from "../shared/constants/SimulationEnums";
import { ConfigurationError } from "../shared/errors/SimulationErrors";

/**
 * Parameters of one simulation run.
 *
 * Passed to the coordinator at construction and threaded to every agent at
 * spawn time. Nothing here is read from process-wide state after startup.
 */
export interface SimulationConfig {
  width: number;
  height: number;
  /** Initial share of the cells held by each group. */
  densities: Record<GroupType, number>;
  similarityThreshold: number;
  maxRounds: number;
  randomSeed: number;
  neighborhoodRadius: number;
  boundary: NeighborhoodBoundary;
  executionMode: ExecutionMode;
  workerCount: number;
  /** Collection window for one round's intents. */
  agentTimeoutMs: number;
  /** Pause between rounds, for watching a run. */
  roundDelayMs: number;
}

const availableWorkers = (): number =>
  typeof os.availableParallelism === "function"
    ? os.availableParallelism()
    : os.cpus().length;

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  width: 50,
  height: 50,
  densities: {
    [GroupType.RED]: 0.45,
    [GroupType.BLUE]: 0.45,
  },
  similarityThreshold: 0.4,
  maxRounds: 100,
  randomSeed: 42,
  neighborhoodRadius: 1,
  boundary: NeighborhoodBoundary.EXCLUDE,
  executionMode: ExecutionMode.INLINE,
  workerCount: Math.max(1, Math.min(availableWorkers(), 4)),
  agentTimeoutMs: 1000,
  roundDelayMs: 0,
};

/**
 * Number of agents of each group a config produces.
 */
export function populationCounts(
  config: Pick<SimulationConfig, "width" | "height" | "densities">,
): Record<GroupType, number> {
  const cells = config.width * config.height;
  return {
    [GroupType.RED]: Math.floor(config.densities[GroupType.RED] * cells),
    [GroupType.BLUE]: Math.floor(config.densities[GroupType.BLUE] * cells),
  };
}

const isPositiveInteger = (value: number): boolean =>
  Number.isInteger(value) && value > 0;

/**
 * Validates a config before a run starts.
 *
 * @throws {ConfigurationError} naming the first invalid parameter
 */
export function validateSimulationConfig(config: SimulationConfig): void {
  if (!isPositiveInteger(config.width)) {
    throw new ConfigurationError("width", "must be a positive integer");
  }
  if (!isPositiveInteger(config.height)) {
    throw new ConfigurationError("height", "must be a positive integer");
  }
  for (const group of Object.values(GroupType)) {
    const density = config.densities[group];
    if (!Number.isFinite(density) || density < 0 || density > 1) {
      throw new ConfigurationError(
        `densities.${group}`,
        `must be within [0, 1], received ${density}`,
      );
    }
  }
  const counts = populationCounts(config);
  const agents = counts[GroupType.RED] + counts[GroupType.BLUE];
  const cells = config.width * config.height;
  if (agents > cells) {
    throw new ConfigurationError(
      "densities",
      `${agents} agents do not fit in ${cells} cells`,
    );
  }
  if (
    !Number.isFinite(config.similarityThreshold) ||
    config.similarityThreshold < 0 ||
    config.similarityThreshold > 1
  ) {
    throw new ConfigurationError(
      "similarityThreshold",
      `must be within [0, 1], received ${config.similarityThreshold}`,
    );
  }
  if (!isPositiveInteger(config.maxRounds)) {
    throw new ConfigurationError("maxRounds", "must be a positive integer");
  }
  if (!Number.isInteger(config.randomSeed)) {
    throw new ConfigurationError("randomSeed", "must be an integer");
  }
  if (!isPositiveInteger(config.neighborhoodRadius)) {
    throw new ConfigurationError(
      "neighborhoodRadius",
      "must be a positive integer",
    );
  }
  if (!Object.values(NeighborhoodBoundary).includes(config.boundary)) {
    throw new ConfigurationError(
      "boundary",
      `must be one of ${Object.values(NeighborhoodBoundary).join(", ")}`,
    );
  }
  if (!Object.values(ExecutionMode).includes(config.executionMode)) {
    throw new ConfigurationError(
      "executionMode",
      `must be one of ${Object.values(ExecutionMode).join(", ")}`,
    );
  }
  if (!isPositiveInteger(config.workerCount)) {
    throw new ConfigurationError("workerCount", "must be a positive integer");
  }
  if (!isPositiveInteger(config.agentTimeoutMs)) {
    throw new ConfigurationError(
      "agentTimeoutMs",
      "must be a positive integer",
    );
  }
  if (!Number.isInteger(config.roundDelayMs) || config.roundDelayMs < 0) {
    throw new ConfigurationError(
      "roundDelayMs",
      "must be a non-negative integer",
    );
  }
}

/**
 * Merges overrides onto the defaults and validates the result.
 */
export function createSimulationConfig(
  overrides: Partial<SimulationConfig> = {},
): SimulationConfig {
  const config: SimulationConfig = {
    ...DEFAULT_SIMULATION_CONFIG,
    ...overrides,
    densities: {
      ...DEFAULT_SIMULATION_CONFIG.densities,
      ...overrides.densities,
    },
  };
  validateSimulationConfig(config);
  return config;
}

const readNumber = (
  env: NodeJS.ProcessEnv,
  key: string,
): number | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(key, `expected a number, received "${raw}"`);
  }
  return value;
};

const readEnum = <T extends string>(
  env: NodeJS.ProcessEnv,
  key: string,
  values: readonly T[],
): T | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const match = values.find((value) => value === raw.trim().toLowerCase());
  if (!match) {
    throw new ConfigurationError(key, `expected one of ${values.join(", ")}`);
  }
  return match;
};

/**
 * Reads `SIM_*` environment variables into a validated config.
 *
 * SIM_WIDTH, SIM_HEIGHT, SIM_DENSITY_RED, SIM_DENSITY_BLUE, SIM_THRESHOLD,
 * SIM_MAX_ROUNDS, SIM_SEED, SIM_RADIUS, SIM_BOUNDARY, SIM_EXECUTION_MODE,
 * SIM_WORKERS, SIM_AGENT_TIMEOUT_MS, SIM_ROUND_DELAY_MS.
 */
export function loadSimulationConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): SimulationConfig {
  const overrides: Partial<SimulationConfig> = {};
  const set = <K extends keyof SimulationConfig>(
    key: K,
    value: SimulationConfig[K] | undefined,
  ): void => {
    if (value !== undefined) overrides[key] = value;
  };

  set("width", readNumber(env, "SIM_WIDTH"));
  set("height", readNumber(env, "SIM_HEIGHT"));
  set("similarityThreshold", readNumber(env, "SIM_THRESHOLD"));
  set("maxRounds", readNumber(env, "SIM_MAX_ROUNDS"));
  set("randomSeed", readNumber(env, "SIM_SEED"));
  set("neighborhoodRadius", readNumber(env, "SIM_RADIUS"));
  set(
    "boundary",
    readEnum(env, "SIM_BOUNDARY", Object.values(NeighborhoodBoundary)),
  );
  set(
    "executionMode",
    readEnum(env, "SIM_EXECUTION_MODE", Object.values(ExecutionMode)),
  );
  set("workerCount", readNumber(env, "SIM_WORKERS"));
  set("agentTimeoutMs", readNumber(env, "SIM_AGENT_TIMEOUT_MS"));
  set("roundDelayMs", readNumber(env, "SIM_ROUND_DELAY_MS"));

  const red = readNumber(env, "SIM_DENSITY_RED");
  const blue = readNumber(env, "SIM_DENSITY_BLUE");
  overrides.densities = {
    [GroupType.RED]: red ?? DEFAULT_SIMULATION_CONFIG.densities[GroupType.RED],
    [GroupType.BLUE]:
      blue ?? DEFAULT_SIMULATION_CONFIG.densities[GroupType.BLUE],
  };

  return createSimulationConfig(overrides);
}
