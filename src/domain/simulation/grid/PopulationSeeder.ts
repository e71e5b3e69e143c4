import { GroupType } from "../../../shared/constants/SimulationEnums";
import type {
  Placement,
  Position,
} from "../../../shared/types/simulation/grid";
import type { SeededRandom } from "../../../shared/utils/SeededRandom";
import {
  populationCounts,
  validateSimulationConfig,
  type SimulationConfig,
} from "../../../config/simulationConfig";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import { Grid } from "./Grid";

/**
 * Random initial placement.
 *
 * Agent ids alternate between groups while both still have quota (even ids
 * RED, odd ids BLUE), then the larger group takes the remaining ids. Each
 * agent draws a random free cell, which is then removed from the free list by
 * swapping in the last entry.
 */
export class PopulationSeeder {
  constructor(private readonly rng: SeededRandom) {}

  public placements(config: SimulationConfig): Placement[] {
    const counts = populationCounts(config);
    const free: Position[] = [];
    for (let row = 0; row < config.height; row++) {
      for (let col = 0; col < config.width; col++) {
        free.push({ row, col });
      }
    }

    const remaining = { ...counts };
    const placements: Placement[] = [];
    let agentId = 0;

    while (remaining[GroupType.RED] + remaining[GroupType.BLUE] > 0) {
      const preferred = agentId % 2 === 0 ? GroupType.RED : GroupType.BLUE;
      const other = preferred === GroupType.RED ? GroupType.BLUE : GroupType.RED;
      const group = remaining[preferred] > 0 ? preferred : other;
      remaining[group]--;

      const idx = this.rng.index(free.length);
      const position = free[idx];
      free[idx] = free[free.length - 1];
      free.pop();

      placements.push({ agentId, group, position });
      agentId++;
    }

    return placements;
  }

  /**
   * Builds generation 0 for a config.
   *
   * @throws {ConfigurationError} when the config is invalid
   */
  public populate(config: SimulationConfig): Grid {
    validateSimulationConfig(config);
    const placements = this.placements(config);
    logger.info(
      `🌱 Seeded ${placements.length} agents on a ${config.width}x${config.height} grid`,
      LogCategory.GRID,
    );
    return Grid.fromPlacements(config.width, config.height, placements);
  }
}
