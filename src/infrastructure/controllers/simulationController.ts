import type { Request, Response } from "express";

import { logger, LogCategory } from "../utils/logger";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../../shared/constants/ResponseEnums";
import { GroupType } from "../../shared/constants/SimulationEnums";
import type { RoundCoordinator } from "../../domain/simulation/core/RoundCoordinator";
import { renderSnapshot } from "../../shared/utils/GridRenderer";

/**
 * Read-only observation endpoints over a running coordinator.
 *
 * Handlers never touch grid state; `stop` only asks the coordinator to end
 * the run at the next round boundary.
 */
export class SimulationController {
  constructor(private readonly coordinator: RoundCoordinator) {}

  getHealth(_req: Request, res: Response): void {
    res.status(HttpStatusCode.OK).json({
      status: ResponseStatus.OK,
      phase: this.coordinator.getPhase(),
      generation: this.coordinator.getGeneration(),
      terminated: this.coordinator.isTerminated(),
    });
  }

  getSnapshot(_req: Request, res: Response): void {
    const frame = this.coordinator.getLastFrame();
    if (!frame) {
      res.status(HttpStatusCode.SERVICE_UNAVAILABLE).json({
        status: ResponseStatus.ERROR,
        error: "No snapshot published yet",
      });
      return;
    }
    res.status(HttpStatusCode.OK).json({
      ...frame.snapshot.toJSON(),
      satisfactionRatio: frame.satisfactionRatio,
    });
  }

  getStats(_req: Request, res: Response): void {
    const frame = this.coordinator.getLastFrame();
    res.status(HttpStatusCode.OK).json({
      generation: this.coordinator.getGeneration(),
      phase: this.coordinator.getPhase(),
      population: this.coordinator.getPopulation(),
      groups: this.countGroups(),
      satisfactionRatio: this.coordinator.getSatisfactionRatio(),
      lastRound: frame
        ? {
            generation: frame.generation,
            requested: frame.requested,
            moved: frame.moves.length,
            degraded: frame.degraded,
          }
        : null,
      terminationReason: this.coordinator.getTerminationReason() ?? null,
    });
  }

  getFrame(_req: Request, res: Response): void {
    res
      .status(HttpStatusCode.OK)
      .type("text/plain")
      .send(renderSnapshot(this.coordinator.getSnapshot()));
  }

  private countGroups(): Record<GroupType, number> {
    const counts = { [GroupType.RED]: 0, [GroupType.BLUE]: 0 };
    for (const agent of this.coordinator.getAgents()) counts[agent.group]++;
    return counts;
  }

  stop(_req: Request, res: Response): void {
    if (this.coordinator.isTerminated()) {
      res.status(HttpStatusCode.CONFLICT).json({
        status: ResponseStatus.TERMINATED,
        reason: this.coordinator.getTerminationReason(),
      });
      return;
    }
    logger.info("🛑 Stop requested over HTTP", LogCategory.NETWORK);
    this.coordinator.stop();
    res.status(HttpStatusCode.ACCEPTED).json({
      status: ResponseStatus.STOPPING,
      generation: this.coordinator.getGeneration(),
    });
  }
}
