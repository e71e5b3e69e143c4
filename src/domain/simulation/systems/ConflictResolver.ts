import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { SimulationConfig } from "../../../config/simulationConfig";
import {
  DestinationKind,
  IntentKind,
} from "../../../shared/constants/SimulationEnums";
import type {
  MoveRequestIntent,
  RelocationIntent,
} from "../../../shared/types/simulation/agents";
import type { AgentId } from "../../../shared/types/simulation/grid";
import type {
  Resolution,
  ResolvedMove,
} from "../../../shared/types/simulation/rounds";
import { SeededRandom } from "../../../shared/utils/SeededRandom";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import type { GridSnapshot } from "../grid/GridSnapshot";

/**
 * Assigns destination cells to movers.
 *
 * Movers are sorted by id and then shuffled; the empty cells of the prior
 * snapshot are shuffled as well. Walking the movers in that order, a request
 * for a specific cell takes it if nobody took it first, and a request for any
 * empty cell takes the next free one. A mover left without a cell stays for
 * the round.
 *
 * All randomness comes from one generator seeded with `randomSeed`, so the
 * same seed and the same sequence of inputs yield the same moves.
 */
@injectable()
export class ConflictResolver {
  private readonly rng: SeededRandom;

  constructor(@inject(TYPES.SimulationConfig) config: SimulationConfig) {
    this.rng = new SeededRandom(config.randomSeed, "conflict");
  }

  public resolve(
    intents: Iterable<RelocationIntent>,
    snapshot: GridSnapshot,
  ): Resolution {
    const requests: MoveRequestIntent[] = [];
    for (const intent of intents) {
      if (intent.kind === IntentKind.REQUEST_MOVE) requests.push(intent);
    }
    requests.sort((a, b) => a.agentId - b.agentId);
    this.rng.shuffle(requests);

    const pool = this.rng.shuffle(
      snapshot.emptyCells().map((position) => snapshot.indexOf(position)),
    );
    const taken = new Set<number>();
    let cursor = 0;

    const moves: ResolvedMove[] = [];
    const degraded: AgentId[] = [];

    for (const request of requests) {
      const from = snapshot.positionOf(request.agentId);
      if (!from) {
        logger.warn(
          `Move request from agent ${request.agentId}, which is not on generation ${snapshot.generation}`,
          LogCategory.CONFLICT,
        );
        degraded.push(request.agentId);
        continue;
      }

      let target: number | undefined;
      if (request.destination.kind === DestinationKind.TARGET) {
        const wanted = request.destination.target;
        if (snapshot.isEmpty(wanted) && !taken.has(snapshot.indexOf(wanted))) {
          target = snapshot.indexOf(wanted);
        }
      } else {
        while (cursor < pool.length && taken.has(pool[cursor])) cursor++;
        if (cursor < pool.length) target = pool[cursor++];
      }

      if (target === undefined) {
        degraded.push(request.agentId);
        continue;
      }

      taken.add(target);
      moves.push({
        agentId: request.agentId,
        from,
        to: snapshot.positionAt(target),
      });
    }

    if (degraded.length > 0) {
      logger.debug(
        `${degraded.length} mover(s) left without a destination this round`,
        LogCategory.CONFLICT,
      );
    }

    return { moves, degraded };
  }
}
