import { ExecutionMode } from "../../../../shared/constants/SimulationEnums";
import type {
  AgentState,
  DecisionSettings,
  IntentCollection,
  RelocationIntent,
} from "../../../../shared/types/simulation/agents";
import type { AgentId } from "../../../../shared/types/simulation/grid";
import type { ResolvedMove } from "../../../../shared/types/simulation/rounds";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import { AgentActor } from "../../agents/AgentActor";
import type { GridSnapshot } from "../../grid/GridSnapshot";
import type { AgentRuntime } from "./AgentRuntime";

export type ActorFactory = (
  state: AgentState,
  settings: DecisionSettings,
) => AgentActor;

const TIMED_OUT = Symbol("timed-out");

interface ActorOutcome {
  agentId: AgentId;
  outcome: RelocationIntent | typeof TIMED_OUT;
}

/**
 * Runs one `AgentActor` per agent inside the main thread.
 *
 * Every actor receives the same snapshot reference. Their receives are
 * raced against a single deadline for the round.
 */
export class InlineAgentRuntime implements AgentRuntime {
  public readonly mode = ExecutionMode.INLINE;
  private readonly actors = new Map<AgentId, AgentActor>();

  constructor(
    private readonly settings: DecisionSettings,
    private readonly createActor: ActorFactory = (state, settings) =>
      new AgentActor(state, settings),
  ) {}

  public spawn(agents: readonly AgentState[]): void {
    for (const agent of agents) {
      this.actors.set(agent.id, this.createActor(agent, this.settings));
    }
    logger.debug(
      `Spawned ${agents.length} inline agent actors`,
      LogCategory.AGENTS,
    );
  }

  public async collectIntents(
    snapshot: GridSnapshot,
    deadlineMs: number,
  ): Promise<IntentCollection> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), deadlineMs);
    });

    try {
      const outcomes = await Promise.all(
        [...this.actors.values()].map(async (actor): Promise<ActorOutcome> => {
          try {
            const outcome = await Promise.race([
              actor.receive(snapshot),
              expired,
            ]);
            return { agentId: actor.id, outcome };
          } catch (error) {
            logger.warn(
              `Agent ${actor.id} failed while deciding`,
              LogCategory.AGENTS,
              error instanceof Error ? error.message : String(error),
            );
            return { agentId: actor.id, outcome: TIMED_OUT };
          }
        }),
      );

      const intents = new Map<AgentId, RelocationIntent>();
      const timedOut: AgentId[] = [];
      for (const { agentId, outcome } of outcomes) {
        if (outcome === TIMED_OUT) {
          timedOut.push(agentId);
        } else {
          intents.set(agentId, outcome);
        }
      }
      return { intents, timedOut };
    } finally {
      clearTimeout(timer);
    }
  }

  public relocate(moves: readonly ResolvedMove[]): void {
    for (const move of moves) {
      this.actors.get(move.agentId)?.relocate(move.to);
    }
  }

  public destroy(): Promise<void> {
    this.actors.clear();
    return Promise.resolve();
  }
}
