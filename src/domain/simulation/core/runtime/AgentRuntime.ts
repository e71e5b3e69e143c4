import type { ExecutionMode } from "../../../../shared/constants/SimulationEnums";
import type {
  AgentState,
  IntentCollection,
} from "../../../../shared/types/simulation/agents";
import type { ResolvedMove } from "../../../../shared/types/simulation/rounds";
import type { GridSnapshot } from "../../grid/GridSnapshot";

/**
 * Where the agents of a run live and decide.
 *
 * The coordinator spawns every agent once, broadcasts each round's snapshot
 * through `collectIntents`, and reports granted moves back through
 * `relocate` after publishing.
 */
export interface AgentRuntime {
  readonly mode: ExecutionMode;

  spawn(agents: readonly AgentState[]): void;

  /**
   * Hands `snapshot` to every agent and waits for their intents.
   * Resolves once every agent answered or `deadlineMs` elapsed; agents that
   * did not answer (or failed) are listed in `timedOut`. Never rejects on
   * account of a single agent.
   */
  collectIntents(
    snapshot: GridSnapshot,
    deadlineMs: number,
  ): Promise<IntentCollection>;

  relocate(moves: readonly ResolvedMove[]): void;

  destroy(): Promise<void>;
}
