import { ExecutionMode } from "../../../../shared/constants/SimulationEnums";
import { AgentTimeout } from "../../../../shared/errors/SimulationErrors";
import type {
  AgentState,
  DecisionSettings,
  IntentCollection,
  RelocationIntent,
} from "../../../../shared/types/simulation/agents";
import type { AgentId } from "../../../../shared/types/simulation/grid";
import type { ResolvedMove } from "../../../../shared/types/simulation/rounds";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import type { GridSnapshot } from "../../grid/GridSnapshot";
import type { AgentRuntime } from "./AgentRuntime";
import { DecisionWorkerPool } from "./DecisionWorkerPool";

/** Upper bound on worker start-up, counted before a round's deadline. */
export const WORKER_STARTUP_TIMEOUT_MS = 15000;

/**
 * Splits agents into at most `parts` contiguous batches of near-equal size.
 */
export function partition<T>(items: readonly T[], parts: number): T[][] {
  const count = Math.max(1, Math.min(parts, items.length));
  const batches: T[][] = [];
  const base = Math.floor(items.length / count);
  let extra = items.length % count;
  let offset = 0;
  for (let i = 0; i < count && offset < items.length; i++) {
    const size = base + (extra > 0 ? 1 : 0);
    if (extra > 0) extra--;
    batches.push(items.slice(offset, offset + size));
    offset += size;
  }
  return batches;
}

/**
 * Evaluates agent decisions on a pool of worker threads.
 *
 * Agents are split into one batch per worker. Every batch is evaluated
 * against the same wire copy of the round's snapshot. A batch that times out
 * or fails contributes no intents; its agents are reported in `timedOut`.
 * The round's deadline starts once every worker has announced READY, so
 * thread start-up never eats into the first round.
 */
export class WorkerAgentRuntime implements AgentRuntime {
  public readonly mode = ExecutionMode.WORKERS;
  private readonly agents = new Map<AgentId, AgentState>();
  private readonly pool: DecisionWorkerPool;

  constructor(
    private readonly settings: DecisionSettings,
    private readonly workerCount: number,
    pool?: DecisionWorkerPool,
  ) {
    this.pool = pool ?? new DecisionWorkerPool(workerCount);
  }

  public spawn(agents: readonly AgentState[]): void {
    for (const agent of agents) {
      this.agents.set(agent.id, { ...agent, position: { ...agent.position } });
    }
  }

  public async collectIntents(
    snapshot: GridSnapshot,
    deadlineMs: number,
  ): Promise<IntentCollection> {
    const wire = snapshot.toWire();
    const ordered = [...this.agents.values()].sort((a, b) => a.id - b.id);
    if (ordered.length === 0) {
      return { intents: new Map<AgentId, RelocationIntent>(), timedOut: [] };
    }
    const batches = partition(ordered, this.workerCount);

    try {
      await this.pool.whenReady(WORKER_STARTUP_TIMEOUT_MS);
    } catch (error) {
      logger.error(
        "Decision workers unavailable for this round",
        LogCategory.WORKERS,
        error instanceof Error ? error.message : String(error),
      );
      return {
        intents: new Map<AgentId, RelocationIntent>(),
        timedOut: ordered.map((agent) => agent.id),
      };
    }

    const results = await Promise.allSettled(
      batches.map((batch) =>
        this.pool.evaluate(wire, batch, this.settings, deadlineMs),
      ),
    );

    const intents = new Map<AgentId, RelocationIntent>();
    const timedOut: AgentId[] = [];
    results.forEach((result, idx) => {
      const batch = batches[idx];
      if (result.status === "fulfilled") {
        for (const intent of result.value) intents.set(intent.agentId, intent);
        return;
      }
      const reason: unknown = result.reason;
      if (!(reason instanceof AgentTimeout)) {
        logger.warn(
          `Decision batch of ${batch.length} agent(s) failed`,
          LogCategory.WORKERS,
          reason instanceof Error ? reason.message : String(reason),
        );
      }
      for (const agent of batch) timedOut.push(agent.id);
    });

    return { intents, timedOut };
  }

  public relocate(moves: readonly ResolvedMove[]): void {
    for (const move of moves) {
      const agent = this.agents.get(move.agentId);
      if (agent) {
        this.agents.set(move.agentId, { ...agent, position: { ...move.to } });
      }
    }
  }

  public async destroy(): Promise<void> {
    this.agents.clear();
    await this.pool.destroy();
  }
}
