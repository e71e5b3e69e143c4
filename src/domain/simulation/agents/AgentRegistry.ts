import type { AgentState } from "../../../shared/types/simulation/agents";
import type { AgentId } from "../../../shared/types/simulation/grid";
import type { ResolvedMove } from "../../../shared/types/simulation/rounds";
import type { GridSnapshot } from "../grid/GridSnapshot";

/**
 * Agent states as of the last published generation, indexed by id.
 *
 * Owned by the round coordinator. Positions change only through
 * `applyMoves`, after the grid has accepted the moves.
 */
export class AgentRegistry {
  private readonly agents = new Map<AgentId, AgentState>();

  public static fromSnapshot(snapshot: GridSnapshot): AgentRegistry {
    const registry = new AgentRegistry();
    for (const { occupant, position } of snapshot.occupants()) {
      registry.agents.set(occupant.agentId, {
        id: occupant.agentId,
        group: occupant.group,
        position,
      });
    }
    return registry;
  }

  public get size(): number {
    return this.agents.size;
  }

  public get(agentId: AgentId): AgentState | undefined {
    return this.agents.get(agentId);
  }

  /**
   * Agents in ascending id order.
   */
  public list(): AgentState[] {
    return [...this.agents.values()].sort((a, b) => a.id - b.id);
  }

  public ids(): AgentId[] {
    return this.list().map((agent) => agent.id);
  }

  public applyMoves(moves: readonly ResolvedMove[]): void {
    for (const move of moves) {
      const agent = this.agents.get(move.agentId);
      if (!agent) continue;
      this.agents.set(move.agentId, { ...agent, position: { ...move.to } });
    }
  }
}
