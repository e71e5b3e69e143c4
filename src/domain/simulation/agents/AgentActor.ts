import {
  DestinationKind,
  IntentKind,
  StayReason,
} from "../../../shared/constants/SimulationEnums";
import type {
  AgentState,
  DecisionSettings,
  RelocationIntent,
} from "../../../shared/types/simulation/agents";
import type { NeighborCounts } from "../../../shared/types/simulation/grid";
import type { GridSnapshot } from "../grid/GridSnapshot";
import { countNeighbors } from "../grid/NeighborhoodOracle";

/**
 * Satisfaction rule: the share of same-group occupied neighbours must reach
 * the threshold. An agent with no occupied neighbours is satisfied.
 */
export function isSatisfied(
  counts: Pick<NeighborCounts, "same" | "different">,
  threshold: number,
): boolean {
  const occupied = counts.same + counts.different;
  if (occupied === 0) return true;
  return counts.same / occupied >= threshold;
}

/**
 * Decision of one agent against one snapshot.
 * Unsatisfied agents ask for any empty cell; picking the cell is left to the
 * conflict resolver.
 */
export function decideIntent(
  agent: AgentState,
  snapshot: GridSnapshot,
  settings: DecisionSettings,
): RelocationIntent {
  const counts = countNeighbors(
    snapshot,
    agent.position,
    { radius: settings.neighborhoodRadius, boundary: settings.boundary },
    agent.group,
  );

  if (isSatisfied(counts, settings.similarityThreshold)) {
    return {
      kind: IntentKind.STAY,
      agentId: agent.id,
      reason: StayReason.SATISFIED,
    };
  }

  return {
    kind: IntentKind.REQUEST_MOVE,
    agentId: agent.id,
    destination: { kind: DestinationKind.ANY_EMPTY },
  };
}

/**
 * One agent of the simulation.
 *
 * The actor keeps its own identity and position; the position is only
 * rewritten by the coordinator after a granted move has been published. Its
 * sole output is one intent per broadcast.
 */
export class AgentActor {
  private state: AgentState;

  constructor(
    state: AgentState,
    protected readonly settings: DecisionSettings,
  ) {
    this.state = { ...state, position: { ...state.position } };
  }

  public get id(): number {
    return this.state.id;
  }

  public getState(): Readonly<AgentState> {
    return this.state;
  }

  public decide(snapshot: GridSnapshot): RelocationIntent {
    return decideIntent(this.state, snapshot, this.settings);
  }

  /**
   * Mailbox receive for a broadcast snapshot. Resolves on a later turn of the
   * event loop so that every actor of the round is handed the snapshot before
   * any of them decides.
   */
  public receive(snapshot: GridSnapshot): Promise<RelocationIntent> {
    return new Promise<RelocationIntent>((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(this.decide(snapshot));
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      });
    });
  }

  public relocate(position: AgentState["position"]): void {
    this.state = { ...this.state, position: { ...position } };
  }
}
