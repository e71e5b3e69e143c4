import type { TerminationReason } from "../../constants/SimulationEnums";
import type { GridSnapshot } from "../../../domain/simulation/grid/GridSnapshot";
import type { AgentId, Position } from "./grid";

/**
 * A granted relocation, produced by the conflict resolver.
 */
export interface ResolvedMove {
  agentId: AgentId;
  from: Position;
  to: Position;
}

/**
 * Output of the conflict resolver for one round.
 */
export interface Resolution {
  moves: ResolvedMove[];
  /** Movers left without a destination; they stay this round. */
  degraded: AgentId[];
}

export interface TerminationDecision {
  stop: boolean;
  reason?: TerminationReason;
}

/**
 * Read-only frame handed to observers after each publish.
 */
export interface PublishedFrame {
  readonly snapshot: GridSnapshot;
  readonly generation: number;
  readonly satisfactionRatio: number;
  readonly moves: readonly ResolvedMove[];
  readonly requested: number;
  readonly degraded: number;
}

/**
 * Summary of one completed round.
 */
export interface RoundReport {
  generation: number;
  moves: ResolvedMove[];
  requested: number;
  degraded: AgentId[];
  timedOut: AgentId[];
  satisfactionRatio: number;
  termination: TerminationDecision;
}

/**
 * Final result of a run.
 */
export interface SimulationOutcome {
  reason: TerminationReason;
  generation: number;
  satisfactionRatio: number;
  snapshot: GridSnapshot;
}
