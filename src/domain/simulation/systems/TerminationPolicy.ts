import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { SimulationConfig } from "../../../config/simulationConfig";
import { TerminationReason } from "../../../shared/constants/SimulationEnums";
import type { TerminationDecision } from "../../../shared/types/simulation/rounds";

export interface TerminationInput {
  /** Generation just published. */
  generation: number;
  /** Move requests collected in the round that produced it. */
  requestedMoves: number;
  /** Agents whose intent was missing and defaulted to Stay. */
  timedOut: number;
}

/**
 * Stops a run once a round ends without move requests, or once the
 * published generation reaches `maxRounds`. Convergence wins when both hold.
 *
 * A round with timed-out agents never counts as converged: their Stay was
 * not a decision.
 */
@injectable()
export class TerminationPolicy {
  private readonly maxRounds: number;

  constructor(@inject(TYPES.SimulationConfig) config: SimulationConfig) {
    this.maxRounds = config.maxRounds;
  }

  public evaluate(input: TerminationInput): TerminationDecision {
    if (input.requestedMoves === 0 && input.timedOut === 0) {
      return { stop: true, reason: TerminationReason.CONVERGED };
    }
    if (input.generation >= this.maxRounds) {
      return { stop: true, reason: TerminationReason.MAX_ROUNDS };
    }
    return { stop: false };
  }
}
