import type {
  DestinationKind,
  GroupType,
  IntentKind,
  NeighborhoodBoundary,
  StayReason,
} from "../../constants/SimulationEnums";
import type { AgentId, Position } from "./grid";

/**
 * Agent identity, group and position as of the last published generation.
 */
export interface AgentState {
  id: AgentId;
  group: GroupType;
  position: Position;
}

/**
 * Settings every agent receives at spawn time.
 */
export interface DecisionSettings {
  similarityThreshold: number;
  neighborhoodRadius: number;
  boundary: NeighborhoodBoundary;
}

export interface AnyEmptyDestination {
  kind: DestinationKind.ANY_EMPTY;
}

export interface TargetDestination {
  kind: DestinationKind.TARGET;
  target: Position;
}

export type DestinationPreference = AnyEmptyDestination | TargetDestination;

export interface StayIntent {
  kind: IntentKind.STAY;
  agentId: AgentId;
  reason: StayReason;
}

export interface MoveRequestIntent {
  kind: IntentKind.REQUEST_MOVE;
  agentId: AgentId;
  destination: DestinationPreference;
}

/**
 * Output of one agent for one round. Never outlives the round.
 */
export type RelocationIntent = StayIntent | MoveRequestIntent;

/**
 * Intents gathered behind the round barrier.
 */
export interface IntentCollection {
  intents: Map<AgentId, RelocationIntent>;
  /** Agents that produced no intent before the deadline. */
  timedOut: AgentId[];
}
