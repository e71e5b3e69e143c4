/**
 * Simulation enumerations shared by the grid, the agents and the coordinator.
 *
 * @module shared/constants/SimulationEnums
 */

/**
 * Population groups an agent can belong to.
 */
export enum GroupType {
  RED = "red",
  BLUE = "blue",
}

/**
 * Kind of relocation intent an agent emits in a round.
 */
export enum IntentKind {
  STAY = "stay",
  REQUEST_MOVE = "request_move",
}

/**
 * Why an agent ended the round in place.
 */
export enum StayReason {
  SATISFIED = "satisfied",
  TIMEOUT = "timeout",
}

/**
 * Destination class named by a move request.
 */
export enum DestinationKind {
  ANY_EMPTY = "any_empty",
  TARGET = "target",
}

/**
 * Round coordinator state machine phases.
 */
export enum CoordinatorPhase {
  IDLE = "idle",
  BROADCASTING = "broadcasting",
  COLLECTING_INTENTS = "collecting_intents",
  RESOLVING = "resolving",
  PUBLISHING = "publishing",
  TERMINATED = "terminated",
}

/**
 * Reasons a run stops.
 */
export enum TerminationReason {
  CONVERGED = "converged",
  MAX_ROUNDS = "max_rounds",
  CANCELLED = "cancelled",
  FAILED = "failed",
}

/**
 * Neighbour counting policy at the grid edges.
 */
export enum NeighborhoodBoundary {
  /** Out-of-bounds neighbours are skipped. */
  EXCLUDE = "exclude",
  /** Toroidal grid: edges wrap around. */
  WRAP = "wrap",
}

/**
 * Where agent decisions are evaluated.
 */
export enum ExecutionMode {
  INLINE = "inline",
  WORKERS = "workers",
}

/**
 * Events emitted by the round coordinator.
 */
export enum SimulationEventType {
  SNAPSHOT_PUBLISHED = "snapshotPublished",
  TERMINATED = "terminated",
  AGENT_TIMEOUT = "agentTimeout",
  PHASE_CHANGED = "phaseChanged",
}

/**
 * Single-character codes used by the text renderer.
 */
export const GROUP_GLYPHS: Record<GroupType, string> = {
  [GroupType.RED]: "R",
  [GroupType.BLUE]: "B",
};

export const EMPTY_GLYPH = ".";

/**
 * Numeric codes used on the worker wire format. Empty cells are -1.
 */
export const GROUP_CODES: Record<GroupType, number> = {
  [GroupType.RED]: 0,
  [GroupType.BLUE]: 1,
};

export const EMPTY_CODE = -1;

export const ALL_GROUP_TYPES: readonly GroupType[] = [
  GroupType.RED,
  GroupType.BLUE,
];
