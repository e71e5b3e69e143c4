import type { GroupType } from "../../constants/SimulationEnums";

/**
 * Stable agent identifier. Assigned once at initialization.
 */
export type AgentId = number;

/**
 * Zero-based cell coordinate. Cells are stored row-major.
 */
export interface Position {
  row: number;
  col: number;
}

/**
 * The agent standing on a cell.
 */
export interface Occupant {
  readonly agentId: AgentId;
  readonly group: GroupType;
}

/**
 * Occupancy of a single cell: an occupant or `null` when empty.
 */
export type CellState = Occupant | null;

/**
 * Initial placement of one agent.
 */
export interface Placement {
  agentId: AgentId;
  group: GroupType;
  position: Position;
}

/**
 * Compact snapshot form posted to decision workers.
 * `cells` holds one group code per cell, -1 for empty.
 */
export interface SnapshotWire {
  generation: number;
  width: number;
  height: number;
  cells: Int8Array;
}

/**
 * Result of scanning the neighbourhood of a cell.
 */
export interface NeighborCounts {
  same: number;
  different: number;
  emptyNearby: boolean;
}
