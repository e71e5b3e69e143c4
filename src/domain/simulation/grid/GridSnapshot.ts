import {
  ALL_GROUP_TYPES,
  EMPTY_CODE,
  GROUP_CODES,
  type GroupType,
} from "../../../shared/constants/SimulationEnums";
import type {
  AgentId,
  CellState,
  Occupant,
  Position,
  SnapshotWire,
} from "../../../shared/types/simulation/grid";

const GROUPS_BY_CODE = new Map<number, GroupType>(
  ALL_GROUP_TYPES.map((group) => [GROUP_CODES[group], group]),
);

/**
 * Immutable, point-in-time view of grid occupancy for one generation.
 *
 * The cell array and every occupant are frozen at construction. A snapshot
 * can be shared with any number of agents and observers; the grid produces a
 * new instance for every generation instead of updating an existing one.
 */
export class GridSnapshot {
  private readonly cells: readonly CellState[];
  private readonly positions: ReadonlyMap<AgentId, number>;

  constructor(
    public readonly width: number,
    public readonly height: number,
    public readonly generation: number,
    cells: readonly CellState[],
  ) {
    if (cells.length !== width * height) {
      throw new RangeError(
        `Snapshot needs ${width * height} cells, received ${cells.length}`,
      );
    }
    const frozen = cells.map((cell) =>
      cell ? Object.freeze({ agentId: cell.agentId, group: cell.group }) : null,
    );
    const positions = new Map<AgentId, number>();
    frozen.forEach((cell, idx) => {
      if (cell) positions.set(cell.agentId, idx);
    });
    this.cells = Object.freeze(frozen);
    this.positions = positions;
    Object.freeze(this);
  }

  public get size(): number {
    return this.cells.length;
  }

  public inBounds(position: Position): boolean {
    return (
      Number.isInteger(position.row) &&
      Number.isInteger(position.col) &&
      position.row >= 0 &&
      position.row < this.height &&
      position.col >= 0 &&
      position.col < this.width
    );
  }

  public indexOf(position: Position): number {
    return position.row * this.width + position.col;
  }

  public positionAt(index: number): Position {
    return { row: Math.floor(index / this.width), col: index % this.width };
  }

  /**
   * Cell state at a position; `null` for empty cells and out-of-bounds positions.
   */
  public at(position: Position): CellState {
    if (!this.inBounds(position)) return null;
    return this.cells[this.indexOf(position)];
  }

  public occupantAt(index: number): Occupant | null {
    return this.cells[index] ?? null;
  }

  public isEmpty(position: Position): boolean {
    return this.inBounds(position) && this.at(position) === null;
  }

  public positionOf(agentId: AgentId): Position | undefined {
    const idx = this.positions.get(agentId);
    return idx === undefined ? undefined : this.positionAt(idx);
  }

  public occupiedCount(): number {
    return this.positions.size;
  }

  /**
   * Empty cells in row-major order.
   */
  public emptyCells(): Position[] {
    const empty: Position[] = [];
    this.cells.forEach((cell, idx) => {
      if (cell === null) empty.push(this.positionAt(idx));
    });
    return empty;
  }

  public occupants(): Array<{ occupant: Occupant; position: Position }> {
    const result: Array<{ occupant: Occupant; position: Position }> = [];
    this.cells.forEach((cell, idx) => {
      if (cell) result.push({ occupant: cell, position: this.positionAt(idx) });
    });
    return result;
  }

  /**
   * Compact form for worker threads: one group code per cell.
   * Agent ids are not needed to count neighbours and are left out.
   */
  public toWire(): SnapshotWire {
    const codes = new Int8Array(this.cells.length);
    this.cells.forEach((cell, idx) => {
      codes[idx] = cell ? GROUP_CODES[cell.group] : EMPTY_CODE;
    });
    return {
      generation: this.generation,
      width: this.width,
      height: this.height,
      cells: codes,
    };
  }

  /**
   * Rebuilds a snapshot from its wire form. Occupants get synthetic ids
   * (their cell index); only group composition is meaningful afterwards.
   */
  public static fromWire(wire: SnapshotWire): GridSnapshot {
    const cells: CellState[] = Array.from(wire.cells, (code, idx) => {
      if (code === EMPTY_CODE) return null;
      const group = GROUPS_BY_CODE.get(code);
      if (!group) {
        throw new RangeError(`Unknown group code ${code} at cell ${idx}`);
      }
      return { agentId: idx, group };
    });
    return new GridSnapshot(wire.width, wire.height, wire.generation, cells);
  }

  public toJSON(): {
    generation: number;
    width: number;
    height: number;
    cells: CellState[];
  } {
    return {
      generation: this.generation,
      width: this.width,
      height: this.height,
      cells: [...this.cells],
    };
  }
}
