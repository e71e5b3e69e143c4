import {
  ConfigurationError,
  InvariantViolation,
} from "../../../shared/errors/SimulationErrors";
import type {
  AgentId,
  CellState,
  Placement,
  Position,
} from "../../../shared/types/simulation/grid";
import type { ResolvedMove } from "../../../shared/types/simulation/rounds";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import { GridSnapshot } from "./GridSnapshot";

const formatPosition = (position: Position): string =>
  `(${position.row}, ${position.col})`;

/**
 * Authoritative occupancy of the lattice.
 *
 * The grid only ever swaps its current snapshot for a new one. Snapshots
 * already handed out keep their value; a rejected `apply` leaves the grid on
 * the generation it was on.
 */
export class Grid {
  private current: GridSnapshot;

  private constructor(snapshot: GridSnapshot) {
    this.current = snapshot;
  }

  /**
   * Builds generation 0 from explicit placements.
   *
   * @throws {ConfigurationError} on bad dimensions, out-of-bounds placements,
   * shared cells or repeated agent ids
   */
  public static fromPlacements(
    width: number,
    height: number,
    placements: readonly Placement[],
  ): Grid {
    if (!Number.isInteger(width) || width <= 0) {
      throw new ConfigurationError("width", "must be a positive integer");
    }
    if (!Number.isInteger(height) || height <= 0) {
      throw new ConfigurationError("height", "must be a positive integer");
    }

    const cells: CellState[] = new Array<CellState>(width * height).fill(null);
    const seen = new Set<AgentId>();

    for (const placement of placements) {
      const { row, col } = placement.position;
      if (
        !Number.isInteger(row) ||
        !Number.isInteger(col) ||
        row < 0 ||
        row >= height ||
        col < 0 ||
        col >= width
      ) {
        throw new ConfigurationError(
          "placements",
          `agent ${placement.agentId} placed outside the ${width}x${height} grid at ${formatPosition(placement.position)}`,
        );
      }
      if (seen.has(placement.agentId)) {
        throw new ConfigurationError(
          "placements",
          `agent ${placement.agentId} placed twice`,
        );
      }
      const idx = row * width + col;
      const existing = cells[idx];
      if (existing) {
        throw new ConfigurationError(
          "placements",
          `agents ${existing.agentId} and ${placement.agentId} share cell ${formatPosition(placement.position)}`,
        );
      }
      seen.add(placement.agentId);
      cells[idx] = { agentId: placement.agentId, group: placement.group };
    }

    return new Grid(new GridSnapshot(width, height, 0, cells));
  }

  public get width(): number {
    return this.current.width;
  }

  public get height(): number {
    return this.current.height;
  }

  public get generation(): number {
    return this.current.generation;
  }

  public get population(): number {
    return this.current.occupiedCount();
  }

  /**
   * Current authoritative snapshot.
   */
  public snapshot(): GridSnapshot {
    return this.current;
  }

  public positionOf(agentId: AgentId): Position | undefined {
    return this.current.positionOf(agentId);
  }

  /**
   * Produces the next generation by applying resolved moves.
   *
   * Every move must start at its agent's last known position and end on a
   * cell that is empty in the current snapshot; no two moves may share a
   * target or a mover.
   *
   * @throws {InvariantViolation} when any move breaks those rules
   */
  public apply(moves: readonly ResolvedMove[]): GridSnapshot {
    const prior = this.current;
    const targets = new Set<number>();
    const movers = new Set<AgentId>();

    for (const move of moves) {
      if (movers.has(move.agentId)) {
        throw new InvariantViolation(
          "duplicate-mover",
          `agent ${move.agentId} was resolved more than once`,
        );
      }
      movers.add(move.agentId);

      const known = prior.positionOf(move.agentId);
      if (!known) {
        throw new InvariantViolation(
          "unknown-agent",
          `agent ${move.agentId} is not on the grid`,
        );
      }
      if (known.row !== move.from.row || known.col !== move.from.col) {
        throw new InvariantViolation(
          "stale-position",
          `agent ${move.agentId} is at ${formatPosition(known)}, move starts at ${formatPosition(move.from)}`,
        );
      }
      if (!prior.inBounds(move.to)) {
        throw new InvariantViolation(
          "out-of-bounds",
          `agent ${move.agentId} resolved to ${formatPosition(move.to)}`,
        );
      }

      const target = prior.indexOf(move.to);
      if (targets.has(target)) {
        throw new InvariantViolation(
          "duplicate-target",
          `two agents resolved to ${formatPosition(move.to)}`,
        );
      }
      targets.add(target);

      const occupant = prior.occupantAt(target);
      if (occupant) {
        throw new InvariantViolation(
          "target-occupied",
          `agent ${move.agentId} resolved to ${formatPosition(move.to)}, held by agent ${occupant.agentId}`,
        );
      }
    }

    const cells: CellState[] = [];
    for (let idx = 0; idx < prior.size; idx++) {
      cells.push(prior.occupantAt(idx));
    }
    for (const move of moves) {
      const from = prior.indexOf(move.from);
      cells[prior.indexOf(move.to)] = cells[from];
      cells[from] = null;
    }

    this.current = new GridSnapshot(
      prior.width,
      prior.height,
      prior.generation + 1,
      cells,
    );
    logger.debug(
      `Grid advanced to generation ${this.current.generation} with ${moves.length} move(s)`,
      LogCategory.GRID,
    );
    return this.current;
  }
}
