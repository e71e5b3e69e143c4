import {
  NeighborhoodBoundary,
  type GroupType,
} from "../../../shared/constants/SimulationEnums";
import { InvariantViolation } from "../../../shared/errors/SimulationErrors";
import type {
  NeighborCounts,
  Position,
} from "../../../shared/types/simulation/grid";
import type { GridSnapshot } from "./GridSnapshot";

export interface NeighborhoodOptions {
  /** Chebyshev radius; 1 is the Moore neighbourhood. */
  radius: number;
  boundary: NeighborhoodBoundary;
}

export const DEFAULT_NEIGHBORHOOD: NeighborhoodOptions = {
  radius: 1,
  boundary: NeighborhoodBoundary.EXCLUDE,
};

/**
 * Counts same-group and different-group occupants around a cell.
 *
 * With `EXCLUDE`, cells beyond the edge are skipped, so corners see 3 Moore
 * neighbours and edges 5. With `WRAP`, coordinates wrap around and every
 * distinct cell is counted once; the centre cell is never counted.
 *
 * @param group - group to compare against; defaults to the occupant at `position`
 * @throws {InvariantViolation} when `position` is empty and no group is given
 */
export function countNeighbors(
  snapshot: GridSnapshot,
  position: Position,
  options: NeighborhoodOptions = DEFAULT_NEIGHBORHOOD,
  group?: GroupType,
): NeighborCounts {
  const reference = group ?? snapshot.at(position)?.group;
  if (!reference) {
    throw new InvariantViolation(
      "empty-cell",
      `no occupant at (${position.row}, ${position.col}) to compare against`,
    );
  }

  const centre = snapshot.indexOf(position);
  const visited = new Set<number>();
  let same = 0;
  let different = 0;
  let emptyNearby = false;

  for (let dr = -options.radius; dr <= options.radius; dr++) {
    for (let dc = -options.radius; dc <= options.radius; dc++) {
      if (dr === 0 && dc === 0) continue;

      let row = position.row + dr;
      let col = position.col + dc;
      if (options.boundary === NeighborhoodBoundary.WRAP) {
        row = ((row % snapshot.height) + snapshot.height) % snapshot.height;
        col = ((col % snapshot.width) + snapshot.width) % snapshot.width;
      } else if (
        row < 0 ||
        row >= snapshot.height ||
        col < 0 ||
        col >= snapshot.width
      ) {
        continue;
      }

      const idx = row * snapshot.width + col;
      if (idx === centre || visited.has(idx)) continue;
      visited.add(idx);

      const occupant = snapshot.occupantAt(idx);
      if (!occupant) {
        emptyNearby = true;
      } else if (occupant.group === reference) {
        same++;
      } else {
        different++;
      }
    }
  }

  return { same, different, emptyNearby };
}
