import { describe, it, expect } from "vitest";
import {
  GroupType,
  NeighborhoodBoundary,
} from "../../src/shared/constants/SimulationEnums";
import { InvariantViolation } from "../../src/shared/errors/SimulationErrors";
import { countNeighbors } from "../../src/domain/simulation/grid/NeighborhoodOracle";
import { snapshotFromRows } from "../setup";

const wrap = { radius: 1, boundary: NeighborhoodBoundary.WRAP };

describe("countNeighbors", () => {
  const full = snapshotFromRows(["RRR", "RRR", "RRR"]);

  describe("sin envolver bordes", () => {
    it("debe ver 3 vecinos en una esquina", () => {
      expect(countNeighbors(full, { row: 0, col: 0 })).toEqual({
        same: 3,
        different: 0,
        emptyNearby: false,
      });
    });

    it("debe ver 5 vecinos en un borde", () => {
      expect(countNeighbors(full, { row: 0, col: 1 }).same).toBe(5);
      expect(countNeighbors(full, { row: 2, col: 1 }).same).toBe(5);
    });

    it("debe ver 8 vecinos en el interior", () => {
      expect(countNeighbors(full, { row: 1, col: 1 }).same).toBe(8);
    });

    it("debe separar iguales, distintos y celdas vacías", () => {
      const mixed = snapshotFromRows(["RB.", "BRR", "..."]);

      expect(countNeighbors(mixed, { row: 1, col: 1 })).toEqual({
        same: 2,
        different: 2,
        emptyNearby: true,
      });
    });

    it("debe ampliar la vecindad con el radio", () => {
      const big = snapshotFromRows(["RRRRR", "RRRRR", "RRRRR", "RRRRR", "RRRRR"]);

      expect(
        countNeighbors(big, { row: 2, col: 2 }, {
          radius: 2,
          boundary: NeighborhoodBoundary.EXCLUDE,
        }).same,
      ).toBe(24);
      expect(
        countNeighbors(big, { row: 0, col: 0 }, {
          radius: 2,
          boundary: NeighborhoodBoundary.EXCLUDE,
        }).same,
      ).toBe(8);
    });
  });

  describe("envolviendo bordes", () => {
    it("debe ver 8 vecinos también en las esquinas", () => {
      expect(countNeighbors(full, { row: 0, col: 0 }, wrap).same).toBe(8);
    });

    it("debe contar una sola vez las celdas repetidas en cuadrículas pequeñas", () => {
      const small = snapshotFromRows(["RR", "RB"]);

      expect(countNeighbors(small, { row: 0, col: 0 }, wrap)).toEqual({
        same: 2,
        different: 1,
        emptyNearby: false,
      });
    });

    it("no debe contar la propia celda", () => {
      const single = snapshotFromRows(["R"]);

      expect(countNeighbors(single, { row: 0, col: 0 }, wrap)).toEqual({
        same: 0,
        different: 0,
        emptyNearby: false,
      });
    });
  });

  it("debe exigir un grupo de referencia para celdas vacías", () => {
    const snapshot = snapshotFromRows(["R.", "BB"]);

    expect(() => countNeighbors(snapshot, { row: 0, col: 1 })).toThrow(
      InvariantViolation,
    );
    expect(
      countNeighbors(snapshot, { row: 0, col: 1 }, undefined, GroupType.BLUE),
    ).toEqual({ same: 2, different: 1, emptyNearby: false });
  });
});
