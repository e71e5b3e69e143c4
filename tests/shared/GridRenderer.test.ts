import { describe, it, expect } from "vitest";
import { renderSnapshot } from "../../src/shared/utils/GridRenderer";
import { snapshotFromRows } from "../setup";

describe("renderSnapshot", () => {
  it("debe escribir una línea por fila con R, B y punto", () => {
    expect(renderSnapshot(snapshotFromRows(["R.B", "..R"]))).toBe("R.B\n..R");
  });

  it("debe representar una cuadrícula vacía sólo con puntos", () => {
    expect(renderSnapshot(snapshotFromRows(["..", ".."]))).toBe("..\n..");
  });
});
