import { describe, it, expect } from "vitest";
import { SeededRandom } from "../../src/shared/utils/SeededRandom";

const draw = (rng: SeededRandom, count: number): number[] =>
  Array.from({ length: count }, () => rng.float());

describe("SeededRandom", () => {
  it("debe producir la misma secuencia con la misma semilla", () => {
    expect(draw(new SeededRandom(42), 5)).toEqual(draw(new SeededRandom(42), 5));
  });

  it("debe separar flujos independientes de una misma semilla", () => {
    expect(draw(new SeededRandom(42, "placement"), 3)).not.toEqual(
      draw(new SeededRandom(42, "conflict"), 3),
    );
  });

  it("debe mantener enteros dentro del rango pedido", () => {
    const rng = new SeededRandom(5);
    for (let i = 0; i < 200; i++) {
      const value = rng.intRange(2, 4);
      expect(value).toBeGreaterThanOrEqual(2);
      expect(value).toBeLessThanOrEqual(4);
      expect(Number.isInteger(value)).toBe(true);
    }
  });

  it("debe rechazar índices de colecciones vacías", () => {
    expect(() => new SeededRandom(1).index(0)).toThrow(
      "Cannot pick from an empty collection",
    );
  });

  it("debe barajar en el mismo arreglo conservando sus elementos", () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = new SeededRandom(9).shuffle(items);

    expect(shuffled).toBe(items);
    expect([...shuffled].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
  });
});
