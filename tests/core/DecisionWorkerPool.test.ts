import { describe, it, expect, afterEach } from "vitest";
import {
  DestinationKind,
  GroupType,
  IntentKind,
  StayReason,
} from "../../src/shared/constants/SimulationEnums";
import { AgentTimeout } from "../../src/shared/errors/SimulationErrors";
import { DecisionWorkerPool } from "../../src/domain/simulation/core/runtime/DecisionWorkerPool";
import { createSettings, snapshotFromRows } from "../setup";

describe("DecisionWorkerPool", () => {
  const settings = createSettings();
  const wire = snapshotFromRows(["RB"]).toWire();
  const red = { id: 0, group: GroupType.RED, position: { row: 0, col: 0 } };
  const blue = { id: 1, group: GroupType.BLUE, position: { row: 0, col: 1 } };
  let pool: DecisionWorkerPool;

  afterEach(async () => {
    await pool.destroy();
  });

  it("debe evaluar un lote con el worker por defecto", async () => {
    pool = new DecisionWorkerPool(1);
    await pool.whenReady(10000);

    const intents = await pool.evaluate(wire, [red], settings, 5000);

    expect(intents).toEqual([
      {
        kind: IntentKind.REQUEST_MOVE,
        agentId: 0,
        destination: { kind: DestinationKind.ANY_EMPTY },
      },
    ]);
  }, 20000);

  it("debe vencer un lote sin respuesta y reemplazar al worker", async () => {
    pool = new DecisionWorkerPool(1, {
      script: new URL("../fixtures/StallingDecisionWorker.ts", import.meta.url),
    });
    await pool.whenReady(10000);

    const stalled = pool.evaluate(wire, [red], settings, 100);

    await expect(stalled).rejects.toBeInstanceOf(AgentTimeout);
    await expect(stalled).rejects.toMatchObject({ agentIds: [0] });

    const answered = await pool.evaluate(wire, [blue], settings, 10000);

    expect(answered).toEqual([
      { kind: IntentKind.STAY, agentId: 1, reason: StayReason.SATISFIED },
    ]);
  }, 30000);

  it("debe rechazar trabajos después de destruirse", async () => {
    pool = new DecisionWorkerPool(1);
    await pool.destroy();

    await expect(pool.evaluate(wire, [red], settings, 100)).rejects.toThrow(
      "DecisionWorkerPool disposed",
    );
    await expect(pool.whenReady(100)).rejects.toThrow("DecisionWorkerPool disposed");
  });
});
