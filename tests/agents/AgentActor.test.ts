import { describe, it, expect } from "vitest";
import {
  DestinationKind,
  GroupType,
  IntentKind,
  StayReason,
} from "../../src/shared/constants/SimulationEnums";
import {
  AgentActor,
  decideIntent,
  isSatisfied,
} from "../../src/domain/simulation/agents/AgentActor";
import type { RelocationIntent } from "../../src/shared/types/simulation/agents";
import { createSettings, snapshotFromRows } from "../setup";

describe("AgentActor", () => {
  describe("isSatisfied", () => {
    it("debe considerar satisfecho a un agente sin vecinos ocupados", () => {
      expect(isSatisfied({ same: 0, different: 0 }, 0.6)).toBe(true);
      expect(isSatisfied({ same: 0, different: 0 }, 1)).toBe(true);
    });

    it("debe aceptar una proporción igual al umbral", () => {
      expect(isSatisfied({ same: 1, different: 1 }, 0.5)).toBe(true);
      expect(isSatisfied({ same: 1, different: 2 }, 0.5)).toBe(false);
    });

    it("debe respetar los umbrales extremos", () => {
      expect(isSatisfied({ same: 0, different: 3 }, 0)).toBe(true);
      expect(isSatisfied({ same: 2, different: 0 }, 1)).toBe(true);
      expect(isSatisfied({ same: 2, different: 1 }, 1)).toBe(false);
    });
  });

  describe("decideIntent", () => {
    it("debe quedarse cuando está solo en una cuadrícula de 3x3", () => {
      const snapshot = snapshotFromRows(["...", ".R.", "..."]);
      const intent = decideIntent(
        { id: 4, group: GroupType.RED, position: { row: 1, col: 1 } },
        snapshot,
        createSettings({ similarityThreshold: 0.6 }),
      );

      expect(intent).toEqual({
        kind: IntentKind.STAY,
        agentId: 4,
        reason: StayReason.SATISFIED,
      });
    });

    it("debe pedir cualquier celda vacía cuando no está satisfecho", () => {
      const snapshot = snapshotFromRows(["RR", "B."]);
      const intent = decideIntent(
        { id: 2, group: GroupType.BLUE, position: { row: 1, col: 0 } },
        snapshot,
        createSettings({ similarityThreshold: 0.5 }),
      );

      expect(intent).toEqual({
        kind: IntentKind.REQUEST_MOVE,
        agentId: 2,
        destination: { kind: DestinationKind.ANY_EMPTY },
      });
    });

    it("debe pedir moverse aunque no haya celdas vacías", () => {
      const snapshot = snapshotFromRows(["RB", "BB"]);
      const intent = decideIntent(
        { id: 0, group: GroupType.RED, position: { row: 0, col: 0 } },
        snapshot,
        createSettings({ similarityThreshold: 0.3 }),
      );

      expect(intent.kind).toBe(IntentKind.REQUEST_MOVE);
    });
  });

  describe("mensajes", () => {
    it("debe responder a un snapshot con una intención", async () => {
      const actor = new AgentActor(
        { id: 0, group: GroupType.RED, position: { row: 0, col: 0 } },
        createSettings(),
      );

      await expect(actor.receive(snapshotFromRows(["RR"]))).resolves.toEqual({
        kind: IntentKind.STAY,
        agentId: 0,
        reason: StayReason.SATISFIED,
      });
    });

    it("debe rechazar la respuesta si la decisión falla", async () => {
      class FailingActor extends AgentActor {
        public override decide(): RelocationIntent {
          throw new Error("decision failed");
        }
      }
      const actor = new FailingActor(
        { id: 0, group: GroupType.RED, position: { row: 0, col: 0 } },
        createSettings(),
      );

      await expect(actor.receive(snapshotFromRows(["R."]))).rejects.toThrow(
        "decision failed",
      );
    });

    it("debe actualizar su posición sólo al reubicarse", () => {
      const start = { row: 0, col: 0 };
      const actor = new AgentActor(
        { id: 3, group: GroupType.BLUE, position: start },
        createSettings(),
      );

      start.col = 5;
      expect(actor.getState().position).toEqual({ row: 0, col: 0 });

      actor.relocate({ row: 1, col: 1 });
      expect(actor.getState()).toEqual({
        id: 3,
        group: GroupType.BLUE,
        position: { row: 1, col: 1 },
      });
      expect(actor.id).toBe(3);
    });
  });
});
