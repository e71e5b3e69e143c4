import { describe, it, expect } from "vitest";
import {
  ExecutionMode,
  IntentKind,
  StayReason,
} from "../../src/shared/constants/SimulationEnums";
import type { RelocationIntent } from "../../src/shared/types/simulation/agents";
import { AgentActor } from "../../src/domain/simulation/agents/AgentActor";
import { AgentRegistry } from "../../src/domain/simulation/agents/AgentRegistry";
import { InlineAgentRuntime } from "../../src/domain/simulation/core/runtime/InlineAgentRuntime";
import { createSettings, gridFromRows } from "../setup";

class StalledActor extends AgentActor {
  public override receive(): Promise<RelocationIntent> {
    return new Promise<RelocationIntent>(() => undefined);
  }
}

class BrokenActor extends AgentActor {
  public override receive(): Promise<RelocationIntent> {
    return Promise.reject(new Error("mailbox closed"));
  }
}

describe("InlineAgentRuntime", () => {
  const settings = createSettings({ similarityThreshold: 0.5 });
  const grid = gridFromRows(["RR", "B."]);
  const agents = AgentRegistry.fromSnapshot(grid.snapshot()).list();

  it("debe recoger una intención por agente", async () => {
    const runtime = new InlineAgentRuntime(settings);
    runtime.spawn(agents);

    const { intents, timedOut } = await runtime.collectIntents(grid.snapshot(), 1000);

    expect(runtime.mode).toBe(ExecutionMode.INLINE);
    expect(timedOut).toEqual([]);
    expect([...intents.keys()].sort()).toEqual([0, 1, 2]);
    expect(intents.get(0)).toEqual({
      kind: IntentKind.STAY,
      agentId: 0,
      reason: StayReason.SATISFIED,
    });
    expect(intents.get(2)?.kind).toBe(IntentKind.REQUEST_MOVE);
  });

  it("debe reportar como vencidos a los agentes que no responden a tiempo", async () => {
    const runtime = new InlineAgentRuntime(settings, (state, actorSettings) =>
      state.id === 1
        ? new StalledActor(state, actorSettings)
        : new AgentActor(state, actorSettings),
    );
    runtime.spawn(agents);

    const { intents, timedOut } = await runtime.collectIntents(grid.snapshot(), 20);

    expect(timedOut).toEqual([1]);
    expect(intents.has(1)).toBe(false);
    expect(intents.size).toBe(2);
  });

  it("debe tratar un fallo del agente como un vencimiento", async () => {
    const runtime = new InlineAgentRuntime(settings, (state, actorSettings) =>
      state.id === 0
        ? new BrokenActor(state, actorSettings)
        : new AgentActor(state, actorSettings),
    );
    runtime.spawn(agents);

    const { timedOut } = await runtime.collectIntents(grid.snapshot(), 1000);

    expect(timedOut).toEqual([0]);
  });

  it("debe decidir con la posición actualizada tras reubicar", async () => {
    const runtime = new InlineAgentRuntime(settings);
    runtime.spawn(agents);
    const next = grid.apply([
      { agentId: 2, from: { row: 1, col: 0 }, to: { row: 1, col: 1 } },
    ]);
    runtime.relocate([
      { agentId: 2, from: { row: 1, col: 0 }, to: { row: 1, col: 1 } },
    ]);

    const { intents } = await runtime.collectIntents(next, 1000);

    expect(intents.get(2)?.kind).toBe(IntentKind.REQUEST_MOVE);
    expect(intents.get(0)?.kind).toBe(IntentKind.STAY);
    await runtime.destroy();
  });
});
