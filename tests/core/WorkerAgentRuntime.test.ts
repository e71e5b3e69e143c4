import { describe, it, expect, afterAll } from "vitest";
import {
  ExecutionMode,
  GroupType,
} from "../../src/shared/constants/SimulationEnums";
import { SeededRandom } from "../../src/shared/utils/SeededRandom";
import { createSimulationConfig } from "../../src/config/simulationConfig";
import { AgentRegistry } from "../../src/domain/simulation/agents/AgentRegistry";
import { PopulationSeeder } from "../../src/domain/simulation/grid/PopulationSeeder";
import { InlineAgentRuntime } from "../../src/domain/simulation/core/runtime/InlineAgentRuntime";
import {
  WorkerAgentRuntime,
  partition,
} from "../../src/domain/simulation/core/runtime/WorkerAgentRuntime";
import { createSettings } from "../setup";

describe("partition", () => {
  it("debe repartir en lotes contiguos de tamaño parecido", () => {
    expect(partition([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5], [6, 7]]);
  });

  it("no debe crear lotes vacíos", () => {
    expect(partition([1, 2], 4)).toEqual([[1], [2]]);
    expect(partition([], 3)).toEqual([]);
  });
});

describe("WorkerAgentRuntime", () => {
  const settings = createSettings({ similarityThreshold: 0.6 });
  const runtime = new WorkerAgentRuntime(settings, 2);

  afterAll(async () => {
    await runtime.destroy();
  });

  it("debe producir las mismas intenciones que los actores en proceso", async () => {
    const config = createSimulationConfig({
      width: 8,
      height: 8,
      densities: { [GroupType.RED]: 0.4, [GroupType.BLUE]: 0.4 },
    });
    const grid = new PopulationSeeder(new SeededRandom(21)).populate(config);
    const agents = AgentRegistry.fromSnapshot(grid.snapshot()).list();
    const inline = new InlineAgentRuntime(settings);
    inline.spawn(agents);
    runtime.spawn(agents);

    const expected = await inline.collectIntents(grid.snapshot(), 5000);
    const actual = await runtime.collectIntents(grid.snapshot(), 5000);

    expect(runtime.mode).toBe(ExecutionMode.WORKERS);
    expect(actual.timedOut).toEqual([]);
    expect(actual.intents.size).toBe(agents.length);
    for (const agent of agents) {
      expect(actual.intents.get(agent.id)).toEqual(expected.intents.get(agent.id));
    }
  }, 20000);
});
