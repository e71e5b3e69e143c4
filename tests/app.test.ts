import { describe, it, expect } from "vitest";
import { createApp } from "../src/application/app";
import { GroupType } from "../src/shared/constants/SimulationEnums";
import { createSimulationConfig } from "../src/config/simulationConfig";
import { createCoordinator } from "../src/config/container";
import { gridFromRows } from "./setup";

describe("App", () => {
  it("debe exportar la aplicación Express", () => {
    const coordinator = createCoordinator(
      createSimulationConfig({
        width: 2,
        height: 1,
        densities: { [GroupType.RED]: 0, [GroupType.BLUE]: 0 },
      }),
      { grid: gridFromRows(["RB"]) },
    );

    const app = createApp(coordinator);

    expect(app).toBeDefined();
    expect(typeof app).toBe("function");
  });
});
