import { describe, it, expect, afterEach, vi } from "vitest";

describe("Config", () => {
  afterEach(() => {
    delete process.env.PORT;
    delete process.env.ALLOWED_ORIGINS;
    delete process.env.SIM_AUTO_START;
    vi.resetModules();
  });

  it("debe usar valores por defecto", async () => {
    delete process.env.PORT;
    delete process.env.ALLOWED_ORIGINS;
    delete process.env.SIM_AUTO_START;
    vi.resetModules();
    const { CONFIG } = await import("../../src/config/config");

    expect(CONFIG.PORT).toBe(8080);
    expect(CONFIG.ALLOWED_ORIGINS).toBe("*");
    expect(CONFIG.AUTO_START).toBe(true);
  });

  it("debe usar valores de entorno cuando están disponibles", async () => {
    process.env.PORT = "3000";
    process.env.ALLOWED_ORIGINS = "http://localhost:5173,http://localhost:3000";
    process.env.SIM_AUTO_START = "false";
    vi.resetModules();
    const { CONFIG } = await import("../../src/config/config");

    expect(CONFIG.PORT).toBe(3000);
    expect(CONFIG.ALLOWED_ORIGINS).toEqual([
      "http://localhost:5173",
      "http://localhost:3000",
    ]);
    expect(CONFIG.AUTO_START).toBe(false);
  });
});
