import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { Logger, LogCategory, LogLevel } from "../../src/infrastructure/utils/logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("debe prefijar nivel, categoría y generación en consola", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = new Logger({ writeToFile: false, minLevel: LogLevel.DEBUG });
    log.setTick(7);

    log.info("ronda publicada", LogCategory.SIMULATION, { moved: 2 });

    expect(info).toHaveBeenCalledTimes(1);
    const [line, data] = info.mock.calls[0];
    expect(String(line)).toContain("[INFO] [simulation] [gen 7]");
    expect(String(line)).toMatch(/ ronda publicada$/);
    expect(data).toEqual({ moved: 2 });
  });

  it("debe omitir niveles por debajo del mínimo", () => {
    const debug = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = new Logger({ writeToFile: false, minLevel: LogLevel.WARN });

    log.debug("detalle");
    log.warn("aviso");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("debe limitar mensajes repetidos salvo los errores", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = new Logger({
      writeToFile: false,
      minLevel: LogLevel.DEBUG,
      maxThrottleCount: 2,
      throttleWindowMs: 60000,
    });

    for (let i = 0; i < 5; i++) {
      log.warn("repetido");
      log.error("fallo");
    }

    expect(warn).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledTimes(5);
  });

  it("debe volcar las entradas a un archivo JSON Lines al hacer flush", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logDir = await fs.mkdtemp(path.join(os.tmpdir(), "sim-logs-"));
    const log = new Logger({
      writeToFile: true,
      logDir,
      minLevel: LogLevel.ERROR,
    });
    log.setTick(3);

    log.info("primera", LogCategory.GRID);
    log.info("segunda", { cells: 4 });
    await log.flush();

    const [file] = await fs.readdir(logDir);
    expect(file).toMatch(/^logs-\d{4}-\d{2}-\d{2}\.jsonl$/);
    const lines = (await fs.readFile(path.join(logDir, file), "utf-8"))
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: "info",
      category: "grid",
      message: "primera",
      tick: 3,
    });
    expect(lines[1]).toMatchObject({
      category: "general",
      message: "segunda",
      data: { cells: 4 },
    });

    await fs.rm(logDir, { recursive: true, force: true });
  });
});
