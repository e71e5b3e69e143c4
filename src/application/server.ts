import "dotenv/config";
import "reflect-metadata";
import { createApp } from "./app";
import { CONFIG } from "../config/config";
import { createCoordinator } from "../config/container";
import { loadSimulationConfigFromEnv } from "../config/simulationConfig";
import { SimulationEventType } from "../shared/constants/SimulationEnums";
import { SnapshotStreamServer } from "../infrastructure/services/stream/SnapshotStreamServer";
import { logger, LogCategory } from "../infrastructure/utils/logger";

/**
 * Main server entry point.
 *
 * Seeds the grid from `SIM_*` environment variables, serves the observation
 * API and streams every published snapshot on `/ws/sim`. The run starts
 * once the server is listening unless `SIM_AUTO_START=false`.
 *
 * @module application
 */

const simulationConfig = loadSimulationConfigFromEnv(process.env);
const coordinator = createCoordinator(simulationConfig);
const app = createApp(coordinator);
const streamServer = new SnapshotStreamServer(coordinator);
const runController = new AbortController();

coordinator.on(SimulationEventType.AGENT_TIMEOUT, (timeout) => {
  logger.debug(
    `Agents defaulted to stay: ${timeout.agentIds.length}`,
    LogCategory.AGENTS,
  );
});

coordinator.initialize();

const server = app.listen(CONFIG.PORT, () => {
  logger.info(
    `Simulation server running on http://localhost:${CONFIG.PORT}`,
    LogCategory.NETWORK,
  );
  if (CONFIG.AUTO_START) startRun();
});

server.on("upgrade", (request, socket, head) => {
  const host = request.headers.host ?? "localhost";
  const url = request.url ?? "/";
  let pathname: string;
  try {
    pathname = new URL(url, `http://${host}`).pathname;
  } catch (error) {
    logger.debug("Invalid URL in WebSocket upgrade request", LogCategory.NETWORK, {
      url,
      host,
      error: error instanceof Error ? error.message : String(error),
    });
    socket.destroy();
    return;
  }

  if (pathname === "/ws/sim") {
    streamServer.handleUpgrade(request, socket, head);
    return;
  }

  socket.destroy();
});

function startRun(): void {
  coordinator
    .run({ signal: runController.signal })
    .then((outcome) => {
      logger.info(
        `✅ Run finished: ${outcome.reason} at generation ${outcome.generation}`,
        LogCategory.SIMULATION,
      );
    })
    .catch((err: unknown) => {
      logger.error(
        "❌ Run failed:",
        LogCategory.SIMULATION,
        err instanceof Error ? err.message : String(err),
      );
    });
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`, LogCategory.GENERAL);
  runController.abort();
  streamServer.close();
  server.close();
  await coordinator.shutdown();
  await logger.flush();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}
