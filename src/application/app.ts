import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import { createSimulationRouter } from "./routes/simulationRoutes";
import { SimulationController } from "../infrastructure/controllers/simulationController";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../shared/constants/ResponseEnums";
import { SimulationError } from "../shared/errors/SimulationErrors";
import { CONFIG } from "../config/config";
import type { RoundCoordinator } from "../domain/simulation/core/RoundCoordinator";

/**
 * Express application over one coordinator.
 *
 * Routes:
 * - `/health` - Process health check
 * - `/api/sim` - Read-only observation endpoints and stop
 *
 * @module application
 */
export function createApp(coordinator: RoundCoordinator): Express {
  const app = express();

  app.use(
    cors({
      origin: CONFIG.ALLOWED_ORIGINS,
      credentials: true,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.NETWORK);
      next();
    });
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.status(HttpStatusCode.OK).json({ status: ResponseStatus.OK });
  });

  app.use("/", createSimulationRouter(new SimulationController(coordinator)));

  app.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
      if (SimulationError.isSimulationError(err)) {
        logger.error(`Simulation error: ${err.message}`, LogCategory.NETWORK);
        res
          .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
          .json({ status: ResponseStatus.ERROR, error: err.toJSON() });
        return;
      }
      const errorMessage =
        process.env.NODE_ENV === "production"
          ? "Internal server error"
          : err.message;
      logger.error("Unhandled error:", LogCategory.NETWORK, err.message);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ status: ResponseStatus.ERROR, error: errorMessage });
    },
  );

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  return app;
}
