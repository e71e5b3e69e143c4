import { Router, type Request, type Response } from "express";
import type { SimulationController } from "@/infrastructure/controllers/simulationController";

/**
 * Observation routes under `/api/sim`.
 *
 * - `GET /api/sim/health` - Coordinator phase and generation
 * - `GET /api/sim/snapshot` - Latest published snapshot as JSON
 * - `GET /api/sim/stats` - Population, satisfaction and last round counts
 * - `GET /api/sim/frame` - Latest snapshot as a text frame
 * - `POST /api/sim/stop` - End the run at the next round boundary
 */
export function createSimulationRouter(controller: SimulationController): Router {
  const router = Router();

  router.get("/api/sim/health", (req: Request, res: Response) =>
    controller.getHealth(req, res),
  );
  router.get("/api/sim/snapshot", (req: Request, res: Response) =>
    controller.getSnapshot(req, res),
  );
  router.get("/api/sim/stats", (req: Request, res: Response) =>
    controller.getStats(req, res),
  );
  router.get("/api/sim/frame", (req: Request, res: Response) =>
    controller.getFrame(req, res),
  );
  router.post("/api/sim/stop", (req: Request, res: Response) =>
    controller.stop(req, res),
  );

  return router;
}
