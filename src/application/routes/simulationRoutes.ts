import { Router, type NextFunction, type Request, type Response } from "express";
import type { SimulationController } from "@/infrastructure/controllers/simulationController";

/**
 * Routes for the turn simulation.
 *
 * - `GET /api/sim/status` - Scheduler state and population counts
 * - `GET /api/sim/agents` - Agents, optionally limited to `?x&y&w&h`
 * - `GET /api/sim/agents/:id` - One agent snapshot
 * - `POST /api/sim/agents` - Spawn an agent
 * - `DELETE /api/sim/agents/:id` - Despawn an agent
 * - `POST /api/sim/agents/:id/select` - Select an agent until the turn ends
 * - `POST /api/sim/player/move` - Move the player and run one turn
 * - `POST /api/sim/pause`, `/resume`, `/reset` - Scheduler control
 */
export function createSimulationRouter(controller: SimulationController): Router {
  const router = Router();

  router.get("/api/sim/status", controller.getStatus);
  router.get("/api/sim/agents", controller.listAgents);
  router.get("/api/sim/agents/:id", controller.getAgent);
  router.post("/api/sim/agents", controller.spawnAgent);
  router.delete("/api/sim/agents/:id", controller.removeAgent);
  router.post("/api/sim/agents/:id/select", controller.selectAgent);
  router.post(
    "/api/sim/player/move",
    (req: Request, res: Response, next: NextFunction): void => {
      controller.movePlayer(req, res).catch(next);
    },
  );
  router.post("/api/sim/pause", controller.pause);
  router.post("/api/sim/resume", controller.resume);
  router.post("/api/sim/reset", controller.reset);

  return router;
}
