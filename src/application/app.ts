import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import { createSimulationRouter } from "./routes/simulationRoutes";
import type { SimulationController } from "../infrastructure/controllers/simulationController";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";

/**
 * Express application for one simulation session.
 *
 * Routes:
 * - `/api/sim` - Simulation control, agents and player moves
 * - `/health` - Health check endpoint
 *
 * @module application
 */
export function createApp(controller: SimulationController): Express {
  const app = express();

  app.use(
    cors({
      origin: process.env.ALLOWED_ORIGINS?.split(",") ?? "*",
      credentials: true,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.API);
      next();
    });
  }

  app.get("/health", (_req: Request, res: Response): void => {
    res.json({ status: "ok", timestamp: Date.now() });
  });

  app.use("/", createSimulationRouter(controller));

  app.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
      const errorMessage =
        process.env.NODE_ENV === "production"
          ? "Internal server error"
          : err.message;
      logger.error("Unhandled error:", LogCategory.API, err.message);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: errorMessage });
    },
  );

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  return app;
}
