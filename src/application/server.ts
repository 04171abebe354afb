import "dotenv/config";
import { createApp } from "./app";
import { CONFIG } from "../config/config";
import { createContainer } from "../config/container";
import { TYPES } from "../config/Types";
import { SimulationController } from "../infrastructure/controllers/simulationController";
import type { WorldSeeder } from "../infrastructure/services/world/WorldSeeder";
import { DEFAULT_WORLD_LAYOUT } from "../infrastructure/services/world/config/defaultWorldLayout";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";

/**
 * Main server entry point.
 *
 * Seeds the default world into a fresh container and serves the simulation
 * API. Turns only advance when the player moves.
 *
 * @module application
 */

logger.setMinLevel(CONFIG.LOG_LEVEL);
logger.info("🚀 Backend: Seeding simulation world...", LogCategory.SIMULATION);

const container = createContainer({ layout: DEFAULT_WORLD_LAYOUT });

try {
  container.get<WorldSeeder>(TYPES.WorldSeeder).populate();
} catch (error) {
  logger.error(
    "❌ Backend: Failed to seed the world",
    LogCategory.SIMULATION,
    error instanceof Error ? error.message : String(error),
  );
  process.exit(1);
}

const app = createApp(new SimulationController(container));

const server = app.listen(CONFIG.PORT, () => {
  logger.info(
    `Simulation server running on http://localhost:${CONFIG.PORT}`,
    LogCategory.SIMULATION,
  );
});

function shutdown(signal: string): void {
  logger.info(`🛑 Backend: ${signal} received, closing server`, LogCategory.SIMULATION);
  server.close(() => {
    logger
      .flush()
      .catch((error: unknown) => {
        console.error("Failed to flush logs:", error);
      })
      .finally(() => {
        logger.destroy();
        process.exit(0);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
