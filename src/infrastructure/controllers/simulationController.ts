import type { Request, Response } from "express";
import type { Container } from "inversify";

import { logger } from "../utils/logger";
import { LogCategory } from "../../shared/constants/LogEnums";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import {
  AgentCategory,
  isMoveDirection,
  isPlayerSpecies,
  isPredatorSpecies,
  isPreySpecies,
  isWorkerSpecies,
} from "../../shared/constants/AgentEnums";
import { MoveRejection } from "../../shared/constants/PlayerEnums";
import {
  InvalidSpawnError,
  StaleReferenceError,
} from "../../shared/errors/SimulationErrors";
import { TYPES } from "../../config/Types";
import {
  viewportRect,
  type AgentRegistry,
} from "../../domain/simulation/core/AgentRegistry";
import type { TurnScheduler } from "../../domain/simulation/core/TurnScheduler";
import type {
  MoveResult,
  PlayerController,
} from "../../domain/simulation/systems/agents/player/PlayerController";
import type { AgentKind } from "../../domain/types/simulation/agents";
import type { WorldSeeder } from "../services/world/WorldSeeder";
import { DenStorage } from "../services/world/DenStorage";
import { ForageField } from "../services/world/ForageField";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readInteger(
  source: Record<string, unknown>,
  key: string,
): number | undefined {
  const value = source[key];
  const parsed = typeof value === "string" && value !== "" ? Number(value) : value;
  return typeof parsed === "number" && Number.isInteger(parsed)
    ? parsed
    : undefined;
}

/**
 * Builds an agent kind from untrusted category and subtype strings.
 */
export function toAgentKind(category: string, subtype: string): AgentKind | null {
  switch (category) {
    case AgentCategory.PLAYER:
      return isPlayerSpecies(subtype) ? { category: AgentCategory.PLAYER, subtype } : null;
    case AgentCategory.PREY:
      return isPreySpecies(subtype) ? { category: AgentCategory.PREY, subtype } : null;
    case AgentCategory.PREDATOR:
      return isPredatorSpecies(subtype)
        ? { category: AgentCategory.PREDATOR, subtype }
        : null;
    case AgentCategory.WORKER:
      return isWorkerSpecies(subtype) ? { category: AgentCategory.WORKER, subtype } : null;
    default:
      return null;
  }
}

/**
 * Controller for the turn simulation HTTP API.
 *
 * Handlers are arrow properties so the router can pass them unbound. Every
 * collaborator is resolved from the session container on each request.
 */
export class SimulationController {
  constructor(private readonly container: Container) {}

  private get registry(): AgentRegistry {
    return this.container.get<AgentRegistry>(TYPES.AgentRegistry);
  }

  private get scheduler(): TurnScheduler {
    return this.container.get<TurnScheduler>(TYPES.TurnScheduler);
  }

  /**
   * Scheduler state, population counts, den storage, forage growth and the
   * selected agent.
   */
  getStatus = (_req: Request, res: Response): void => {
    res.json({
      scheduler: this.scheduler.getStatus(),
      agents: this.registry.getStats(),
      storage: this.container.get(DenStorage).getStats(),
      resources: this.container.get(ForageField).getStats(),
      selectedAgentId: this.registry.getSelectedAgentId(),
    });
  };

  /**
   * Every live agent, or only those inside `?x&y&w&h` when all four are given.
   */
  listAgents = (req: Request, res: Response): void => {
    const query: Record<string, unknown> = req.query;
    const keys = ["x", "y", "w", "h"];
    const present = keys.filter((key) => query[key] !== undefined);

    const registry = this.registry;
    let ids: string[];
    if (present.length === 0) {
      ids = registry.allAgents();
    } else {
      const [x, y, w, h] = keys.map((key) => readInteger(query, key));
      if (x === undefined || y === undefined || w === undefined || h === undefined) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "Invalid viewport: x, y, w and h must all be integers",
        });
        return;
      }
      ids = registry.getAgentsInViewport(viewportRect(x, y, w, h));
    }

    const agents = ids.flatMap((id) => {
      const agent = registry.get(id);
      return agent ? [registry.snapshot(agent)] : [];
    });
    res.json({ agents });
  };

  getAgent = (req: Request, res: Response): void => {
    try {
      const registry = this.registry;
      const agent = registry.require(req.params.id);
      res.json({ agent: registry.snapshot(agent) });
    } catch (error) {
      this.handleError(res, error, "getAgent");
    }
  };

  spawnAgent = (req: Request, res: Response): void => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(HttpStatusCode.BAD_REQUEST).json({ error: "Invalid request body" });
      return;
    }

    const { category, subtype, homeId } = body;
    const kind =
      typeof category === "string" && typeof subtype === "string"
        ? toAgentKind(category, subtype)
        : null;
    if (!kind) {
      res.status(HttpStatusCode.BAD_REQUEST).json({
        error: "Invalid request: unknown category or subtype",
      });
      return;
    }

    const x = readInteger(body, "x");
    const y = readInteger(body, "y");
    if (x === undefined || y === undefined) {
      res.status(HttpStatusCode.BAD_REQUEST).json({
        error: "Invalid request: x and y must be integers",
      });
      return;
    }

    try {
      const registry = this.registry;
      const id = registry.spawn(
        kind,
        { x, y },
        {
          homeId: typeof homeId === "string" ? homeId : null,
          groupCount: readInteger(body, "groupCount"),
          hunger: readInteger(body, "hunger"),
        },
      );
      logger.info(`🐣 [SimulationController] spawned ${id}`, LogCategory.API);
      res
        .status(HttpStatusCode.CREATED)
        .json({ agent: registry.snapshot(registry.require(id)) });
    } catch (error) {
      this.handleError(res, error, "spawnAgent");
    }
  };

  /**
   * Highlights one agent until the current turn completes.
   */
  selectAgent = (req: Request, res: Response): void => {
    try {
      const registry = this.registry;
      registry.select(req.params.id);
      res.json({ selectedAgentId: registry.getSelectedAgentId() });
    } catch (error) {
      this.handleError(res, error, "selectAgent");
    }
  };

  removeAgent = (req: Request, res: Response): void => {
    const removed = this.registry.remove(req.params.id);
    if (!removed) {
      res
        .status(HttpStatusCode.NOT_FOUND)
        .json({ error: `Agent ${req.params.id} not found` });
      return;
    }
    res.status(HttpStatusCode.NO_CONTENT).send();
  };

  /**
   * Moves the player by `{direction}` or one step toward `{x, y}`, then runs
   * the turn it triggers.
   */
  movePlayer = async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(HttpStatusCode.BAD_REQUEST).json({ error: "Invalid request body" });
      return;
    }

    const player = this.container.get<PlayerController>(TYPES.PlayerController);
    const { direction } = body;
    const x = readInteger(body, "x");
    const y = readInteger(body, "y");

    let pending: Promise<MoveResult>;
    if (typeof direction === "string" && isMoveDirection(direction)) {
      pending = player.requestMove(direction);
    } else if (x !== undefined && y !== undefined) {
      pending = player.requestMoveToTile({ x, y });
    } else {
      res.status(HttpStatusCode.BAD_REQUEST).json({
        error: "Invalid request: expected a direction or integer x and y",
      });
      return;
    }

    try {
      const result = await pending;
      if (result.accepted) {
        res.json(result);
        return;
      }
      const status =
        result.reason === MoveRejection.NO_PLAYER
          ? HttpStatusCode.NOT_FOUND
          : HttpStatusCode.CONFLICT;
      res.status(status).json(result);
    } catch (error) {
      this.handleError(res, error, "movePlayer");
    }
  };

  pause = (_req: Request, res: Response): void => {
    this.scheduler.pause();
    res.json({ scheduler: this.scheduler.getStatus() });
  };

  resume = (_req: Request, res: Response): void => {
    this.scheduler.resume();
    res.json({ scheduler: this.scheduler.getStatus() });
  };

  reset = (_req: Request, res: Response): void => {
    try {
      this.container.get<WorldSeeder>(TYPES.WorldSeeder).reset();
      res.json({ scheduler: this.scheduler.getStatus() });
    } catch (error) {
      this.handleError(res, error, "reset");
    }
  };

  private handleError(res: Response, error: unknown, action: string): void {
    if (error instanceof InvalidSpawnError) {
      res
        .status(HttpStatusCode.BAD_REQUEST)
        .json({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof StaleReferenceError) {
      res
        .status(HttpStatusCode.NOT_FOUND)
        .json({ error: error.message, code: error.code });
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`❌ [SimulationController] ${action} failed`, LogCategory.API, message);
    res
      .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
      .json({ error: `Failed to ${action}` });
  }
}
