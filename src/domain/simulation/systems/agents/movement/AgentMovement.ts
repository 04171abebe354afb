import { inject, injectable, optional } from "inversify";
import { TYPES } from "@/config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { TileType } from "@/shared/constants/TileTypeEnums";
import { MissingCollaboratorError } from "@/shared/errors/SimulationErrors";
import { cellsEqual } from "@/shared/utils/gridMath";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { Agent, AgentId } from "@/domain/types/simulation/agents";
import type {
  GridService,
  Pathfinder,
} from "@/domain/types/simulation/collaborators";
import type {
  GridCell,
  TraversalPredicate,
} from "@/domain/types/simulation/grid";

/**
 * Result of a single-step move attempt.
 */
export enum StepOutcome {
  MOVED = "moved",
  ALREADY_THERE = "already_there",
  NO_PATH = "no_path",
  BLOCKED = "blocked",
  AGENT_GONE = "agent_gone",
  NO_PATHFINDER = "no_pathfinder",
}

export interface StepOptions {
  /** Lets the mover enter a cell held by another agent (prey tile, home) */
  allowOccupied?: (cell: GridCell) => boolean;
}

export type PlannedStep =
  | { ok: true; mover: Agent; next: GridCell }
  | { ok: false; outcome: StepOutcome };

/**
 * Expands waypoints into axis-aligned single-cell steps: for each segment the
 * horizontal run first, then the vertical run. The first element is the start.
 */
export function flattenPath(path: readonly GridCell[]): GridCell[] {
  if (path.length === 0) return [];

  const steps: GridCell[] = [{ ...path[0] }];
  let current = { ...path[0] };

  for (let i = 1; i < path.length; i++) {
    const target = path[i];
    while (current.x !== target.x) {
      current = { x: current.x + Math.sign(target.x - current.x), y: current.y };
      steps.push(current);
    }
    while (current.y !== target.y) {
      current = { x: current.x, y: current.y + Math.sign(target.y - current.y) };
      steps.push(current);
    }
  }

  return steps;
}

/**
 * Pathfinding-constrained single-step movement shared by every machine.
 */
@injectable()
export class AgentMovement {
  constructor(
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.GridService) private readonly grid: GridService,
    @inject(TYPES.Pathfinder) @optional() private readonly pathfinder?: Pathfinder,
  ) {}

  /**
   * Whether the agent's species may stand on the cell.
   */
  public canEnter(agent: Agent, cell: GridCell): boolean {
    if (!this.grid.isValid(cell) || !this.grid.isWalkable(cell)) return false;
    return (
      agent.params.canCrossWater || this.grid.tileKind(cell) !== TileType.WATER
    );
  }

  public traversalFor(agent: Agent): TraversalPredicate {
    return (cell, tile) =>
      this.grid.isWalkable(cell) &&
      tile !== TileType.OBSTACLE &&
      (agent.params.canCrossWater || tile !== TileType.WATER);
  }

  /**
   * Moves the agent one grid cell along the pathfinder's route to `target`.
   * The agent is re-checked after the path arrives; a removed agent is never
   * touched.
   */
  public async stepTowards(
    agentId: AgentId,
    target: GridCell,
    options: StepOptions = {},
  ): Promise<StepOutcome> {
    const plan = await this.planStep(agentId, target);
    if (!plan.ok) return plan.outcome;
    return this.stepTo(plan.mover, plan.next, options);
  }

  /**
   * First flattened step of the route to `target`, without moving.
   */
  public async planStep(
    agentId: AgentId,
    target: GridCell,
  ): Promise<PlannedStep> {
    const agent = this.registry.get(agentId);
    if (!agent) return { ok: false, outcome: StepOutcome.AGENT_GONE };
    if (cellsEqual(agent.position, target)) {
      return { ok: false, outcome: StepOutcome.ALREADY_THERE };
    }

    if (!this.pathfinder) {
      logger.warn(
        new MissingCollaboratorError("Pathfinder", `step of ${agentId}`).message,
        LogCategory.MOVEMENT,
      );
      return { ok: false, outcome: StepOutcome.NO_PATHFINDER };
    }

    const start = { ...agent.position };
    const result = await this.pathfinder.findPath(
      start,
      target,
      this.traversalFor(agent),
    );

    const mover = this.registry.get(agentId);
    if (!mover) return { ok: false, outcome: StepOutcome.AGENT_GONE };
    if (!cellsEqual(mover.position, start)) {
      return { ok: false, outcome: StepOutcome.BLOCKED };
    }

    if (!result.success) {
      logger.debug(result.error.message, LogCategory.MOVEMENT);
      return { ok: false, outcome: StepOutcome.NO_PATH };
    }

    const steps = flattenPath(result.path);
    if (steps.length < 2) return { ok: false, outcome: StepOutcome.NO_PATH };

    return { ok: true, mover, next: steps[1] };
  }

  /**
   * Moves to an adjacent cell without consulting the pathfinder.
   */
  public stepTo(
    agent: Agent,
    next: GridCell,
    options: StepOptions = {},
  ): StepOutcome {
    if (!this.canEnter(agent, next)) return StepOutcome.BLOCKED;

    if (
      this.registry.hasOtherAgentAt(agent.id, next) &&
      !options.allowOccupied?.(next)
    ) {
      return StepOutcome.BLOCKED;
    }

    this.registry.moveAgent(agent.id, next);
    return StepOutcome.MOVED;
  }
}
