import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { AgentCategory } from "@/shared/constants/AgentEnums";
import type { RandomUtils } from "@/shared/utils/RandomUtils";
import {
  addCells,
  cellsEqual,
  clampCell,
  manhattan,
  ringCells,
} from "@/shared/utils/gridMath";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { Agent } from "@/domain/types/simulation/agents";
import type { GridService } from "@/domain/types/simulation/collaborators";
import type { GridCell } from "@/domain/types/simulation/grid";
import {
  StepOutcome,
  type AgentMovement,
} from "@/domain/simulation/systems/agents/movement/AgentMovement";

const FLEE_SEARCH_RADIUS = 3;
const RANDOM_FLEE_ATTEMPTS = 5;

/** Right, left, up, down; the sort below is stable so this breaks ties. */
const FLEE_DIRECTIONS: readonly GridCell[] = [
  { x: 1, y: 0 },
  { x: -1, y: 0 },
  { x: 0, y: 1 },
  { x: 0, y: -1 },
];

/**
 * Chooses and takes one step away from a threat.
 */
@injectable()
export class FleeNavigator {
  constructor(
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.GridService) private readonly grid: GridService,
    @inject(TYPES.AgentMovement) private readonly movement: AgentMovement,
    @inject(TYPES.RandomSource) private readonly random: RandomUtils,
  ) {}

  /**
   * @returns true when the agent moved
   */
  public async flee(agent: Agent, threat: GridCell): Promise<boolean> {
    const origin = { ...agent.position };
    const target = this.fleeTarget(agent, threat);
    const destination = this.findFleeCell(agent, target);

    if (destination && (await this.tryStep(agent, destination))) {
      return true;
    }

    const directions = [...FLEE_DIRECTIONS].sort(
      (a, b) =>
        manhattan(addCells(origin, b), threat) -
        manhattan(addCells(origin, a), threat),
    );
    for (const direction of directions) {
      const candidate = addCells(origin, direction);
      if (this.isFleeCell(agent, candidate) && (await this.tryStep(agent, candidate))) {
        return true;
      }
    }

    for (let attempt = 0; attempt < RANDOM_FLEE_ATTEMPTS; attempt++) {
      const randomTarget = clampCell(
        addCells(origin, this.randomOffset(agent.params.fleeDistance)),
        this.grid.gridSize(),
      );
      const fallback = this.findFleeCell(agent, randomTarget);
      if (fallback && (await this.tryStep(agent, fallback))) {
        return true;
      }
    }

    return false;
  }

  /**
   * Point `fleeDistance` cells straight away from the threat, clamped to the
   * grid. On the threat's own tile the direction is random.
   */
  public fleeTarget(agent: Agent, threat: GridCell): GridCell {
    const dx = agent.position.x - threat.x;
    const dy = agent.position.y - threat.y;
    const distance = agent.params.fleeDistance;

    let offset: GridCell;
    if (dx === 0 && dy === 0) {
      offset = this.randomOffset(distance);
    } else {
      const magnitude = Math.sqrt(dx * dx + dy * dy);
      offset = {
        x: Math.round((dx / magnitude) * distance),
        y: Math.round((dy / magnitude) * distance),
      };
    }

    return clampCell(addCells(agent.position, offset), this.grid.gridSize());
  }

  /**
   * The target itself if usable, else the first usable cell on rings 1..3
   * around it, never the agent's own cell.
   */
  public findFleeCell(agent: Agent, target: GridCell): GridCell | null {
    if (this.isFleeCell(agent, target)) return target;

    for (let radius = 1; radius <= FLEE_SEARCH_RADIUS; radius++) {
      for (const cell of ringCells(target, radius)) {
        if (cellsEqual(cell, agent.position)) continue;
        if (this.isFleeCell(agent, cell)) return cell;
      }
    }
    return null;
  }

  private isFleeCell(agent: Agent, cell: GridCell): boolean {
    if (!this.movement.canEnter(agent, cell)) return false;
    return !this.registry
      .agentsAt(cell)
      .some(
        (other) =>
          other.id !== agent.id &&
          (other.kind.category === AgentCategory.PREY ||
            other.kind.category === AgentCategory.WORKER),
      );
  }

  private randomOffset(distance: number): GridCell {
    const angle = this.random.angle();
    return {
      x: Math.round(Math.cos(angle) * distance),
      y: Math.round(Math.sin(angle) * distance),
    };
  }

  private async tryStep(agent: Agent, destination: GridCell): Promise<boolean> {
    return (
      (await this.movement.stepTowards(agent.id, destination)) ===
      StepOutcome.MOVED
    );
  }
}
