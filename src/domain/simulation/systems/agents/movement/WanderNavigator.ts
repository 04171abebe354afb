import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import type { RandomUtils } from "@/shared/utils/RandomUtils";
import { cellsEqual, clampCell } from "@/shared/utils/gridMath";
import type { Agent } from "@/domain/types/simulation/agents";
import type { GridService } from "@/domain/types/simulation/collaborators";
import type { GridCell } from "@/domain/types/simulation/grid";
import {
  StepOutcome,
  type AgentMovement,
} from "@/domain/simulation/systems/agents/movement/AgentMovement";

const RING_ATTEMPTS = 30;
const UNIFORM_ATTEMPTS = 20;

export interface WanderArea {
  center: GridCell;
  minDistance: number;
  maxDistance: number;
}

/**
 * Random destinations inside a bounded territory, kept until reached or
 * invalidated.
 */
@injectable()
export class WanderNavigator {
  constructor(
    @inject(TYPES.GridService) private readonly grid: GridService,
    @inject(TYPES.AgentMovement) private readonly movement: AgentMovement,
    @inject(TYPES.RandomSource) private readonly random: RandomUtils,
  ) {}

  public chooseDestination(agent: Agent, area: WanderArea): GridCell | null {
    const size = this.grid.gridSize();

    for (let attempt = 0; attempt < RING_ATTEMPTS; attempt++) {
      const angle = this.random.angle();
      const distance = this.random.intRange(area.minDistance, area.maxDistance);
      const candidate = clampCell(
        {
          x: Math.round(area.center.x + Math.cos(angle) * distance),
          y: Math.round(area.center.y + Math.sin(angle) * distance),
        },
        size,
      );
      if (this.isDestination(agent, candidate)) return candidate;
    }

    for (let attempt = 0; attempt < UNIFORM_ATTEMPTS; attempt++) {
      const candidate = {
        x: this.random.intRange(0, size.width - 1),
        y: this.random.intRange(0, size.height - 1),
      };
      if (this.isDestination(agent, candidate)) return candidate;
    }

    return null;
  }

  /**
   * Keeps or re-rolls the wander destination.
   */
  public ensureDestination(agent: Agent, area: WanderArea): GridCell | null {
    const current = agent.memory.wanderDestination;
    if (current && this.isDestination(agent, current)) {
      return current;
    }
    agent.memory.wanderDestination = this.chooseDestination(agent, area);
    return agent.memory.wanderDestination;
  }

  /**
   * One step toward the wander destination. Blocked routes drop the
   * destination so the next turn picks another.
   */
  public async wander(agent: Agent, area: WanderArea): Promise<StepOutcome> {
    const destination = this.ensureDestination(agent, area);
    if (!destination) return StepOutcome.NO_PATH;

    const outcome = await this.movement.stepTowards(agent.id, destination);
    if (outcome === StepOutcome.NO_PATH || outcome === StepOutcome.BLOCKED) {
      agent.memory.wanderDestination = null;
    } else if (cellsEqual(agent.position, destination)) {
      agent.memory.wanderDestination = null;
    }
    return outcome;
  }

  private isDestination(agent: Agent, cell: GridCell): boolean {
    return (
      !cellsEqual(cell, agent.position) && this.movement.canEnter(agent, cell)
    );
  }
}
