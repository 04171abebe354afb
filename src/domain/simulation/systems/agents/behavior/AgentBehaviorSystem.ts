import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { AgentCategory, AgentState } from "@/shared/constants/AgentEnums";
import type { Agent } from "@/domain/types/simulation/agents";
import type { AgentBehavior } from "@/domain/simulation/systems/agents/behavior/AgentBehavior";
import type { PredatorBehavior } from "@/domain/simulation/systems/agents/behavior/PredatorBehavior";
import type { PreyBehavior } from "@/domain/simulation/systems/agents/behavior/PreyBehavior";
import type { WorkerBehavior } from "@/domain/simulation/systems/agents/behavior/WorkerBehavior";

/**
 * Routes each agent to the machine of its category.
 */
@injectable()
export class AgentBehaviorSystem {
  private readonly machines: Partial<Record<AgentCategory, AgentBehavior>>;

  constructor(
    @inject(TYPES.PreyBehavior) prey: PreyBehavior,
    @inject(TYPES.PredatorBehavior) predator: PredatorBehavior,
    @inject(TYPES.WorkerBehavior) worker: WorkerBehavior,
  ) {
    this.machines = {
      [AgentCategory.PREY]: prey,
      [AgentCategory.PREDATOR]: predator,
      [AgentCategory.WORKER]: worker,
    };
  }

  /**
   * Workers without a home sit out the turn loop.
   */
  public isDormant(agent: Agent): boolean {
    if (agent.kind.category !== AgentCategory.WORKER) return false;
    return agent.homeId === null || agent.state === AgentState.DORMANT;
  }

  public async step(agent: Agent): Promise<void> {
    const machine = this.machines[agent.kind.category];
    if (!machine) return;
    await machine.takeTurn(agent);
  }
}
