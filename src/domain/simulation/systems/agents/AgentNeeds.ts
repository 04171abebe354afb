import type { Agent } from "@/domain/types/simulation/agents";

/**
 * Hunger arithmetic. These are the only writers of `agent.hunger`, and every
 * result is clamped to [0, maxHunger].
 */
export class AgentNeeds {
  public static decreaseHunger(agent: Agent, amount: number): number {
    agent.hunger = Math.max(0, agent.hunger - Math.max(0, amount));
    return agent.hunger;
  }

  public static increaseHunger(agent: Agent, amount: number): number {
    agent.hunger = Math.min(
      agent.params.maxHunger,
      agent.hunger + Math.max(0, amount),
    );
    return agent.hunger;
  }

  /**
   * Applies the species' per-turn decay.
   * @returns true when the agent starved this turn
   */
  public static applyTurnDecay(agent: Agent): boolean {
    return AgentNeeds.decreaseHunger(agent, agent.params.hungerDecayPerTurn) === 0;
  }

  public static isHungry(agent: Agent): boolean {
    return agent.hunger < agent.params.hungerThreshold;
  }

  public static isCriticallyHungry(agent: Agent): boolean {
    return agent.hunger < agent.params.criticalHunger;
  }
}
