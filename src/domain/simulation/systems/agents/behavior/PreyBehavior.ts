import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { AgentState, RemovalReason } from "@/shared/constants/AgentEnums";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { Agent } from "@/domain/types/simulation/agents";
import { AgentNeeds } from "@/domain/simulation/systems/agents/AgentNeeds";
import type { FleeNavigator } from "@/domain/simulation/systems/agents/movement/FleeNavigator";
import type { WanderNavigator } from "@/domain/simulation/systems/agents/movement/WanderNavigator";
import type { ShelterRoutines } from "@/domain/simulation/systems/agents/behavior/ShelterRoutines";
import type { AgentBehavior } from "@/domain/simulation/systems/agents/behavior/AgentBehavior";

/**
 * Prey machine: Wandering, Fleeing, Foraging, Hiding, ReturningHome.
 */
@injectable()
export class PreyBehavior implements AgentBehavior {
  constructor(
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.ShelterRoutines) private readonly shelter: ShelterRoutines,
    @inject(TYPES.FleeNavigator) private readonly flee: FleeNavigator,
    @inject(TYPES.WanderNavigator) private readonly wanderer: WanderNavigator,
  ) {}

  public async takeTurn(agent: Agent): Promise<void> {
    if (AgentNeeds.applyTurnDecay(agent)) {
      this.registry.remove(agent.id, RemovalReason.STARVATION);
      return;
    }

    const home = this.shelter.resolveHome(agent);

    if (this.shelter.isHidden(agent)) {
      if (!this.shelter.shouldLeaveShelter(agent)) {
        agent.state = AgentState.HIDING;
        return;
      }
      this.shelter.leave(agent);
    }

    const canMove = this.shelter.consumeMoveCadence(agent);

    if (!AgentNeeds.isHungry(agent)) {
      if (home) {
        await this.shelter.returnHome(agent, home, canMove);
        return;
      }
      await this.wander(agent, canMove);
      return;
    }

    const critical = AgentNeeds.isCriticallyHungry(agent);
    const threat = this.shelter.detectPredator(agent);
    if (threat && !critical) {
      agent.state = AgentState.FLEEING;
      agent.memory.wanderDestination = null;
      if (canMove) await this.flee.flee(agent, threat.position);
      return;
    }

    const food = this.shelter.findFood(agent, critical);
    if (food) {
      await this.shelter.forage(agent, food, canMove);
      return;
    }

    await this.wander(agent, canMove);
  }

  private async wander(agent: Agent, canMove: boolean): Promise<void> {
    agent.state = AgentState.WANDERING;
    if (!canMove) return;

    const home = this.shelter.resolveHome(agent);
    await this.wanderer.wander(agent, {
      center: home ? home.position() : agent.position,
      minDistance: agent.params.wanderMin,
      maxDistance: agent.params.wanderMax,
    });
  }
}
