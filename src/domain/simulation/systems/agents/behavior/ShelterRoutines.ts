import { inject, injectable, optional } from "inversify";
import { TYPES } from "@/config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { AgentCategory, AgentState } from "@/shared/constants/AgentEnums";
import { cellsEqual, manhattan } from "@/shared/utils/gridMath";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { HideableRegistry } from "@/domain/simulation/core/HideableRegistry";
import type { EventBus } from "@/domain/simulation/core/EventBus";
import type { Agent } from "@/domain/types/simulation/agents";
import type {
  ForageableResource,
  Hideable,
  ResourceField,
} from "@/domain/types/simulation/collaborators";
import { AgentNeeds } from "@/domain/simulation/systems/agents/AgentNeeds";
import {
  StepOutcome,
  type AgentMovement,
} from "@/domain/simulation/systems/agents/movement/AgentMovement";

/**
 * Home, hiding, threat and food routines shared by the prey-side machines.
 */
@injectable()
export class ShelterRoutines {
  constructor(
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.HideableRegistry)
    private readonly hideables: HideableRegistry,
    @inject(TYPES.AgentMovement) private readonly movement: AgentMovement,
    @inject(TYPES.ResourceField)
    @optional()
    private readonly resources?: ResourceField,
    @inject(TYPES.EventBus) @optional() private readonly events?: EventBus,
  ) {}

  /**
   * Home hideable, or undefined. A home that no longer exists is forgotten.
   */
  public resolveHome(agent: Agent): Hideable | undefined {
    if (agent.homeId === null) return undefined;
    const home = this.hideables.get(agent.homeId);
    if (!home) {
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.AGENTS,
        agent.id,
        `home ${agent.homeId} is gone`,
      );
      this.registry.clearHome(agent.id);
      return undefined;
    }
    return home;
  }

  /**
   * True when the agent sits inside a hideable that still exists.
   */
  public isHidden(agent: Agent): boolean {
    if (agent.currentHideableId === null) return false;
    if (!this.hideables.get(agent.currentHideableId)) {
      this.registry.leaveHideable(agent.id);
      return false;
    }
    return true;
  }

  /**
   * Critical hunger always leaves; a sated agent stays; a moderately hungry
   * one leaves only when no predator is around.
   */
  public shouldLeaveShelter(agent: Agent): boolean {
    if (AgentNeeds.isCriticallyHungry(agent)) return true;
    if (!AgentNeeds.isHungry(agent)) return false;
    return this.detectPredator(agent) === undefined;
  }

  public leave(agent: Agent): void {
    this.registry.leaveHideable(agent.id);
  }

  public tryHide(agent: Agent, home: Hideable): boolean {
    if (!this.registry.enterHideable(agent.id, home.id)) return false;
    agent.state = AgentState.HIDING;
    agent.memory.wanderDestination = null;
    return true;
  }

  /**
   * Advances the move cadence counter.
   * @returns true when the species may move this turn
   */
  public consumeMoveCadence(agent: Agent): boolean {
    agent.memory.moveCounter++;
    const cadence = Math.max(1, agent.params.moveCadence);
    return (agent.memory.moveCounter - 1) % cadence === 0;
  }

  public detectPredator(agent: Agent): Agent | undefined {
    return this.registry.findNearest(
      agent.position,
      (other) =>
        other.id !== agent.id &&
        other.kind.category === AgentCategory.PREDATOR &&
        other.currentHideableId === null,
      agent.params.detectionRadius,
    );
  }

  public isAtHome(agent: Agent, home: Hideable): boolean {
    return cellsEqual(agent.position, home.position());
  }

  /**
   * Steps toward home, entering it on arrival.
   */
  public async returnHome(
    agent: Agent,
    home: Hideable,
    canMove: boolean,
  ): Promise<void> {
    if (this.isAtHome(agent, home) && this.tryHide(agent, home)) return;

    agent.state = AgentState.RETURNING_HOME;
    if (!canMove) return;

    await this.stepHome(agent, home);
    if (this.registry.isAlive(agent.id) && this.isAtHome(agent, home)) {
      this.tryHide(agent, home);
    }
  }

  public stepHome(agent: Agent, home: Hideable): Promise<StepOutcome> {
    const homeCell = home.position();
    return this.movement.stepTowards(agent.id, homeCell, {
      allowOccupied: (cell) => cellsEqual(cell, homeCell),
    });
  }

  /**
   * Nearest fully grown resource of the species' food type. The radius is
   * ignored when `unlimited` is set.
   */
  public findFood(
    agent: Agent,
    unlimited: boolean,
  ): ForageableResource | undefined {
    if (!this.resources || agent.params.foodType === null) return undefined;

    let best: ForageableResource | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const resource of this.resources.all()) {
      if (resource.foodType !== agent.params.foodType) continue;
      if (!resource.isFullyGrown()) continue;
      if (!this.movement.canEnter(agent, resource.position)) continue;
      const distance = manhattan(agent.position, resource.position);
      if (!unlimited && distance > agent.params.forageRadius) continue;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = resource;
      }
    }
    return best;
  }

  /**
   * Harvests the resource: it reverts to growing and hunger rises by its
   * restoration value scaled by the species multiplier.
   * @returns hunger restored
   */
  public harvest(agent: Agent, resource: ForageableResource): number {
    resource.harvest();
    const restored = Math.round(
      resource.hungerRestored * agent.params.harvestMultiplier,
    );
    AgentNeeds.increaseHunger(agent, restored);
    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AGENTS,
      agent.id,
      `harvested ${resource.id} (+${restored} hunger)`,
    );
    this.events?.emit("forage:harvested", {
      agentId: agent.id,
      resourceId: resource.id,
      hungerRestored: restored,
      turn: this.registry.getCurrentTurn(),
    });
    return restored;
  }

  /**
   * Steps toward a resource and harvests it once on its tile.
   */
  public async forage(
    agent: Agent,
    resource: ForageableResource,
    canMove: boolean,
  ): Promise<void> {
    agent.state = AgentState.FORAGING;
    agent.memory.wanderDestination = null;

    if (!cellsEqual(agent.position, resource.position) && canMove) {
      await this.movement.stepTowards(agent.id, resource.position);
    }
    if (
      this.registry.isAlive(agent.id) &&
      cellsEqual(agent.position, resource.position) &&
      resource.isFullyGrown()
    ) {
      this.harvest(agent, resource);
    }
  }
}
