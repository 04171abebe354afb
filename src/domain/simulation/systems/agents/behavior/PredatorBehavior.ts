import { inject, injectable, optional } from "inversify";
import { TYPES } from "@/config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import {
  AgentCategory,
  AgentState,
  RemovalReason,
} from "@/shared/constants/AgentEnums";
import { HideableKind } from "@/shared/constants/WorldEnums";
import { cellsEqual } from "@/shared/utils/gridMath";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { HideableRegistry } from "@/domain/simulation/core/HideableRegistry";
import type { EventBus } from "@/domain/simulation/core/EventBus";
import type { Agent } from "@/domain/types/simulation/agents";
import { AgentNeeds } from "@/domain/simulation/systems/agents/AgentNeeds";
import type { AgentMovement } from "@/domain/simulation/systems/agents/movement/AgentMovement";
import type {
  WanderArea,
  WanderNavigator,
} from "@/domain/simulation/systems/agents/movement/WanderNavigator";
import type { AgentBehavior } from "@/domain/simulation/systems/agents/behavior/AgentBehavior";
import {
  PREDATOR_VARIANTS,
  type PredatorToolkit,
  type PredatorVariantHooks,
  type StandardTurnOutcome,
} from "@/domain/simulation/systems/agents/behavior/predatorVariants";

/**
 * Predator machine: Wandering, Hunting, Stalled.
 *
 * Species differences live in {@link PREDATOR_VARIANTS}; this class runs the
 * shared hunt loop and hands the variant a toolkit bound to the registry.
 */
@injectable()
export class PredatorBehavior implements AgentBehavior {
  private readonly kit: PredatorToolkit;

  constructor(
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.HideableRegistry)
    private readonly hideables: HideableRegistry,
    @inject(TYPES.AgentMovement) private readonly movement: AgentMovement,
    @inject(TYPES.WanderNavigator) private readonly wanderer: WanderNavigator,
    @inject(TYPES.EventBus) @optional() private readonly events?: EventBus,
  ) {
    this.kit = {
      isValidTarget: (predator, other) => this.isValidTarget(predator, other),
      wantsToHunt: (predator) => this.wantsToHunt(predator),
      tryHuntAtCurrentPosition: (predator) => this.tryHunt(predator),
      canEnter: (agent, cell) => this.movement.canEnter(agent, cell),
      visibleAgentsAt: (cell) => this.registry.agentsAt(cell),
      moveAgent: (agentId, cell) => {
        this.registry.moveAgent(agentId, cell);
      },
      markEncountered: (agentId) => this.registry.markEncountered(agentId),
    };
  }

  public async takeTurn(predator: Agent): Promise<void> {
    if (AgentNeeds.applyTurnDecay(predator)) {
      this.registry.remove(predator.id, RemovalReason.STARVATION);
      return;
    }

    if (predator.stallTurnsRemaining > 0) {
      predator.stallTurnsRemaining--;
      predator.state = AgentState.STALLED;
      return;
    }

    const hooks = this.hooksFor(predator);
    if (hooks.specialAction?.(predator, this.kit)) return;

    const outcome = await this.standardTurn(predator);

    const current = this.registry.get(predator.id);
    if (current) hooks.afterTurn?.(current, this.kit, outcome);
  }

  /**
   * Only a predator below its hunger threshold hunts; a variant may widen
   * the rule.
   */
  public wantsToHunt(predator: Agent): boolean {
    const rule = this.hooksFor(predator).wantsToHunt;
    if (rule) return rule(predator);
    return AgentNeeds.isHungry(predator);
  }

  /**
   * Non-predators and predators of a strictly lower tier, out in the world
   * and off shelter tiles.
   */
  public isValidTarget(predator: Agent, other: Agent): boolean {
    if (other.id === predator.id || other.removed) return false;
    if (other.currentHideableId !== null) return false;
    if (this.hideables.isShelterTile(other.position)) return false;
    if (other.kind.category !== AgentCategory.PREDATOR) return true;
    return other.params.priorityTier < predator.params.priorityTier;
  }

  public findTarget(predator: Agent): Agent | undefined {
    return this.registry.findNearest(
      predator.position,
      (other) => this.isValidTarget(predator, other),
      predator.params.detectionRadius,
    );
  }

  /**
   * Hunts the first valid target sharing the predator's tile.
   * @returns true on a kill
   */
  public tryHunt(predator: Agent): boolean {
    if (this.hideables.isShelterTile(predator.position)) return false;

    const target = this.registry
      .agentsAt(predator.position)
      .find((other) => this.isValidTarget(predator, other));
    if (!target) return false;

    const remaining = this.registry.reduceGroupCount(target.id);
    AgentNeeds.increaseHunger(predator, predator.params.huntHungerRestored);
    predator.stallTurnsRemaining = predator.params.huntCooldown;
    predator.memory.huntingTargetId = null;

    logger.agentLog(
      LogLevel.INFO,
      LogCategory.PREDATION,
      predator.id,
      `🦴 hunted ${target.id} at (${predator.position.x}, ${predator.position.y}), ${remaining} left`,
    );
    this.events?.emit("predation:hunted", {
      predatorId: predator.id,
      targetId: target.id,
      targetRemaining: remaining,
      position: { ...predator.position },
      turn: this.registry.getCurrentTurn(),
    });
    return true;
  }

  private async standardTurn(predator: Agent): Promise<StandardTurnOutcome> {
    const hungry = this.wantsToHunt(predator);
    const target = hungry ? this.findTarget(predator) : undefined;

    if (target) {
      predator.state = AgentState.HUNTING;
      predator.memory.wanderDestination = null;
      predator.memory.huntingTargetId = target.id;

      const targetCell = { ...target.position };
      await this.movement.stepTowards(predator.id, targetCell, {
        allowOccupied: (cell) => cellsEqual(cell, targetCell),
      });
    } else {
      predator.state = AgentState.WANDERING;
      predator.memory.huntingTargetId = null;
      await this.wanderer.wander(predator, this.territoryOf(predator));
    }

    if (!this.registry.isAlive(predator.id)) {
      return { targetId: target?.id ?? null, hunted: false, hungry };
    }
    const hunted = hungry && this.tryHunt(predator);
    return { targetId: target?.id ?? null, hunted, hungry };
  }

  /**
   * Home predator den with its radius, or the species radius around the
   * spawn cell.
   */
  private territoryOf(predator: Agent): WanderArea {
    const den = this.hideables.get(predator.homeId);
    if (den && den.kind === HideableKind.PREDATOR_DEN) {
      return {
        center: den.position(),
        minDistance: 1,
        maxDistance: den.territoryRadius ?? predator.params.territoryRadius,
      };
    }
    return {
      center: predator.spawnPosition,
      minDistance: 1,
      maxDistance: predator.params.territoryRadius,
    };
  }

  private hooksFor(predator: Agent): PredatorVariantHooks {
    if (predator.kind.category !== AgentCategory.PREDATOR) return {};
    return PREDATOR_VARIANTS[predator.kind.subtype];
  }
}
