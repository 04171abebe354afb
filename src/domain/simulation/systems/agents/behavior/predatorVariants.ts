import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { AgentState, PredatorSpecies } from "@/shared/constants/AgentEnums";
import { addCells, signDelta } from "@/shared/utils/gridMath";
import { AgentNeeds } from "@/domain/simulation/systems/agents/AgentNeeds";
import {
  COYOTE_BREAK_DURATION,
  COYOTE_CHASE_TURNS_BEFORE_BREAK,
  HAWK_DASH_DISTANCE,
} from "@/domain/simulation/config/SpeciesConfigs";
import type { Agent, AgentId } from "@/domain/types/simulation/agents";
import type { GridCell } from "@/domain/types/simulation/grid";

/**
 * What a variant hook may do to the world.
 */
export interface PredatorToolkit {
  isValidTarget(predator: Agent, other: Agent): boolean;
  wantsToHunt(predator: Agent): boolean;
  /** Hunts a valid target on the predator's tile; true on a kill */
  tryHuntAtCurrentPosition(predator: Agent): boolean;
  /** In bounds, walkable and open to the species */
  canEnter(agent: Agent, cell: GridCell): boolean;
  visibleAgentsAt(cell: GridCell): Agent[];
  moveAgent(agentId: AgentId, cell: GridCell): void;
  /** Makes the scheduler's conflict pass send the agent back one step */
  markEncountered(agentId: AgentId): void;
}

export interface StandardTurnOutcome {
  targetId: AgentId | null;
  hunted: boolean;
  /** Hunger allowed hunting this turn */
  hungry: boolean;
}

export interface PredatorVariantHooks {
  /** Replaces the default `hunger < hungerThreshold` rule */
  wantsToHunt?(predator: Agent): boolean;
  /** Replaces the standard turn when it returns true */
  specialAction?(predator: Agent, kit: PredatorToolkit): boolean;
  /** Runs after a standard turn */
  afterTurn?(
    predator: Agent,
    kit: PredatorToolkit,
    outcome: StandardTurnOutcome,
  ): void;
}

const DEFAULT_FACING: GridCell = { x: 0, y: 1 };

function ensureMinimumStall(predator: Agent, turns: number): void {
  predator.stallTurnsRemaining = Math.max(predator.stallTurnsRemaining, turns);
}

/**
 * Coyote: too many consecutive turns chasing the same target without a kill
 * forces a rest.
 */
const coyoteHooks: PredatorVariantHooks = {
  wantsToHunt(predator) {
    return (
      AgentNeeds.isHungry(predator) || AgentNeeds.isCriticallyHungry(predator)
    );
  },

  afterTurn(predator, _kit, outcome) {
    const memory = predator.memory;
    if (outcome.hunted || outcome.targetId === null) {
      memory.chaseTargetId = null;
      memory.chaseTurnsWithoutKill = 0;
      return;
    }

    if (memory.chaseTargetId !== outcome.targetId) {
      memory.chaseTargetId = outcome.targetId;
      memory.chaseTurnsWithoutKill = 1;
    } else {
      memory.chaseTurnsWithoutKill++;
    }

    if (memory.chaseTurnsWithoutKill > COYOTE_CHASE_TURNS_BEFORE_BREAK) {
      ensureMinimumStall(predator, COYOTE_BREAK_DURATION);
      memory.chaseTargetId = null;
      memory.chaseTurnsWithoutKill = 0;
      logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.PREDATION,
        predator.id,
        `gives up the chase and rests ${COYOTE_BREAK_DURATION} turns`,
      );
    }
  },
};

function facingOf(predator: Agent): GridCell {
  const facing = signDelta(predator.previousPosition, predator.position);
  if (facing.x === 0 && facing.y === 0) return { ...DEFAULT_FACING };
  return facing;
}

/**
 * Hawk: a visible target straight ahead with a clear line queues a dash for
 * the next turn. Without a dash queued the hawk rests every other turn. A
 * sated hawk drops a queued dash and never prepares one. A dash cut short by
 * another agent counts as an encounter.
 */
const hawkHooks: PredatorVariantHooks = {
  specialAction(predator, kit) {
    const dash = predator.memory.pendingDash;
    if (!dash) return false;

    predator.memory.pendingDash = null;
    if (!kit.wantsToHunt(predator)) return false;
    predator.state = AgentState.HUNTING;

    for (let step = 0; step < dash.distance; step++) {
      const next = addCells(predator.position, dash.direction);
      if (!kit.canEnter(predator, next)) break;

      const occupants = kit
        .visibleAgentsAt(next)
        .filter((other) => other.id !== predator.id);
      const prey = occupants.find((other) => kit.isValidTarget(predator, other));
      if (occupants.length > 0 && !prey) {
        if (step > 0) kit.markEncountered(predator.id);
        break;
      }

      kit.moveAgent(predator.id, next);
      if (prey) break;
    }

    kit.tryHuntAtCurrentPosition(predator);
    ensureMinimumStall(predator, 1);
    return true;
  },

  afterTurn(predator, kit, outcome) {
    if (outcome.hunted) return;
    if (!outcome.hungry) {
      ensureMinimumStall(predator, 1);
      return;
    }

    const facing = facingOf(predator);
    let cell = predator.position;
    for (let step = 1; step <= predator.params.detectionRadius; step++) {
      cell = addCells(cell, facing);
      if (!kit.canEnter(predator, cell)) break;

      const occupants = kit
        .visibleAgentsAt(cell)
        .filter((other) => other.id !== predator.id);
      if (occupants.some((other) => kit.isValidTarget(predator, other))) {
        predator.memory.pendingDash = {
          direction: facing,
          distance: HAWK_DASH_DISTANCE,
        };
        logger.agentLog(
          LogLevel.DEBUG,
          LogCategory.PREDATION,
          predator.id,
          `queues a dash toward (${cell.x}, ${cell.y})`,
        );
        return;
      }
      if (occupants.length > 0) break;
    }

    ensureMinimumStall(predator, 1);
  },
};

export const PREDATOR_VARIANTS: Record<PredatorSpecies, PredatorVariantHooks> =
  {
    [PredatorSpecies.COYOTE]: coyoteHooks,
    [PredatorSpecies.HAWK]: hawkHooks,
    [PredatorSpecies.WOLF]: {},
  };
