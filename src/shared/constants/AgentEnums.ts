/**
 * Agent enumerations for the turn simulation.
 *
 * Defines agent categories, species subtypes and the behaviour states
 * used by the per-species state machines.
 *
 * @module shared/constants/AgentEnums
 */

/**
 * Top-level agent category. Each category maps to one behaviour machine.
 */
export enum AgentCategory {
  PLAYER = "player",
  PREY = "prey",
  PREDATOR = "predator",
  WORKER = "worker",
}

export enum PlayerSpecies {
  PLAYER = "player",
}

export enum PreySpecies {
  RABBIT = "rabbit",
}

export enum PredatorSpecies {
  COYOTE = "coyote",
  HAWK = "hawk",
  WOLF = "wolf",
}

export enum WorkerSpecies {
  KANGAROO_RAT = "kangaroo_rat",
}

/**
 * Behaviour states shared by every machine. Each machine only uses its subset.
 */
export enum AgentState {
  IDLE = "idle",
  WANDERING = "wandering",
  FLEEING = "fleeing",
  FORAGING = "foraging",
  HIDING = "hiding",
  RETURNING_HOME = "returning_home",
  HUNTING = "hunting",
  STALLED = "stalled",
  CARRYING = "carrying",
  DEPOSITING = "depositing",
  CONSUMING_STORED_FOOD = "consuming_stored_food",
  DORMANT = "dormant",
}

/**
 * Reason an agent left the registry.
 */
export enum RemovalReason {
  STARVATION = "starvation",
  PREDATION = "predation",
  DESPAWN = "despawn",
}

/**
 * Cardinal directions accepted by the player adapter.
 */
export enum MoveDirection {
  UP = "up",
  DOWN = "down",
  LEFT = "left",
  RIGHT = "right",
}

export type AgentCategoryValue = `${AgentCategory}`;

export type AgentStateValue = `${AgentState}`;

export function isAgentCategory(value: string): value is AgentCategory {
  return Object.values(AgentCategory).some((category) => category === value);
}

export function isMoveDirection(value: string): value is MoveDirection {
  return Object.values(MoveDirection).some((direction) => direction === value);
}

export function isPreySpecies(value: string): value is PreySpecies {
  return Object.values(PreySpecies).some((species) => species === value);
}

export function isPredatorSpecies(value: string): value is PredatorSpecies {
  return Object.values(PredatorSpecies).some((species) => species === value);
}

export function isWorkerSpecies(value: string): value is WorkerSpecies {
  return Object.values(WorkerSpecies).some((species) => species === value);
}

export function isPlayerSpecies(value: string): value is PlayerSpecies {
  return Object.values(PlayerSpecies).some((species) => species === value);
}
