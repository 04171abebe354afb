import type {
  AgentSubtype,
  SpeciesParams,
} from "@/domain/types/simulation/agents";
import { FoodType } from "@/shared/constants/WorldEnums";
import {
  PlayerSpecies,
  PredatorSpecies,
  PreySpecies,
  WorkerSpecies,
} from "@/shared/constants/AgentEnums";

const BASE_PARAMS: SpeciesParams = {
  maxHunger: 100,
  hungerThreshold: 70,
  criticalHunger: 20,
  hungerDecayPerTurn: 1,
  detectionRadius: 5,
  fleeDistance: 3,
  moveCadence: 1,
  priorityTier: 0,
  huntCooldown: 0,
  huntHungerRestored: 0,
  territoryRadius: 5,
  forageRadius: 10,
  wanderMin: 2,
  wanderMax: 6,
  foodType: null,
  canCrossWater: false,
  harvestMultiplier: 1,
  initialGroupCount: 1,
};

export const SPECIES_CONFIGS: Record<AgentSubtype, SpeciesParams> = {
  [PlayerSpecies.PLAYER]: {
    ...BASE_PARAMS,
    hungerThreshold: 50,
    detectionRadius: 0,
    foodType: FoodType.GRASS,
    initialGroupCount: 1,
  },

  [PreySpecies.RABBIT]: {
    ...BASE_PARAMS,
    hungerThreshold: 50,
    detectionRadius: 7,
    moveCadence: 2,
    foodType: FoodType.GRASS,
  },

  [WorkerSpecies.KANGAROO_RAT]: {
    ...BASE_PARAMS,
    detectionRadius: 5,
    wanderMax: 8,
    foodType: FoodType.SEEDS,
    harvestMultiplier: 0.5,
  },

  [PredatorSpecies.COYOTE]: {
    ...BASE_PARAMS,
    maxHunger: 200,
    detectionRadius: 6,
    priorityTier: 2,
    huntCooldown: 3,
    huntHungerRestored: 60,
    territoryRadius: 5,
    foodType: FoodType.MEAT,
  },

  [PredatorSpecies.HAWK]: {
    ...BASE_PARAMS,
    maxHunger: 200,
    detectionRadius: 6,
    priorityTier: 1,
    huntCooldown: 2,
    huntHungerRestored: 40,
    territoryRadius: 6,
    foodType: FoodType.MEAT,
    canCrossWater: true,
  },

  [PredatorSpecies.WOLF]: {
    ...BASE_PARAMS,
    maxHunger: 200,
    detectionRadius: 5,
    priorityTier: 3,
    huntCooldown: 2,
    huntHungerRestored: 60,
    foodType: FoodType.MEAT,
  },
};

/** Coyote: consecutive chase turns tolerated before a forced rest. */
export const COYOTE_CHASE_TURNS_BEFORE_BREAK = 8;
export const COYOTE_BREAK_DURATION = 2;

/** Hawk: cells covered by one dash. */
export const HAWK_DASH_DISTANCE = 3;

export const PLAYER_MAX_CARRIED_ITEMS = 5;

export function getSpeciesParams(
  subtype: AgentSubtype,
  overrides: Partial<SpeciesParams> = {},
): SpeciesParams {
  return { ...SPECIES_CONFIGS[subtype], ...overrides };
}
