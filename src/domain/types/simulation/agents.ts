import type {
  AgentCategory,
  AgentState,
  PlayerSpecies,
  PredatorSpecies,
  PreySpecies,
  WorkerSpecies,
} from "../../../shared/constants/AgentEnums";
import type { FoodType, ItemKind } from "../../../shared/constants/WorldEnums";
import type { GridCell } from "./grid";

export type AgentId = string;

export type AgentKind =
  | { category: AgentCategory.PLAYER; subtype: PlayerSpecies }
  | { category: AgentCategory.PREY; subtype: PreySpecies }
  | { category: AgentCategory.PREDATOR; subtype: PredatorSpecies }
  | { category: AgentCategory.WORKER; subtype: WorkerSpecies };

export type AgentSubtype = AgentKind["subtype"];

/**
 * Immutable per-species tunables.
 */
export interface SpeciesParams {
  maxHunger: number;
  /** At or above this value the agent is not hungry */
  hungerThreshold: number;
  /** Below this value the agent ignores danger to eat */
  criticalHunger: number;
  hungerDecayPerTurn: number;
  detectionRadius: number;
  fleeDistance: number;
  /** Move on every n-th eligible turn, starting with the first */
  moveCadence: number;
  /** Predators only target predators of a strictly lower tier */
  priorityTier: number;
  huntCooldown: number;
  huntHungerRestored: number;
  territoryRadius: number;
  /** Search radius for food and loose items when not critically hungry */
  forageRadius: number;
  wanderMin: number;
  wanderMax: number;
  foodType: FoodType | null;
  canCrossWater: boolean;
  /** Scales the hunger restored by a harvest */
  harvestMultiplier: number;
  initialGroupCount: number;
}

export interface ItemRecord {
  id: string;
  itemType: string;
  kind: ItemKind;
  hungerRestored: number;
}

export interface PendingDash {
  direction: GridCell;
  distance: number;
}

/**
 * Scratch state kept between turns by the behaviour machines.
 */
export interface AgentMemory {
  moveCounter: number;
  wanderDestination: GridCell | null;
  huntingTargetId: AgentId | null;
  chaseTargetId: AgentId | null;
  chaseTurnsWithoutKill: number;
  pendingDash: PendingDash | null;
  encounteredAgentWhileMoving: boolean;
}

export interface Agent {
  id: AgentId;
  kind: AgentKind;
  position: GridCell;
  previousPosition: GridCell;
  /** Territory centre for agents without a home */
  spawnPosition: GridCell;
  hunger: number;
  groupCount: number;
  homeId: string | null;
  currentHideableId: string | null;
  carriedItems: ItemRecord[];
  stallTurnsRemaining: number;
  params: Readonly<SpeciesParams>;
  state: AgentState;
  memory: AgentMemory;
  spawnedAtTurn: number;
  /** Tombstone; set on removal, purged at the end of the step */
  removed: boolean;
}

export interface SpawnOptions {
  hunger?: number;
  groupCount?: number;
  homeId?: string | null;
  params?: Partial<SpeciesParams>;
}

/**
 * Read-only projection handed to observers and the HTTP layer.
 */
export interface AgentSnapshot {
  id: AgentId;
  category: AgentCategory;
  subtype: AgentSubtype;
  position: GridCell;
  hunger: number;
  maxHunger: number;
  groupCount: number;
  state: AgentState;
  homeId: string | null;
  hidden: boolean;
  carriedItems: number;
  stallTurnsRemaining: number;
}
