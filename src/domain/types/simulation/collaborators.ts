import type { TileType } from "../../../shared/constants/TileTypeEnums";
import type { Season } from "../../../shared/constants/TimeEnums";
import type {
  FoodType,
  HideableKind,
} from "../../../shared/constants/WorldEnums";
import type { PathUnavailableError } from "../../../shared/errors/SimulationErrors";
import type { AgentId, ItemRecord } from "./agents";
import type {
  GridCell,
  GridSize,
  TraversalPredicate,
  WorldPoint,
} from "./grid";

/**
 * Grid queries. World conversions are used only by the player adapter.
 */
export interface GridService {
  isValid(cell: GridCell): boolean;
  isWalkable(cell: GridCell): boolean;
  tileKind(cell: GridCell): TileType;
  gridSize(): GridSize;
  gridToWorld(cell: GridCell): WorldPoint;
  worldToGrid(point: WorldPoint): GridCell;
}

export type PathResult =
  | { success: true; path: GridCell[] }
  | { success: false; error: PathUnavailableError };

export interface Pathfinder {
  findPath(
    start: GridCell,
    end: GridCell,
    canTraverse: TraversalPredicate,
  ): Promise<PathResult>;
}

/**
 * A den, spawner, bush or predator den. Lifecycle is owned outside the core.
 */
export interface Hideable {
  readonly id: string;
  readonly kind: HideableKind;
  /** Present on predator dens */
  readonly territoryRadius?: number;
  position(): GridCell;
  capacity(): number;
  occupants(): readonly AgentId[];
  onEnter(agentId: AgentId): void;
  onLeave(agentId: AgentId): void;
}

export interface InventorySink {
  deposit(item: ItemRecord): void;
  /** Consumes one stored food unit and returns the hunger it restores */
  spendStoredFood(): number;
  availableStoredFood(): boolean;
}

export interface ForageableResource {
  readonly id: string;
  readonly position: GridCell;
  readonly foodType: FoodType;
  readonly hungerRestored: number;
  isFullyGrown(): boolean;
  harvest(): void;
}

export interface ResourceField {
  all(): readonly ForageableResource[];
  at(cell: GridCell): ForageableResource | undefined;
}

export interface GroundItem {
  readonly position: GridCell;
  readonly item: ItemRecord;
}

export interface ItemField {
  all(): readonly GroundItem[];
  at(cell: GridCell): GroundItem | undefined;
  /** Removes and returns the item; undefined if already taken */
  take(itemId: string): GroundItem | undefined;
}

export interface TurnContext {
  turn: number;
  season: Season;
}

/**
 * Fire-and-forget refresh run after every turn (visibility, audio, regrowth).
 */
export interface PostTurnHook {
  readonly name: string;
  onTurnCompleted(context: TurnContext): void | Promise<void>;
}
