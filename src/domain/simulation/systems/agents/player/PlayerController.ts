import { inject, injectable, optional } from "inversify";
import { TYPES } from "@/config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import {
  AgentCategory,
  RemovalReason,
  type MoveDirection,
} from "@/shared/constants/AgentEnums";
import { MoveRejection, PickUpRejection } from "@/shared/constants/PlayerEnums";
import { TileType } from "@/shared/constants/TileTypeEnums";
import { HideableKind, ItemKind } from "@/shared/constants/WorldEnums";
import { addCells, cellsEqual, directionDelta } from "@/shared/utils/gridMath";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { HideableRegistry } from "@/domain/simulation/core/HideableRegistry";
import type { EventBus } from "@/domain/simulation/core/EventBus";
import type {
  TurnReport,
  TurnScheduler,
} from "@/domain/simulation/core/TurnScheduler";
import { PLAYER_MAX_CARRIED_ITEMS } from "@/domain/simulation/config/SpeciesConfigs";
import type { Agent, ItemRecord } from "@/domain/types/simulation/agents";
import type {
  GridService,
  Hideable,
  InventorySink,
  ItemField,
} from "@/domain/types/simulation/collaborators";
import type { GridCell, WorldPoint } from "@/domain/types/simulation/grid";
import { AgentNeeds } from "@/domain/simulation/systems/agents/AgentNeeds";
import type { AgentMovement } from "@/domain/simulation/systems/agents/movement/AgentMovement";

export type MoveResult =
  | {
      accepted: true;
      position: GridCell;
      /** The player stepped onto an occupied tile and went back */
      yielded: boolean;
      hidden: boolean;
      report: TurnReport;
    }
  | { accepted: false; reason: MoveRejection };

export type PickUpResult =
  | { picked: true; item: ItemRecord }
  | { picked: false; reason: PickUpRejection };

/** Den first, bush second */
const SHELTER_PREFERENCE: readonly HideableKind[] = [
  HideableKind.DEN,
  HideableKind.BUSH,
];

/**
 * Turns player input into moves and advances the turn after each accepted
 * one. Also owns the player's hunger clock and carried food.
 */
@injectable()
export class PlayerController {
  private readonly unsubscribe: () => void;

  constructor(
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.HideableRegistry)
    private readonly hideables: HideableRegistry,
    @inject(TYPES.GridService) private readonly grid: GridService,
    @inject(TYPES.AgentMovement) private readonly movement: AgentMovement,
    @inject(TYPES.TurnScheduler) private readonly scheduler: TurnScheduler,
    @inject(TYPES.InventorySink)
    @optional()
    private readonly inventory?: InventorySink,
    @inject(TYPES.ItemField) @optional() private readonly items?: ItemField,
    @inject(TYPES.EventBus) @optional() private readonly events?: EventBus,
  ) {
    this.unsubscribe = this.scheduler.onTurnAdvanced((turn) =>
      this.onTurnAdvanced(turn),
    );
  }

  public dispose(): void {
    this.unsubscribe();
  }

  public requestMove(direction: MoveDirection): Promise<MoveResult> {
    const player = this.registry.findPlayer();
    if (!player) return Promise.resolve(this.reject(MoveRejection.NO_PLAYER));
    const next = addCells(player.position, directionDelta(direction));
    return this.moveTo(player, next);
  }

  /**
   * One pathfinder step toward the cell.
   */
  public async requestMoveToTile(cell: GridCell): Promise<MoveResult> {
    const player = this.registry.findPlayer();
    if (!player) return this.reject(MoveRejection.NO_PLAYER);
    if (this.scheduler.isBlocked()) return this.reject(MoveRejection.PAUSED);

    const invalid = this.validateTarget(cell);
    if (invalid) return this.reject(invalid);
    if (cellsEqual(player.position, cell)) {
      return this.reject(MoveRejection.ALREADY_THERE);
    }

    const plan = await this.movement.planStep(player.id, cell);
    if (!plan.ok) return this.reject(MoveRejection.NO_PATH);
    return this.moveTo(plan.mover, plan.next);
  }

  public requestMoveToWorldPoint(point: WorldPoint): Promise<MoveResult> {
    return this.requestMoveToTile(this.grid.worldToGrid(point));
  }

  /**
   * Picks up the ground item on the player's tile.
   */
  public pickUpItem(): PickUpResult {
    const player = this.registry.findPlayer();
    if (!player) return { picked: false, reason: PickUpRejection.NO_PLAYER };
    if (player.carriedItems.length >= PLAYER_MAX_CARRIED_ITEMS) {
      return { picked: false, reason: PickUpRejection.INVENTORY_FULL };
    }

    const ground = this.items?.at(player.position);
    const taken = ground ? this.items?.take(ground.item.id) : undefined;
    if (!taken) return { picked: false, reason: PickUpRejection.NOTHING_HERE };

    player.carriedItems.push(taken.item);
    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AGENTS,
      player.id,
      `picked up ${taken.item.id}`,
    );
    return { picked: true, item: taken.item };
  }

  /**
   * Eats the first carried food item.
   * @returns hunger restored, or null with no food at hand
   */
  public eatCarriedFood(): number | null {
    const player = this.registry.findPlayer();
    if (!player) return null;

    const index = player.carriedItems.findIndex(
      (item) => item.kind === ItemKind.FOOD,
    );
    if (index < 0) return null;

    const [food] = player.carriedItems.splice(index, 1);
    const before = player.hunger;
    AgentNeeds.increaseHunger(player, food.hungerRestored);
    return player.hunger - before;
  }

  private async moveTo(player: Agent, next: GridCell): Promise<MoveResult> {
    if (this.scheduler.isBlocked()) return this.reject(MoveRejection.PAUSED);
    const invalid = this.validateTarget(next);
    if (invalid) return this.reject(invalid);

    this.registry.leaveHideable(player.id);
    this.registry.moveAgent(player.id, next);
    const yielded = this.registry.resolveMoveConflict(player.id);
    const hidden = this.enterShelter(player);

    const report = await this.scheduler.notifyPlayerMoved();
    return {
      accepted: true,
      position: { ...player.position },
      yielded,
      hidden,
      report,
    };
  }

  private validateTarget(cell: GridCell): MoveRejection | null {
    if (!this.grid.isValid(cell)) return MoveRejection.OUT_OF_BOUNDS;
    if (!this.grid.isWalkable(cell)) return MoveRejection.UNWALKABLE;
    if (this.grid.tileKind(cell) === TileType.WATER) return MoveRejection.WATER;
    return null;
  }

  /**
   * Hides in a den or bush on the player's tile unless a predator is there.
   * Reaching the player's own den hands over carried food.
   */
  private enterShelter(player: Agent): boolean {
    const predatorHere = this.registry
      .agentsAt(player.position)
      .some((other) => other.kind.category === AgentCategory.PREDATOR);
    if (predatorHere) return false;

    const here = this.hideables.at(player.position);
    for (const kind of SHELTER_PREFERENCE) {
      const hideable = here.find((candidate) => candidate.kind === kind);
      if (!hideable || !this.registry.enterHideable(player.id, hideable.id)) {
        continue;
      }
      if (hideable.id === player.homeId) this.deliverFood(player, hideable);
      return true;
    }
    return false;
  }

  private deliverFood(player: Agent, den: Hideable): void {
    const food = player.carriedItems.filter(
      (item) => item.kind === ItemKind.FOOD,
    );
    if (food.length === 0) return;

    player.carriedItems = player.carriedItems.filter(
      (item) => item.kind !== ItemKind.FOOD,
    );
    for (const item of food) {
      this.inventory?.deposit(item);
    }
    const groupCount = this.registry.increaseGroupCount(player.id, food.length);

    logger.info(
      `🥕 PlayerController: delivered ${food.length} food to ${den.id}`,
      LogCategory.AGENTS,
    );
    this.events?.emit("player:food_delivered", {
      agentId: player.id,
      denId: den.id,
      itemCount: food.length,
      groupCount,
    });
  }

  private onTurnAdvanced(turn: number): void {
    if (turn === 0) return;
    const player = this.registry.findPlayer();
    if (!player) return;

    if (AgentNeeds.applyTurnDecay(player)) {
      logger.info(
        `💀 PlayerController: ${player.id} starved on turn ${turn}`,
        LogCategory.AGENTS,
      );
      this.events?.emit("player:died", { agentId: player.id, turn });
      this.registry.remove(player.id, RemovalReason.STARVATION);
    }
  }

  private reject(reason: MoveRejection): MoveResult {
    logger.debug(
      `🚫 PlayerController: move rejected (${reason})`,
      LogCategory.AGENTS,
    );
    return { accepted: false, reason };
  }
}
