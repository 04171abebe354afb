import { inject, injectable } from "inversify";
import { TYPES } from "../../../config/Types";
import type { SimulationSettings } from "../../../config/config";
import { logger } from "../../utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { Season } from "../../../shared/constants/TimeEnums";
import { FoodType, GrowthStage } from "../../../shared/constants/WorldEnums";
import { cellKey } from "../../../shared/utils/gridMath";
import type {
  ForageableResource,
  PostTurnHook,
  ResourceField,
  TurnContext,
} from "../../../domain/types/simulation/collaborators";
import type { GridCell } from "../../../domain/types/simulation/grid";

/**
 * Growth speed per season; regrowth takes `regrowTurns / multiplier` turns.
 */
export const SEASON_GROWTH_MULTIPLIER: Readonly<Record<Season, number>> = {
  [Season.SPRING]: 1.5,
  [Season.SUMMER]: 1.2,
  [Season.AUTUMN]: 0.8,
  [Season.WINTER]: 0.5,
};

const DEFAULT_HUNGER_RESTORED: Readonly<Record<FoodType, number>> = {
  [FoodType.GRASS]: 30,
  [FoodType.SEEDS]: 20,
  [FoodType.MEAT]: 50,
};

export interface PlantSpec {
  id?: string;
  position: GridCell;
  foodType: FoodType;
  hungerRestored?: number;
  /** Overrides the field-wide regrowth time */
  regrowTurns?: number;
  stage?: GrowthStage;
}

class ForagePlant implements ForageableResource {
  public stage: GrowthStage;

  constructor(
    public readonly id: string,
    public readonly position: GridCell,
    public readonly foodType: FoodType,
    public readonly hungerRestored: number,
    public readonly regrowTurns: number,
    stage: GrowthStage,
    private readonly onHarvest: (plant: ForagePlant) => void,
  ) {
    this.stage = stage;
  }

  public isFullyGrown(): boolean {
    return this.stage === GrowthStage.FULL;
  }

  public harvest(): void {
    if (!this.isFullyGrown()) return;
    this.stage = GrowthStage.GROWING;
    this.onHarvest(this);
  }
}

/**
 * Grass and seed patches. Harvested plants regrow after a number of turns
 * scaled by the current season.
 */
@injectable()
export class ForageField implements ResourceField, PostTurnHook {
  public readonly name = "forage-regrowth";

  private plants = new Map<string, ForagePlant>();
  private byCell = new Map<string, string>();
  private regenerationTimers = new Map<string, number>();
  private nextId = 1;

  constructor(
    @inject(TYPES.SimulationSettings)
    private readonly settings: SimulationSettings,
  ) {}

  /**
   * Plants a resource; one per cell.
   * @throws Error when the cell already holds a resource
   */
  public plant(spec: PlantSpec): ForageableResource {
    const key = cellKey(spec.position);
    if (this.byCell.has(key)) {
      throw new Error(
        `ForageField: (${spec.position.x}, ${spec.position.y}) already holds a resource`,
      );
    }

    const plant = new ForagePlant(
      spec.id ?? `resource_${this.nextId++}`,
      { ...spec.position },
      spec.foodType,
      spec.hungerRestored ?? DEFAULT_HUNGER_RESTORED[spec.foodType],
      spec.regrowTurns ?? this.settings.resourceRegrowTurns,
      spec.stage ?? GrowthStage.FULL,
      (harvested) => this.regenerationTimers.set(harvested.id, 0),
    );
    this.plants.set(plant.id, plant);
    this.byCell.set(key, plant.id);
    if (plant.stage === GrowthStage.GROWING) {
      this.regenerationTimers.set(plant.id, 0);
    }
    return plant;
  }

  public all(): readonly ForageableResource[] {
    return Array.from(this.plants.values());
  }

  public at(cell: GridCell): ForageableResource | undefined {
    const id = this.byCell.get(cellKey(cell));
    return id === undefined ? undefined : this.plants.get(id);
  }

  public get(id: string): ForageableResource | undefined {
    return this.plants.get(id);
  }

  public remove(id: string): boolean {
    const plant = this.plants.get(id);
    if (!plant) return false;
    this.plants.delete(id);
    this.byCell.delete(cellKey(plant.position));
    this.regenerationTimers.delete(id);
    return true;
  }

  public turnsToRegrow(regrowTurns: number, season: Season): number {
    const multiplier = SEASON_GROWTH_MULTIPLIER[season];
    return Math.max(1, Math.round(regrowTurns / multiplier));
  }

  public onTurnCompleted(context: TurnContext): void {
    let regrown = 0;
    for (const [id, elapsed] of this.regenerationTimers) {
      const plant = this.plants.get(id);
      if (!plant) {
        this.regenerationTimers.delete(id);
        continue;
      }

      const progress = elapsed + 1;
      if (progress >= this.turnsToRegrow(plant.regrowTurns, context.season)) {
        plant.stage = GrowthStage.FULL;
        this.regenerationTimers.delete(id);
        regrown++;
      } else {
        this.regenerationTimers.set(id, progress);
      }
    }

    if (regrown > 0) {
      logger.debug(
        `🌱 ForageField: ${regrown} resource(s) regrew on turn ${context.turn}`,
        LogCategory.WORLD,
      );
    }
  }

  public getStats(): { total: number; grown: number; growing: number } {
    let grown = 0;
    for (const plant of this.plants.values()) {
      if (plant.isFullyGrown()) grown++;
    }
    const total = this.plants.size;
    return { total, grown, growing: total - grown };
  }

  public clear(): void {
    this.plants.clear();
    this.byCell.clear();
    this.regenerationTimers.clear();
    this.nextId = 1;
  }
}
