import { inject, injectable } from "inversify";
import { TYPES } from "../../../config/Types";
import { logger } from "../../utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import type { TileType } from "../../../shared/constants/TileTypeEnums";
import type { RandomUtils } from "../../../shared/utils/RandomUtils";
import type { AgentRegistry } from "../../../domain/simulation/core/AgentRegistry";
import type { HideableRegistry } from "../../../domain/simulation/core/HideableRegistry";
import type { TurnScheduler } from "../../../domain/simulation/core/TurnScheduler";
import type { WorkerBehavior } from "../../../domain/simulation/systems/agents/behavior/WorkerBehavior";
import type {
  AgentKind,
  ItemRecord,
} from "../../../domain/types/simulation/agents";
import type { GridCell } from "../../../domain/types/simulation/grid";
import { DenStorage } from "./DenStorage";
import { ForageField, type PlantSpec } from "./ForageField";
import { GroundItemField } from "./GroundItemField";
import { Shelter, type ShelterOptions } from "./Shelter";

export interface TerrainPatch {
  tile: TileType;
  from: GridCell;
  to: GridCell;
}

export interface AgentPlacement {
  kind: AgentKind;
  position: GridCell;
  homeId?: string;
  groupCount?: number;
  hunger?: number;
}

export interface WorldLayout {
  width: number;
  height: number;
  /** Applied in order over an all-grass grid */
  terrain: TerrainPatch[];
  shelters: ShelterOptions[];
  plants: PlantSpec[];
  items: { position: GridCell; item: ItemRecord }[];
  agents: AgentPlacement[];
}

export const EMPTY_WORLD_LAYOUT: WorldLayout = {
  width: 0,
  height: 0,
  terrain: [],
  shelters: [],
  plants: [],
  items: [],
  agents: [],
};

/**
 * Builds the starting population from a layout and rebuilds it on reset.
 */
@injectable()
export class WorldSeeder {
  constructor(
    @inject(TYPES.WorldLayout) private readonly layout: WorldLayout,
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.HideableRegistry)
    private readonly hideables: HideableRegistry,
    @inject(TYPES.TurnScheduler) private readonly scheduler: TurnScheduler,
    @inject(TYPES.WorkerBehavior) private readonly workers: WorkerBehavior,
    @inject(TYPES.RandomSource) private readonly random: RandomUtils,
    @inject(ForageField) private readonly forage: ForageField,
    @inject(GroundItemField) private readonly items: GroundItemField,
    @inject(DenStorage) private readonly storage: DenStorage,
  ) {}

  /**
   * Registers shelters, plants, items and agents, in that order.
   * @throws InvalidSpawnError when a placement does not fit the grid
   */
  public populate(): void {
    for (const options of this.layout.shelters) {
      this.hideables.register(new Shelter(options));
    }
    for (const plant of this.layout.plants) {
      this.forage.plant(plant);
    }
    for (const { position, item } of this.layout.items) {
      this.items.drop(position, item);
    }
    for (const placement of this.layout.agents) {
      this.registry.spawn(placement.kind, placement.position, {
        homeId: placement.homeId ?? null,
        groupCount: placement.groupCount,
        hunger: placement.hunger,
      });
    }

    logger.info(
      `🌍 WorldSeeder: ${this.layout.agents.length} agents, ${this.layout.shelters.length} shelters, ${this.layout.plants.length} plants`,
      LogCategory.WORLD,
    );
  }

  /**
   * Clears every store, rewinds the random source, the id counters and the
   * turn counter, then populates again.
   */
  public reset(): void {
    this.registry.clear();
    this.hideables.clear();
    this.forage.clear();
    this.items.clear();
    this.storage.clear();
    this.workers.reset();
    this.random.reseed();
    this.scheduler.reset();
    this.populate();
  }
}
