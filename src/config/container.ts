import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { CONFIG, settingsFromConfig, type SimulationSettings } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Every core component and world adapter is registered as a singleton so one
 * container holds exactly one simulation session.
 *
 * @module config
 */
import { AgentRegistry } from "../domain/simulation/core/AgentRegistry";
import { EventBus } from "../domain/simulation/core/EventBus";
import { HideableRegistry } from "../domain/simulation/core/HideableRegistry";
import { TurnScheduler } from "../domain/simulation/core/TurnScheduler";
import { AgentMovement } from "../domain/simulation/systems/agents/movement/AgentMovement";
import { FleeNavigator } from "../domain/simulation/systems/agents/movement/FleeNavigator";
import { WanderNavigator } from "../domain/simulation/systems/agents/movement/WanderNavigator";
import { ShelterRoutines } from "../domain/simulation/systems/agents/behavior/ShelterRoutines";
import { PreyBehavior } from "../domain/simulation/systems/agents/behavior/PreyBehavior";
import { PredatorBehavior } from "../domain/simulation/systems/agents/behavior/PredatorBehavior";
import { WorkerBehavior } from "../domain/simulation/systems/agents/behavior/WorkerBehavior";
import { AgentBehaviorSystem } from "../domain/simulation/systems/agents/behavior/AgentBehaviorSystem";
import { PlayerController } from "../domain/simulation/systems/agents/player/PlayerController";
import type {
  GridService,
  InventorySink,
  ItemField,
  Pathfinder,
  PostTurnHook,
  ResourceField,
} from "../domain/types/simulation/collaborators";
import { EasyStarPathfinder } from "../infrastructure/services/pathfinding/EasyStarPathfinder";
import { TileGridService } from "../infrastructure/services/grid/TileGridService";
import { DenStorage } from "../infrastructure/services/world/DenStorage";
import { ForageField } from "../infrastructure/services/world/ForageField";
import { GroundItemField } from "../infrastructure/services/world/GroundItemField";
import {
  EMPTY_WORLD_LAYOUT,
  WorldSeeder,
  type WorldLayout,
} from "../infrastructure/services/world/WorldSeeder";
import { RandomUtils } from "../shared/utils/RandomUtils";

export interface ContainerOptions {
  settings?: Partial<SimulationSettings>;
  /** Replaces the grid built from the layout */
  grid?: GridService;
  layout?: WorldLayout;
}

/**
 * Grid for a layout: all grass with the terrain patches painted over it. An
 * empty layout falls back to the configured size.
 */
export function buildGrid(layout: WorldLayout): TileGridService {
  const width = layout.width > 0 ? layout.width : CONFIG.GRID_WIDTH;
  const height = layout.height > 0 ? layout.height : CONFIG.GRID_HEIGHT;
  const grid = TileGridService.filled(width, height);

  for (const patch of layout.terrain) {
    for (let y = patch.from.y; y <= patch.to.y; y++) {
      for (let x = patch.from.x; x <= patch.to.x; x++) {
        grid.setTile({ x, y }, patch.tile);
      }
    }
  }
  return grid;
}

export function createContainer(options: ContainerOptions = {}): Container {
  const container = new Container();
  const settings = settingsFromConfig(options.settings);
  const layout = options.layout ?? EMPTY_WORLD_LAYOUT;

  container
    .bind<SimulationSettings>(TYPES.SimulationSettings)
    .toConstantValue(settings);
  container
    .bind<RandomUtils>(TYPES.RandomSource)
    .toConstantValue(new RandomUtils(settings.seed));
  container.bind<EventBus>(TYPES.EventBus).toConstantValue(new EventBus());
  container.bind<WorldLayout>(TYPES.WorldLayout).toConstantValue(layout);
  container
    .bind<GridService>(TYPES.GridService)
    .toConstantValue(options.grid ?? buildGrid(layout));

  container
    .bind<HideableRegistry>(TYPES.HideableRegistry)
    .to(HideableRegistry)
    .inSingletonScope();
  container
    .bind<AgentRegistry>(TYPES.AgentRegistry)
    .to(AgentRegistry)
    .inSingletonScope();
  container
    .bind<Pathfinder>(TYPES.Pathfinder)
    .to(EasyStarPathfinder)
    .inSingletonScope();

  container.bind(DenStorage).toSelf().inSingletonScope();
  container.bind<InventorySink>(TYPES.InventorySink).toService(DenStorage);
  container.bind(ForageField).toSelf().inSingletonScope();
  container.bind<ResourceField>(TYPES.ResourceField).toService(ForageField);
  container.bind(GroundItemField).toSelf().inSingletonScope();
  container.bind<ItemField>(TYPES.ItemField).toService(GroundItemField);
  container
    .bind<PostTurnHook[]>(TYPES.PostTurnHooks)
    .toDynamicValue((context) => [context.container.get(ForageField)])
    .inSingletonScope();

  container
    .bind<AgentMovement>(TYPES.AgentMovement)
    .to(AgentMovement)
    .inSingletonScope();
  container
    .bind<FleeNavigator>(TYPES.FleeNavigator)
    .to(FleeNavigator)
    .inSingletonScope();
  container
    .bind<WanderNavigator>(TYPES.WanderNavigator)
    .to(WanderNavigator)
    .inSingletonScope();
  container
    .bind<ShelterRoutines>(TYPES.ShelterRoutines)
    .to(ShelterRoutines)
    .inSingletonScope();
  container
    .bind<PreyBehavior>(TYPES.PreyBehavior)
    .to(PreyBehavior)
    .inSingletonScope();
  container
    .bind<PredatorBehavior>(TYPES.PredatorBehavior)
    .to(PredatorBehavior)
    .inSingletonScope();
  container
    .bind<WorkerBehavior>(TYPES.WorkerBehavior)
    .to(WorkerBehavior)
    .inSingletonScope();
  container
    .bind<AgentBehaviorSystem>(TYPES.AgentBehaviorSystem)
    .to(AgentBehaviorSystem)
    .inSingletonScope();

  container
    .bind<TurnScheduler>(TYPES.TurnScheduler)
    .to(TurnScheduler)
    .inSingletonScope();
  container
    .bind<PlayerController>(TYPES.PlayerController)
    .to(PlayerController)
    .inSingletonScope();
  container
    .bind<WorldSeeder>(TYPES.WorldSeeder)
    .to(WorldSeeder)
    .inSingletonScope();

  return container;
}
