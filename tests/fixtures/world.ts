import type { Container } from "inversify";
import { createContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import type { SimulationSettings } from "../../src/config/config";
import type { AgentRegistry } from "../../src/domain/simulation/core/AgentRegistry";
import type { EventBus } from "../../src/domain/simulation/core/EventBus";
import type { HideableRegistry } from "../../src/domain/simulation/core/HideableRegistry";
import type { TurnScheduler } from "../../src/domain/simulation/core/TurnScheduler";
import type { AgentMovement } from "../../src/domain/simulation/systems/agents/movement/AgentMovement";
import type { Agent, AgentKind, SpawnOptions } from "../../src/domain/types/simulation/agents";
import type { GridCell } from "../../src/domain/types/simulation/grid";
import { TileGridService } from "../../src/infrastructure/services/grid/TileGridService";
import { DenStorage } from "../../src/infrastructure/services/world/DenStorage";
import { ForageField } from "../../src/infrastructure/services/world/ForageField";
import { GroundItemField } from "../../src/infrastructure/services/world/GroundItemField";
import { Shelter, type ShelterOptions } from "../../src/infrastructure/services/world/Shelter";
import type { WorldLayout } from "../../src/infrastructure/services/world/WorldSeeder";
import {
  AgentCategory,
  PlayerSpecies,
  PredatorSpecies,
  PreySpecies,
  WorkerSpecies,
} from "../../src/shared/constants/AgentEnums";

export const PLAYER: AgentKind = { category: AgentCategory.PLAYER, subtype: PlayerSpecies.PLAYER };
export const RABBIT: AgentKind = { category: AgentCategory.PREY, subtype: PreySpecies.RABBIT };
export const KANGAROO_RAT: AgentKind = {
  category: AgentCategory.WORKER,
  subtype: WorkerSpecies.KANGAROO_RAT,
};
export const COYOTE: AgentKind = { category: AgentCategory.PREDATOR, subtype: PredatorSpecies.COYOTE };
export const HAWK: AgentKind = { category: AgentCategory.PREDATOR, subtype: PredatorSpecies.HAWK };
export const WOLF: AgentKind = { category: AgentCategory.PREDATOR, subtype: PredatorSpecies.WOLF };

export interface TestWorld {
  container: Container;
  grid: TileGridService;
  registry: AgentRegistry;
  hideables: HideableRegistry;
  scheduler: TurnScheduler;
  movement: AgentMovement;
  events: EventBus;
  forage: ForageField;
  items: GroundItemField;
  storage: DenStorage;
  spawn(kind: AgentKind, position: GridCell, options?: SpawnOptions): Agent;
  shelter(options: ShelterOptions): Shelter;
}

export interface TestWorldOptions {
  settings?: Partial<SimulationSettings>;
  layout?: WorldLayout;
  cellSize?: number;
}

/**
 * Contenedor completo sobre una rejilla ASCII (`.` hierba, `,` tierra,
 * `~` agua, `#` obstáculo). La fila 0 es y = 0.
 */
export function createTestWorld(
  rows: readonly string[],
  options: TestWorldOptions = {},
): TestWorld {
  const grid = TileGridService.fromAscii(rows, options.cellSize);
  const container = createContainer({
    grid,
    layout: options.layout,
    settings: {
      seed: "test-seed",
      turnsPerSeason: 50,
      workerGoal: 20,
      workerBonusRate: 0,
      resourceRegrowTurns: 10,
      ...options.settings,
    },
  });

  const registry = container.get<AgentRegistry>(TYPES.AgentRegistry);
  const hideables = container.get<HideableRegistry>(TYPES.HideableRegistry);

  return {
    container,
    grid,
    registry,
    hideables,
    scheduler: container.get<TurnScheduler>(TYPES.TurnScheduler),
    movement: container.get<AgentMovement>(TYPES.AgentMovement),
    events: container.get<EventBus>(TYPES.EventBus),
    forage: container.get(ForageField),
    items: container.get(GroundItemField),
    storage: container.get(DenStorage),
    spawn(kind, position, spawnOptions) {
      return registry.require(registry.spawn(kind, position, spawnOptions));
    },
    shelter(shelterOptions) {
      const shelter = new Shelter(shelterOptions);
      hideables.register(shelter);
      return shelter;
    },
  };
}

/**
 * Rejilla abierta de `width` x `height` casillas de hierba.
 */
export function openGrid(width: number, height: number): string[] {
  return Array.from({ length: height }, () => ".".repeat(width));
}
