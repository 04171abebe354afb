import { describe, it, expect, beforeEach } from "vitest";
import type { Container } from "inversify";
import { createContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import type { AgentRegistry } from "../../src/domain/simulation/core/AgentRegistry";
import type { HideableRegistry } from "../../src/domain/simulation/core/HideableRegistry";
import type { TurnScheduler } from "../../src/domain/simulation/core/TurnScheduler";
import { DenStorage } from "../../src/infrastructure/services/world/DenStorage";
import { ForageField } from "../../src/infrastructure/services/world/ForageField";
import { GroundItemField } from "../../src/infrastructure/services/world/GroundItemField";
import {
  EMPTY_WORLD_LAYOUT,
  type WorldSeeder,
} from "../../src/infrastructure/services/world/WorldSeeder";
import { DEFAULT_WORLD_LAYOUT } from "../../src/infrastructure/services/world/config/defaultWorldLayout";
import { TileType } from "../../src/shared/constants/TileTypeEnums";
import { FoodType, HideableKind, ItemKind } from "../../src/shared/constants/WorldEnums";
import type { GridService } from "../../src/domain/types/simulation/collaborators";
import type { GridCell } from "../../src/domain/types/simulation/grid";
import { createTestWorld, KANGAROO_RAT } from "../fixtures/world";

function positions(registry: AgentRegistry): GridCell[] {
  return registry.allAgents().flatMap((id) => {
    const agent = registry.get(id);
    return agent ? [{ ...agent.position }] : [];
  });
}

describe("WorldSeeder", () => {
  let container: Container;
  let seeder: WorldSeeder;
  let registry: AgentRegistry;

  beforeEach(() => {
    container = createContainer({
      layout: DEFAULT_WORLD_LAYOUT,
      settings: { seed: "test-seed", workerBonusRate: 0 },
    });
    seeder = container.get<WorldSeeder>(TYPES.WorldSeeder);
    registry = container.get<AgentRegistry>(TYPES.AgentRegistry);
  });

  it("debe construir la rejilla a partir del terreno del mapa", () => {
    const grid = container.get<GridService>(TYPES.GridService);

    expect(grid.gridSize()).toEqual({ width: 32, height: 32 });
    expect(grid.tileKind({ x: 15, y: 5 })).toBe(TileType.WATER);
    expect(grid.tileKind({ x: 20, y: 2 })).toBe(TileType.DIRT);
    expect(grid.isWalkable({ x: 9, y: 21 })).toBe(false);
  });

  it("debe poblar refugios, plantas, objetos y agentes", () => {
    seeder.populate();

    const hideables = container.get<HideableRegistry>(TYPES.HideableRegistry);
    expect(hideables.getAll()).toHaveLength(6);
    expect(hideables.countByKind(HideableKind.BUSH)).toBe(2);
    expect(container.get(ForageField).getStats()).toEqual({ total: 9, grown: 9, growing: 0 });
    expect(container.get(GroundItemField).count()).toBe(2);
    expect(registry.getStats()).toEqual({
      total: 8,
      byCategory: { player: 1, prey: 2, predator: 2, worker: 3 },
      hidden: 0,
    });
    expect(registry.findPlayer()?.position).toEqual({ x: 3, y: 4 });
  });

  it("debe reiniciar al estado inicial y repetir la misma partida", async () => {
    const scheduler = container.get<TurnScheduler>(TYPES.TurnScheduler);
    seeder.populate();
    for (let turn = 0; turn < 3; turn++) {
      await scheduler.notifyPlayerMoved();
    }
    const firstRun = positions(registry);
    container.get(DenStorage).deposit({
      id: "extra",
      itemType: "twig",
      kind: ItemKind.MATERIAL,
      hungerRestored: 0,
    });

    seeder.reset();

    expect(scheduler.getTurn()).toBe(0);
    expect(registry.getStats().total).toBe(8);
    expect(container.get(DenStorage).getStats().deposited).toBe(0);

    for (let turn = 0; turn < 3; turn++) {
      await scheduler.notifyPlayerMoved();
    }
    expect(positions(registry)).toEqual(firstRun);
  });

  it("debe repetir los identificadores de agentes y cosechas tras reiniciar", async () => {
    const world = createTestWorld(["......"], {
      layout: {
        ...EMPTY_WORLD_LAYOUT,
        width: 6,
        height: 1,
        shelters: [{ id: "den", kind: HideableKind.DEN, position: { x: 0, y: 0 } }],
        plants: [{ position: { x: 3, y: 0 }, foodType: FoodType.SEEDS }],
        agents: [{ kind: KANGAROO_RAT, position: { x: 1, y: 0 }, homeId: "den", hunger: 60 }],
      },
    });
    const worldSeeder = world.container.get<WorldSeeder>(TYPES.WorldSeeder);

    async function harvestedIds(): Promise<string[]> {
      await world.scheduler.notifyPlayerMoved();
      await world.scheduler.notifyPlayerMoved();
      return world.registry.require("agent_1").carriedItems.map((item) => item.id);
    }

    worldSeeder.populate();
    expect(await harvestedIds()).toEqual(["resource_1_harvest_1"]);

    worldSeeder.reset();
    expect(world.registry.allAgents()).toEqual(["agent_1"]);
    expect(await harvestedIds()).toEqual(["resource_1_harvest_1"]);
  });
});
