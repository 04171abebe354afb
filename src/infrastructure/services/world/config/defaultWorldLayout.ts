import {
  AgentCategory,
  PlayerSpecies,
  PredatorSpecies,
  PreySpecies,
  WorkerSpecies,
} from "../../../../shared/constants/AgentEnums";
import { TileType } from "../../../../shared/constants/TileTypeEnums";
import {
  FoodType,
  HideableKind,
  ItemKind,
} from "../../../../shared/constants/WorldEnums";
import type { WorldLayout } from "../WorldSeeder";

const RABBIT = { category: AgentCategory.PREY, subtype: PreySpecies.RABBIT } as const;
const KANGAROO_RAT = {
  category: AgentCategory.WORKER,
  subtype: WorkerSpecies.KANGAROO_RAT,
} as const;

/**
 * Starting world served by the HTTP server: a stream splitting the map, the
 * player's den in the north-west, a rabbit warren in the south-west, a worker
 * den on the dirt flats and a coyote den in the south-east.
 */
export const DEFAULT_WORLD_LAYOUT: WorldLayout = {
  width: 32,
  height: 32,
  terrain: [
    { tile: TileType.WATER, from: { x: 15, y: 0 }, to: { x: 15, y: 11 } },
    { tile: TileType.DIRT, from: { x: 20, y: 2 }, to: { x: 27, y: 9 } },
    { tile: TileType.OBSTACLE, from: { x: 8, y: 20 }, to: { x: 9, y: 21 } },
  ],
  shelters: [
    { id: "den_player", kind: HideableKind.DEN, position: { x: 3, y: 3 }, capacity: 4 },
    { id: "warren", kind: HideableKind.SPAWNER, position: { x: 10, y: 24 } },
    { id: "den_workers", kind: HideableKind.DEN, position: { x: 24, y: 5 } },
    { id: "bush_west", kind: HideableKind.BUSH, position: { x: 6, y: 12 } },
    { id: "bush_centre", kind: HideableKind.BUSH, position: { x: 18, y: 18 } },
    {
      id: "den_coyote",
      kind: HideableKind.PREDATOR_DEN,
      position: { x: 27, y: 27 },
      territoryRadius: 6,
    },
  ],
  plants: [
    { position: { x: 5, y: 8 }, foodType: FoodType.GRASS },
    { position: { x: 7, y: 14 }, foodType: FoodType.GRASS },
    { position: { x: 12, y: 22 }, foodType: FoodType.GRASS },
    { position: { x: 13, y: 26 }, foodType: FoodType.GRASS },
    { position: { x: 9, y: 28 }, foodType: FoodType.GRASS },
    { position: { x: 20, y: 20 }, foodType: FoodType.GRASS },
    { position: { x: 22, y: 3 }, foodType: FoodType.SEEDS },
    { position: { x: 26, y: 8 }, foodType: FoodType.SEEDS },
    { position: { x: 21, y: 9 }, foodType: FoodType.SEEDS },
  ],
  items: [
    {
      position: { x: 25, y: 10 },
      item: {
        id: "seed_pouch_1",
        itemType: FoodType.SEEDS,
        kind: ItemKind.FOOD,
        hungerRestored: 20,
      },
    },
    {
      position: { x: 23, y: 12 },
      item: { id: "twig_1", itemType: "twig", kind: ItemKind.MATERIAL, hungerRestored: 0 },
    },
  ],
  agents: [
    {
      kind: { category: AgentCategory.PLAYER, subtype: PlayerSpecies.PLAYER },
      position: { x: 3, y: 4 },
      homeId: "den_player",
    },
    { kind: RABBIT, position: { x: 10, y: 23 }, homeId: "warren", groupCount: 3 },
    { kind: RABBIT, position: { x: 11, y: 25 }, homeId: "warren", groupCount: 2 },
    { kind: KANGAROO_RAT, position: { x: 24, y: 6 }, homeId: "den_workers" },
    { kind: KANGAROO_RAT, position: { x: 23, y: 5 }, homeId: "den_workers" },
    { kind: KANGAROO_RAT, position: { x: 25, y: 5 }, homeId: "den_workers" },
    {
      kind: { category: AgentCategory.PREDATOR, subtype: PredatorSpecies.COYOTE },
      position: { x: 27, y: 26 },
      homeId: "den_coyote",
      hunger: 90,
    },
    {
      kind: { category: AgentCategory.PREDATOR, subtype: PredatorSpecies.HAWK },
      position: { x: 16, y: 16 },
      hunger: 80,
    },
  ],
};
