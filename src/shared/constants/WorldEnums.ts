/**
 * World object enumerations: hideables, items and food.
 *
 * @module shared/constants/WorldEnums
 */

/**
 * Kinds of hideable locations. DEN and SPAWNER are shelter tiles where
 * predators cannot hunt.
 */
export enum HideableKind {
  DEN = "den",
  SPAWNER = "spawner",
  BUSH = "bush",
  PREDATOR_DEN = "predator_den",
}

export enum ItemKind {
  FOOD = "food",
  MATERIAL = "material",
}

export enum FoodType {
  GRASS = "grass",
  SEEDS = "seeds",
  MEAT = "meat",
}

export enum GrowthStage {
  FULL = "full",
  GROWING = "growing",
}

export const SHELTER_KINDS: ReadonlySet<HideableKind> = new Set([
  HideableKind.DEN,
  HideableKind.SPAWNER,
]);
