/**
 * Tile type enumerations for the simulation grid.
 *
 * @module shared/constants/TileTypeEnums
 */

/**
 * Enumeration of grid tile kinds. Obstacles are never walkable; water is
 * walkable only for species that can cross it.
 */
export enum TileType {
  GRASS = "grass",
  DIRT = "dirt",
  WATER = "water",
  OBSTACLE = "obstacle",
}

export function isTileType(value: string): value is TileType {
  return Object.values(TileType).some((tile) => tile === value);
}
