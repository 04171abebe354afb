import type { TileType } from "../../../shared/constants/TileTypeEnums";

/** Integer grid coordinates. */
export interface GridCell {
  x: number;
  y: number;
}

/** Continuous world-space coordinates, used only by the input adapter. */
export interface WorldPoint {
  x: number;
  y: number;
}

export interface GridSize {
  width: number;
  height: number;
}

/**
 * Decides whether a mover may enter a cell of the given tile kind.
 */
export type TraversalPredicate = (cell: GridCell, tile: TileType) => boolean;
