/**
 * Player input enumerations.
 *
 * @module shared/constants/PlayerEnums
 */

/**
 * Why a requested move was refused. A refused move does not advance the turn.
 */
export enum MoveRejection {
  NO_PLAYER = "no_player",
  PAUSED = "paused",
  OUT_OF_BOUNDS = "out_of_bounds",
  UNWALKABLE = "unwalkable",
  WATER = "water",
  ALREADY_THERE = "already_there",
  NO_PATH = "no_path",
}

export enum PickUpRejection {
  NO_PLAYER = "no_player",
  INVENTORY_FULL = "inventory_full",
  NOTHING_HERE = "nothing_here",
}
