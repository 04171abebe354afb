/**
 * Time-related enumerations for the turn simulation.
 *
 * @module shared/constants/TimeEnums
 */

/**
 * Seasons cycle in this order, one step every `turnsPerSeason` turns.
 */
export enum Season {
  SPRING = "spring",
  SUMMER = "summer",
  AUTUMN = "autumn",
  WINTER = "winter",
}

export const SEASON_ORDER: readonly Season[] = [
  Season.SPRING,
  Season.SUMMER,
  Season.AUTUMN,
  Season.WINTER,
];
