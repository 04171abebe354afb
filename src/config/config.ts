import { LogLevel, isLogLevel } from "../shared/constants/LogEnums";

/**
 * Application configuration loaded from environment variables.
 *
 * @module config
 */

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readOptionalRate(name: string): number | null {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return null;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return null;
  return Math.min(1, Math.max(0, parsed));
}

const rawLogLevel = process.env.LOG_LEVEL ?? LogLevel.INFO;

/**
 * Application configuration object.
 *
 * @property {number} PORT - HTTP server port (default: 8080)
 * @property {string} SIM_SEED - seed for the simulation RNG
 * @property {number} GRID_WIDTH - default grid width for the in-memory world
 * @property {number} GRID_HEIGHT - default grid height for the in-memory world
 * @property {number} TURNS_PER_SEASON - turns between season changes
 * @property {number} WORKER_GOAL - assigned workers needed for a bonus rate of 1
 * @property {number|null} WORKER_BONUS_RATE - fixed duplication rate, overrides WORKER_GOAL
 * @property {number} RESOURCE_REGROW_TURNS - base turns for a harvested resource to regrow
 * @property {LogLevel} LOG_LEVEL - minimum level written to the console
 */
export const CONFIG = {
  PORT: readInt("PORT", 8080),
  SIM_SEED: process.env.SIM_SEED || "den-turn-simulation",
  GRID_WIDTH: readInt("GRID_WIDTH", 32),
  GRID_HEIGHT: readInt("GRID_HEIGHT", 32),
  TURNS_PER_SEASON: readInt("TURNS_PER_SEASON", 50),
  WORKER_GOAL: readInt("WORKER_GOAL", 20),
  WORKER_BONUS_RATE: readOptionalRate("WORKER_BONUS_RATE"),
  RESOURCE_REGROW_TURNS: readInt("RESOURCE_REGROW_TURNS", 10),
  LOG_LEVEL: isLogLevel(rawLogLevel) ? rawLogLevel : LogLevel.INFO,
};

/**
 * Tunables shared by the scheduler and the behaviour machines.
 */
export interface SimulationSettings {
  seed: string;
  turnsPerSeason: number;
  workerGoal: number;
  workerBonusRate: number | null;
  resourceRegrowTurns: number;
}

export function settingsFromConfig(
  overrides: Partial<SimulationSettings> = {},
): SimulationSettings {
  return {
    seed: CONFIG.SIM_SEED,
    turnsPerSeason: CONFIG.TURNS_PER_SEASON,
    workerGoal: CONFIG.WORKER_GOAL,
    workerBonusRate: CONFIG.WORKER_BONUS_RATE,
    resourceRegrowTurns: CONFIG.RESOURCE_REGROW_TURNS,
    ...overrides,
  };
}
