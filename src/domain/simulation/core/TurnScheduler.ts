/**
 * TurnScheduler - Drives one full simulation turn per player move.
 *
 * Turns are serialised through a promise chain: a request made while a turn
 * is still running is queued behind it, never nested inside it. Each agent
 * step is awaited before the next agent runs, and moves apply immediately,
 * so later agents observe earlier agents' new positions.
 *
 * @module core
 */

import { performance } from "node:perf_hooks";
import { inject, injectable, optional } from "inversify";
import { TYPES } from "@/config/Types";
import type { SimulationSettings } from "@/config/config";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { AgentCategory } from "@/shared/constants/AgentEnums";
import { SchedulerState } from "@/shared/constants/SchedulerEnums";
import { SEASON_ORDER, Season } from "@/shared/constants/TimeEnums";
import { MissingCollaboratorError } from "@/shared/errors/SimulationErrors";
import { cellsEqual } from "@/shared/utils/gridMath";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { EventBus } from "@/domain/simulation/core/EventBus";
import type { AgentBehaviorSystem } from "@/domain/simulation/systems/agents/behavior/AgentBehaviorSystem";
import type {
  GridService,
  PostTurnHook,
  TurnContext,
} from "@/domain/types/simulation/collaborators";

export type TurnListener = (turn: number) => void;

export interface TurnReport {
  turn: number;
  season: Season;
  processed: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

export interface SchedulerStatus {
  state: SchedulerState;
  turn: number;
  season: Season;
  paused: boolean;
}

@injectable()
export class TurnScheduler {
  private state = SchedulerState.IDLE;
  private turn = 0;
  private season = Season.SPRING;
  private paused = false;
  private queue: Promise<unknown> = Promise.resolve();
  private listeners = new Set<TurnListener>();
  private hooks: PostTurnHook[];

  constructor(
    @inject(TYPES.SimulationSettings)
    private readonly settings: SimulationSettings,
    @inject(TYPES.AgentRegistry)
    @optional()
    private readonly registry?: AgentRegistry,
    @inject(TYPES.GridService) @optional() private readonly grid?: GridService,
    @inject(TYPES.AgentBehaviorSystem)
    @optional()
    private readonly behaviors?: AgentBehaviorSystem,
    @inject(TYPES.PostTurnHooks) @optional() hooks?: PostTurnHook[],
    @inject(TYPES.EventBus) @optional() private readonly events?: EventBus,
  ) {
    this.hooks = hooks ? [...hooks] : [];
  }

  /**
   * Runs one turn once every earlier request has finished.
   */
  public notifyPlayerMoved(): Promise<TurnReport> {
    const run = this.queue.then(() => this.runTurn());
    this.queue = run.catch((error: unknown) => {
      logger.error(
        "❌ TurnScheduler: turn failed",
        LogCategory.SIMULATION,
        error instanceof Error ? error.message : String(error),
      );
    });
    return run;
  }

  public onTurnAdvanced(listener: TurnListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public addPostTurnHook(hook: PostTurnHook): void {
    this.hooks.push(hook);
  }

  public pause(): void {
    this.paused = true;
    logger.info("⏸️ TurnScheduler: paused", LogCategory.SIMULATION);
  }

  public resume(): void {
    this.paused = false;
    logger.info("▶️ TurnScheduler: resumed", LogCategory.SIMULATION);
  }

  /**
   * True while a started game is paused; moves are rejected then.
   */
  public isBlocked(): boolean {
    return this.paused && this.state === SchedulerState.RUNNING;
  }

  /**
   * Back to idle at turn 0. Observers are told about the new counter.
   */
  public reset(): void {
    this.state = SchedulerState.IDLE;
    this.turn = 0;
    this.season = Season.SPRING;
    this.paused = false;
    this.registry?.setCurrentTurn(0);
    logger.setTurn(0);
    logger.info("🔄 TurnScheduler: reset", LogCategory.SIMULATION);
    this.notifyListeners();
  }

  public getStatus(): SchedulerStatus {
    return {
      state: this.state,
      turn: this.turn,
      season: this.season,
      paused: this.paused,
    };
  }

  public getTurn(): number {
    return this.turn;
  }

  public getSeason(): Season {
    return this.season;
  }

  private async runTurn(): Promise<TurnReport> {
    const startedAt = performance.now();
    this.state = SchedulerState.RUNNING;
    this.turn++;
    this.advanceSeason();
    logger.setTurn(this.turn);

    const report: TurnReport = {
      turn: this.turn,
      season: this.season,
      processed: 0,
      skipped: 0,
      failed: 0,
      durationMs: 0,
    };

    if (!this.registry || !this.grid || !this.behaviors) {
      const missing = !this.registry
        ? "AgentRegistry"
        : !this.grid
          ? "GridService"
          : "AgentBehaviorSystem";
      logger.warn(
        new MissingCollaboratorError(missing, `turn ${this.turn}`).message,
        LogCategory.SIMULATION,
      );
      this.registry?.setCurrentTurn(this.turn);
    } else {
      await this.runAgents(this.registry, this.behaviors, report);
      this.registry.clearTransientReferences();
    }

    this.firePostTurnHooks({ turn: this.turn, season: this.season });
    this.notifyListeners();

    report.durationMs = performance.now() - startedAt;
    logger.debug(
      `⏱️ TurnScheduler: turn ${report.turn} processed=${report.processed} skipped=${report.skipped} failed=${report.failed}`,
      LogCategory.SIMULATION,
    );
    return report;
  }

  private async runAgents(
    registry: AgentRegistry,
    behaviors: AgentBehaviorSystem,
    report: TurnReport,
  ): Promise<void> {
    registry.beginTurn(this.turn);
    try {
      for (const agentId of registry.allAgents()) {
        const agent = registry.get(agentId);
        if (!agent || agent.kind.category === AgentCategory.PLAYER) continue;
        if (behaviors.isDormant(agent)) {
          report.skipped++;
          continue;
        }

        const before = { ...agent.position };
        try {
          await behaviors.step(agent);
          report.processed++;
        } catch (error) {
          report.failed++;
          logger.error(
            `❌ TurnScheduler: step of ${agentId} failed`,
            LogCategory.SIMULATION,
            error instanceof Error ? error.message : String(error),
          );
        }

        const after = registry.get(agentId);
        if (after && !cellsEqual(before, after.position)) {
          registry.resolveMoveConflict(agentId);
        }
        registry.flushRemovals();
      }
    } finally {
      registry.endTurn();
    }
  }

  private advanceSeason(): void {
    const perSeason = Math.max(1, this.settings.turnsPerSeason);
    const index = Math.floor(this.turn / perSeason) % SEASON_ORDER.length;
    const next = SEASON_ORDER[index];
    if (next === this.season) return;

    this.season = next;
    logger.info(
      `🍂 TurnScheduler: season is now ${next} (turn ${this.turn})`,
      LogCategory.SIMULATION,
    );
    this.events?.emit("time:season_changed", { season: next, turn: this.turn });
  }

  private firePostTurnHooks(context: TurnContext): void {
    for (const hook of this.hooks) {
      try {
        const pending = hook.onTurnCompleted(context);
        if (pending instanceof Promise) {
          pending.catch((error: unknown) => this.logHookFailure(hook, error));
        }
      } catch (error) {
        this.logHookFailure(hook, error);
      }
    }
  }

  private logHookFailure(hook: PostTurnHook, error: unknown): void {
    logger.error(
      `❌ TurnScheduler: post-turn hook ${hook.name} failed`,
      LogCategory.SIMULATION,
      error instanceof Error ? error.message : String(error),
    );
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.turn);
      } catch (error) {
        logger.error(
          "❌ TurnScheduler: turn listener failed",
          LogCategory.SIMULATION,
          error instanceof Error ? error.message : String(error),
        );
      }
    }
  }
}
