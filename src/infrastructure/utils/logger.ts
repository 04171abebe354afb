/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import {
  LogLevel,
  LogCategory,
  LOG_LEVEL_PRIORITY,
  isLogLevel,
} from "../../shared/constants/LogEnums";

/**
 * Process-wide logger for the simulation server.
 *
 * Every entry is stamped with the turn the scheduler last reported, kept in a
 * bounded in-memory ring for queries, and optionally appended to a daily
 * JSON Lines file under LOG_DIR. Identical messages are throttled so per-turn
 * loops cannot flood the output; errors are never throttled.
 */

export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  agentId?: string;
  /** Simulation turn current when the entry was written */
  turn: number;
  data?: unknown;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  agentId?: string;
  turn?: number;
  /** Case-insensitive substring */
  messageContains?: string;
  /** Keep only the newest N matches */
  limit?: number;
}

export interface LoggerOptions {
  minLevel: LogLevel;
  maxMemoryLogs: number;
  /** Evacuation is off when null */
  logDir: string | null;
  writeIntervalMs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
  /** Distinct messages tracked for throttling before old ones are dropped */
  maxThrottleKeys: number;
  console: boolean;
}

function envNumber(name: string, fallback: number): number {
  const parsed = Number(process.env[name]);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function optionsFromEnv(): LoggerOptions {
  const level = process.env.LOG_LEVEL ?? LogLevel.INFO;
  return {
    minLevel: isLogLevel(level) ? level : LogLevel.INFO,
    maxMemoryLogs: envNumber("LOG_MAX_MEMORY", 5000),
    logDir: process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : null,
    writeIntervalMs: envNumber("LOG_WRITE_INTERVAL_MS", 5000),
    throttleWindowMs: envNumber("LOG_THROTTLE_WINDOW_MS", 5000),
    maxThrottleCount: envNumber("LOG_MAX_THROTTLE_COUNT", 20),
    maxThrottleKeys: envNumber("LOG_MAX_THROTTLE_KEYS", 500),
    console: process.env.LOG_CONSOLE !== "false",
  };
}

const COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};
const RESET = "\x1b[0m";

const CONSOLE_SINK: Record<LogLevel, (...args: unknown[]) => void> = {
  [LogLevel.DEBUG]: (...args) => console.log(...args),
  [LogLevel.INFO]: (...args) => console.info(...args),
  [LogLevel.WARN]: (...args) => console.warn(...args),
  [LogLevel.ERROR]: (...args) => console.error(...args),
};

function isLogCategory(value: unknown): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

export class Logger {
  private options: LoggerOptions;
  private entries: LogEntry[] = [];
  private unwritten: LogEntry[] = [];
  private recent = new Map<string, { count: number; since: number }>();
  private countsByLevel: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 0,
    [LogLevel.WARN]: 0,
    [LogLevel.ERROR]: 0,
  };
  private countsByCategory = new Map<LogCategory, number>();
  private writer?: NodeJS.Timeout;
  private writing: Promise<void> = Promise.resolve();
  private turn = 0;
  private sequence = 0;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = { ...optionsFromEnv(), ...options };

    const dir = this.options.logDir;
    if (dir) {
      try {
        fs.mkdirSync(dir, { recursive: true });
        this.writer = setInterval(() => this.scheduleWrite(), this.options.writeIntervalMs);
        this.writer.unref();
      } catch (error) {
        console.warn(
          `Logger: cannot create ${dir}, file output disabled:`,
          error instanceof Error ? error.message : String(error),
        );
        this.options.logDir = null;
      }
    }
  }

  /** Called by the scheduler at the start of every turn. */
  setTurn(turn: number): void {
    this.turn = turn;
  }

  setMinLevel(level: LogLevel): void {
    this.options.minLevel = level;
  }

  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    extra?: { agentId?: string; data?: unknown },
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.options.minLevel]) return;
    if (level !== LogLevel.ERROR && this.isThrottled(message)) return;

    const timestamp = new Date().toISOString();
    const entry: LogEntry = {
      id: `${this.turn}-${++this.sequence}`,
      level,
      category,
      message,
      timestamp,
      agentId: extra?.agentId,
      turn: this.turn,
      data: extra?.data,
    };
    this.record(entry);

    if (this.options.console) {
      CONSOLE_SINK[level](
        `${COLORS[level]}[${timestamp}] [${level.toUpperCase()}] [${category}] [turn ${this.turn}]${RESET} ${message}`,
        extra?.data ?? "",
      );
    }
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.ERROR, message, categoryOrData, data);
  }

  agentLog(
    level: LogLevel,
    category: LogCategory,
    agentId: string,
    message: string,
    data?: unknown,
  ): void {
    this.log(level, category, `[Agent:${agentId}] ${message}`, { agentId, data });
  }

  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const search = filter.messageContains?.toLowerCase();
    const matches = this.entries.filter(
      (entry) =>
        (!filter.levels?.length || filter.levels.includes(entry.level)) &&
        (!filter.categories?.length || filter.categories.includes(entry.category)) &&
        (filter.agentId === undefined || entry.agentId === filter.agentId) &&
        (filter.turn === undefined || entry.turn === filter.turn) &&
        (search === undefined || entry.message.toLowerCase().includes(search)),
    );
    return filter.limit ? matches.slice(-filter.limit) : matches;
  }

  getRecentLogs(count = 100): LogEntry[] {
    return this.entries.slice(-count);
  }

  getBufferSize(): number {
    return this.entries.length;
  }

  getThrottledKeyCount(): number {
    return this.recent.size;
  }

  getMetrics(): {
    byLevel: Record<LogLevel, number>;
    byCategory: Record<string, number>;
    totalCount: number;
  } {
    const byLevel = { ...this.countsByLevel };
    return {
      byLevel,
      byCategory: Object.fromEntries(this.countsByCategory),
      totalCount: Object.values(byLevel).reduce((sum, n) => sum + n, 0),
    };
  }

  /** Writes whatever is still buffered for the log file. */
  async flush(): Promise<void> {
    this.scheduleWrite();
    await this.writing;
  }

  destroy(): void {
    if (this.writer) clearInterval(this.writer);
    this.scheduleWrite();
  }

  private dispatch(
    level: LogLevel,
    message: string,
    categoryOrData: unknown,
    data: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
    } else {
      this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
    }
  }

  private isThrottled(message: string): boolean {
    const now = Date.now();
    const key = message.slice(0, 100);
    const seen = this.recent.get(key);
    if (!seen || now - seen.since > this.options.throttleWindowMs) {
      this.recent.set(key, { count: 1, since: now });
      if (this.recent.size > this.options.maxThrottleKeys) this.pruneThrottled(now);
      return false;
    }
    seen.count++;
    return seen.count > this.options.maxThrottleCount;
  }

  /**
   * Drops keys idle for two windows, then the oldest ones while still over
   * `maxThrottleKeys`.
   */
  private pruneThrottled(now: number): void {
    for (const [key, seen] of this.recent) {
      if (now - seen.since > this.options.throttleWindowMs * 2) {
        this.recent.delete(key);
      }
    }
    for (const key of this.recent.keys()) {
      if (this.recent.size <= this.options.maxThrottleKeys) break;
      this.recent.delete(key);
    }
  }

  private record(entry: LogEntry): void {
    this.entries.push(entry);
    const overflow = this.entries.length - this.options.maxMemoryLogs;
    if (overflow > 0) this.entries.splice(0, overflow);
    if (this.options.logDir) this.unwritten.push(entry);

    this.countsByLevel[entry.level]++;
    this.countsByCategory.set(
      entry.category,
      (this.countsByCategory.get(entry.category) ?? 0) + 1,
    );
  }

  private scheduleWrite(): void {
    this.writing = this.writing.then(() => this.writePending());
  }

  private async writePending(): Promise<void> {
    const dir = this.options.logDir;
    if (!dir || this.unwritten.length === 0) return;

    const batch = this.unwritten;
    this.unwritten = [];
    const file = path.join(dir, `turns-${new Date().toISOString().slice(0, 10)}.jsonl`);
    try {
      await fs.promises.appendFile(
        file,
        batch.map((entry) => JSON.stringify(entry)).join("\n") + "\n",
        "utf-8",
      );
    } catch (error) {
      this.unwritten = batch.concat(this.unwritten);
      console.error(
        `Logger: failed to append ${batch.length} entries to ${file}:`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
