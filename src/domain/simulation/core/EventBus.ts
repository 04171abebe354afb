import { injectable } from "inversify";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import type {
  AgentCategory,
  RemovalReason,
} from "@/shared/constants/AgentEnums";
import type { Season } from "@/shared/constants/TimeEnums";
import type {
  AgentId,
  AgentSubtype,
} from "@/domain/types/simulation/agents";
import type { GridCell } from "@/domain/types/simulation/grid";

/**
 * Typed simulation events.
 */
export interface SystemEvents {
  "lifecycle:agent_spawned": {
    agentId: AgentId;
    category: AgentCategory;
    subtype: AgentSubtype;
    position: GridCell;
    turn: number;
  };
  "lifecycle:agent_removed": {
    agentId: AgentId;
    reason: RemovalReason;
    turn: number;
  };

  "predation:hunted": {
    predatorId: AgentId;
    targetId: AgentId;
    targetRemaining: number;
    position: GridCell;
    turn: number;
  };

  "forage:harvested": {
    agentId: AgentId;
    resourceId: string;
    hungerRestored: number;
    turn: number;
  };
  "worker:item_collected": {
    agentId: AgentId;
    itemId: string;
    turn: number;
  };
  "worker:deposited": {
    agentId: AgentId;
    homeId: string;
    itemCount: number;
    duplicated: number;
    turn: number;
  };

  "player:food_delivered": {
    agentId: AgentId;
    denId: string;
    itemCount: number;
    groupCount: number;
  };
  "player:died": {
    agentId: AgentId;
    turn: number;
  };

  "time:season_changed": {
    season: Season;
    turn: number;
  };
}

export type EventName = keyof SystemEvents;
export type EventData<E extends EventName> = SystemEvents[E];
export type EventHandler<E extends EventName> = (data: EventData<E>) => void;

type HandlerTable = { [E in EventName]?: Set<EventHandler<E>> };

export interface EventBusOptions {
  /** When false a throwing handler aborts the emit and the error reaches the emitter */
  catchErrors: boolean;
}

/**
 * Synchronous typed pub/sub shared by every simulation service. Handlers run
 * in registration order inside the emitting call, so a listener observes the
 * world exactly as the emitter left it.
 */
@injectable()
export class EventBus {
  private readonly options: EventBusOptions;
  private handlers: HandlerTable = {};
  private emitted = new Map<EventName, number>();

  constructor(options: Partial<EventBusOptions> = {}) {
    this.options = { catchErrors: true, ...options };
  }

  private handlersFor<E extends EventName>(event: E): Set<EventHandler<E>> {
    let set: Set<EventHandler<E>> | undefined = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<E>>();
      this.handlers[event] = set;
    }
    return set;
  }

  /** @returns a function that removes the handler */
  public on<E extends EventName>(
    event: E,
    handler: EventHandler<E>,
  ): () => void {
    const set = this.handlersFor(event);
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  public once<E extends EventName>(
    event: E,
    handler: EventHandler<E>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      handler(data);
    });
    return unsubscribe;
  }

  public emit<E extends EventName>(event: E, data: EventData<E>): void {
    this.emitted.set(event, (this.emitted.get(event) ?? 0) + 1);

    const set: Set<EventHandler<E>> | undefined = this.handlers[event];
    if (!set) return;

    // Copy so handlers may unsubscribe while being notified.
    for (const handler of Array.from(set)) {
      try {
        handler(data);
      } catch (error) {
        if (!this.options.catchErrors) throw error;
        logger.error(`EventBus: ${event} handler threw`, LogCategory.SIMULATION, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  public getHandlerCount(event: EventName): number {
    return this.handlers[event]?.size ?? 0;
  }

  public getStats(): {
    totalEvents: number;
    eventCounts: Record<string, number>;
  } {
    const eventCounts: Record<string, number> = {};
    let totalEvents = 0;
    for (const [event, count] of this.emitted) {
      eventCounts[event] = count;
      totalEvents += count;
    }
    return { totalEvents, eventCounts };
  }
}
