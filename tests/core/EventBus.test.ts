import { describe, it, expect, beforeEach, vi } from "vitest";
import { EventBus } from "../../src/domain/simulation/core/EventBus";
import { Season } from "../../src/shared/constants/TimeEnums";

describe("EventBus", () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it("debe entregar el payload a cada handler registrado", () => {
    const first = vi.fn();
    const second = vi.fn();
    bus.on("time:season_changed", first);
    bus.on("time:season_changed", second);

    bus.emit("time:season_changed", { season: Season.SUMMER, turn: 50 });

    expect(first).toHaveBeenCalledWith({ season: Season.SUMMER, turn: 50 });
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("debe dejar de notificar tras cancelar la suscripción", () => {
    const handler = vi.fn();
    const unsubscribe = bus.on("player:died", handler);

    unsubscribe();
    bus.emit("player:died", { agentId: "agent_1", turn: 3 });

    expect(handler).not.toHaveBeenCalled();
    expect(bus.getHandlerCount("player:died")).toBe(0);
  });

  it("debe ejecutar once una sola vez", () => {
    const handler = vi.fn();
    bus.once("player:died", handler);

    bus.emit("player:died", { agentId: "agent_1", turn: 1 });
    bus.emit("player:died", { agentId: "agent_1", turn: 2 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ agentId: "agent_1", turn: 1 });
  });

  it("debe aislar los errores de un handler cuando catchErrors está activo", () => {
    const after = vi.fn();
    bus.on("player:died", () => {
      throw new Error("handler roto");
    });
    bus.on("player:died", after);

    expect(() => bus.emit("player:died", { agentId: "agent_1", turn: 1 })).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it("debe propagar los errores cuando catchErrors está desactivado", () => {
    const strict = new EventBus({ catchErrors: false });
    strict.on("player:died", () => {
      throw new Error("handler roto");
    });

    expect(() => strict.emit("player:died", { agentId: "agent_1", turn: 1 })).toThrow(
      "handler roto",
    );
  });

  it("debe contar las emisiones aunque no haya handlers", () => {
    bus.emit("player:died", { agentId: "agent_1", turn: 1 });
    bus.emit("player:died", { agentId: "agent_2", turn: 2 });
    bus.emit("time:season_changed", { season: Season.AUTUMN, turn: 100 });

    expect(bus.getStats()).toEqual({
      totalEvents: 3,
      eventCounts: { "player:died": 2, "time:season_changed": 1 },
    });
  });
});
