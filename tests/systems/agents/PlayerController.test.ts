import { describe, it, expect, vi } from "vitest";
import {
  createTestWorld,
  openGrid,
  KANGAROO_RAT,
  PLAYER,
  type TestWorld,
} from "../../fixtures/world";
import { TYPES } from "../../../src/config/Types";
import type { PlayerController } from "../../../src/domain/simulation/systems/agents/player/PlayerController";
import { MoveDirection, RemovalReason } from "../../../src/shared/constants/AgentEnums";
import { MoveRejection, PickUpRejection } from "../../../src/shared/constants/PlayerEnums";
import { FoodType, HideableKind, ItemKind } from "../../../src/shared/constants/WorldEnums";
import type { ItemRecord } from "../../../src/domain/types/simulation/agents";

const carrot = (id: string): ItemRecord => ({
  id,
  itemType: FoodType.GRASS,
  kind: ItemKind.FOOD,
  hungerRestored: 30,
});

function playerIn(world: TestWorld): PlayerController {
  return world.container.get<PlayerController>(TYPES.PlayerController);
}

describe("PlayerController", () => {
  it("debe mover al jugador y avanzar un turno", async () => {
    const world = createTestWorld(openGrid(5, 5));
    const controller = playerIn(world);
    const player = world.spawn(PLAYER, { x: 2, y: 2 });

    const result = await controller.requestMove(MoveDirection.RIGHT);

    expect(result.accepted).toBe(true);
    if (result.accepted) {
      expect(result.position).toEqual({ x: 3, y: 2 });
      expect(result.yielded).toBe(false);
      expect(result.hidden).toBe(false);
      expect(result.report.turn).toBe(1);
    }
    expect(player.hunger).toBe(99);
    expect(world.scheduler.getTurn()).toBe(1);
  });

  it("debe rechazar movimientos al agua o fuera de la rejilla sin avanzar el turno", async () => {
    const world = createTestWorld(["..~", "..."]);
    const controller = playerIn(world);
    world.spawn(PLAYER, { x: 1, y: 0 });

    expect(await controller.requestMove(MoveDirection.RIGHT)).toEqual({
      accepted: false,
      reason: MoveRejection.WATER,
    });
    expect(await controller.requestMove(MoveDirection.DOWN)).toEqual({
      accepted: false,
      reason: MoveRejection.OUT_OF_BOUNDS,
    });
    expect(world.scheduler.getTurn()).toBe(0);
  });

  it("debe rechazar movimientos sin jugador o con la partida en pausa", async () => {
    const world = createTestWorld(openGrid(5, 5));
    const controller = playerIn(world);

    expect(await controller.requestMove(MoveDirection.UP)).toEqual({
      accepted: false,
      reason: MoveRejection.NO_PLAYER,
    });

    world.spawn(PLAYER, { x: 2, y: 2 });
    await controller.requestMove(MoveDirection.UP);
    world.scheduler.pause();

    expect(await controller.requestMove(MoveDirection.UP)).toEqual({
      accepted: false,
      reason: MoveRejection.PAUSED,
    });
  });

  it("debe ceder la casilla ocupada y aun así avanzar el turno", async () => {
    const world = createTestWorld(openGrid(5, 5));
    const controller = playerIn(world);
    world.spawn(PLAYER, { x: 2, y: 2 });
    world.spawn(KANGAROO_RAT, { x: 3, y: 2 });

    const result = await controller.requestMove(MoveDirection.RIGHT);

    expect(result.accepted).toBe(true);
    if (result.accepted) {
      expect(result.yielded).toBe(true);
      expect(result.position).toEqual({ x: 2, y: 2 });
      expect(result.report.turn).toBe(1);
    }
  });

  it("debe esconderse en un arbusto al entrar en su casilla", async () => {
    const world = createTestWorld(openGrid(5, 5));
    const controller = playerIn(world);
    world.shelter({ id: "bush", kind: HideableKind.BUSH, position: { x: 3, y: 2 } });
    const player = world.spawn(PLAYER, { x: 2, y: 2 });

    const result = await controller.requestMove(MoveDirection.RIGHT);

    expect(result.accepted && result.hidden).toBe(true);
    expect(player.currentHideableId).toBe("bush");
  });

  it("debe entregar la comida cargada al llegar a su madriguera", async () => {
    const world = createTestWorld(openGrid(5, 5));
    const controller = playerIn(world);
    world.shelter({ id: "den", kind: HideableKind.DEN, position: { x: 3, y: 2 } });
    const player = world.spawn(PLAYER, { x: 2, y: 2 }, { homeId: "den" });
    player.carriedItems = [carrot("c1"), carrot("c2")];
    const delivered = vi.fn();
    world.events.on("player:food_delivered", delivered);

    await controller.requestMove(MoveDirection.RIGHT);

    expect(player.groupCount).toBe(3);
    expect(player.carriedItems).toEqual([]);
    expect(world.storage.getStats().deposited).toBe(2);
    expect(delivered).toHaveBeenCalledWith({
      agentId: player.id,
      denId: "den",
      itemCount: 2,
      groupCount: 3,
    });
  });

  it("debe recoger objetos del suelo y comerlos", () => {
    const world = createTestWorld(openGrid(3, 3));
    const controller = playerIn(world);
    const player = world.spawn(PLAYER, { x: 1, y: 1 }, { hunger: 50 });
    world.items.drop({ x: 1, y: 1 }, carrot("c1"));

    expect(controller.pickUpItem()).toEqual({ picked: true, item: carrot("c1") });
    expect(controller.pickUpItem()).toEqual({
      picked: false,
      reason: PickUpRejection.NOTHING_HERE,
    });

    expect(controller.eatCarriedFood()).toBe(30);
    expect(player.hunger).toBe(80);
    expect(controller.eatCarriedFood()).toBeNull();
  });

  it("debe morir de inanición al agotar el hambre", async () => {
    const world = createTestWorld(openGrid(5, 5));
    const controller = playerIn(world);
    const player = world.spawn(PLAYER, { x: 2, y: 2 }, { hunger: 1 });
    const died = vi.fn();
    const removed = vi.fn();
    world.events.on("player:died", died);
    world.events.on("lifecycle:agent_removed", removed);

    await controller.requestMove(MoveDirection.UP);

    expect(world.registry.isAlive(player.id)).toBe(false);
    expect(died).toHaveBeenCalledWith({ agentId: player.id, turn: 1 });
    expect(removed).toHaveBeenCalledWith({
      agentId: player.id,
      reason: RemovalReason.STARVATION,
      turn: 1,
    });
  });

  it("debe dar un paso de ruta hacia una casilla o un punto del mundo", async () => {
    const world = createTestWorld(openGrid(5, 5));
    const controller = playerIn(world);
    const player = world.spawn(PLAYER, { x: 2, y: 2 });

    await controller.requestMoveToTile({ x: 2, y: 4 });
    expect(player.position).toEqual({ x: 2, y: 3 });

    await controller.requestMoveToWorldPoint({ x: 3.5, y: 3.5 });
    expect(player.position).toEqual({ x: 3, y: 3 });

    expect(await controller.requestMoveToTile({ x: 3, y: 3 })).toEqual({
      accepted: false,
      reason: MoveRejection.ALREADY_THERE,
    });
  });

  it("debe rechazar destinos sin ruta", async () => {
    const world = createTestWorld([".....", ".....", "~~~~~", "....."]);
    const controller = playerIn(world);
    world.spawn(PLAYER, { x: 2, y: 0 });

    expect(await controller.requestMoveToTile({ x: 2, y: 3 })).toEqual({
      accepted: false,
      reason: MoveRejection.NO_PATH,
    });
    expect(world.scheduler.getTurn()).toBe(0);
  });
});
