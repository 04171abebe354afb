import { describe, it, expect, vi } from "vitest";
import {
  createTestWorld,
  openGrid,
  COYOTE,
  HAWK,
  KANGAROO_RAT,
  RABBIT,
  WOLF,
} from "../../fixtures/world";
import { TYPES } from "../../../src/config/Types";
import type { PredatorBehavior } from "../../../src/domain/simulation/systems/agents/behavior/PredatorBehavior";
import { AgentState } from "../../../src/shared/constants/AgentEnums";
import { HideableKind } from "../../../src/shared/constants/WorldEnums";

describe("PredatorBehavior", () => {
  describe("objetivos", () => {
    it("debe cazar presas y depredadores de rango estrictamente menor", () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      const wolf = world.spawn(WOLF, { x: 0, y: 0 });
      const coyote = world.spawn(COYOTE, { x: 1, y: 0 });
      const hawk = world.spawn(HAWK, { x: 2, y: 0 });
      const rabbit = world.spawn(RABBIT, { x: 3, y: 0 });

      expect(predators.isValidTarget(wolf, coyote)).toBe(true);
      expect(predators.isValidTarget(coyote, hawk)).toBe(true);
      expect(predators.isValidTarget(hawk, coyote)).toBe(false);
      expect(predators.isValidTarget(coyote, coyote)).toBe(false);
      expect(predators.isValidTarget(hawk, rabbit)).toBe(true);
    });

    it("debe ignorar agentes escondidos o sobre casillas de refugio", () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      world.shelter({ id: "warren", kind: HideableKind.SPAWNER, position: { x: 3, y: 3 } });
      world.shelter({ id: "bush", kind: HideableKind.BUSH, position: { x: 1, y: 1 } });
      const coyote = world.spawn(COYOTE, { x: 0, y: 0 });
      const onShelter = world.spawn(RABBIT, { x: 3, y: 3 });
      const inBush = world.spawn(RABBIT, { x: 1, y: 1 });
      world.registry.enterHideable(inBush.id, "bush");

      expect(predators.isValidTarget(coyote, onShelter)).toBe(false);
      expect(predators.isValidTarget(coyote, inBush)).toBe(false);
      expect(predators.findTarget(coyote)).toBeUndefined();
    });
  });

  it("debe perseguir y cazar a un objetivo a tres casillas", async () => {
    const world = createTestWorld(openGrid(10, 10));
    const coyote = world.spawn(COYOTE, { x: 0, y: 0 }, { hunger: 50 });
    const worker = world.spawn(KANGAROO_RAT, { x: 3, y: 0 });
    const hunted = vi.fn();
    world.events.on("predation:hunted", hunted);

    await world.scheduler.notifyPlayerMoved();
    expect(coyote.position).toEqual({ x: 1, y: 0 });
    expect(coyote.state).toBe(AgentState.HUNTING);

    await world.scheduler.notifyPlayerMoved();
    expect(coyote.position).toEqual({ x: 2, y: 0 });

    await world.scheduler.notifyPlayerMoved();
    expect(coyote.position).toEqual({ x: 3, y: 0 });
    expect(world.registry.get(worker.id)).toBeUndefined();
    expect(coyote.hunger).toBe(107);
    expect(coyote.stallTurnsRemaining).toBe(3);
    expect(hunted).toHaveBeenCalledWith({
      predatorId: coyote.id,
      targetId: worker.id,
      targetRemaining: 0,
      position: { x: 3, y: 0 },
      turn: 3,
    });

    await world.scheduler.notifyPlayerMoved();
    expect(coyote.state).toBe(AgentState.STALLED);
    expect(coyote.stallTurnsRemaining).toBe(2);
    expect(coyote.position).toEqual({ x: 3, y: 0 });
  });

  it("debe retroceder al entrar en un grupo que sobrevive a la caza", async () => {
    const world = createTestWorld(openGrid(6, 1));
    const coyote = world.spawn(COYOTE, { x: 0, y: 0 }, { hunger: 50 });
    const rabbits = world.spawn(KANGAROO_RAT, { x: 1, y: 0 }, { groupCount: 3 });

    await world.scheduler.notifyPlayerMoved();

    expect(rabbits.groupCount).toBe(2);
    expect(coyote.position).toEqual({ x: 0, y: 0 });
    expect(coyote.stallTurnsRemaining).toBe(3);
  });

  it("debe pasear por su territorio sin objetivos", async () => {
    const world = createTestWorld(openGrid(12, 12));
    const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
    world.shelter({
      id: "den_coyote",
      kind: HideableKind.PREDATOR_DEN,
      position: { x: 6, y: 6 },
      territoryRadius: 2,
    });
    const coyote = world.spawn(COYOTE, { x: 6, y: 6 }, { homeId: "den_coyote" });

    await predators.takeTurn(coyote);

    expect(coyote.state).toBe(AgentState.WANDERING);
    const destination = coyote.memory.wanderDestination;
    if (destination) {
      const distance = Math.abs(destination.x - 6) + Math.abs(destination.y - 6);
      expect(distance).toBeLessThanOrEqual(4);
    }
  });

  describe("hambre", () => {
    it("debe ignorar a una presa contigua si está saciado", async () => {
      const world = createTestWorld(openGrid(6, 1));
      const coyote = world.spawn(COYOTE, { x: 0, y: 0 }, { hunger: 200 });
      const worker = world.spawn(KANGAROO_RAT, { x: 1, y: 0 });

      await world.scheduler.notifyPlayerMoved();

      expect(world.registry.isAlive(worker.id)).toBe(true);
      expect(coyote.state).toBe(AgentState.WANDERING);
      expect(coyote.memory.huntingTargetId).toBeNull();
      expect(coyote.hunger).toBe(199);
    });

    it("debe cazar en cuanto el hambre baja del umbral", async () => {
      const world = createTestWorld(openGrid(6, 1));
      const coyote = world.spawn(COYOTE, { x: 0, y: 0 }, { hunger: 70 });
      const worker = world.spawn(KANGAROO_RAT, { x: 1, y: 0 });

      await world.scheduler.notifyPlayerMoved();

      expect(world.registry.get(worker.id)).toBeUndefined();
      expect(coyote.position).toEqual({ x: 1, y: 0 });
      expect(coyote.hunger).toBe(129);
    });

    it("debe dejar cazar al coyote con hambre crítica aunque su umbral sea menor", () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      const params = { hungerThreshold: 10, criticalHunger: 20 };
      const coyote = world.spawn(COYOTE, { x: 0, y: 0 }, { hunger: 15, params });
      const wolf = world.spawn(WOLF, { x: 5, y: 5 }, { hunger: 15, params });

      expect(predators.wantsToHunt(coyote)).toBe(true);
      expect(predators.wantsToHunt(wolf)).toBe(false);
    });

    it("debe descartar el picado pendiente de un halcón saciado", async () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      const hawk = world.spawn(HAWK, { x: 0, y: 0 }, { hunger: 200 });
      const worker = world.spawn(KANGAROO_RAT, { x: 0, y: 2 });
      hawk.memory.pendingDash = { direction: { x: 0, y: 1 }, distance: 3 };

      await predators.takeTurn(hawk);

      expect(hawk.memory.pendingDash).toBeNull();
      expect(hawk.state).toBe(AgentState.WANDERING);
      expect(hawk.stallTurnsRemaining).toBe(1);
      expect(world.registry.isAlive(worker.id)).toBe(true);
    });
  });

  describe("coyote", () => {
    it("debe descansar tras nueve turnos persiguiendo sin éxito", async () => {
      const world = createTestWorld(["..~..", "..~..", "..~.."]);
      const coyote = world.spawn(COYOTE, { x: 0, y: 1 }, { hunger: 50 });
      const worker = world.spawn(KANGAROO_RAT, { x: 4, y: 1 });

      for (let turn = 1; turn <= 8; turn++) {
        await world.scheduler.notifyPlayerMoved();
      }
      expect(coyote.memory.chaseTargetId).toBe(worker.id);
      expect(coyote.memory.chaseTurnsWithoutKill).toBe(8);
      expect(coyote.stallTurnsRemaining).toBe(0);
      expect(coyote.position).toEqual({ x: 0, y: 1 });

      await world.scheduler.notifyPlayerMoved();
      expect(coyote.stallTurnsRemaining).toBe(2);
      expect(coyote.memory.chaseTurnsWithoutKill).toBe(0);
      expect(coyote.memory.chaseTargetId).toBeNull();

      await world.scheduler.notifyPlayerMoved();
      expect(coyote.state).toBe(AgentState.STALLED);
      expect(coyote.stallTurnsRemaining).toBe(1);
    });
  });

  describe("halcón", () => {
    it("debe preparar un picado, ejecutarlo, descansar y cazar", async () => {
      const world = createTestWorld(openGrid(10, 10));
      const hawk = world.spawn(HAWK, { x: 2, y: 0 }, { hunger: 50 });
      const worker = world.spawn(KANGAROO_RAT, { x: 2, y: 5 });

      await world.scheduler.notifyPlayerMoved();
      expect(hawk.position).toEqual({ x: 2, y: 1 });
      expect(hawk.memory.pendingDash).toEqual({ direction: { x: 0, y: 1 }, distance: 3 });
      expect(hawk.stallTurnsRemaining).toBe(0);

      await world.scheduler.notifyPlayerMoved();
      expect(hawk.position).toEqual({ x: 2, y: 4 });
      expect(hawk.memory.pendingDash).toBeNull();
      expect(hawk.stallTurnsRemaining).toBe(1);

      await world.scheduler.notifyPlayerMoved();
      expect(hawk.state).toBe(AgentState.STALLED);
      expect(hawk.position).toEqual({ x: 2, y: 4 });

      await world.scheduler.notifyPlayerMoved();
      expect(hawk.position).toEqual({ x: 2, y: 5 });
      expect(world.registry.isAlive(worker.id)).toBe(false);
      expect(hawk.stallTurnsRemaining).toBe(2);
      expect(hawk.hunger).toBe(86);
    });

    it("debe detener el picado sobre la presa y cazarla", async () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      const hawk = world.spawn(HAWK, { x: 0, y: 0 }, { hunger: 50 });
      const worker = world.spawn(KANGAROO_RAT, { x: 0, y: 2 });
      hawk.memory.pendingDash = { direction: { x: 0, y: 1 }, distance: 3 };

      await predators.takeTurn(hawk);

      expect(hawk.position).toEqual({ x: 0, y: 2 });
      expect(world.registry.isAlive(worker.id)).toBe(false);
      expect(hawk.stallTurnsRemaining).toBe(2);
    });

    it("debe ceder la última casilla si otro agente corta el picado", async () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      const hawk = world.spawn(HAWK, { x: 0, y: 0 }, { hunger: 50 });
      world.spawn(COYOTE, { x: 0, y: 2 });
      hawk.memory.pendingDash = { direction: { x: 0, y: 1 }, distance: 3 };

      await predators.takeTurn(hawk);

      expect(hawk.position).toEqual({ x: 0, y: 1 });
      expect(hawk.memory.encounteredAgentWhileMoving).toBe(true);
      expect(hawk.stallTurnsRemaining).toBe(1);

      expect(world.registry.resolveMoveConflict(hawk.id)).toBe(true);
      expect(hawk.position).toEqual({ x: 0, y: 0 });
      expect(hawk.memory.encounteredAgentWhileMoving).toBe(false);
    });

    it("no debe marcar encuentro si el picado se corta sin avanzar", async () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      const hawk = world.spawn(HAWK, { x: 0, y: 0 }, { hunger: 50 });
      world.spawn(COYOTE, { x: 0, y: 1 });
      hawk.memory.pendingDash = { direction: { x: 0, y: 1 }, distance: 3 };

      await predators.takeTurn(hawk);

      expect(hawk.position).toEqual({ x: 0, y: 0 });
      expect(hawk.memory.encounteredAgentWhileMoving).toBe(false);
    });

    it("debe descansar un turno si no ve presa al frente", async () => {
      const world = createTestWorld(openGrid(6, 6));
      const predators = world.container.get<PredatorBehavior>(TYPES.PredatorBehavior);
      const hawk = world.spawn(HAWK, { x: 3, y: 3 });

      await predators.takeTurn(hawk);

      expect(hawk.state).toBe(AgentState.WANDERING);
      expect(hawk.memory.pendingDash).toBeNull();
      expect(hawk.stallTurnsRemaining).toBe(1);

      await predators.takeTurn(hawk);
      expect(hawk.state).toBe(AgentState.STALLED);
      expect(hawk.stallTurnsRemaining).toBe(0);
    });
  });
});
