import { describe, it, expect, beforeEach } from "vitest";
import { ForageField } from "../../src/infrastructure/services/world/ForageField";
import { settingsFromConfig } from "../../src/config/config";
import { Season } from "../../src/shared/constants/TimeEnums";
import { FoodType, GrowthStage } from "../../src/shared/constants/WorldEnums";

describe("ForageField", () => {
  let field: ForageField;

  beforeEach(() => {
    field = new ForageField(settingsFromConfig({ resourceRegrowTurns: 10 }));
  });

  it("debe escalar el tiempo de rebrote según la estación", () => {
    expect(field.turnsToRegrow(10, Season.SPRING)).toBe(7);
    expect(field.turnsToRegrow(10, Season.SUMMER)).toBe(8);
    expect(field.turnsToRegrow(10, Season.AUTUMN)).toBe(13);
    expect(field.turnsToRegrow(10, Season.WINTER)).toBe(20);
    expect(field.turnsToRegrow(0, Season.SPRING)).toBe(1);
  });

  it("debe plantar con identificadores secuenciales y valores por defecto", () => {
    const grass = field.plant({ position: { x: 1, y: 1 }, foodType: FoodType.GRASS });
    const seeds = field.plant({ position: { x: 2, y: 1 }, foodType: FoodType.SEEDS });

    expect(grass.id).toBe("resource_1");
    expect(grass.hungerRestored).toBe(30);
    expect(seeds.id).toBe("resource_2");
    expect(seeds.hungerRestored).toBe(20);
    expect(field.at({ x: 2, y: 1 })).toBe(seeds);
  });

  it("debe rechazar dos recursos en la misma casilla", () => {
    field.plant({ position: { x: 1, y: 1 }, foodType: FoodType.GRASS });

    expect(() => field.plant({ position: { x: 1, y: 1 }, foodType: FoodType.SEEDS })).toThrow(
      "ForageField: (1, 1) already holds a resource",
    );
  });

  it("debe rebrotar tras los turnos de la estación", () => {
    const plant = field.plant({ position: { x: 0, y: 0 }, foodType: FoodType.GRASS });
    plant.harvest();
    expect(plant.isFullyGrown()).toBe(false);

    for (let turn = 1; turn <= 6; turn++) {
      field.onTurnCompleted({ turn, season: Season.SPRING });
    }
    expect(plant.isFullyGrown()).toBe(false);

    field.onTurnCompleted({ turn: 7, season: Season.SPRING });
    expect(plant.isFullyGrown()).toBe(true);
  });

  it("debe contar recursos crecidos y en crecimiento", () => {
    field.plant({ position: { x: 0, y: 0 }, foodType: FoodType.GRASS });
    field.plant({ position: { x: 1, y: 0 }, foodType: FoodType.GRASS, stage: GrowthStage.GROWING });

    expect(field.getStats()).toEqual({ total: 2, grown: 1, growing: 1 });

    expect(field.remove("resource_2")).toBe(true);
    expect(field.getStats()).toEqual({ total: 1, grown: 1, growing: 0 });
  });
});
