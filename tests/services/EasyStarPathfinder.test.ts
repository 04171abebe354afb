import { describe, it, expect } from "vitest";
import { EasyStarPathfinder } from "../../src/infrastructure/services/pathfinding/EasyStarPathfinder";
import { TileGridService } from "../../src/infrastructure/services/grid/TileGridService";
import { TileType } from "../../src/shared/constants/TileTypeEnums";
import type { TraversalPredicate } from "../../src/domain/types/simulation/grid";

const landOnly: TraversalPredicate = (_cell, tile) =>
  tile !== TileType.OBSTACLE && tile !== TileType.WATER;
const anyWalkable: TraversalPredicate = (_cell, tile) => tile !== TileType.OBSTACLE;

describe("EasyStarPathfinder", () => {
  it("debe devolver la ruta incluyendo la casilla inicial", async () => {
    const pathfinder = new EasyStarPathfinder(TileGridService.fromAscii(["...."]));

    const result = await pathfinder.findPath({ x: 0, y: 0 }, { x: 3, y: 0 }, landOnly);

    expect(result).toEqual({
      success: true,
      path: [
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 0 },
        { x: 3, y: 0 },
      ],
    });
  });

  it("debe devolver solo el inicio cuando origen y destino coinciden", async () => {
    const pathfinder = new EasyStarPathfinder(TileGridService.fromAscii(["..."]));

    const result = await pathfinder.findPath({ x: 1, y: 0 }, { x: 1, y: 0 }, landOnly);

    expect(result).toEqual({ success: true, path: [{ x: 1, y: 0 }] });
  });

  it("debe fallar cuando el destino es un obstáculo", async () => {
    const pathfinder = new EasyStarPathfinder(TileGridService.fromAscii(["..#"]));

    const result = await pathfinder.findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, landOnly);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("No path from (0, 0) to (2, 0)");
    }
  });

  it("debe fallar fuera de la rejilla", async () => {
    const pathfinder = new EasyStarPathfinder(TileGridService.fromAscii(["..."]));

    const result = await pathfinder.findPath({ x: 0, y: 0 }, { x: 5, y: 0 }, landOnly);

    expect(result.success).toBe(false);
  });

  it("debe respetar el predicado de cada especie ante el agua", async () => {
    const pathfinder = new EasyStarPathfinder(TileGridService.fromAscii([".~."]));

    const walker = await pathfinder.findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, landOnly);
    const flyer = await pathfinder.findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, anyWalkable);

    expect(walker.success).toBe(false);
    expect(flyer).toEqual({
      success: true,
      path: [
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 0 },
      ],
    });
  });
});
