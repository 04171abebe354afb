import { describe, it, expect } from "vitest";
import {
  addCells,
  clampCell,
  directionDelta,
  manhattan,
  ringCells,
  signDelta,
} from "../../src/shared/utils/gridMath";
import { MoveDirection } from "../../src/shared/constants/AgentEnums";

describe("gridMath", () => {
  it("debe medir distancias Manhattan", () => {
    expect(manhattan({ x: 1, y: 2 }, { x: 4, y: 0 })).toBe(5);
  });

  it("debe usar UP como +y", () => {
    expect(directionDelta(MoveDirection.UP)).toEqual({ x: 0, y: 1 });
    expect(directionDelta(MoveDirection.LEFT)).toEqual({ x: -1, y: 0 });
  });

  it("debe acotar casillas al tamaño de la rejilla", () => {
    expect(clampCell({ x: -3, y: 12 }, { width: 5, height: 10 })).toEqual({ x: 0, y: 9 });
  });

  it("debe calcular pasos unitarios por eje", () => {
    expect(signDelta({ x: 2, y: 2 }, { x: 7, y: 2 })).toEqual({ x: 1, y: 0 });
    expect(addCells({ x: 1, y: 1 }, { x: -1, y: 2 })).toEqual({ x: 0, y: 3 });
  });

  it("debe recorrer el anillo columna a columna", () => {
    expect(ringCells({ x: 0, y: 0 }, 0)).toEqual([{ x: 0, y: 0 }]);
    expect(ringCells({ x: 5, y: 5 }, 1)).toEqual([
      { x: 4, y: 4 },
      { x: 4, y: 5 },
      { x: 4, y: 6 },
      { x: 5, y: 4 },
      { x: 5, y: 6 },
      { x: 6, y: 4 },
      { x: 6, y: 5 },
      { x: 6, y: 6 },
    ]);
  });
});
