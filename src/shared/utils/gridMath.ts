import type {
  GridCell,
  GridSize,
} from "../../domain/types/simulation/grid";
import { MoveDirection } from "../constants/AgentEnums";

export const CARDINAL_DIRECTIONS: readonly GridCell[] = [
  { x: 0, y: 1 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 },
];

const DIRECTION_DELTAS: Record<MoveDirection, GridCell> = {
  [MoveDirection.UP]: { x: 0, y: 1 },
  [MoveDirection.DOWN]: { x: 0, y: -1 },
  [MoveDirection.LEFT]: { x: -1, y: 0 },
  [MoveDirection.RIGHT]: { x: 1, y: 0 },
};

export function manhattan(a: GridCell, b: GridCell): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function cellsEqual(a: GridCell, b: GridCell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function addCells(a: GridCell, b: GridCell): GridCell {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function cellKey(cell: GridCell): string {
  return `${cell.x},${cell.y}`;
}

export function clampCell(cell: GridCell, size: GridSize): GridCell {
  return {
    x: Math.min(Math.max(cell.x, 0), size.width - 1),
    y: Math.min(Math.max(cell.y, 0), size.height - 1),
  };
}

export function directionDelta(direction: MoveDirection): GridCell {
  return { ...DIRECTION_DELTAS[direction] };
}

/**
 * Unit step from `from` toward `to` per axis (each component -1, 0 or 1).
 */
export function signDelta(from: GridCell, to: GridCell): GridCell {
  return { x: Math.sign(to.x - from.x), y: Math.sign(to.y - from.y) };
}

/**
 * Cells on the square ring at Chebyshev distance `radius` around `center`,
 * column by column from the lowest x.
 */
export function ringCells(center: GridCell, radius: number): GridCell[] {
  if (radius === 0) return [{ ...center }];
  const cells: GridCell[] = [];
  for (let dx = -radius; dx <= radius; dx++) {
    for (let dy = -radius; dy <= radius; dy++) {
      if (Math.abs(dx) !== radius && Math.abs(dy) !== radius) continue;
      cells.push({ x: center.x + dx, y: center.y + dy });
    }
  }
  return cells;
}
