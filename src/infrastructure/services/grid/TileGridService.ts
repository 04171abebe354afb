import { TileType } from "../../../shared/constants/TileTypeEnums";
import type { GridService } from "../../../domain/types/simulation/collaborators";
import type {
  GridCell,
  GridSize,
  WorldPoint,
} from "../../../domain/types/simulation/grid";

const ASCII_TILES: Readonly<Record<string, TileType>> = {
  ".": TileType.GRASS,
  ",": TileType.DIRT,
  "~": TileType.WATER,
  "#": TileType.OBSTACLE,
};

/**
 * In-memory tile matrix. Row index is y, column index is x; each tile spans
 * `cellSize` world units.
 */
export class TileGridService implements GridService {
  private readonly tiles: TileType[][];
  private readonly size: GridSize;

  constructor(
    tiles: TileType[][],
    private readonly cellSize = 1,
  ) {
    const height = tiles.length;
    const width = height > 0 ? tiles[0].length : 0;
    if (tiles.some((row) => row.length !== width)) {
      throw new Error("TileGridService: every row must have the same width");
    }
    if (cellSize <= 0) {
      throw new Error("TileGridService: cellSize must be positive");
    }
    this.tiles = tiles.map((row) => [...row]);
    this.size = { width, height };
  }

  public static filled(
    width: number,
    height: number,
    tile: TileType = TileType.GRASS,
    cellSize = 1,
  ): TileGridService {
    const rows: TileType[][] = [];
    for (let y = 0; y < height; y++) {
      rows.push(new Array<TileType>(width).fill(tile));
    }
    return new TileGridService(rows, cellSize);
  }

  /**
   * `.` grass, `,` dirt, `~` water, `#` obstacle. The first string is row 0.
   */
  public static fromAscii(
    rows: readonly string[],
    cellSize = 1,
  ): TileGridService {
    const tiles = rows.map((row, y) =>
      Array.from(row).map((symbol, x) => {
        const tile = ASCII_TILES[symbol];
        if (tile === undefined) {
          throw new Error(
            `TileGridService: unknown tile symbol "${symbol}" at (${x}, ${y})`,
          );
        }
        return tile;
      }),
    );
    return new TileGridService(tiles, cellSize);
  }

  public isValid(cell: GridCell): boolean {
    return (
      Number.isInteger(cell.x) &&
      Number.isInteger(cell.y) &&
      cell.x >= 0 &&
      cell.y >= 0 &&
      cell.x < this.size.width &&
      cell.y < this.size.height
    );
  }

  public isWalkable(cell: GridCell): boolean {
    return this.isValid(cell) && this.tileKind(cell) !== TileType.OBSTACLE;
  }

  /**
   * Cells outside the grid read as obstacles.
   */
  public tileKind(cell: GridCell): TileType {
    if (!this.isValid(cell)) return TileType.OBSTACLE;
    return this.tiles[cell.y][cell.x];
  }

  public setTile(cell: GridCell, tile: TileType): void {
    if (!this.isValid(cell)) return;
    this.tiles[cell.y][cell.x] = tile;
  }

  public gridSize(): GridSize {
    return { ...this.size };
  }

  /**
   * Centre of the cell in world units.
   */
  public gridToWorld(cell: GridCell): WorldPoint {
    return {
      x: (cell.x + 0.5) * this.cellSize,
      y: (cell.y + 0.5) * this.cellSize,
    };
  }

  public worldToGrid(point: WorldPoint): GridCell {
    return {
      x: Math.floor(point.x / this.cellSize),
      y: Math.floor(point.y / this.cellSize),
    };
  }
}
