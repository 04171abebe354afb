import { injectable } from "inversify";
import { cellsEqual } from "../../../shared/utils/gridMath";
import type { ItemRecord } from "../../../domain/types/simulation/agents";
import type {
  GroundItem,
  ItemField,
} from "../../../domain/types/simulation/collaborators";
import type { GridCell } from "../../../domain/types/simulation/grid";

/**
 * Loose items lying on the grid, in drop order.
 */
@injectable()
export class GroundItemField implements ItemField {
  private items = new Map<string, GroundItem>();

  public drop(position: GridCell, item: ItemRecord): GroundItem {
    const ground: GroundItem = { position: { ...position }, item: { ...item } };
    this.items.set(item.id, ground);
    return ground;
  }

  public all(): readonly GroundItem[] {
    return Array.from(this.items.values());
  }

  public at(cell: GridCell): GroundItem | undefined {
    for (const ground of this.items.values()) {
      if (cellsEqual(ground.position, cell)) return ground;
    }
    return undefined;
  }

  public take(itemId: string): GroundItem | undefined {
    const ground = this.items.get(itemId);
    if (!ground) return undefined;
    this.items.delete(itemId);
    return ground;
  }

  public count(): number {
    return this.items.size;
  }

  public clear(): void {
    this.items.clear();
  }
}
