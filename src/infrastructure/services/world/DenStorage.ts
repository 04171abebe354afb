import { injectable } from "inversify";
import { logger } from "../../utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { ItemKind } from "../../../shared/constants/WorldEnums";
import type { ItemRecord } from "../../../domain/types/simulation/agents";
import type { InventorySink } from "../../../domain/types/simulation/collaborators";

export interface DenStorageStats {
  deposited: number;
  storedFood: number;
  byType: Record<string, number>;
}

/**
 * Shared stockpile fed by workers and the player. Food is eaten first in,
 * first out.
 */
@injectable()
export class DenStorage implements InventorySink {
  private food: ItemRecord[] = [];
  private deposited = 0;
  private byType = new Map<string, number>();

  public deposit(item: ItemRecord): void {
    this.deposited++;
    this.byType.set(item.itemType, (this.byType.get(item.itemType) ?? 0) + 1);
    if (item.kind === ItemKind.FOOD) {
      this.food.push({ ...item });
    }
  }

  public availableStoredFood(): boolean {
    return this.food.length > 0;
  }

  public spendStoredFood(): number {
    const item = this.food.shift();
    if (!item) return 0;
    logger.debug(
      `🍽️ DenStorage: ${item.id} eaten (${this.food.length} left)`,
      LogCategory.WORLD,
    );
    return item.hungerRestored;
  }

  public getStats(): DenStorageStats {
    return {
      deposited: this.deposited,
      storedFood: this.food.length,
      byType: Object.fromEntries(this.byType),
    };
  }

  public clear(): void {
    this.food = [];
    this.deposited = 0;
    this.byType.clear();
  }
}
