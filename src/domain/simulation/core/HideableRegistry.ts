import { injectable } from "inversify";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { HideableKind, SHELTER_KINDS } from "@/shared/constants/WorldEnums";
import { StaleReferenceError } from "@/shared/errors/SimulationErrors";
import { cellsEqual } from "@/shared/utils/gridMath";
import type { Hideable } from "@/domain/types/simulation/collaborators";
import type { GridCell } from "@/domain/types/simulation/grid";

/**
 * Lookup-by-id table of hideables (dens, spawners, bushes, predator dens).
 *
 * Agents only store hideable ids; every dereference goes through this table
 * so a destroyed hideable reads as absent instead of dangling.
 */
@injectable()
export class HideableRegistry {
  private hideables = new Map<string, Hideable>();

  public register(hideable: Hideable): void {
    this.hideables.set(hideable.id, hideable);
    logger.debug(
      `🏠 HideableRegistry: registered ${hideable.kind} ${hideable.id}`,
      LogCategory.WORLD,
    );
  }

  public unregister(id: string): boolean {
    const removed = this.hideables.delete(id);
    if (removed) {
      logger.debug(
        `🏚️ HideableRegistry: unregistered ${id}`,
        LogCategory.WORLD,
      );
    }
    return removed;
  }

  public get(id: string | null): Hideable | undefined {
    if (id === null) return undefined;
    return this.hideables.get(id);
  }

  public require(id: string): Hideable {
    const hideable = this.hideables.get(id);
    if (!hideable) {
      throw new StaleReferenceError("hideable", id);
    }
    return hideable;
  }

  /**
   * Hideables located at a cell, in registration order.
   */
  public at(cell: GridCell): Hideable[] {
    const result: Hideable[] = [];
    for (const hideable of this.hideables.values()) {
      if (cellsEqual(hideable.position(), cell)) {
        result.push(hideable);
      }
    }
    return result;
  }

  /**
   * Den and spawner tiles protect whoever stands on them from predators.
   */
  public isShelterTile(cell: GridCell): boolean {
    return this.at(cell).some((hideable) => SHELTER_KINDS.has(hideable.kind));
  }

  public hasCapacity(hideable: Hideable): boolean {
    return hideable.occupants().length < hideable.capacity();
  }

  public getAll(): Hideable[] {
    return Array.from(this.hideables.values());
  }

  public countByKind(kind: HideableKind): number {
    let count = 0;
    for (const hideable of this.hideables.values()) {
      if (hideable.kind === kind) count++;
    }
    return count;
  }

  public clear(): void {
    this.hideables.clear();
  }
}
