import { HideableKind } from "../../../shared/constants/WorldEnums";
import type { AgentId } from "../../../domain/types/simulation/agents";
import type { Hideable } from "../../../domain/types/simulation/collaborators";
import type { GridCell } from "../../../domain/types/simulation/grid";

export interface ShelterOptions {
  id: string;
  kind: HideableKind;
  position: GridCell;
  capacity?: number;
  territoryRadius?: number;
}

const DEFAULT_CAPACITY: Readonly<Record<HideableKind, number>> = {
  [HideableKind.DEN]: 8,
  [HideableKind.SPAWNER]: 8,
  [HideableKind.BUSH]: 2,
  [HideableKind.PREDATOR_DEN]: 4,
};

/**
 * Fixed-position hideable with a capacity limit.
 */
export class Shelter implements Hideable {
  public readonly id: string;
  public readonly kind: HideableKind;
  public readonly territoryRadius?: number;
  private readonly cell: GridCell;
  private readonly limit: number;
  private readonly inside = new Set<AgentId>();

  constructor(options: ShelterOptions) {
    this.id = options.id;
    this.kind = options.kind;
    this.cell = { ...options.position };
    this.limit = options.capacity ?? DEFAULT_CAPACITY[options.kind];
    this.territoryRadius = options.territoryRadius;
  }

  public position(): GridCell {
    return { ...this.cell };
  }

  public capacity(): number {
    return this.limit;
  }

  public occupants(): readonly AgentId[] {
    return Array.from(this.inside);
  }

  public onEnter(agentId: AgentId): void {
    this.inside.add(agentId);
  }

  public onLeave(agentId: AgentId): void {
    this.inside.delete(agentId);
  }
}
