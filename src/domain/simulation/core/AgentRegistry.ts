/**
 * AgentRegistry - Single source of truth for agent state.
 *
 * Owns every live agent and is the only writer of positions, hiding state and
 * group counts. Behaviour machines read through its queries and write through
 * its mutation methods.
 *
 * Iteration order is insertion order and drives both the turn loop and the
 * tie-break of nearest queries. Removals during a turn only tombstone the agent;
 * the purge happens in `flushRemovals`, so the current iteration never shifts.
 *
 * @module core
 */

import { inject, injectable, optional } from "inversify";
import { TYPES } from "@/config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import {
  AgentCategory,
  AgentState,
  RemovalReason,
} from "@/shared/constants/AgentEnums";
import { TileType } from "@/shared/constants/TileTypeEnums";
import {
  InvalidSpawnError,
  StaleReferenceError,
} from "@/shared/errors/SimulationErrors";
import { cellKey, cellsEqual, manhattan } from "@/shared/utils/gridMath";
import { getSpeciesParams } from "@/domain/simulation/config/SpeciesConfigs";
import { HideableRegistry } from "@/domain/simulation/core/HideableRegistry";
import { EventBus } from "@/domain/simulation/core/EventBus";
import type {
  Agent,
  AgentId,
  AgentKind,
  AgentSnapshot,
  SpawnOptions,
} from "@/domain/types/simulation/agents";
import type { GridService } from "@/domain/types/simulation/collaborators";
import type { GridCell } from "@/domain/types/simulation/grid";

export type AgentPredicate = (agent: Agent) => boolean;

export type CellPredicate = (cell: GridCell) => boolean;

/**
 * Rectangle predicate for `getAgentsInViewport`.
 */
export function viewportRect(
  x: number,
  y: number,
  width: number,
  height: number,
): CellPredicate {
  return (cell) =>
    cell.x >= x && cell.x < x + width && cell.y >= y && cell.y < y + height;
}

@injectable()
export class AgentRegistry {
  private agents = new Map<AgentId, Agent>();
  private cellIndex = new Map<string, Set<AgentId>>();
  private pendingRemovals: AgentId[] = [];
  private nextId = 1;
  private turnInProgress = false;
  private currentTurn = 0;
  private selectedAgentId: AgentId | null = null;

  constructor(
    @inject(TYPES.GridService) private readonly grid: GridService,
    @inject(TYPES.HideableRegistry)
    private readonly hideables: HideableRegistry,
    @inject(TYPES.EventBus) @optional() private readonly events?: EventBus,
  ) {}

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Creates an agent at a walkable cell.
   * @throws InvalidSpawnError when the cell cannot host the species
   */
  public spawn(
    kind: AgentKind,
    position: GridCell,
    options: SpawnOptions = {},
  ): AgentId {
    const params = getSpeciesParams(kind.subtype, options.params);

    if (!this.grid.isValid(position)) {
      throw new InvalidSpawnError(position, "outside the grid");
    }
    if (!this.grid.isWalkable(position)) {
      throw new InvalidSpawnError(position, "tile is not walkable");
    }
    if (
      this.grid.tileKind(position) === TileType.WATER &&
      !params.canCrossWater
    ) {
      throw new InvalidSpawnError(position, `${kind.subtype} cannot enter water`);
    }

    const homeId = options.homeId ?? null;
    if (homeId !== null && !this.hideables.get(homeId)) {
      throw new InvalidSpawnError(position, `unknown home ${homeId}`);
    }

    const groupCount = options.groupCount ?? params.initialGroupCount;
    if (groupCount < 1) {
      throw new InvalidSpawnError(position, "group count must be at least 1");
    }

    const id = `agent_${this.nextId++}`;
    const agent: Agent = {
      id,
      kind,
      position: { ...position },
      previousPosition: { ...position },
      spawnPosition: { ...position },
      hunger: Math.min(
        params.maxHunger,
        Math.max(0, options.hunger ?? params.maxHunger),
      ),
      groupCount,
      homeId,
      currentHideableId: null,
      carriedItems: [],
      stallTurnsRemaining: 0,
      params,
      state: this.initialState(kind, homeId),
      memory: {
        moveCounter: 0,
        wanderDestination: null,
        huntingTargetId: null,
        chaseTargetId: null,
        chaseTurnsWithoutKill: 0,
        pendingDash: null,
        encounteredAgentWhileMoving: false,
      },
      spawnedAtTurn: this.currentTurn,
      removed: false,
    };

    this.agents.set(id, agent);
    this.indexAgent(agent);

    logger.debug(
      `🐾 AgentRegistry: Spawned ${kind.subtype} (${id}) at (${position.x}, ${position.y})`,
      LogCategory.AGENTS,
    );
    this.events?.emit("lifecycle:agent_spawned", {
      agentId: id,
      category: kind.category,
      subtype: kind.subtype,
      position: { ...position },
      turn: this.currentTurn,
    });

    return id;
  }

  private initialState(kind: AgentKind, homeId: string | null): AgentState {
    if (kind.category === AgentCategory.PLAYER) return AgentState.IDLE;
    if (kind.category === AgentCategory.WORKER && homeId === null) {
      return AgentState.DORMANT;
    }
    return AgentState.WANDERING;
  }

  /**
   * Removes an agent. Idempotent; during a turn the purge is deferred.
   * @returns false when the agent was already gone
   */
  public remove(
    agentId: AgentId,
    reason: RemovalReason = RemovalReason.DESPAWN,
  ): boolean {
    const agent = this.agents.get(agentId);
    if (!agent || agent.removed) return false;

    this.leaveHideable(agentId);
    agent.removed = true;
    this.unindexAgent(agent);
    this.clearReferencesTo(agentId);

    if (this.turnInProgress) {
      this.pendingRemovals.push(agentId);
    } else {
      this.agents.delete(agentId);
    }

    logger.debug(
      `🐾 AgentRegistry: Removed ${agent.kind.subtype} (${agentId}) by ${reason}`,
      LogCategory.AGENTS,
    );
    this.events?.emit("lifecycle:agent_removed", {
      agentId,
      reason,
      turn: this.currentTurn,
    });
    return true;
  }

  private clearReferencesTo(agentId: AgentId): void {
    if (this.selectedAgentId === agentId) {
      this.selectedAgentId = null;
    }
    for (const other of this.agents.values()) {
      if (other.memory.huntingTargetId === agentId) {
        other.memory.huntingTargetId = null;
      }
      if (other.memory.chaseTargetId === agentId) {
        other.memory.chaseTargetId = null;
        other.memory.chaseTurnsWithoutKill = 0;
      }
    }
  }

  /**
   * Purges tombstoned agents.
   */
  public flushRemovals(): void {
    for (const agentId of this.pendingRemovals) {
      this.agents.delete(agentId);
    }
    this.pendingRemovals = [];
  }

  public beginTurn(turn: number): void {
    this.currentTurn = turn;
    this.turnInProgress = true;
  }

  public endTurn(): void {
    this.flushRemovals();
    this.turnInProgress = false;
  }

  public setCurrentTurn(turn: number): void {
    this.currentTurn = turn;
  }

  public getCurrentTurn(): number {
    return this.currentTurn;
  }

  /**
   * Despawns every agent, e.g. on a level reset.
   */
  /**
   * Despawns everyone and restarts id numbering at `agent_1`.
   */
  public clear(): void {
    for (const agentId of this.allAgents()) {
      this.remove(agentId, RemovalReason.DESPAWN);
    }
    this.flushRemovals();
    this.nextId = 1;
  }

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  /**
   * Live agent by id; tombstoned agents read as absent.
   */
  public get(agentId: AgentId | null): Agent | undefined {
    if (agentId === null) return undefined;
    const agent = this.agents.get(agentId);
    return agent && !agent.removed ? agent : undefined;
  }

  /**
   * @throws StaleReferenceError when the agent no longer exists
   */
  public require(agentId: AgentId): Agent {
    const agent = this.get(agentId);
    if (!agent) {
      throw new StaleReferenceError("agent", agentId);
    }
    return agent;
  }

  public isAlive(agentId: AgentId): boolean {
    return this.get(agentId) !== undefined;
  }

  /**
   * Live agent ids in insertion order.
   */
  public allAgents(): AgentId[] {
    const ids: AgentId[] = [];
    for (const agent of this.agents.values()) {
      if (!agent.removed) ids.push(agent.id);
    }
    return ids;
  }

  public liveAgents(): Agent[] {
    const result: Agent[] = [];
    for (const agent of this.agents.values()) {
      if (!agent.removed) result.push(agent);
    }
    return result;
  }

  public findPlayer(): Agent | undefined {
    for (const agent of this.agents.values()) {
      if (!agent.removed && agent.kind.category === AgentCategory.PLAYER) {
        return agent;
      }
    }
    return undefined;
  }

  /**
   * Nearest live agent by Manhattan distance. `maxRadius` null means
   * unlimited; ties go to the agent registered first.
   */
  public nearest(
    from: GridCell,
    predicate: AgentPredicate,
    maxRadius: number | null,
  ): AgentId | null {
    return this.findNearest(from, predicate, maxRadius)?.id ?? null;
  }

  public findNearest(
    from: GridCell,
    predicate: AgentPredicate,
    maxRadius: number | null,
  ): Agent | undefined {
    let best: Agent | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const agent of this.agents.values()) {
      if (agent.removed || !predicate(agent)) continue;
      const distance = manhattan(from, agent.position);
      if (maxRadius !== null && distance > maxRadius) continue;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = agent;
      }
    }

    return best;
  }

  /**
   * Live agents on a cell, in registry order.
   */
  public agentsAt(
    cell: GridCell,
    options: { includeHidden?: boolean } = {},
  ): Agent[] {
    const ids = this.cellIndex.get(cellKey(cell));
    if (!ids) return [];
    const result: Agent[] = [];
    for (const agent of this.agents.values()) {
      if (!ids.has(agent.id) || agent.removed) continue;
      if (!options.includeHidden && agent.currentHideableId !== null) continue;
      result.push(agent);
    }
    return result;
  }

  /**
   * True when another live agent that is out in the world stands on the cell.
   */
  public hasOtherAgentAt(originId: AgentId, cell: GridCell): boolean {
    return this.agentsAt(cell).some((agent) => agent.id !== originId);
  }

  /**
   * Agent ids whose cell satisfies the viewport predicate. Hidden agents are
   * left out unless asked for.
   */
  public getAgentsInViewport(
    inViewport: CellPredicate,
    options: { includeHidden?: boolean } = {},
  ): AgentId[] {
    const ids: AgentId[] = [];
    for (const agent of this.agents.values()) {
      if (agent.removed) continue;
      if (!options.includeHidden && agent.currentHideableId !== null) continue;
      if (inViewport(agent.position)) ids.push(agent.id);
    }
    return ids;
  }

  public countAssignedWorkers(): number {
    let count = 0;
    for (const agent of this.agents.values()) {
      if (
        !agent.removed &&
        agent.kind.category === AgentCategory.WORKER &&
        agent.homeId !== null
      ) {
        count++;
      }
    }
    return count;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /**
   * Applies a move immediately; later agents in the same turn see it.
   */
  public moveAgent(agentId: AgentId, cell: GridCell): boolean {
    const agent = this.get(agentId);
    if (!agent) return false;

    this.unindexAgent(agent);
    agent.previousPosition = { ...agent.position };
    agent.position = { ...cell };
    this.indexAgent(agent);
    return true;
  }

  public markEncountered(agentId: AgentId): void {
    const agent = this.get(agentId);
    if (agent) agent.memory.encounteredAgentWhileMoving = true;
  }

  /**
   * Last mover yields: if the mover shares its tile with another live agent
   * that is out in the world, or flagged an encounter while moving, it goes
   * back to its previous position.
   * @returns true when the mover was reverted
   */
  public resolveMoveConflict(moverId: AgentId): boolean {
    const mover = this.get(moverId);
    if (!mover) return false;

    const encountered = mover.memory.encounteredAgentWhileMoving;
    mover.memory.encounteredAgentWhileMoving = false;

    if (mover.currentHideableId !== null) return false;

    if (!encountered && !this.hasOtherAgentAt(moverId, mover.position)) {
      return false;
    }

    logger.debug(
      `↩️ AgentRegistry: ${moverId} yields (${mover.position.x}, ${mover.position.y}) and returns to (${mover.previousPosition.x}, ${mover.previousPosition.y})`,
      LogCategory.MOVEMENT,
    );
    this.unindexAgent(mover);
    mover.position = { ...mover.previousPosition };
    this.indexAgent(mover);
    return true;
  }

  /**
   * Decrements the group count, removing the agent by predation at zero.
   * @returns remaining group count (0 when removed)
   */
  public reduceGroupCount(agentId: AgentId): number {
    const agent = this.get(agentId);
    if (!agent) return 0;

    agent.groupCount = Math.max(0, agent.groupCount - 1);
    if (agent.groupCount === 0) {
      this.remove(agentId, RemovalReason.PREDATION);
    }
    return agent.groupCount;
  }

  public increaseGroupCount(agentId: AgentId, amount: number): number {
    const agent = this.get(agentId);
    if (!agent) return 0;
    agent.groupCount += Math.max(0, amount);
    return agent.groupCount;
  }

  public setState(agentId: AgentId, state: AgentState): void {
    const agent = this.get(agentId);
    if (agent) agent.state = state;
  }

  /**
   * Enters a hideable located on the agent's cell.
   * @returns false when the hideable is gone, elsewhere or full
   */
  public enterHideable(agentId: AgentId, hideableId: string): boolean {
    const agent = this.get(agentId);
    const hideable = this.hideables.get(hideableId);
    if (!agent || !hideable) return false;
    if (agent.currentHideableId === hideableId) return true;
    if (!cellsEqual(hideable.position(), agent.position)) return false;
    if (!this.hideables.hasCapacity(hideable)) return false;

    this.leaveHideable(agentId);
    hideable.onEnter(agentId);
    agent.currentHideableId = hideableId;
    return true;
  }

  /**
   * Leaves the current hideable, if any. A hideable that no longer exists is
   * simply forgotten.
   */
  public leaveHideable(agentId: AgentId): void {
    const agent = this.agents.get(agentId);
    if (!agent || agent.currentHideableId === null) return;

    const hideable = this.hideables.get(agent.currentHideableId);
    agent.currentHideableId = null;
    hideable?.onLeave(agentId);
  }

  public assignHome(agentId: AgentId, hideableId: string): void {
    const agent = this.require(agentId);
    this.hideables.require(hideableId);
    agent.homeId = hideableId;
    if (agent.state === AgentState.DORMANT) {
      agent.state = AgentState.WANDERING;
    }
  }

  public clearHome(agentId: AgentId): void {
    const agent = this.get(agentId);
    if (!agent) return;
    if (agent.currentHideableId === agent.homeId) {
      this.leaveHideable(agentId);
    }
    agent.homeId = null;
    if (agent.kind.category === AgentCategory.WORKER) {
      agent.state = AgentState.DORMANT;
    }
  }

  // ---------------------------------------------------------------------------
  // Selection and transient references
  // ---------------------------------------------------------------------------

  public select(agentId: AgentId): void {
    this.selectedAgentId = this.require(agentId).id;
  }

  public getSelectedAgentId(): AgentId | null {
    return this.selectedAgentId;
  }

  /**
   * Drops selection and per-turn targeting links once a turn completes.
   */
  public clearTransientReferences(): void {
    this.selectedAgentId = null;
    for (const agent of this.agents.values()) {
      agent.memory.huntingTargetId = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Projections
  // ---------------------------------------------------------------------------

  public snapshot(agent: Agent): AgentSnapshot {
    return {
      id: agent.id,
      category: agent.kind.category,
      subtype: agent.kind.subtype,
      position: { ...agent.position },
      hunger: agent.hunger,
      maxHunger: agent.params.maxHunger,
      groupCount: agent.groupCount,
      state: agent.state,
      homeId: agent.homeId,
      hidden: agent.currentHideableId !== null,
      carriedItems: agent.carriedItems.length,
      stallTurnsRemaining: agent.stallTurnsRemaining,
    };
  }

  public getStats(): {
    total: number;
    byCategory: Record<AgentCategory, number>;
    hidden: number;
  } {
    const byCategory: Record<AgentCategory, number> = {
      [AgentCategory.PLAYER]: 0,
      [AgentCategory.PREY]: 0,
      [AgentCategory.PREDATOR]: 0,
      [AgentCategory.WORKER]: 0,
    };
    let total = 0;
    let hidden = 0;
    for (const agent of this.liveAgents()) {
      total++;
      byCategory[agent.kind.category]++;
      if (agent.currentHideableId !== null) hidden++;
    }
    return { total, byCategory, hidden };
  }

  // ---------------------------------------------------------------------------
  // Cell index
  // ---------------------------------------------------------------------------

  private indexAgent(agent: Agent): void {
    const key = cellKey(agent.position);
    let ids = this.cellIndex.get(key);
    if (!ids) {
      ids = new Set();
      this.cellIndex.set(key, ids);
    }
    ids.add(agent.id);
  }

  private unindexAgent(agent: Agent): void {
    const key = cellKey(agent.position);
    const ids = this.cellIndex.get(key);
    if (!ids) return;
    ids.delete(agent.id);
    if (ids.size === 0) this.cellIndex.delete(key);
  }
}
