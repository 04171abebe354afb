import { inject, injectable, optional } from "inversify";
import { TYPES } from "@/config/Types";
import type { SimulationSettings } from "@/config/config";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { AgentState, RemovalReason } from "@/shared/constants/AgentEnums";
import { ItemKind } from "@/shared/constants/WorldEnums";
import { MissingCollaboratorError } from "@/shared/errors/SimulationErrors";
import type { RandomUtils } from "@/shared/utils/RandomUtils";
import { cellsEqual, manhattan } from "@/shared/utils/gridMath";
import type { AgentRegistry } from "@/domain/simulation/core/AgentRegistry";
import type { EventBus } from "@/domain/simulation/core/EventBus";
import type { Agent } from "@/domain/types/simulation/agents";
import type { GridCell } from "@/domain/types/simulation/grid";
import type {
  ForageableResource,
  GroundItem,
  Hideable,
  InventorySink,
  ItemField,
} from "@/domain/types/simulation/collaborators";
import { AgentNeeds } from "@/domain/simulation/systems/agents/AgentNeeds";
import {
  StepOutcome,
  type AgentMovement,
} from "@/domain/simulation/systems/agents/movement/AgentMovement";
import type { FleeNavigator } from "@/domain/simulation/systems/agents/movement/FleeNavigator";
import type { WanderNavigator } from "@/domain/simulation/systems/agents/movement/WanderNavigator";
import type { ShelterRoutines } from "@/domain/simulation/systems/agents/behavior/ShelterRoutines";
import type { AgentBehavior } from "@/domain/simulation/systems/agents/behavior/AgentBehavior";

type ForageTarget =
  | { kind: "resource"; resource: ForageableResource }
  | { kind: "item"; ground: GroundItem };

/**
 * Worker machine: prey rules plus carrying loot home, depositing it into the
 * inventory sink and eating from storage while hidden.
 */
@injectable()
export class WorkerBehavior implements AgentBehavior {
  private harvestedItems = 0;

  constructor(
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.ShelterRoutines) private readonly shelter: ShelterRoutines,
    @inject(TYPES.AgentMovement) private readonly movement: AgentMovement,
    @inject(TYPES.FleeNavigator) private readonly flee: FleeNavigator,
    @inject(TYPES.WanderNavigator) private readonly wanderer: WanderNavigator,
    @inject(TYPES.RandomSource) private readonly random: RandomUtils,
    @inject(TYPES.SimulationSettings)
    private readonly settings: SimulationSettings,
    @inject(TYPES.InventorySink)
    @optional()
    private readonly inventory?: InventorySink,
    @inject(TYPES.ItemField) @optional() private readonly items?: ItemField,
    @inject(TYPES.EventBus) @optional() private readonly events?: EventBus,
  ) {}

  public async takeTurn(worker: Agent): Promise<void> {
    if (AgentNeeds.applyTurnDecay(worker)) {
      this.registry.remove(worker.id, RemovalReason.STARVATION);
      return;
    }

    const home = this.shelter.resolveHome(worker);
    if (!home) {
      worker.state = AgentState.DORMANT;
      return;
    }

    if (this.shelter.isHidden(worker)) {
      if (this.tryEatStoredFood(worker)) return;
      if (!this.shelter.shouldLeaveShelter(worker)) {
        worker.state = AgentState.HIDING;
        return;
      }
      this.shelter.leave(worker);
    }

    const canMove = this.shelter.consumeMoveCadence(worker);

    if (worker.carriedItems.length > 0) {
      await this.carryHome(worker, home, canMove);
      return;
    }

    if (!AgentNeeds.isHungry(worker)) {
      await this.shelter.returnHome(worker, home, canMove);
      return;
    }

    const critical = AgentNeeds.isCriticallyHungry(worker);
    const threat = this.shelter.detectPredator(worker);
    if (threat && !critical) {
      await this.fleeHome(worker, home, threat.position, canMove);
      return;
    }

    const target = this.findForageTarget(worker, critical);
    if (target) {
      await this.collect(worker, target, canMove);
      return;
    }

    worker.state = AgentState.WANDERING;
    if (!canMove) return;
    await this.wanderer.wander(worker, {
      center: home.position(),
      minDistance: worker.params.wanderMin,
      maxDistance: worker.params.wanderMax,
    });
  }

  /** Restarts harvested item numbering for a new game. */
  public reset(): void {
    this.harvestedItems = 0;
  }

  /**
   * Fixed rate when configured, otherwise assigned workers over the goal,
   * capped at 1.
   */
  public bonusRate(): number {
    if (this.settings.workerBonusRate !== null) {
      return this.settings.workerBonusRate;
    }
    if (this.settings.workerGoal <= 0) return 1;
    return Math.min(
      1,
      this.registry.countAssignedWorkers() / this.settings.workerGoal,
    );
  }

  /**
   * Deposits every carried item; food may be duplicated by the bonus rate.
   * @returns false when there is no inventory sink to receive the items
   */
  public deposit(worker: Agent, home: Hideable): boolean {
    if (!this.inventory) {
      logger.warn(
        new MissingCollaboratorError("InventorySink", `deposit of ${worker.id}`)
          .message,
        LogCategory.AGENTS,
      );
      return false;
    }

    worker.state = AgentState.DEPOSITING;
    const rate = this.bonusRate();
    const itemCount = worker.carriedItems.length;
    let duplicated = 0;

    for (const item of worker.carriedItems) {
      this.inventory.deposit(item);
      if (item.kind === ItemKind.FOOD && this.random.float() < rate) {
        this.inventory.deposit({ ...item, id: `${item.id}_bonus` });
        duplicated++;
      }
    }
    worker.carriedItems = [];

    logger.agentLog(
      LogLevel.DEBUG,
      LogCategory.AGENTS,
      worker.id,
      `📦 deposited ${itemCount} item(s) at ${home.id} (+${duplicated} bonus)`,
    );
    this.events?.emit("worker:deposited", {
      agentId: worker.id,
      homeId: home.id,
      itemCount,
      duplicated,
      turn: this.registry.getCurrentTurn(),
    });
    return true;
  }

  private tryEatStoredFood(worker: Agent): boolean {
    if (!AgentNeeds.isCriticallyHungry(worker)) return false;
    if (!this.inventory?.availableStoredFood()) return false;

    const restored = this.inventory.spendStoredFood();
    AgentNeeds.increaseHunger(worker, restored);
    worker.state = AgentState.CONSUMING_STORED_FOOD;
    return true;
  }

  private async carryHome(
    worker: Agent,
    home: Hideable,
    canMove: boolean,
  ): Promise<void> {
    worker.state = AgentState.CARRYING;
    worker.memory.wanderDestination = null;

    if (!this.shelter.isAtHome(worker, home) && canMove) {
      await this.shelter.stepHome(worker, home);
    }
    if (!this.registry.isAlive(worker.id)) return;
    if (!this.shelter.isAtHome(worker, home)) return;

    if (this.deposit(worker, home) && !AgentNeeds.isHungry(worker)) {
      this.shelter.tryHide(worker, home);
    }
  }

  /**
   * Runs for home, hiding on arrival. Without a route home it falls back to
   * the prey flee.
   */
  private async fleeHome(
    worker: Agent,
    home: Hideable,
    threat: GridCell,
    canMove: boolean,
  ): Promise<void> {
    worker.state = AgentState.FLEEING;
    worker.memory.wanderDestination = null;

    if (
      this.shelter.isAtHome(worker, home) &&
      this.shelter.tryHide(worker, home)
    ) {
      return;
    }
    if (!canMove) return;

    const outcome = await this.shelter.stepHome(worker, home);
    if (!this.registry.isAlive(worker.id)) return;

    if (outcome === StepOutcome.MOVED) {
      if (this.shelter.isAtHome(worker, home)) {
        this.shelter.tryHide(worker, home);
      }
      return;
    }
    await this.flee.flee(worker, threat);
  }

  /**
   * Nearer of a grown resource and a ground item; ties go to the resource.
   */
  private findForageTarget(
    worker: Agent,
    critical: boolean,
  ): ForageTarget | undefined {
    const resource = this.shelter.findFood(worker, critical);
    const ground = this.findGroundItem(worker);

    if (resource && ground) {
      const toResource = manhattan(worker.position, resource.position);
      const toItem = manhattan(worker.position, ground.position);
      return toItem < toResource
        ? { kind: "item", ground }
        : { kind: "resource", resource };
    }
    if (resource) return { kind: "resource", resource };
    if (ground) return { kind: "item", ground };
    return undefined;
  }

  private findGroundItem(worker: Agent): GroundItem | undefined {
    if (!this.items) return undefined;

    let best: GroundItem | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const ground of this.items.all()) {
      const distance = manhattan(worker.position, ground.position);
      if (distance > worker.params.forageRadius) continue;
      if (!this.movement.canEnter(worker, ground.position)) continue;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = ground;
      }
    }
    return best;
  }

  private async collect(
    worker: Agent,
    target: ForageTarget,
    canMove: boolean,
  ): Promise<void> {
    worker.state = AgentState.FORAGING;
    worker.memory.wanderDestination = null;

    const cell =
      target.kind === "resource"
        ? target.resource.position
        : target.ground.position;
    if (!cellsEqual(worker.position, cell) && canMove) {
      await this.movement.stepTowards(worker.id, cell);
    }
    if (!this.registry.isAlive(worker.id)) return;
    if (!cellsEqual(worker.position, cell)) return;

    if (target.kind === "resource") {
      this.harvestToCarry(worker, target.resource);
    } else {
      this.pickUp(worker, target.ground);
    }
  }

  private harvestToCarry(worker: Agent, resource: ForageableResource): void {
    if (!resource.isFullyGrown()) return;

    this.shelter.harvest(worker, resource);
    this.harvestedItems++;
    worker.carriedItems.push({
      id: `${resource.id}_harvest_${this.harvestedItems}`,
      itemType: resource.foodType,
      kind: ItemKind.FOOD,
      hungerRestored: resource.hungerRestored,
    });
  }

  private pickUp(worker: Agent, ground: GroundItem): void {
    const taken = this.items?.take(ground.item.id);
    if (!taken) return;

    worker.carriedItems.push(taken.item);
    this.events?.emit("worker:item_collected", {
      agentId: worker.id,
      itemId: taken.item.id,
      turn: this.registry.getCurrentTurn(),
    });
  }
}
