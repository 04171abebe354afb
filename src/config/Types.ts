/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationSettings: Symbol.for("SimulationSettings"),
  RandomSource: Symbol.for("RandomSource"),
  EventBus: Symbol.for("EventBus"),

  AgentRegistry: Symbol.for("AgentRegistry"),
  HideableRegistry: Symbol.for("HideableRegistry"),
  TurnScheduler: Symbol.for("TurnScheduler"),
  PostTurnHooks: Symbol.for("PostTurnHooks"),

  GridService: Symbol.for("GridService"),
  Pathfinder: Symbol.for("Pathfinder"),
  InventorySink: Symbol.for("InventorySink"),
  ResourceField: Symbol.for("ResourceField"),
  ItemField: Symbol.for("ItemField"),

  AgentMovement: Symbol.for("AgentMovement"),
  FleeNavigator: Symbol.for("FleeNavigator"),
  WanderNavigator: Symbol.for("WanderNavigator"),
  ShelterRoutines: Symbol.for("ShelterRoutines"),
  PreyBehavior: Symbol.for("PreyBehavior"),
  PredatorBehavior: Symbol.for("PredatorBehavior"),
  WorkerBehavior: Symbol.for("WorkerBehavior"),
  AgentBehaviorSystem: Symbol.for("AgentBehaviorSystem"),
  PlayerController: Symbol.for("PlayerController"),

  WorldLayout: Symbol.for("WorldLayout"),
  WorldSeeder: Symbol.for("WorldSeeder"),
};
