/**
 * Error taxonomy for the turn simulation.
 *
 * None of these abort a turn. InvalidSpawn and StaleReference are thrown to
 * callers outside the turn loop; PathUnavailable travels inside a PathResult;
 * MissingCollaborator is logged and the affected step is skipped.
 *
 * @module shared/errors/SimulationErrors
 */

import type { GridCell } from "../../domain/types/simulation/grid";

export enum SimulationErrorCode {
  INVALID_SPAWN = "INVALID_SPAWN",
  PATH_UNAVAILABLE = "PATH_UNAVAILABLE",
  MISSING_COLLABORATOR = "MISSING_COLLABORATOR",
  STALE_REFERENCE = "STALE_REFERENCE",
}

export abstract class SimulationError extends Error {
  abstract readonly code: SimulationErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidSpawnError extends SimulationError {
  readonly code = SimulationErrorCode.INVALID_SPAWN;

  constructor(
    public readonly cell: GridCell,
    reason: string,
  ) {
    super(`Cannot spawn at (${cell.x}, ${cell.y}): ${reason}`);
  }
}

export class PathUnavailableError extends SimulationError {
  readonly code = SimulationErrorCode.PATH_UNAVAILABLE;

  constructor(
    public readonly from: GridCell,
    public readonly to: GridCell,
  ) {
    super(`No path from (${from.x}, ${from.y}) to (${to.x}, ${to.y})`);
  }
}

export class MissingCollaboratorError extends SimulationError {
  readonly code = SimulationErrorCode.MISSING_COLLABORATOR;

  constructor(
    public readonly collaborator: string,
    context: string,
  ) {
    super(`${collaborator} unavailable during ${context}`);
  }
}

export class StaleReferenceError extends SimulationError {
  readonly code = SimulationErrorCode.STALE_REFERENCE;

  constructor(
    public readonly referenceKind: "agent" | "hideable",
    public readonly referenceId: string,
  ) {
    super(`${referenceKind} ${referenceId} no longer exists`);
  }
}
