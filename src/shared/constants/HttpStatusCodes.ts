/**
 * Status codes returned by the simulation API.
 *
 * Simulation errors map onto these in the controller: bad input is 400, a
 * stale agent reference is 404 and a rejected player move is 409.
 *
 * @module shared/constants/HttpStatusCodes
 */
export enum HttpStatusCode {
  CREATED = 201,
  NO_CONTENT = 204,

  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  CONFLICT = 409,

  INTERNAL_SERVER_ERROR = 500,
}
