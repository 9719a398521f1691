/**
 * Response status values returned in HTTP bodies.
 *
 * @module shared/constants/ResponseEnums
 */

export enum ResponseStatus {
  OK = "ok",
  QUEUED = "queued",
}
