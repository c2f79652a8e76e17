/**
 * Response status values returned by the HTTP adapter.
 *
 * @module shared/constants/ResponseEnums
 */
export enum ResponseStatus {
  OK = "ok",
}
