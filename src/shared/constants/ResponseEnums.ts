/**
 * Response status enumerations for API responses.
 *
 * @module shared/constants/ResponseEnums
 */

export enum ResponseStatus {
  OK = "ok",
  ERROR = "error",
  STOPPING = "stopping",
  TERMINATED = "terminated",
}
