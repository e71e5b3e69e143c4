/**
 * HTTP status code enumerations for API responses.
 *
 * @module shared/constants/HttpStatusCodes
 */

/**
 * Enumeration of the HTTP status codes used by the observation API.
 */
export enum HttpStatusCode {
  OK = 200,
  ACCEPTED = 202,

  NOT_FOUND = 404,
  CONFLICT = 409,

  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}
