/**
 * synthctl Runtime Host — API Errors
 */

/** The API answered with a status other than 200 or 201. */
export class ApiRequestError extends Error {
  constructor(
    readonly status: number,
    readonly operation: string,
    message: string,
    /** Response body as received. */
    readonly body?: unknown,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

/** The API answered successfully but the payload is not what the operation returns. */
export class UnexpectedResponseError extends Error {
  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(`${operation}: ${message}`);
    this.name = 'UnexpectedResponseError';
  }
}
