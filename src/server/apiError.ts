/**
 * ApiError class: request-level failure with an HTTP status
 *
 * Thrown by route handlers; the error middleware turns it into
 * `{ "error": message }` with the given status.
 */

export class ApiError extends Error {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ApiError";
    this.status = status;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }
}
