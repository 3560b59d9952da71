/**
 * An error with an HTTP status, rendered as `{ detail }` by the error handler.
 */
export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, detail: string) {
    super(detail);
    this.name = "ApiError";
    this.status = status;
  }
}

export const notFound = (detail: string): ApiError => new ApiError(404, detail);

export const unprocessable = (detail: string): ApiError =>
  new ApiError(422, detail);
