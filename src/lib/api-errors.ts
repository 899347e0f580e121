// ---------------------------------------------------------------------------
// API error helpers
// ---------------------------------------------------------------------------
// Fastify reads `statusCode` from thrown errors to pick the response status,
// so route handlers throw these instead of building replies by hand.
// ---------------------------------------------------------------------------

/** Error carrying the HTTP status it should be reported with. */
export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.statusCode = statusCode;
    this.name = "ApiError";
  }
}

export function badRequest(message: string): ApiError {
  return new ApiError(400, message);
}

export function unauthorized(message: string): ApiError {
  return new ApiError(401, message);
}

export function notFound(message: string): ApiError {
  return new ApiError(404, message);
}

/**
 * A 503 for failures the client may retry unchanged, such as a bulk write
 * that rolled back.
 */
export function serviceUnavailable(message: string): ApiError {
  return new ApiError(503, message);
}
