/**
 * Errors that reach the HTTP boundary with a known status code.
 * Anything else is reported as INTERNAL_ERROR by the global handler.
 */

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code = 'BAD_REQUEST') {
    super(400, code, message);
    this.name = 'BadRequestError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string, code = 'SERVICE_UNAVAILABLE') {
    super(503, code, message);
    this.name = 'ServiceUnavailableError';
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, code = 'UPSTREAM_ERROR') {
    super(500, code, message);
    this.name = 'UpstreamError';
  }
}
