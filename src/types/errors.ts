/**
 * Error taxonomy for the query gateway.
 * Each class carries the HTTP status the request layer answers with.
 */

/**
 * Base class for every error the gateway raises on purpose.
 */
export abstract class GatewayError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = 'GatewayError';
    Object.setPrototypeOf(this, GatewayError.prototype);
  }
}

/**
 * The statement (or request) failed a safety check. User-fixable.
 */
export class ValidationRejected extends GatewayError {
  readonly statusCode = 400;

  constructor(public readonly reason: string) {
    super(reason);
    this.name = 'ValidationRejected';
    Object.setPrototypeOf(this, ValidationRejected.prototype);
  }
}

/**
 * The principal may not see what it asked for.
 */
export class AuthorizationDenied extends GatewayError {
  readonly statusCode = 403;

  constructor(message: string = 'You are not authorized to access this resource') {
    super(message);
    this.name = 'AuthorizationDenied';
    Object.setPrototypeOf(this, AuthorizationDenied.prototype);
  }
}

/**
 * The database (or schema introspection) failed while running a statement.
 */
export class ExecutionFailed extends GatewayError {
  readonly statusCode = 500;

  constructor(public readonly detail: string) {
    super(`Query execution failed: ${detail}`);
    this.name = 'ExecutionFailed';
    Object.setPrototypeOf(this, ExecutionFailed.prototype);
  }
}

/**
 * The external SQL generator errored or timed out.
 */
export class UpstreamGenerationFailed extends GatewayError {
  readonly statusCode = 502;

  constructor(message: string) {
    super(message);
    this.name = 'UpstreamGenerationFailed';
    Object.setPrototypeOf(this, UpstreamGenerationFailed.prototype);
  }
}

/**
 * A required collaborator (usually the database) is not available.
 */
export class ServiceUnavailable extends GatewayError {
  readonly statusCode = 503;

  constructor(message: string) {
    super(message);
    this.name = 'ServiceUnavailable';
    Object.setPrototypeOf(this, ServiceUnavailable.prototype);
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
