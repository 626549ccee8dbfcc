// ============================================
// GATEWAY ERROR TYPES
// ============================================

export enum GatewayErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_CONFIGURED = 'NOT_CONFIGURED',
  API_ERROR = 'API_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class GatewayError extends Error {
  constructor(
    public readonly type: GatewayErrorType,
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
    };
  }
}

/** Malformed or missing caller input. Raised before any remote call is made. */
export class ValidationError extends GatewayError {
  constructor(message: string) {
    super(GatewayErrorType.VALIDATION_ERROR, message, 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(GatewayErrorType.NOT_FOUND, message, 400);
    this.name = 'NotFoundError';
  }
}

/** Optimistic-concurrency mismatch; the message always names the latest known version. */
export class ConflictError extends GatewayError {
  constructor(message: string, public readonly latestVersion: unknown) {
    super(GatewayErrorType.CONFLICT, message, 409);
    this.name = 'ConflictError';
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(message: string) {
    super(GatewayErrorType.UNAUTHORIZED, message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotConfiguredError extends GatewayError {
  constructor(message: string) {
    super(GatewayErrorType.NOT_CONFIGURED, message, 503);
    this.name = 'NotConfiguredError';
  }
}

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { value: String(error) };
}
