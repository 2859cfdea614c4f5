export type ErrorCode = 'Unauthorized' | 'Conflict' | 'InvalidArgument' | 'NotFound';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  Unauthorized: 401,
  Conflict: 409,
  InvalidArgument: 400,
  NotFound: 404,
};

/**
 * Caller-input failure. Anything thrown that is not an AppError is treated
 * as an internal error by the HTTP layer.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = code;
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super('Unauthorized', message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('Conflict', message);
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message: string) {
    super('InvalidArgument', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NotFound', message);
  }
}
