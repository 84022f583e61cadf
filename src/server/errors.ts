import type { ErrorCode } from '../shared/types/errors.js';

type ErrorOptions = {
  readonly cause?: unknown;
  readonly details?: Record<string, unknown>;
};

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, status: number, options?: ErrorOptions) {
    super(message, { cause: options?.cause });
    this.code = code;
    this.status = status;
    this.details = options?.details;
    this.name = this.constructor.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION', 400, options);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'UNAUTHORIZED', 401, options);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'FORBIDDEN', 403, options);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', 404, options);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFLICT', 409, options);
  }
}

/** Registration attempted while the raffle is not accepting entries. */
export class RaffleClosedError extends AppError {
  constructor(message = 'Raffle is not accepting entries.', options?: ErrorOptions) {
    super(message, 'RAFFLE_CLOSED', 409, options);
  }
}

export class DrawInProgressError extends AppError {
  constructor(message = 'A draw is already in progress.', options?: ErrorOptions) {
    super(message, 'DRAW_IN_PROGRESS', 409, options);
  }
}

/** A draw was requested but there is no open raffle to draw. */
export class NoOpRaffleError extends AppError {
  constructor(message = 'No open raffle to draw.', options?: ErrorOptions) {
    super(message, 'NO_OP_RAFFLE', 409, options);
  }
}

export class InsufficientBalanceError extends AppError {
  constructor(message = 'Insufficient balance.', options?: ErrorOptions) {
    super(message, 'INSUFFICIENT_BALANCE', 400, options);
  }
}

export class InvalidConfigurationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_CONFIGURATION', 422, options);
  }
}

export class InternalError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INTERNAL', 500, options);
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
