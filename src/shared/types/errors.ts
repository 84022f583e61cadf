export type ErrorCode =
  | 'VALIDATION'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RAFFLE_CLOSED'
  | 'DRAW_IN_PROGRESS'
  | 'NO_OP_RAFFLE'
  | 'INSUFFICIENT_BALANCE'
  | 'INVALID_CONFIGURATION'
  | 'VALIDATION_FAILED'
  | 'INTERNAL';

export interface ErrorPayload {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}
