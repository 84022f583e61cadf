import type { ErrorRequestHandler } from 'express';
import { SchemaValidationError } from '../../shared/validation.js';
import type { ApiErrorEnvelope } from '../../shared/types/dto.js';
import { InternalError, isAppError } from '../errors.js';
import { logger } from '../logging.js';

const buildErrorResponse = (
  code: string,
  message: string,
  details: Record<string, unknown> | undefined,
  correlationId?: string,
): ApiErrorEnvelope => ({
  error: {
    code,
    message,
    details: {
      ...(details ?? {}),
      ...(correlationId ? { correlationId } : {}),
    },
  },
});

// express.json() rejects malformed bodies with a SyntaxError tagged `type: 'entity.parse.failed'`.
const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const correlationId = req.correlationId;

  if (error instanceof SchemaValidationError) {
    const payload = error.toErrorPayload();
    res
      .status(400)
      .json(buildErrorResponse(payload.code, payload.message, payload.details, correlationId));
    return;
  }

  if (isAppError(error)) {
    if (error.status >= 500) {
      logger.error('request failed', { correlationId, code: error.code, error });
    }
    res
      .status(error.status)
      .json(buildErrorResponse(error.code, error.message, error.details, correlationId));
    return;
  }

  if (isBodyParseError(error)) {
    res
      .status(400)
      .json(buildErrorResponse('VALIDATION', 'Malformed JSON body.', undefined, correlationId));
    return;
  }

  const internal = new InternalError('Unexpected server error occurred.', { cause: error });
  logger.error('unhandled server error', {
    correlationId,
    message: error instanceof Error ? error.message : 'unknown error',
  });

  res
    .status(internal.status)
    .json(buildErrorResponse(internal.code, internal.message, undefined, correlationId));
};
