import type { ZodError, ZodTypeAny, output } from 'zod';
import type { ErrorPayload } from './types/errors.js';

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
  readonly code: string;
}

export type ParseOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: SchemaValidationError };

const toIssues = (error: ZodError): ValidationIssue[] =>
  error.issues.map(({ path, message, code }) => ({
    path: path.length > 0 ? path.join('.') : '(root)',
    message,
    code,
  }));

/** Raised at the HTTP boundary and when stored records fail to deserialise. */
export class SchemaValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, error: ZodError) {
    super(message);
    this.name = 'SchemaValidationError';
    this.issues = toIssues(error);
  }

  toErrorPayload(): ErrorPayload {
    return {
      code: 'VALIDATION_FAILED',
      message: this.message,
      details: { issues: this.issues },
    };
  }
}

export const parseWith = <TSchema extends ZodTypeAny>(
  schema: TSchema,
  data: unknown,
  message = 'Validation failed.',
): ParseOutcome<output<TSchema>> => {
  const parsed = schema.safeParse(data);
  return parsed.success
    ? { ok: true, value: parsed.data }
    : { ok: false, error: new SchemaValidationError(message, parsed.error) };
};

export const ensureValid = <TSchema extends ZodTypeAny>(
  schema: TSchema,
  data: unknown,
  message = 'Validation failed.',
): output<TSchema> => {
  const outcome = parseWith(schema, data, message);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
};
