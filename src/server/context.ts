import { timingSafeEqual } from 'node:crypto';

export const ADMIN_KEY_HEADER = 'x-admin-key';

export interface RequestContext {
  readonly isAdmin: boolean;
}

const keysMatch = (provided: string, expected: string): boolean => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

/** Admin routes are closed entirely when no admin key is configured. */
export const buildRequestContext = (
  adminKey: string | null,
  providedKey: string | undefined,
): RequestContext => ({
  isAdmin: adminKey !== null && providedKey !== undefined && keysMatch(providedKey, adminKey),
});
