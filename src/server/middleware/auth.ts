import type { RequestHandler } from 'express';
import { ForbiddenError, UnauthorizedError } from '../errors.js';
import { ADMIN_KEY_HEADER } from '../context.js';

export const requireAdmin: RequestHandler = (req, _res, next) => {
  const context = req.appContext;
  if (!context) {
    next(new UnauthorizedError('Request context missing.'));
    return;
  }

  if (!req.get(ADMIN_KEY_HEADER)) {
    next(new UnauthorizedError(`Admin key required in ${ADMIN_KEY_HEADER} header.`));
    return;
  }

  if (!context.isAdmin) {
    next(new ForbiddenError('Admin key rejected.'));
    return;
  }

  next();
};
