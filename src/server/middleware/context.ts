import type { RequestHandler } from 'express';
import { ADMIN_KEY_HEADER, buildRequestContext } from '../context.js';

export const createContextMiddleware = (adminKey: string | null): RequestHandler => {
  return (req, _res, next) => {
    req.appContext = buildRequestContext(adminKey, req.get(ADMIN_KEY_HEADER));
    next();
  };
};
