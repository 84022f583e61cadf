import { randomUUID } from 'node:crypto';
import type { RequestHandler } from 'express';

const CORRELATION_HEADER = 'x-correlation-id';

export const tracingMiddleware: RequestHandler = (req, res, next) => {
  const incoming = req.get(CORRELATION_HEADER);
  const correlationId = incoming && incoming.length <= 128 ? incoming : randomUUID();
  req.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
};
