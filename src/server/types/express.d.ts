import type { RequestContext } from '../context.js';

declare global {
  namespace Express {
    interface Request {
      appContext?: RequestContext;
      correlationId?: string;
    }
  }
}
