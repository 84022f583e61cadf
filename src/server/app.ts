import express, { type Express } from 'express';
import { tracingMiddleware } from './middleware/tracing.js';
import { createContextMiddleware } from './middleware/context.js';
import { errorHandler } from './middleware/error-handler.js';
import { createAppRouter, type RouterDependencies } from './router.js';

export interface AppOptions {
  readonly adminKey: string | null;
}

export const createApp = (dependencies: RouterDependencies, options: AppOptions): Express => {
  const app = express();

  app.use(express.json());
  app.use(tracingMiddleware);
  app.use(createContextMiddleware(options.adminKey));
  app.use(createAppRouter(dependencies));
  app.use(errorHandler);

  return app;
};
