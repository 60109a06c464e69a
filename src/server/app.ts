import express, { type Express } from 'express';
import type { Logger } from '../core/Logger.js';
import { calculateRouter, type CalculateRouteOptions } from './calculateRoute.js';
import { errorHandler, NotFoundError } from './errors.js';

export interface AppOptions extends CalculateRouteOptions {
  logger: Logger;
}

export function createApp(options: AppOptions): Express {
  const { logger, ...routeOptions } = options;
  const app = express();
  app.disable('x-powered-by');

  app.use(calculateRouter(routeOptions));

  app.use((_req, _res, next) => {
    next(new NotFoundError());
  });
  app.use(errorHandler(logger));

  return app;
}
