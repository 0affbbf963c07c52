import express, { Request, Response, NextFunction, Express, RequestHandler } from 'express';
import type { Route, RouterOptions } from './types';
import { randomUUID } from 'crypto';
import { logger } from '../logger';
import { sendError } from '../controllers/errors';

// Separate auth middleware (enforces service headers, enriches req, or 401)
const serviceAuth = (expectedType: string) => (req: Request, res: Response, next: NextFunction) => {
  const clientType = req.header('x-account-type');
  const clientId = req.header('x-account-id');
  if (!clientType || clientType !== expectedType || !clientId) {
    res.status(401).json({ error: 'Unauthorized Access' });
    return;
  }
  req.clientType = clientType;
  req.clientId = clientId;
  next();
};

// Wrap handler: request id, timing logs (also for 401s), auth, async error forwarding
const wrapHandler = (route: Route, options: RouterOptions) => {
  const auth = route.auth === 'none' ? null : serviceAuth(options.serviceAccountType);
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.requestId) {
      const requestId = req.header('x-request-id') || randomUUID();
      req.requestId = requestId;
      res.setHeader('X-Request-ID', requestId);
    }

    const startTime = Date.now();
    res.on('finish', () => {
      logger.info(req, 'Request ended', {
        statusCode: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });

    req.routeName = route.route_name;
    logger.info(req, 'Request started');

    const run = () => {
      Promise.resolve(route.handler(req, res, next)).catch(next);
    };
    if (!auth) {
      run();
      return;
    }
    auth(req, res, run);
  };
};

export type { Route, RouteHandler, RouterOptions } from './types';

export const createRouter = (routes: Route[], options: RouterOptions = { serviceAccountType: 'service' }): Express => {
  const app = express();
  app.disable('x-powered-by');

  const jsonBody = express.json({ limit: '1mb' });
  // GitHub payloads can be large (push with many commits)
  const rawBody = express.raw({ type: () => true, limit: '25mb' });

  routes.forEach((route) => {
    const handlers: RequestHandler[] = [route.body === 'raw' ? rawBody : jsonBody, wrapHandler(route, options)];
    switch (route.method) {
      case 'GET':
        app.get(route.endpoint, ...handlers);
        break;
      case 'POST':
        app.post(route.endpoint, ...handlers);
        break;
      case 'PUT':
        app.put(route.endpoint, ...handlers);
        break;
      case 'PATCH':
        app.patch(route.endpoint, ...handlers);
        break;
      case 'DELETE':
        app.delete(route.endpoint, ...handlers);
        break;
    }
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    sendError(req, res, err);
  });

  return app;
};
