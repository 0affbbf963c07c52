import { Request, Response, NextFunction } from 'express';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      routeName?: string;
      deliveryId?: string;
      clientType?: string;
      clientId?: string;
    }
  }
}

export type RouteHandler = (req: Request, res: Response, next: NextFunction) => void | Promise<void>;

export interface Route {
  route_name: string;
  method: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';
  endpoint: string;
  // 'service' (default) requires x-account-type / x-account-id; 'none' for GitHub deliveries and health
  auth?: 'service' | 'none';
  // 'raw' keeps the unparsed Buffer in req.body (signature verification needs the exact bytes)
  body?: 'json' | 'raw';
  handler: RouteHandler;
}

export interface RouterOptions {
  serviceAccountType: string;
}
