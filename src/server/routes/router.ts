/**
 * Simple HTTP router for the API server
 * Supports exact paths and parameterized paths
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { matchPath, sendFailure } from '../utils/http.js';

export type HttpMethod = 'GET' | 'POST';

export type RouteParams = Record<string, string>;

export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  params: RouteParams
) => void | Promise<void>;

interface ParamRouteEntry {
  method: HttpMethod;
  pattern: string;
  handler: RouteHandler;
}

/**
 * Simple router that matches HTTP requests to handlers
 *
 * Priority order:
 * 1. Exact path matches (checked first)
 * 2. Parameterized paths (e.g., /api/boats/:id)
 *
 * A handler that throws or rejects is answered through sendFailure.
 */
export class Router {
  private exactRoutes: Map<string, RouteHandler> = new Map();
  private paramRoutes: ParamRouteEntry[] = [];

  /**
   * Add a route with an exact path match
   * Example: router.add('GET', '/health', handler)
   */
  add(method: HttpMethod, path: string, handler: RouteHandler): void {
    this.exactRoutes.set(`${method}:${path}`, handler);
  }

  /**
   * Add a route with URL parameters
   * Example: router.addParam('GET', '/api/boats/:id', handler)
   */
  addParam(method: HttpMethod, pattern: string, handler: RouteHandler): void {
    this.paramRoutes.push({ method, pattern, handler });
  }

  /**
   * Attempt to handle a request
   * Resolves true if a matching route was found and handled,
   * false if no route matched (caller should 404)
   */
  async handle(req: IncomingMessage, res: ServerResponse, pathname: string): Promise<boolean> {
    const method = req.method ?? 'GET';

    const exactHandler = this.exactRoutes.get(`${method}:${pathname}`);
    if (exactHandler) {
      await this.invoke(exactHandler, req, res, {});
      return true;
    }

    for (const route of this.paramRoutes) {
      if (route.method !== method) continue;

      const params = matchPath(pathname, route.pattern);
      if (params) {
        await this.invoke(route.handler, req, res, params);
        return true;
      }
    }

    return false;
  }

  private async invoke(
    handler: RouteHandler,
    req: IncomingMessage,
    res: ServerResponse,
    params: RouteParams
  ): Promise<void> {
    try {
      await handler(req, res, params);
    } catch (error) {
      sendFailure(res, error);
    }
  }
}
