/**
 * Health check routes
 */

import type { Router } from './router.js';
import type { RouteContext } from './index.js';
import { sendJson } from '../utils/http.js';

export function registerHealthRoutes(router: Router, ctx: RouteContext): void {
  router.add('GET', '/health', (_req, res) => {
    const database = ctx.ping();
    sendJson(res, database ? 200 : 503, { status: database ? 'ok' : 'degraded', database });
  });
}
