/**
 * Simulation control routes
 */

import type { Router } from './router.js';
import type { RouteContext } from './index.js';
import { sendJson, sendError, parseJsonBody } from '../utils/http.js';

export function registerSimulationRoutes(router: Router, ctx: RouteContext): void {
  router.add('GET', '/api/simulation/status', (_req, res) => {
    sendJson(res, 200, ctx.controller.getStatus());
  });

  router.add('POST', '/api/simulation/start', (_req, res) => {
    ctx.controller.start();
    sendJson(res, 200, ctx.controller.getStatus());
  });

  router.add('POST', '/api/simulation/pause', (_req, res) => {
    ctx.controller.pause();
    sendJson(res, 200, ctx.controller.getStatus());
  });

  router.add('POST', '/api/simulation/resume', (_req, res) => {
    ctx.controller.resume();
    sendJson(res, 200, ctx.controller.getStatus());
  });

  router.add('POST', '/api/simulation/speed', async (req, res) => {
    const body = await parseJsonBody<{ multiplier?: unknown }>(req);
    if (!body || typeof body.multiplier !== 'number') {
      sendError(res, 400, 'Body must be JSON with a numeric "multiplier"');
      return;
    }

    ctx.controller.setSpeed(body.multiplier);
    sendJson(res, 200, ctx.controller.getStatus());
  });
}
