/**
 * Fleet routes
 */

import type { Router } from './router.js';
import type { RouteContext } from './index.js';
import { sendJson, parseSpeedParam } from '../utils/http.js';

export function registerBoatRoutes(router: Router, ctx: RouteContext): void {
  // Current state of every vessel, ordered by id
  router.add('GET', '/api/boats', (req, res) => {
    const url = new URL(req.url || '/', 'http://localhost');
    const speed = parseSpeedParam(url.searchParams.get('speed'));
    const snapshot = ctx.controller.readFleet(speed);
    sendJson(res, 200, snapshot.vessels);
  });

  // Restore every vessel to its initial state
  router.add('POST', '/api/boats/reset', (_req, res) => {
    const boatsReset = ctx.controller.reset();
    sendJson(res, 200, {
      success: true,
      message: 'Boats reset to initial positions',
      boatsReset,
    });
  });

  router.addParam('GET', '/api/boats/:id', (_req, res, params) => {
    sendJson(res, 200, ctx.controller.getVessel(params.id));
  });
}
