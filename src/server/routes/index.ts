/**
 * Route composition
 * Creates and configures the main router with all route modules
 */

import { Router } from './router.js';
import { registerHealthRoutes } from './health.js';
import { registerBoatRoutes } from './boats.js';
import { registerSimulationRoutes } from './simulation.js';
import type { SimulationController } from '../controllers/SimulationController.js';

/**
 * What route handlers are allowed to touch
 */
export interface RouteContext {
  controller: SimulationController;
  ping: () => boolean;
}

/**
 * Create and configure the main router with all routes
 */
export function createRouter(ctx: RouteContext): Router {
  const router = new Router();

  registerHealthRoutes(router, ctx);
  registerBoatRoutes(router, ctx);
  registerSimulationRoutes(router, ctx);

  return router;
}

export { Router } from './router.js';
export type { HttpMethod, RouteHandler, RouteParams } from './router.js';
