/**
 * HTTP + WebSocket application
 * Wires the router and the client hub to a controller; listening is left to the caller
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { WebSocketServer } from 'ws';
import type { SimulationController } from './controllers/SimulationController.js';
import { createRouter, type RouteContext } from './routes/index.js';
import { ClientHub } from './ws/handlers.js';
import { setCorsHeaders, handleCorsPreflightIfNeeded, sendError, sendFailure } from './utils/http.js';

export interface FleetApp {
  server: Server;
  wss: WebSocketServer;
  hub: ClientHub;
  close(): Promise<void>;
}

export function createApp(ctx: RouteContext & { hub?: ClientHub }): FleetApp {
  const router = createRouter(ctx);
  const hub = ctx.hub ?? new ClientHub();

  function handleRequest(req: IncomingMessage, res: ServerResponse): void {
    setCorsHeaders(res);

    if (handleCorsPreflightIfNeeded(req, res)) {
      return;
    }

    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);

    router
      .handle(req, res, url.pathname)
      .then((handled) => {
        if (!handled) sendError(res, 404, 'Not found');
      })
      .catch((error: unknown) => sendFailure(res, error));
  }

  const server = createServer(handleRequest);
  const wss = new WebSocketServer({ server, path: '/ws' });
  wss.on('connection', (ws) => hub.handleConnection(ws, ctx.controller));

  return {
    server,
    wss,
    hub,
    close: () =>
      new Promise<void>((resolve, reject) => {
        hub.closeAll();
        wss.close();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
