/**
 * WebSocket connection handlers
 * Pushes every published snapshot to connected dashboards and accepts control messages
 */

import { WebSocket } from 'ws';
import type { ClientMessage } from '../state.js';
import type { ControllerEvent, SimulationController } from '../controllers/SimulationController.js';

export class ClientHub {
  private clients = new Set<WebSocket>();

  get size(): number {
    return this.clients.size;
  }

  /**
   * Broadcast a message to all connected WebSocket clients
   */
  broadcast(message: ControllerEvent): void {
    const data = JSON.stringify(message);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  }

  /**
   * Register a new connection against the controller
   */
  handleConnection(ws: WebSocket, controller: SimulationController): void {
    this.clients.add(ws);
    console.log(`[WebSocket] Client connected (${this.clients.size} total)`);

    sendInitialState(ws, controller);

    ws.on('message', (data) => {
      handleMessage(ws, controller, data);
    });

    ws.on('close', () => {
      this.clients.delete(ws);
      console.log(`[WebSocket] Client disconnected (${this.clients.size} remaining)`);
    });

    ws.on('error', (error) => {
      console.error('[WebSocket] Error:', error);
      this.clients.delete(ws);
    });
  }

  closeAll(): void {
    for (const client of this.clients) {
      client.close();
    }
    this.clients.clear();
  }
}

function sendInitialState(ws: WebSocket, controller: SimulationController): void {
  ws.send(JSON.stringify({ type: 'status', data: { status: controller.getStatus().status } }));
  ws.send(JSON.stringify({ type: 'snapshot', data: controller.getSnapshot() }));
}

function sendWsError(ws: WebSocket, message: string): void {
  ws.send(JSON.stringify({ type: 'error', data: { message } }));
}

function isClientMessage(value: unknown): value is ClientMessage {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

function handleMessage(ws: WebSocket, controller: SimulationController, data: unknown): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(String(data));
  } catch (error) {
    console.error('[WebSocket] Message parse error:', error);
    sendWsError(ws, 'Invalid JSON');
    return;
  }

  if (!isClientMessage(parsed)) {
    sendWsError(ws, 'Invalid message');
    return;
  }

  const message = parsed;
  try {
    switch (message.type) {
      case 'start':
        controller.start();
        break;
      case 'pause':
        controller.pause();
        break;
      case 'resume':
        controller.resume();
        break;
      case 'speed':
        if (typeof message.multiplier === 'number') {
          controller.setSpeed(message.multiplier);
        } else {
          sendWsError(ws, 'speed requires a numeric multiplier');
        }
        break;
      default:
        console.log('[WebSocket] Unknown message type:', message.type);
    }
  } catch (error) {
    const text = error instanceof Error ? error.message : String(error);
    console.warn(`[WebSocket] Rejected '${message.type}': ${text}`);
    sendWsError(ws, text);
  }
}
