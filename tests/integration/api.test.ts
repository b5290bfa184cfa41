/**
 * API Tests
 * Drives the HTTP and WebSocket surface on an ephemeral local port
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WebSocket } from 'ws';
import { createApp, type FleetApp } from '../../src/server/app.js';
import { FleetDatabase } from '../../src/storage/index.js';
import { loadFleetSeed } from '../../src/core/world.js';
import { SimulationController } from '../../src/server/controllers/SimulationController.js';

describe('API server', () => {
  let db: FleetDatabase;
  let controller: SimulationController;
  let app: FleetApp;
  let baseUrl: string;

  async function request(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await res.text();
    return { status: res.status, body: text ? JSON.parse(text) : null };
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    db = new FleetDatabase(':memory:');
    db.seed(loadFleetSeed());
    controller = new SimulationController({ store: db, tickMode: 'request' });
    controller.initialize();
    controller.start();

    app = createApp({ controller, ping: () => db.ping() });
    await new Promise<void>((resolve) => app.server.listen(0, '127.0.0.1', resolve));
    const address = app.server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    controller.stop();
    await app.close();
    db.close();
    vi.restoreAllMocks();
  });

  it('should serve the fleet ordered by id and tick once per read', async () => {
    const res = await request('GET', '/api/boats');

    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(4);
    expect(res.body).toMatchObject([
      { id: 'BOAT-001', status: 'Active', energyLevel: expect.closeTo(85.48848, 10), speed: '12 knots' },
      { id: 'BOAT-002', status: 'Charging', speed: 'Station keeping' },
      { id: 'BOAT-003', vesselName: 'Sea Navigator', crewCount: 22 },
      { id: 'BOAT-004', status: 'Maintenance', energyLevel: 15.7, heading: 315 },
    ]);
    expect(controller.getStatus().tick).toBe(1);
  });

  it('should apply the speed multiplier to the tick', async () => {
    const res = await request('GET', '/api/boats?speed=10');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject([{ id: 'BOAT-001', energyLevel: expect.closeTo(85.5 - 0.1152, 10) }]);
  });

  it('should reject an out-of-range speed without ticking', async () => {
    const res = await request('GET', '/api/boats?speed=20');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Speed multiplier must be between 0.1 and 10', code: 'VALIDATION' });
    expect(controller.getStatus().tick).toBe(0);
  });

  it('should reject a speed that is not a number', async () => {
    const res = await request('GET', '/api/boats?speed=fast');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid speed 'fast'", code: 'VALIDATION' });
  });

  it('should serve a single vessel and 404 unknown ids', async () => {
    const found = await request('GET', '/api/boats/BOAT-003');
    expect(found.status).toBe(200);
    expect(found.body).toMatchObject({ id: 'BOAT-003', project: 'Pipeline Inspection' });

    const missing = await request('GET', '/api/boats/BOAT-999');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Vessel BOAT-999 not found', code: 'NOT_FOUND' });
  });

  it('should reset the fleet', async () => {
    await request('GET', '/api/boats?speed=10');
    await request('GET', '/api/boats?speed=10');

    const res = await request('POST', '/api/boats/reset');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, message: 'Boats reset to initial positions', boatsReset: 4 });

    expect(db.getById('BOAT-001').state.energyLevel).toBe(85.5);
    expect(controller.getVessel('BOAT-001').latitude).toBe(51.5074);
  });

  it('should change speed through the control route', async () => {
    const ok = await request('POST', '/api/simulation/speed', { multiplier: 3 });
    expect(ok.status).toBe(200);
    expect(ok.body).toMatchObject({ speedMultiplier: 3, tickMode: 'request', status: 'running' });

    const bad = await request('POST', '/api/simulation/speed', { multiplier: 'fast' });
    expect(bad.status).toBe(400);
    expect(bad.body).toEqual({ error: 'Body must be JSON with a numeric "multiplier"' });

    const outOfRange = await request('POST', '/api/simulation/speed', { multiplier: 50 });
    expect(outOfRange.status).toBe(400);
  });

  it('should pause and resume', async () => {
    expect((await request('POST', '/api/simulation/pause')).body).toMatchObject({ status: 'paused' });
    await request('GET', '/api/boats');
    expect(controller.getStatus().tick).toBe(0);

    expect((await request('POST', '/api/simulation/resume')).body).toMatchObject({ status: 'running' });
  });

  it('should report health', async () => {
    const res = await request('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', database: true });
  });

  it('should 404 unknown routes and answer preflight', async () => {
    const missing = await request('GET', '/api/ships');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Not found' });

    const preflight = await fetch(`${baseUrl}/api/boats`, { method: 'OPTIONS' });
    expect(preflight.status).toBe(204);
    expect(preflight.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('should start a stopped controller through the control route', async () => {
    controller.stop();
    await request('GET', '/api/boats');
    expect(controller.getStatus().tick).toBe(0);

    const res = await request('POST', '/api/simulation/start');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'running' });

    await request('GET', '/api/boats');
    expect(controller.getStatus().tick).toBe(1);
  });

  describe('WebSocket', () => {
    function inbox(ws: WebSocket): (count: number) => Promise<unknown[]> {
      const received: unknown[] = [];
      let waiting: { count: number; resolve: (batch: unknown[]) => void } | null = null;

      const flush = (): void => {
        if (waiting && received.length >= waiting.count) {
          const { count, resolve } = waiting;
          waiting = null;
          resolve(received.splice(0, count));
        }
      };

      ws.on('message', (data) => {
        received.push(JSON.parse(String(data)));
        flush();
      });

      return (count) =>
        new Promise((resolve) => {
          waiting = { count, resolve };
          flush();
        });
    }

    async function connect(): Promise<{ ws: WebSocket; take: (count: number) => Promise<unknown[]> }> {
      const ws = new WebSocket(`${baseUrl.replace('http', 'ws')}/ws`);
      const take = inbox(ws);
      await new Promise<void>((resolve, reject) => {
        ws.once('open', () => resolve());
        ws.once('error', reject);
      });
      return { ws, take };
    }

    it('should send status and a snapshot to new clients', async () => {
      const { ws, take } = await connect();
      const messages = await take(2);
      ws.close();

      expect(messages[0]).toEqual({ type: 'status', data: { status: 'running' } });
      expect(messages[1]).toMatchObject({ type: 'snapshot', data: { tick: 0 } });
    });

    it('should answer messages that are not objects with a type and keep serving', async () => {
      const { ws, take } = await connect();
      await take(2);

      ws.send('null');
      ws.send('5');
      ws.send(JSON.stringify({ type: 'pause' }));
      ws.send('"pause"');
      const replies = await take(3);
      ws.close();

      const invalid = { type: 'error', data: { message: 'Invalid message' } };
      expect(replies).toEqual([invalid, invalid, invalid]);
      expect(controller.getStatus().status).toBe('paused');
    });

    it('should start a stopped controller on a start message', async () => {
      controller.stop();
      const { ws, take } = await connect();
      await take(2);

      ws.send(JSON.stringify({ type: 'start' }));
      ws.send('null');
      await take(1);
      ws.close();

      expect(controller.getStatus().status).toBe('running');
    });

    it('should report rejected speeds to the sender', async () => {
      const { ws, take } = await connect();
      await take(2);

      ws.send(JSON.stringify({ type: 'speed', multiplier: 50 }));
      const [reply] = await take(1);
      ws.close();

      expect(reply).toEqual({ type: 'error', data: { message: 'Speed multiplier must be between 0.1 and 10' } });
      expect(controller.getSpeed()).toBe(1);
    });
  });
});
