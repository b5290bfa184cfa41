/**
 * API Server
 * HTTP + WebSocket server for the survey fleet dashboard
 */

import { config } from './state.js';
import { createApp } from './app.js';
import { ClientHub } from './ws/handlers.js';
import { SimulationController } from './controllers/SimulationController.js';
import { createDatabase } from '../storage/index.js';
import { loadFleetSeed } from '../core/world.js';

// ============================================================================
// Storage
// ============================================================================

const database = createDatabase(config.DB_PATH, { timeoutMs: config.DB_TIMEOUT_MS });
if (!database) {
  console.error(`[Server] Cannot open database at ${config.DB_PATH}`);
  process.exit(1);
}

if (database.seed(loadFleetSeed(config.SEED_PATH))) {
  console.log(`[Database] Seeded fleet from ${config.SEED_PATH}`);
} else {
  console.log('[Database] Fleet already present, skipping seed');
}

// ============================================================================
// Simulation
// ============================================================================

const hub = new ClientHub();

const controller = new SimulationController({
  store: database,
  tickIntervalMs: config.TICK_INTERVAL_MS,
  tickMode: config.TICK_MODE,
  speedMultiplier: config.DEFAULT_SPEED,
  publish: (event) => hub.broadcast(event),
});

controller.initialize();
if (config.AUTO_START) {
  controller.start();
}

// ============================================================================
// Main
// ============================================================================

const app = createApp({ controller, hub, ping: () => database.ping() });

app.server.listen(config.PORT, () => {
  console.log('='.repeat(50));
  console.log('Survey Fleet API Server');
  console.log('='.repeat(50));
  console.log(`HTTP:      http://localhost:${config.PORT}`);
  console.log(`WebSocket: ws://localhost:${config.PORT}/ws`);
  console.log(`Database:  ${config.DB_PATH}`);
  console.log(`Ticks:     ${controller.getTickMode()} (${config.TICK_INTERVAL_MS}ms, ${controller.getSpeed()}x)`);
  console.log('='.repeat(50));
});

process.on('SIGINT', () => {
  console.log(`\n[Server] Shutting down (${hub.size} clients connected)...`);
  controller.stop();

  app
    .close()
    .catch((error: unknown) => console.error('[Server] Close error:', error))
    .finally(() => {
      database.close();
      console.log('[Database] Closed');
      process.exit(0);
    });
});
