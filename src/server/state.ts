/**
 * Server configuration and shared message types
 */

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import type { TickMode } from './controllers/SimulationController.js';
import { DEFAULT_SEED_PATH } from '../core/world.js';

// ============================================================================
// Types
// ============================================================================

export interface ClientMessage {
  type: string;
  [key: string]: unknown;
}

export interface ServerConfig {
  PORT: number;
  DB_PATH: string;
  DB_TIMEOUT_MS: number;
  SEED_PATH: string;
  TICK_INTERVAL_MS: number;
  TICK_MODE: TickMode;
  DEFAULT_SPEED: number;
  AUTO_START: boolean;
}

// ============================================================================
// Configuration
// ============================================================================

function parseTickMode(value: string | undefined): TickMode {
  if (value === undefined || value === 'interval') return 'interval';
  if (value === 'request') return 'request';
  console.warn(`[Config] Unknown TICK_MODE '${value}', using 'interval'`);
  return 'interval';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    PORT: parseInt(env.PORT || '3001', 10),
    DB_PATH: env.DB_PATH || 'fleet.db',
    DB_TIMEOUT_MS: parseInt(env.DB_TIMEOUT_MS || '5000', 10),
    SEED_PATH: env.SEED_PATH || DEFAULT_SEED_PATH,
    TICK_INTERVAL_MS: parseInt(env.TICK_INTERVAL_MS || '1000', 10),
    TICK_MODE: parseTickMode(env.TICK_MODE),
    DEFAULT_SPEED: parseFloat(env.DEFAULT_SPEED || '1'),
    AUTO_START: env.AUTO_START !== 'false',
  };
}

export const config: ServerConfig = loadConfig();
