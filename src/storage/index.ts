/**
 * Storage Module
 * SQLite persistence for vessel metadata, routes and live state
 */

export { FleetDatabase, createDatabase } from './database.js';
export type { StateStore, FleetDatabaseOptions } from './database.js';
