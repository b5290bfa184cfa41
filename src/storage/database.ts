/**
 * SQLite Storage for Fleet State
 * Static vessel metadata and routes, the live per-vessel state, and the
 * initial snapshot that a reset restores
 */

import Database from 'better-sqlite3';
import type {
  Route,
  Vessel,
  VesselId,
  VesselState,
  VesselStatusKind,
  VesselWithState,
  Waypoint,
} from '../core/types.js';
import { VESSEL_STATUSES } from '../core/types.js';
import type { FleetSeed } from '../core/world.js';
import { NotFoundFailure, PersistenceFailure, isSimulationError } from '../core/errors.js';

// ============================================================================
// Store Contract
// ============================================================================

/**
 * Durable per-vessel state keyed by vessel id
 */
export interface StateStore {
  getAllWithStates(): VesselWithState[];
  getById(id: VesselId): VesselWithState;
  getAllRoutes(): Route[];
  getRoute(vesselId: VesselId): Route;
  updateState(state: VesselState): void;
  resetAll(now: Date): number;
}

export interface FleetDatabaseOptions {
  /** Milliseconds to wait on a locked database before failing */
  timeoutMs?: number;
}

// ============================================================================
// Schema
// ============================================================================

const STATE_COLUMNS = `
  latitude REAL NOT NULL CHECK (latitude BETWEEN -90 AND 90),
  longitude REAL NOT NULL CHECK (longitude BETWEEN -180 AND 180),
  heading REAL NOT NULL CHECK (heading >= 0 AND heading < 360),
  speed_knots REAL NOT NULL CHECK (speed_knots >= 0),
  original_speed_knots REAL NOT NULL CHECK (original_speed_knots >= 0),
  energy_level REAL NOT NULL CHECK (energy_level BETWEEN 0 AND 100),
  status TEXT NOT NULL CHECK (status IN ('Active', 'Charging', 'Maintenance')),
  speed TEXT NOT NULL,
  conditions TEXT NOT NULL,
  area_covered REAL NOT NULL DEFAULT 0 CHECK (area_covered >= 0),
  current_waypoint_index INTEGER NOT NULL DEFAULT 0 CHECK (current_waypoint_index >= 0),
  last_updated TEXT NOT NULL
`;

const SCHEMA = `
-- Static vessel metadata
CREATE TABLE IF NOT EXISTS vessels (
  id TEXT PRIMARY KEY,
  vessel_name TEXT NOT NULL,
  crew_count INTEGER NOT NULL CHECK (crew_count > 0),
  equipment TEXT NOT NULL,
  project TEXT NOT NULL,
  survey_type TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Live state, one row per vessel
CREATE TABLE IF NOT EXISTS vessel_states (
  vessel_id TEXT PRIMARY KEY REFERENCES vessels(id) ON DELETE CASCADE,
  ${STATE_COLUMNS}
);

-- State captured at seed time, restored by reset
CREATE TABLE IF NOT EXISTS vessel_initial_states (
  vessel_id TEXT PRIMARY KEY REFERENCES vessels(id) ON DELETE CASCADE,
  ${STATE_COLUMNS}
);

-- Route metadata, one route per vessel
CREATE TABLE IF NOT EXISTS routes (
  vessel_id TEXT PRIMARY KEY REFERENCES vessels(id) ON DELETE CASCADE,
  route_name TEXT NOT NULL
);

-- Ordered survey waypoints
CREATE TABLE IF NOT EXISTS waypoints (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  vessel_id TEXT NOT NULL REFERENCES vessels(id) ON DELETE CASCADE,
  latitude REAL NOT NULL CHECK (latitude BETWEEN -90 AND 90),
  longitude REAL NOT NULL CHECK (longitude BETWEEN -180 AND 180),
  sequence INTEGER NOT NULL CHECK (sequence >= 0),
  UNIQUE (vessel_id, sequence)
);

CREATE INDEX IF NOT EXISTS idx_vessel_states_status ON vessel_states(status);
CREATE INDEX IF NOT EXISTS idx_waypoints_vessel_sequence ON waypoints(vessel_id, sequence);
`;

// ============================================================================
// Row Mapping
// ============================================================================

interface StateRow {
  vessel_id: string;
  latitude: number;
  longitude: number;
  heading: number;
  speed_knots: number;
  original_speed_knots: number;
  energy_level: number;
  status: string;
  speed: string;
  conditions: string;
  area_covered: number;
  current_waypoint_index: number;
  last_updated: string;
}

interface VesselRow {
  id: string;
  vessel_name: string;
  crew_count: number;
  equipment: string;
  project: string;
  survey_type: string;
}

type JoinedRow = VesselRow & StateRow;

interface WaypointRow {
  vessel_id: string;
  route_name: string | null;
  latitude: number;
  longitude: number;
  sequence: number;
}

const JOINED_SELECT = `
  SELECT
    v.id, v.vessel_name, v.crew_count, v.equipment, v.project, v.survey_type,
    s.vessel_id, s.latitude, s.longitude, s.heading, s.speed_knots,
    s.original_speed_knots, s.energy_level, s.status, s.speed, s.conditions,
    s.area_covered, s.current_waypoint_index, s.last_updated
  FROM vessels v
  INNER JOIN vessel_states s ON s.vessel_id = v.id
`;

function isStatusKind(value: string): value is VesselStatusKind {
  return (VESSEL_STATUSES as readonly string[]).includes(value);
}

function rowToVessel(row: VesselRow): Vessel {
  return {
    id: row.id,
    vesselName: row.vessel_name,
    crewCount: row.crew_count,
    equipment: row.equipment,
    project: row.project,
    surveyType: row.survey_type,
  };
}

/**
 * Decode a state row into the tagged variant, rejecting rows the type cannot hold
 */
export function rowToState(row: StateRow): VesselState {
  if (!isStatusKind(row.status)) {
    throw new PersistenceFailure(`Unknown status '${row.status}' stored for ${row.vessel_id}`);
  }

  const base = {
    vesselId: row.vessel_id,
    latitude: row.latitude,
    longitude: row.longitude,
    heading: row.heading,
    originalSpeedKnots: row.original_speed_knots,
    energyLevel: row.energy_level,
    speed: row.speed,
    conditions: row.conditions,
    areaCovered: row.area_covered,
    currentWaypointIndex: row.current_waypoint_index,
    lastUpdated: new Date(row.last_updated),
  };

  switch (row.status) {
    case 'Active':
      return { ...base, status: 'Active', speedKnots: row.speed_knots };
    case 'Maintenance':
      return { ...base, status: 'Maintenance', speedKnots: row.speed_knots };
    case 'Charging':
      if (row.speed_knots !== 0) {
        throw new PersistenceFailure(`Charging vessel ${row.vessel_id} stored with non-zero speed`);
      }
      return { ...base, status: 'Charging', speedKnots: 0 };
  }
}

function stateParams(state: VesselState): Record<string, string | number> {
  return {
    vesselId: state.vesselId,
    latitude: state.latitude,
    longitude: state.longitude,
    heading: state.heading,
    speedKnots: state.speedKnots,
    originalSpeedKnots: state.originalSpeedKnots,
    energyLevel: state.energyLevel,
    status: state.status,
    speed: state.speed,
    conditions: state.conditions,
    areaCovered: state.areaCovered,
    currentWaypointIndex: state.currentWaypointIndex,
    lastUpdated: state.lastUpdated.toISOString(),
  };
}

function wrapFailure(action: string, error: unknown): Error {
  if (isSimulationError(error)) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new PersistenceFailure(`Failed to ${action}: ${detail}`, error);
}

// ============================================================================
// FleetDatabase Class
// ============================================================================

/**
 * SQLite-backed StateStore
 * All methods are synchronous with better-sqlite3; a statement that cannot
 * get the lock within the timeout throws SQLITE_BUSY, surfaced as PersistenceFailure
 */
export class FleetDatabase implements StateStore {
  private db: Database.Database;

  private stmtSelectAll: Database.Statement;
  private stmtSelectOne: Database.Statement;
  private stmtSelectWaypoints: Database.Statement;
  private stmtSelectRouteWaypoints: Database.Statement;
  private stmtUpsertState: Database.Statement;
  private stmtSelectInitial: Database.Statement;
  private stmtCountVessels: Database.Statement;

  /**
   * @param dbPath Path to SQLite database file (use ':memory:' for in-memory)
   */
  constructor(dbPath: string = 'fleet.db', options: FleetDatabaseOptions = {}) {
    this.db = new Database(dbPath, { timeout: options.timeoutMs ?? 5000 });

    // WAL lets dashboard reads proceed while a tick is writing
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');

    this.db.exec(SCHEMA);

    this.stmtSelectAll = this.db.prepare(`${JOINED_SELECT} ORDER BY v.id`);
    this.stmtSelectOne = this.db.prepare(`${JOINED_SELECT} WHERE v.id = ?`);

    this.stmtSelectWaypoints = this.db.prepare(`
      SELECT w.vessel_id, r.route_name, w.latitude, w.longitude, w.sequence
      FROM waypoints w
      LEFT JOIN routes r ON r.vessel_id = w.vessel_id
      ORDER BY w.vessel_id, w.sequence
    `);

    this.stmtSelectRouteWaypoints = this.db.prepare(`
      SELECT w.vessel_id, r.route_name, w.latitude, w.longitude, w.sequence
      FROM waypoints w
      LEFT JOIN routes r ON r.vessel_id = w.vessel_id
      WHERE w.vessel_id = ?
      ORDER BY w.sequence
    `);

    this.stmtUpsertState = this.db.prepare(`
      INSERT INTO vessel_states (
        vessel_id, latitude, longitude, heading, speed_knots, original_speed_knots,
        energy_level, status, speed, conditions, area_covered, current_waypoint_index, last_updated
      ) VALUES (
        @vesselId, @latitude, @longitude, @heading, @speedKnots, @originalSpeedKnots,
        @energyLevel, @status, @speed, @conditions, @areaCovered, @currentWaypointIndex, @lastUpdated
      )
      ON CONFLICT(vessel_id) DO UPDATE SET
        latitude = excluded.latitude,
        longitude = excluded.longitude,
        heading = excluded.heading,
        speed_knots = excluded.speed_knots,
        original_speed_knots = excluded.original_speed_knots,
        energy_level = excluded.energy_level,
        status = excluded.status,
        speed = excluded.speed,
        conditions = excluded.conditions,
        area_covered = excluded.area_covered,
        current_waypoint_index = excluded.current_waypoint_index,
        last_updated = excluded.last_updated
    `);

    this.stmtSelectInitial = this.db.prepare(`
      SELECT * FROM vessel_initial_states ORDER BY vessel_id
    `);

    this.stmtCountVessels = this.db.prepare('SELECT COUNT(*) AS count FROM vessels');
  }

  /**
   * Get the underlying database connection for direct queries
   */
  getDb(): Database.Database {
    return this.db;
  }

  // ============================================================================
  // Seeding
  // ============================================================================

  hasData(): boolean {
    const row = this.stmtCountVessels.get() as { count: number };
    return row.count > 0;
  }

  /**
   * Insert the fleet if the database is empty
   * @returns true if rows were written, false if the fleet already existed
   */
  seed(fleet: FleetSeed): boolean {
    if (this.hasData()) return false;

    const insertVessel = this.db.prepare(`
      INSERT INTO vessels (id, vessel_name, crew_count, equipment, project, survey_type)
      VALUES (@id, @vesselName, @crewCount, @equipment, @project, @surveyType)
    `);
    const insertRoute = this.db.prepare('INSERT INTO routes (vessel_id, route_name) VALUES (?, ?)');
    const insertWaypoint = this.db.prepare(
      'INSERT INTO waypoints (vessel_id, latitude, longitude, sequence) VALUES (?, ?, ?, ?)'
    );
    const insertInitial = this.db.prepare(`
      INSERT INTO vessel_initial_states (
        vessel_id, latitude, longitude, heading, speed_knots, original_speed_knots,
        energy_level, status, speed, conditions, area_covered, current_waypoint_index, last_updated
      ) VALUES (
        @vesselId, @latitude, @longitude, @heading, @speedKnots, @originalSpeedKnots,
        @energyLevel, @status, @speed, @conditions, @areaCovered, @currentWaypointIndex, @lastUpdated
      )
    `);

    const insertFleet = this.db.transaction((data: FleetSeed) => {
      for (const vessel of data.vessels) {
        insertVessel.run(vessel);
      }
      for (const route of data.routes) {
        insertRoute.run(route.vesselId, route.routeName);
        for (const wp of route.waypoints) {
          insertWaypoint.run(route.vesselId, wp.latitude, wp.longitude, wp.sequence);
        }
      }
      for (const state of data.initialStates) {
        insertInitial.run(stateParams(state));
        this.stmtUpsertState.run(stateParams(state));
      }
    });

    try {
      insertFleet(fleet);
    } catch (error) {
      throw wrapFailure('seed fleet', error);
    }
    return true;
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getAllWithStates(): VesselWithState[] {
    try {
      const rows = this.stmtSelectAll.all() as JoinedRow[];
      return rows.map((row) => ({ vessel: rowToVessel(row), state: rowToState(row) }));
    } catch (error) {
      throw wrapFailure('read fleet', error);
    }
  }

  getById(id: VesselId): VesselWithState {
    let row: JoinedRow | undefined;
    try {
      row = this.stmtSelectOne.get(id) as JoinedRow | undefined;
    } catch (error) {
      throw wrapFailure(`read vessel ${id}`, error);
    }

    if (!row) {
      throw new NotFoundFailure(`Vessel ${id} not found`);
    }
    return { vessel: rowToVessel(row), state: rowToState(row) };
  }

  getAllRoutes(): Route[] {
    let rows: WaypointRow[];
    try {
      rows = this.stmtSelectWaypoints.all() as WaypointRow[];
    } catch (error) {
      throw wrapFailure('read routes', error);
    }

    const routes = new Map<VesselId, Route>();
    for (const row of rows) {
      let route = routes.get(row.vessel_id);
      if (!route) {
        route = { vesselId: row.vessel_id, routeName: row.route_name ?? '', waypoints: [] };
        routes.set(row.vessel_id, route);
      }
      route.waypoints.push(rowToWaypoint(row));
    }
    return Array.from(routes.values());
  }

  getRoute(vesselId: VesselId): Route {
    let rows: WaypointRow[];
    try {
      rows = this.stmtSelectRouteWaypoints.all(vesselId) as WaypointRow[];
    } catch (error) {
      throw wrapFailure(`read route for ${vesselId}`, error);
    }

    if (rows.length === 0) {
      throw new NotFoundFailure(`No route for vessel ${vesselId}`);
    }
    return {
      vesselId,
      routeName: rows[0].route_name ?? '',
      waypoints: rows.map(rowToWaypoint),
    };
  }

  // ============================================================================
  // Writes
  // ============================================================================

  /**
   * Full-row upsert; last writer wins
   */
  updateState(state: VesselState): void {
    try {
      this.stmtUpsertState.run(stateParams(state));
    } catch (error) {
      throw wrapFailure(`update state for ${state.vesselId}`, error);
    }
  }

  /**
   * Restore every vessel to its initial snapshot in one transaction
   * @returns number of vessels reset
   */
  resetAll(now: Date): number {
    const restore = this.db.transaction((timestamp: string) => {
      const initialRows = this.stmtSelectInitial.all() as StateRow[];
      let count = 0;

      for (const row of initialRows) {
        const initial = rowToState(row);
        this.stmtUpsertState.run(
          stateParams({ ...initial, currentWaypointIndex: 0, lastUpdated: new Date(timestamp) })
        );
        count++;
      }

      return count;
    });

    try {
      const count = restore(now.toISOString());
      console.log(`[Database] Reset ${count} vessels to initial state`);
      return count;
    } catch (error) {
      console.error('[Database] Reset failed, rolled back:', error);
      throw wrapFailure('reset fleet', error);
    }
  }

  /**
   * Liveness check for the health route
   */
  ping(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  close(): void {
    this.db.close();
  }
}

function rowToWaypoint(row: WaypointRow): Waypoint {
  return { latitude: row.latitude, longitude: row.longitude, sequence: row.sequence };
}

/**
 * Create a FleetDatabase, logging and returning null if the file cannot be opened
 */
export function createDatabase(dbPath: string = 'fleet.db', options: FleetDatabaseOptions = {}): FleetDatabase | null {
  try {
    return new FleetDatabase(dbPath, options);
  } catch (error) {
    console.warn('[Database] Failed to create database:', error);
    return null;
  }
}
