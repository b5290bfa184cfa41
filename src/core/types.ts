/**
 * Core types for the survey fleet simulation
 * Static vessel metadata, routes, and the mutable per-vessel state
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type VesselId = string;

export interface GeoPoint {
  latitude: number; // -90..90
  longitude: number; // -180..180
}

// ============================================================================
// Static Data (seeded once, read-only afterwards)
// ============================================================================

export interface Vessel {
  id: VesselId;
  vesselName: string;
  crewCount: number; // > 0
  equipment: string;
  project: string;
  surveyType: string;
}

export interface Waypoint extends GeoPoint {
  sequence: number; // 0-based, unique per vessel
}

export interface Route {
  vesselId: VesselId;
  routeName: string;
  waypoints: Waypoint[]; // ordered by sequence, never empty
}

// ============================================================================
// Vessel State
// ============================================================================

export type VesselStatusKind = 'Active' | 'Charging' | 'Maintenance';

export const VESSEL_STATUSES: readonly VesselStatusKind[] = ['Active', 'Charging', 'Maintenance'];

interface VesselStateBase {
  vesselId: VesselId;
  latitude: number;
  longitude: number;
  heading: number; // 0..360, 0 = North
  originalSpeedKnots: number; // cruising speed to resume after charging
  energyLevel: number; // 0..100
  speed: string; // human-readable, e.g. "12 knots", "Station keeping"
  conditions: string;
  areaCovered: number; // monotonically non-decreasing
  currentWaypointIndex: number;
  lastUpdated: Date;
}

export interface ActiveVesselState extends VesselStateBase {
  status: 'Active';
  speedKnots: number;
}

/** Station keeping while the batteries recharge */
export interface ChargingVesselState extends VesselStateBase {
  status: 'Charging';
  speedKnots: 0;
}

/** Only an external reset moves a vessel out of maintenance */
export interface MaintenanceVesselState extends VesselStateBase {
  status: 'Maintenance';
  speedKnots: number;
}

export type VesselState = ActiveVesselState | ChargingVesselState | MaintenanceVesselState;

export interface VesselWithState {
  vessel: Vessel;
  state: VesselState;
}

// ============================================================================
// Simulation
// ============================================================================

export interface SimulationConfig {
  arrivalBaseThresholdNm: number;
  arrivalTravelFactor: number;
  areaCoverageFactor: number;
  drainCoefficient: number; // % per simulated second at 10 knots
  chargeRatePerSecond: number; // % per simulated second
  lowEnergyThreshold: number;
  resumeEnergyThreshold: number;
  minSpeedMultiplier: number;
  maxSpeedMultiplier: number;
  baseSimulatedSeconds: number; // simulated seconds per tick at 1x
}

export interface StatusTransition {
  vesselId: VesselId;
  from: VesselStatusKind;
  to: VesselStatusKind;
  energyLevel: number;
}

export interface WaypointArrival {
  vesselId: VesselId;
  fromIndex: number;
  toIndex: number;
}

export interface TickResult {
  simulatedSeconds: number;
  states: VesselState[]; // only the vessels that were stepped
  transitions: StatusTransition[];
  arrivals: WaypointArrival[];
}

// ============================================================================
// Read Model
// ============================================================================

/**
 * Wire shape served to the dashboard
 */
export interface VesselStatus {
  id: VesselId;
  latitude: number;
  longitude: number;
  status: VesselStatusKind;
  energyLevel: number;
  vesselName: string;
  surveyType: string;
  project: string;
  equipment: string;
  areaCovered: number;
  speed: string;
  crewCount: number;
  conditions: string;
  heading: number;
}
