/**
 * Fleet Simulation Step
 * Runs navigation then energy for every vessel, in that order
 */

import type {
  Route,
  SimulationConfig,
  StatusTransition,
  TickResult,
  VesselId,
  VesselState,
  WaypointArrival,
} from './types.js';
import { DEFAULT_CONFIG } from './world.js';
import { advanceNavigation } from '../systems/navigation.js';
import { updateEnergy } from '../systems/energy.js';

export interface VesselStepResult {
  state: VesselState;
  transition: StatusTransition | null;
  arrival: WaypointArrival | null;
}

/**
 * Advance a single vessel by one tick
 *
 * Returns null for vessels the tick leaves alone: Maintenance, and Active
 * vessels on a single-waypoint route.
 */
export function stepVessel(
  state: VesselState,
  route: Route,
  simulatedSeconds: number,
  now: Date,
  config: SimulationConfig
): VesselStepResult | null {
  if (state.status === 'Maintenance') {
    return null;
  }

  if (state.status === 'Charging') {
    const energy = updateEnergy(state, route, simulatedSeconds, config);
    return {
      state: { ...energy.state, lastUpdated: now },
      transition: energy.transition,
      arrival: null,
    };
  }

  if (route.waypoints.length <= 1) {
    return null;
  }

  const nav = advanceNavigation(state, route, simulatedSeconds, config);
  const moved: VesselState = {
    ...state,
    latitude: nav.latitude,
    longitude: nav.longitude,
    heading: nav.heading,
    currentWaypointIndex: nav.currentWaypointIndex,
    areaCovered: nav.areaCovered,
  };

  const energy = updateEnergy(moved, route, simulatedSeconds, config);

  return {
    state: { ...energy.state, lastUpdated: now },
    transition: energy.transition,
    arrival: nav.waypointAdvanced
      ? { vesselId: state.vesselId, fromIndex: state.currentWaypointIndex, toIndex: nav.currentWaypointIndex }
      : null,
  };
}

/**
 * Simulation binds a fleet's routes and constants; it holds no vessel state
 */
export class Simulation {
  private routes: Map<VesselId, Route>;
  private config: SimulationConfig;

  constructor(routes: Iterable<Route>, config: Partial<SimulationConfig> = {}) {
    this.routes = new Map();
    for (const route of routes) {
      this.routes.set(route.vesselId, route);
    }
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getConfig(): SimulationConfig {
    return this.config;
  }

  getRoute(vesselId: VesselId): Route | undefined {
    return this.routes.get(vesselId);
  }

  /**
   * Compute the next state of every vessel for one tick; inputs are not mutated
   */
  step(states: Iterable<VesselState>, simulatedSeconds: number, now: Date): TickResult {
    const result: TickResult = {
      simulatedSeconds,
      states: [],
      transitions: [],
      arrivals: [],
    };

    for (const state of states) {
      const route = this.routes.get(state.vesselId);
      if (!route || route.waypoints.length === 0) {
        console.warn(`[Simulation] No route for ${state.vesselId}, skipping`);
        continue;
      }

      const stepped = stepVessel(state, route, simulatedSeconds, now, this.config);
      if (!stepped) continue;

      result.states.push(stepped.state);
      if (stepped.transition) result.transitions.push(stepped.transition);
      if (stepped.arrival) result.arrivals.push(stepped.arrival);
    }

    return result;
  }
}
