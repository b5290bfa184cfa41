/**
 * Energy System
 * Battery drain and solar charging, and the Active/Charging/Maintenance state machine
 */

import type {
  ActiveVesselState,
  ChargingVesselState,
  Route,
  SimulationConfig,
  StatusTransition,
  VesselState,
} from '../core/types.js';
import { bearingDeg } from './geodesy.js';

export const STATION_KEEPING = 'Station keeping';
export const CHARGING_CONDITIONS = 'Charging via solar panels';

export interface EnergyResult {
  state: VesselState;
  transition: StatusTransition | null;
}

function clampEnergy(value: number): number {
  return Math.max(0, Math.min(100, value));
}

export function formatSpeed(speedKnots: number): string {
  return `${speedKnots.toFixed(0)} knots`;
}

/**
 * Energy drained in one tick; quadratic in speed, 0.008% per second at 10 knots
 */
export function drainForTick(speedKnots: number, simulatedSeconds: number, config: SimulationConfig): number {
  const speedFactor = speedKnots / 10;
  return config.drainCoefficient * speedFactor * speedFactor * simulatedSeconds;
}

export function chargeForTick(simulatedSeconds: number, config: SimulationConfig): number {
  return config.chargeRatePerSecond * simulatedSeconds;
}

function drainActive(
  state: ActiveVesselState,
  simulatedSeconds: number,
  config: SimulationConfig
): EnergyResult {
  const energyLevel = clampEnergy(state.energyLevel - drainForTick(state.speedKnots, simulatedSeconds, config));

  if (energyLevel < config.lowEnergyThreshold) {
    const charging: ChargingVesselState = {
      ...state,
      status: 'Charging',
      speedKnots: 0,
      energyLevel,
      speed: STATION_KEEPING,
      conditions: CHARGING_CONDITIONS,
    };
    return {
      state: charging,
      transition: { vesselId: state.vesselId, from: 'Active', to: 'Charging', energyLevel },
    };
  }

  return { state: { ...state, energyLevel }, transition: null };
}

function chargeStationary(
  state: ChargingVesselState,
  route: Route,
  simulatedSeconds: number,
  config: SimulationConfig
): EnergyResult {
  const energyLevel = clampEnergy(state.energyLevel + chargeForTick(simulatedSeconds, config));

  if (energyLevel >= config.resumeEnergyThreshold) {
    const target = route.waypoints[state.currentWaypointIndex];
    const active: ActiveVesselState = {
      ...state,
      status: 'Active',
      speedKnots: state.originalSpeedKnots,
      energyLevel,
      heading: target ? bearingDeg(state, target) : state.heading,
      speed: formatSpeed(state.originalSpeedKnots),
    };
    return {
      state: active,
      transition: { vesselId: state.vesselId, from: 'Charging', to: 'Active', energyLevel },
    };
  }

  return { state: { ...state, energyLevel, speed: STATION_KEEPING }, transition: null };
}

/**
 * Apply one tick of energy accounting to a vessel
 *
 * At most one transition happens per call. Maintenance vessels are returned as-is.
 */
export function updateEnergy(
  state: VesselState,
  route: Route,
  simulatedSeconds: number,
  config: SimulationConfig
): EnergyResult {
  switch (state.status) {
    case 'Active':
      return drainActive(state, simulatedSeconds, config);
    case 'Charging':
      return chargeStationary(state, route, simulatedSeconds, config);
    case 'Maintenance':
      return { state, transition: null };
  }
}
