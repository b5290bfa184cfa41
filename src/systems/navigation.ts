/**
 * Navigation System
 * Moves an active vessel toward its current route waypoint and decides arrival
 */

import type { ActiveVesselState, GeoPoint, Route, SimulationConfig } from '../core/types.js';
import { bearingDeg, distanceNM, toRadians } from './geodesy.js';

export interface NavigationResult {
  latitude: number;
  longitude: number;
  heading: number;
  currentWaypointIndex: number;
  areaCovered: number;
  traveledNm: number;
  distanceToTargetNm: number;
  waypointAdvanced: boolean;
}

/**
 * Nautical miles covered in one tick (1 knot = 1 NM per hour)
 */
export function distanceTraveled(speedKnots: number, simulatedSeconds: number): number {
  return (speedKnots / 3600) * simulatedSeconds;
}

/**
 * Arrival radius grows with the distance covered per tick so fast multipliers
 * cannot step over a waypoint, while slow ones still register arrival.
 */
export function arrivalThreshold(traveledNm: number, config: SimulationConfig): number {
  return config.arrivalBaseThresholdNm + traveledNm * config.arrivalTravelFactor;
}

/**
 * Local flat-earth displacement; valid only at the scale of survey routes
 * (1 degree of latitude = 60 NM)
 */
export function displace(position: GeoPoint, headingDeg: number, traveledNm: number): GeoPoint {
  const headingRad = toRadians(headingDeg);
  const deltaLat = (traveledNm * Math.cos(headingRad)) / 60;
  const deltaLon = (traveledNm * Math.sin(headingRad)) / (60 * Math.cos(toRadians(position.latitude)));

  return {
    latitude: position.latitude + deltaLat,
    longitude: position.longitude + deltaLon,
  };
}

/**
 * Advance one vessel along its route by one tick
 *
 * The arrival test runs before moving: a vessel inside the threshold switches
 * to the next waypoint (wrapping to the start) and heads for it in the same tick.
 * Single-waypoint routes are stationary and come back unchanged.
 */
export function advanceNavigation(
  state: ActiveVesselState,
  route: Route,
  simulatedSeconds: number,
  config: SimulationConfig
): NavigationResult {
  const waypoints = route.waypoints;
  const traveledNm = distanceTraveled(state.speedKnots, simulatedSeconds);
  const position: GeoPoint = { latitude: state.latitude, longitude: state.longitude };

  if (waypoints.length <= 1) {
    return {
      latitude: state.latitude,
      longitude: state.longitude,
      heading: state.heading,
      currentWaypointIndex: state.currentWaypointIndex,
      areaCovered: state.areaCovered,
      traveledNm: 0,
      distanceToTargetNm: waypoints.length === 1 ? distanceNM(position, waypoints[0]) : 0,
      waypointAdvanced: false,
    };
  }

  let index = state.currentWaypointIndex;
  let target = waypoints[index];
  const distanceToTargetNm = distanceNM(position, target);

  let waypointAdvanced = false;
  if (distanceToTargetNm < arrivalThreshold(traveledNm, config)) {
    index = (index + 1) % waypoints.length;
    target = waypoints[index];
    waypointAdvanced = true;
  }

  const heading = bearingDeg(position, target);
  const next = displace(position, heading, traveledNm);

  return {
    latitude: next.latitude,
    longitude: next.longitude,
    heading,
    currentWaypointIndex: index,
    areaCovered: state.areaCovered + traveledNm * config.areaCoverageFactor * state.speedKnots,
    traveledNm,
    distanceToTargetNm,
    waypointAdvanced,
  };
}
