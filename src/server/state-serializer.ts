/**
 * State Serializer
 * Converts vessel metadata and state into the JSON shape the dashboard reads
 */

import type { Vessel, VesselState, VesselStatus } from '../core/types.js';

export interface FleetSnapshot {
  tick: number;
  publishedAt: string;
  vessels: readonly VesselStatus[];
}

export function toVesselStatus(vessel: Vessel, state: VesselState): VesselStatus {
  return {
    id: vessel.id,
    latitude: state.latitude,
    longitude: state.longitude,
    status: state.status,
    energyLevel: state.energyLevel,
    vesselName: vessel.vesselName,
    surveyType: vessel.surveyType,
    project: vessel.project,
    equipment: vessel.equipment,
    areaCovered: state.areaCovered,
    speed: state.speed,
    crewCount: vessel.crewCount,
    conditions: state.conditions,
    heading: state.heading,
  };
}

/**
 * Build a frozen snapshot ordered by vessel id
 * Readers hold on to it freely; the next tick publishes a new one
 */
export function serializeFleet(
  vessels: Iterable<Vessel>,
  states: ReadonlyMap<string, VesselState>,
  tick: number,
  publishedAt: Date
): FleetSnapshot {
  const entries: VesselStatus[] = [];

  for (const vessel of vessels) {
    const state = states.get(vessel.id);
    if (!state) continue;
    entries.push(Object.freeze(toVesselStatus(vessel, state)));
  }

  entries.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  return Object.freeze({
    tick,
    publishedAt: publishedAt.toISOString(),
    vessels: Object.freeze(entries),
  });
}
