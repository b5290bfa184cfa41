/**
 * Simulation Step Tests
 * Per-vessel ordering of navigation and energy, and fleet-level skipping rules
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Simulation, stepVessel } from '../../src/core/simulation.js';
import { DEFAULT_CONFIG } from '../../src/core/world.js';
import { advanceNavigation, displace } from '../../src/systems/navigation.js';
import type {
  ActiveVesselState,
  ChargingVesselState,
  MaintenanceVesselState,
  Route,
} from '../../src/core/types.js';

const seededAt = new Date('2026-01-01T00:00:00Z');
const now = new Date('2026-01-01T00:00:01Z');

const survey: Route = {
  vesselId: 'BOAT-001',
  routeName: 'Test square',
  waypoints: [
    { latitude: 51.517, longitude: -0.1278, sequence: 0 },
    { latitude: 51.525, longitude: -0.1, sequence: 1 },
  ],
};

const berth: Route = {
  vesselId: 'BOAT-004',
  routeName: 'Berth',
  waypoints: [{ latitude: 51.509, longitude: -0.139, sequence: 0 }],
};

const pioneerRoute: Route = {
  vesselId: 'BOAT-002',
  routeName: 'Berth',
  waypoints: [{ latitude: 51.52, longitude: -0.15, sequence: 0 }],
};

const voyager: ActiveVesselState = {
  vesselId: 'BOAT-001',
  status: 'Active',
  latitude: 51.5074,
  longitude: -0.1278,
  heading: 45,
  speedKnots: 12,
  originalSpeedKnots: 12,
  energyLevel: 85.5,
  speed: '12 knots',
  conditions: 'Good sea state',
  areaCovered: 0,
  currentWaypointIndex: 0,
  lastUpdated: seededAt,
};

const pioneer: ChargingVesselState = {
  vesselId: 'BOAT-002',
  status: 'Charging',
  latitude: 51.5154,
  longitude: -0.142,
  heading: 0,
  speedKnots: 0,
  originalSpeedKnots: 10,
  energyLevel: 42.3,
  speed: 'Station keeping',
  conditions: 'Calm seas',
  areaCovered: 0,
  currentWaypointIndex: 0,
  lastUpdated: seededAt,
};

const explorer: MaintenanceVesselState = {
  vesselId: 'BOAT-004',
  status: 'Maintenance',
  latitude: 51.509,
  longitude: -0.139,
  heading: 315,
  speedKnots: 0,
  originalSpeedKnots: 0,
  energyLevel: 15.7,
  speed: 'Docked',
  conditions: 'At berth',
  areaCovered: 0,
  currentWaypointIndex: 0,
  lastUpdated: seededAt,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('stepVessel', () => {
  it('should move then drain an active vessel in one tick', () => {
    const result = stepVessel(voyager, survey, 1, now, DEFAULT_CONFIG);

    expect(result).not.toBeNull();
    const state = result?.state;
    expect(state?.status).toBe('Active');
    expect(state?.heading).toBe(0);
    expect(state?.latitude).toBeCloseTo(51.5074 + 12 / 3600 / 60, 10);
    expect(state?.longitude).toBe(-0.1278);
    expect(state?.energyLevel).toBeCloseTo(85.5 - 0.01152, 10);
    expect(state?.areaCovered).toBeCloseTo(0.002, 12);
    expect(state?.lastUpdated).toBe(now);
    expect(result?.transition).toBeNull();
    expect(result?.arrival).toBeNull();
  });

  it('should hold course toward a waypoint 1.2 NM to the north-east', () => {
    const target = displace(voyager, 45, 1.2);
    const route: Route = {
      vesselId: 'BOAT-001',
      routeName: 'Single leg',
      waypoints: [
        { ...target, sequence: 0 },
        { latitude: 51.53, longitude: -0.1, sequence: 1 },
      ],
    };

    const result = stepVessel(voyager, route, 1, now, DEFAULT_CONFIG);

    expect(result?.arrival).toBeNull();
    expect(result?.state.currentWaypointIndex).toBe(0);
    expect(result?.state.heading).toBeCloseTo(45, 1);
    expect(result?.state.energyLevel).toBeCloseTo(85.48848, 10);
  });

  it('should double the distance covered when the multiplier doubles', () => {
    const one = advanceNavigation(voyager, survey, 1, DEFAULT_CONFIG);
    const two = advanceNavigation(voyager, survey, 2, DEFAULT_CONFIG);

    expect(two.traveledNm).toBeCloseTo(one.traveledNm * 2, 12);
    expect(two.latitude - voyager.latitude).toBeCloseTo((one.latitude - voyager.latitude) * 2, 12);
  });

  it('should report a waypoint arrival', () => {
    const atWaypoint: ActiveVesselState = { ...voyager, latitude: 51.517, longitude: -0.1278 };
    const result = stepVessel(atWaypoint, survey, 1, now, DEFAULT_CONFIG);

    expect(result?.arrival).toEqual({ vesselId: 'BOAT-001', fromIndex: 0, toIndex: 1 });
    expect(result?.state.currentWaypointIndex).toBe(1);
  });

  it('should charge a charging vessel without moving it', () => {
    const result = stepVessel(pioneer, pioneerRoute, 1, now, DEFAULT_CONFIG);

    expect(result?.state.status).toBe('Charging');
    expect(result?.state.latitude).toBe(51.5154);
    expect(result?.state.longitude).toBe(-0.142);
    expect(result?.state.energyLevel).toBeCloseTo(42.383, 10);
    expect(result?.state.lastUpdated).toBe(now);
  });

  it('should skip maintenance vessels', () => {
    expect(stepVessel(explorer, berth, 10, now, DEFAULT_CONFIG)).toBeNull();
  });

  it('should skip active vessels on a single-waypoint route', () => {
    const parked: ActiveVesselState = { ...voyager, vesselId: 'BOAT-004' };
    expect(stepVessel(parked, berth, 1, now, DEFAULT_CONFIG)).toBeNull();
  });
});

describe('Simulation', () => {
  it('should merge partial config over the defaults', () => {
    const sim = new Simulation([survey], { chargeRatePerSecond: 1 });
    expect(sim.getConfig().chargeRatePerSecond).toBe(1);
    expect(sim.getConfig().lowEnergyThreshold).toBe(20);
    expect(sim.getRoute('BOAT-001')).toBe(survey);
  });

  it('should step active and charging vessels and leave maintenance out', () => {
    const sim = new Simulation([survey, pioneerRoute, berth]);
    const result = sim.step([voyager, pioneer, explorer], 1, now);

    expect(result.simulatedSeconds).toBe(1);
    expect(result.states.map((s) => s.vesselId)).toEqual(['BOAT-001', 'BOAT-002']);
    expect(result.transitions).toEqual([]);
  });

  it('should collect transitions', () => {
    const sim = new Simulation([survey]);
    const tired: ActiveVesselState = { ...voyager, energyLevel: 20.01 };
    const result = sim.step([tired], 1, now);

    expect(result.transitions).toHaveLength(1);
    expect(result.transitions[0].from).toBe('Active');
    expect(result.transitions[0].to).toBe('Charging');
  });

  it('should warn and skip vessels with no route', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sim = new Simulation([]);
    const result = sim.step([voyager], 1, now);

    expect(result.states).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[Simulation] No route for BOAT-001, skipping');
  });

  it('should not mutate the states it is given', () => {
    const sim = new Simulation([survey]);
    const input: ActiveVesselState = { ...voyager };
    sim.step([input], 5, now);

    expect(input).toEqual(voyager);
  });
});
