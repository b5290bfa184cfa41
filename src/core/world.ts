/**
 * World Initialization
 * Default simulation constants and the fleet seed file
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationFailure } from './errors.js';
import type { Route, SimulationConfig, Vessel, VesselState } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_SEED_PATH = resolve(__dirname, '../../data/fleet-seed.json');

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: SimulationConfig = {
  arrivalBaseThresholdNm: 0.15,
  arrivalTravelFactor: 1.5,
  areaCoverageFactor: 0.05,
  drainCoefficient: 0.008,
  chargeRatePerSecond: 0.083, // ~5% per simulated minute
  lowEnergyThreshold: 20,
  resumeEnergyThreshold: 75,
  minSpeedMultiplier: 0.1,
  maxSpeedMultiplier: 10,
  baseSimulatedSeconds: 1,
};

// ============================================================================
// Seed Schema
// ============================================================================

const waypointSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const initialStateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  heading: z.number().min(0).lt(360),
  speedKnots: z.number().nonnegative(),
  originalSpeedKnots: z.number().nonnegative().optional(),
  energyLevel: z.number().min(0).max(100),
  status: z.enum(['Active', 'Charging', 'Maintenance']),
  speed: z.string().min(1),
  conditions: z.string().min(1),
  areaCovered: z.number().nonnegative().default(0),
});

const vesselSeedSchema = z.object({
  id: z.string().min(1),
  vesselName: z.string().min(1),
  crewCount: z.number().int().positive(),
  equipment: z.string().min(1),
  project: z.string().min(1),
  surveyType: z.string().min(1),
  route: z.object({
    routeName: z.string().min(1),
    waypoints: z.array(waypointSchema).min(1, 'Route needs at least one waypoint'),
  }),
  initialState: initialStateSchema,
});

export const fleetSeedSchema = z
  .object({
    version: z.literal(1),
    vessels: z.array(vesselSeedSchema).min(1),
  })
  .refine((seed) => new Set(seed.vessels.map((v) => v.id)).size === seed.vessels.length, {
    message: 'Vessel ids must be unique',
  });

export type FleetSeedFile = z.infer<typeof fleetSeedSchema>;
export type VesselSeed = z.infer<typeof vesselSeedSchema>;

/**
 * Everything the store needs to create a fleet from scratch
 */
export interface FleetSeed {
  vessels: Vessel[];
  routes: Route[];
  initialStates: VesselState[];
}

// ============================================================================
// Seed Construction
// ============================================================================

function toInitialState(seed: VesselSeed, createdAt: Date): VesselState {
  const s = seed.initialState;
  const base = {
    vesselId: seed.id,
    latitude: s.latitude,
    longitude: s.longitude,
    heading: s.heading,
    originalSpeedKnots: s.originalSpeedKnots ?? s.speedKnots,
    energyLevel: s.energyLevel,
    speed: s.speed,
    conditions: s.conditions,
    areaCovered: s.areaCovered,
    currentWaypointIndex: 0,
    lastUpdated: createdAt,
  };

  switch (s.status) {
    case 'Active':
      return { ...base, status: 'Active', speedKnots: s.speedKnots };
    case 'Charging':
      return { ...base, status: 'Charging', speedKnots: 0 };
    case 'Maintenance':
      return { ...base, status: 'Maintenance', speedKnots: s.speedKnots };
  }
}

/**
 * Build vessels, routes and initial states from a validated seed document
 */
export function createFleet(file: FleetSeedFile, createdAt: Date = new Date()): FleetSeed {
  const vessels: Vessel[] = [];
  const routes: Route[] = [];
  const initialStates: VesselState[] = [];

  for (const seed of file.vessels) {
    vessels.push({
      id: seed.id,
      vesselName: seed.vesselName,
      crewCount: seed.crewCount,
      equipment: seed.equipment,
      project: seed.project,
      surveyType: seed.surveyType,
    });

    routes.push({
      vesselId: seed.id,
      routeName: seed.route.routeName,
      waypoints: seed.route.waypoints.map((wp, sequence) => ({ ...wp, sequence })),
    });

    initialStates.push(toInitialState(seed, createdAt));
  }

  vessels.sort((a, b) => a.id.localeCompare(b.id));
  return { vessels, routes, initialStates };
}

export function parseFleetSeed(raw: unknown, source: string = 'fleet seed'): FleetSeedFile {
  const result = fleetSeedSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationFailure(`Invalid ${source}: ${issues}`, result.error);
  }
  return result.data;
}

/**
 * Read and validate the seed file
 */
export function loadFleetSeed(seedPath: string = DEFAULT_SEED_PATH, createdAt?: Date): FleetSeed {
  if (!existsSync(seedPath)) {
    throw new ValidationFailure(`Fleet seed not found at ${seedPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(seedPath, 'utf-8'));
  } catch (error) {
    throw new ValidationFailure(`Fleet seed at ${seedPath} is not valid JSON`, error);
  }

  return createFleet(parseFleetSeed(raw, seedPath), createdAt);
}
