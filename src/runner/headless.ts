/**
 * Headless Runner
 * CLI for running the fleet simulation without a server
 */

import { FleetDatabase } from '../storage/index.js';
import { loadFleetSeed } from '../core/world.js';
import { SimulationController } from '../server/controllers/SimulationController.js';
import type { VesselStatus } from '../core/types.js';
import { parseRunOptions, USAGE, type RunOptions } from './options.js';

function readOptions(): RunOptions {
  try {
    return parseRunOptions(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Runner] ${message}`);
    console.error(USAGE);
    process.exit(1);
  }
}

function formatRow(v: VesselStatus): string {
  return [
    v.id.padEnd(9),
    v.status.padEnd(12),
    v.latitude.toFixed(5).padStart(10),
    v.longitude.toFixed(5).padStart(10),
    v.heading.toFixed(1).padStart(6),
    (v.energyLevel.toFixed(1) + '%').padStart(7),
    v.areaCovered.toFixed(4).padStart(9),
    v.speed,
  ].join(' ');
}

function printFleet(tick: number, vessels: readonly VesselStatus[]): void {
  console.log(`\n--- Tick ${tick} ---`);
  console.log('Vessel    Status         Latitude  Longitude   Hdg  Energy      Area Speed');
  for (const vessel of vessels) {
    console.log(formatRow(vessel));
  }
}

function main(): void {
  const options = readOptions();
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const database = new FleetDatabase(options.dbPath);
  database.seed(loadFleetSeed(options.seedPath));

  let transitions = 0;
  let failures = 0;

  const controller = new SimulationController({
    store: database,
    speedMultiplier: options.speed,
    publish: (event) => {
      if (event.type === 'transition') {
        transitions++;
        if (options.verbose) {
          console.log(`  ${event.data.vesselId}: ${event.data.from} -> ${event.data.to}`);
        }
      } else if (event.type === 'persistence-failure') {
        failures++;
      }
    },
  });

  controller.initialize();
  printFleet(0, controller.getSnapshot().vessels);

  const startTime = Date.now();
  for (let i = 1; i <= options.ticks; i++) {
    controller.runTick();
    if (i % options.logInterval === 0 || i === options.ticks) {
      printFleet(i, controller.getSnapshot().vessels);
    }
  }

  const elapsed = Date.now() - startTime;
  console.log(`\nRan ${options.ticks} ticks at ${options.speed}x in ${elapsed}ms`);
  console.log(`Status transitions: ${transitions}, dropped writes: ${failures}`);

  database.close();
}

main();
