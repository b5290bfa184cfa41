/**
 * Command-line options for the headless runner
 */

import { validateSpeedMultiplier } from '../core/clock.js';
import { ValidationFailure } from '../core/errors.js';
import { DEFAULT_CONFIG, DEFAULT_SEED_PATH } from '../core/world.js';

export interface RunOptions {
  ticks: number;
  speed: number;
  logInterval: number;
  seedPath: string;
  dbPath: string;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `
Survey Fleet Simulation Runner

Usage: npm run simulate -- [options]

Options:
  --ticks <number>       Number of ticks to run (default: 600)
  --speed <number>       Speed multiplier, 0.1-10 (default: 1)
  --log-interval <n>     Print the fleet table every N ticks (default: 60)
  --seed-file <path>     Fleet seed JSON (default: data/fleet-seed.json)
  --db <path>            SQLite file (default: in-memory)
  --verbose, -v          Show transitions as they happen
  --help, -h             Show this help

Examples:
  npm run simulate -- --ticks 3600 --speed 10
  npm run simulate -- --ticks 300 --log-interval 10 --verbose
`;

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationFailure(`${flag} needs a value`);
  }
  return value;
}

function parseCount(flag: string, value: string | undefined, min: number): number {
  const raw = requireValue(flag, value);
  const count = Number(raw);
  if (!Number.isInteger(count) || count < min) {
    throw new ValidationFailure(`${flag} must be an integer >= ${min}, got '${raw}'`);
  }
  return count;
}

/**
 * Parse runner arguments (without the node and script entries)
 * Throws ValidationFailure on unknown flags or bad values
 */
export function parseRunOptions(args: readonly string[]): RunOptions {
  const options: RunOptions = {
    ticks: 600,
    speed: 1,
    logInterval: 60,
    seedPath: DEFAULT_SEED_PATH,
    dbPath: ':memory:',
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--ticks':
        options.ticks = parseCount(arg, next, 0);
        i++;
        break;
      case '--speed': {
        const raw = requireValue(arg, next);
        const speed = raw.trim() === '' ? NaN : Number(raw);
        options.speed = validateSpeedMultiplier(speed, DEFAULT_CONFIG);
        i++;
        break;
      }
      case '--log-interval':
        options.logInterval = parseCount(arg, next, 1);
        i++;
        break;
      case '--seed-file':
        options.seedPath = requireValue(arg, next);
        i++;
        break;
      case '--db':
        options.dbPath = requireValue(arg, next);
        i++;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ValidationFailure(`Unknown option '${arg}'`);
    }
  }

  return options;
}
