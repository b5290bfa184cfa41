/**
 * Simulation Clock
 * Turns a speed multiplier into the simulated seconds for one tick
 */

import { ValidationFailure } from './errors.js';
import type { SimulationConfig } from './types.js';

export type TimeSource = () => Date;

export interface ClockAdvance {
  simulatedSeconds: number;
  wallSeconds: number; // real time since the previous tick, reported only
  now: Date;
}

/**
 * Reject anything that is not a finite multiplier inside the configured bounds
 */
export function validateSpeedMultiplier(
  value: number,
  config: Pick<SimulationConfig, 'minSpeedMultiplier' | 'maxSpeedMultiplier'>
): number {
  if (!Number.isFinite(value) || value < config.minSpeedMultiplier || value > config.maxSpeedMultiplier) {
    throw new ValidationFailure(
      `Speed multiplier must be between ${config.minSpeedMultiplier} and ${config.maxSpeedMultiplier}`
    );
  }
  return value;
}

/**
 * Owns the single "last update" anchor for a fleet.
 *
 * A tick always covers baseSimulatedSeconds * multiplier of simulated time,
 * no matter how long ago the previous tick ran, so total distance depends on
 * how often ticks are requested rather than on wall time.
 */
export class SimulationClock {
  private lastUpdate: Date;

  constructor(
    private readonly config: SimulationConfig,
    private readonly timeSource: TimeSource = () => new Date()
  ) {
    this.lastUpdate = this.timeSource();
  }

  getLastUpdate(): Date {
    return new Date(this.lastUpdate.getTime());
  }

  now(): Date {
    return this.timeSource();
  }

  advance(speedMultiplier: number): ClockAdvance {
    const multiplier = validateSpeedMultiplier(speedMultiplier, this.config);
    const now = this.timeSource();
    const wallSeconds = (now.getTime() - this.lastUpdate.getTime()) / 1000;
    this.lastUpdate = now;

    return {
      simulatedSeconds: this.config.baseSimulatedSeconds * multiplier,
      wallSeconds,
      now,
    };
  }

  /**
   * Re-anchor to now so the next tick shows no jump
   */
  reset(): void {
    this.lastUpdate = this.timeSource();
  }
}
