/**
 * Simulation Controller
 * The single writer of vessel state: owns the tick loop, the clock and the
 * published snapshot, and performs stop-the-world resets
 */

import { Simulation } from '../../core/simulation.js';
import { SimulationClock, validateSpeedMultiplier, type TimeSource } from '../../core/clock.js';
import { DEFAULT_CONFIG } from '../../core/world.js';
import { NotFoundFailure } from '../../core/errors.js';
import type {
  SimulationConfig,
  StatusTransition,
  Vessel,
  VesselId,
  VesselState,
  VesselStatus,
} from '../../core/types.js';
import type { StateStore } from '../../storage/index.js';
import { serializeFleet, type FleetSnapshot } from '../state-serializer.js';

// ============================================================================
// Types
// ============================================================================

export type SchedulerStatus = 'stopped' | 'running' | 'paused';

/**
 * interval: the controller ticks on its own timer
 * request: each fleet read runs one tick (reads drive the simulation)
 */
export type TickMode = 'interval' | 'request';

export interface PersistenceFailureEvent {
  vesselId: VesselId;
  tick: number;
  message: string;
}

export type ControllerEvent =
  | { type: 'snapshot'; data: FleetSnapshot }
  | { type: 'status'; data: { status: SchedulerStatus } }
  | { type: 'transition'; data: StatusTransition }
  | { type: 'persistence-failure'; data: PersistenceFailureEvent }
  | { type: 'reset'; data: { boatsReset: number } };

export interface SimulationControllerOptions {
  store: StateStore;
  config?: Partial<SimulationConfig>;
  tickIntervalMs?: number;
  tickMode?: TickMode;
  speedMultiplier?: number;
  timeSource?: TimeSource;
  publish?: (event: ControllerEvent) => void;
}

export interface TickSummary {
  tick: number;
  simulatedSeconds: number;
  updated: number;
  failed: number;
  transitions: StatusTransition[];
}

export interface ControllerStatus {
  status: SchedulerStatus;
  tick: number;
  speedMultiplier: number;
  tickMode: TickMode;
  persistenceFailures: number;
  lastTickAt: string | null;
}

// ============================================================================
// Controller
// ============================================================================

export class SimulationController {
  private readonly store: StateStore;
  private readonly config: SimulationConfig;
  private readonly clock: SimulationClock;
  private readonly tickIntervalMs: number;
  private readonly tickMode: TickMode;
  private readonly publish: (event: ControllerEvent) => void;

  private simulation: Simulation;
  private vessels: Map<VesselId, Vessel> = new Map();
  private arena: Map<VesselId, VesselState> = new Map();
  private snapshot: FleetSnapshot;

  private status: SchedulerStatus = 'stopped';
  private tickInterval: NodeJS.Timeout | null = null;
  private tickCount = 0;
  private speedMultiplier: number;
  private persistenceFailures = 0;
  private lastTickAt: Date | null = null;

  constructor(options: SimulationControllerOptions) {
    this.store = options.store;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.clock = new SimulationClock(this.config, options.timeSource);
    this.tickIntervalMs = options.tickIntervalMs ?? 1000;
    this.tickMode = options.tickMode ?? 'interval';
    this.speedMultiplier = validateSpeedMultiplier(options.speedMultiplier ?? 1, this.config);
    this.publish = options.publish ?? (() => undefined);

    this.simulation = new Simulation([], this.config);
    this.snapshot = serializeFleet([], this.arena, 0, this.clock.now());
  }

  /**
   * Load routes, metadata and state from the store and publish the first snapshot
   */
  initialize(): void {
    this.simulation = new Simulation(this.store.getAllRoutes(), this.config);
    this.loadFromStore();
    this.clock.reset();
    this.publishSnapshot();
    console.log(`[SimulationController] Initialized with ${this.arena.size} vessels (${this.tickMode} mode)`);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.status === 'running') return;

    this.status = 'running';
    this.clock.reset();
    this.startTimer();
    this.publish({ type: 'status', data: { status: 'running' } });
    console.log(`[SimulationController] Started (${this.speedMultiplier}x speed)`);
  }

  pause(): void {
    if (this.status !== 'running') return;

    this.status = 'paused';
    this.stopTimer();
    this.publish({ type: 'status', data: { status: 'paused' } });
    console.log('[SimulationController] Paused');
  }

  resume(): void {
    if (this.status !== 'paused') return;

    this.status = 'running';
    this.clock.reset();
    this.startTimer();
    this.publish({ type: 'status', data: { status: 'running' } });
    console.log('[SimulationController] Resumed');
  }

  stop(): void {
    this.stopTimer();
    this.status = 'stopped';
  }

  setSpeed(multiplier: number): void {
    this.speedMultiplier = validateSpeedMultiplier(multiplier, this.config);
    console.log(`[SimulationController] Speed set to ${this.speedMultiplier}x`);
  }

  getSpeed(): number {
    return this.speedMultiplier;
  }

  getTickMode(): TickMode {
    return this.tickMode;
  }

  getStatus(): ControllerStatus {
    return {
      status: this.status,
      tick: this.tickCount,
      speedMultiplier: this.speedMultiplier,
      tickMode: this.tickMode,
      persistenceFailures: this.persistenceFailures,
      lastTickAt: this.lastTickAt ? this.lastTickAt.toISOString() : null,
    };
  }

  // ==========================================================================
  // Ticking
  // ==========================================================================

  /**
   * Execute a single tick and commit each vessel's new row
   *
   * A vessel whose write fails keeps its previous state for this tick; the
   * next tick computes from that state again.
   */
  runTick(speedMultiplier: number = this.speedMultiplier): TickSummary {
    const advance = this.clock.advance(speedMultiplier);
    const result = this.simulation.step(this.arena.values(), advance.simulatedSeconds, advance.now);
    const tick = this.tickCount + 1;

    const committed = new Set<VesselId>();
    let failed = 0;

    for (const next of result.states) {
      try {
        this.store.updateState(next);
        this.arena.set(next.vesselId, next);
        committed.add(next.vesselId);
      } catch (error) {
        failed++;
        this.persistenceFailures++;
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[SimulationController] Tick ${tick}: dropped update for ${next.vesselId}: ${message}`);
        this.publish({
          type: 'persistence-failure',
          data: { vesselId: next.vesselId, tick, message },
        });
      }
    }

    const transitions = result.transitions.filter((t) => committed.has(t.vesselId));
    for (const transition of transitions) {
      console.log(
        `[SimulationController] ${transition.vesselId}: ${transition.from} -> ${transition.to} at ${transition.energyLevel.toFixed(1)}%`
      );
      this.publish({ type: 'transition', data: transition });
    }

    for (const arrival of result.arrivals) {
      if (committed.has(arrival.vesselId)) {
        console.log(`[SimulationController] ${arrival.vesselId}: waypoint ${arrival.fromIndex} -> ${arrival.toIndex}`);
      }
    }

    this.tickCount = tick;
    this.lastTickAt = advance.now;
    this.publishSnapshot();

    return {
      tick,
      simulatedSeconds: advance.simulatedSeconds,
      updated: committed.size,
      failed,
      transitions,
    };
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  getSnapshot(): FleetSnapshot {
    return this.snapshot;
  }

  getVessel(id: VesselId): VesselStatus {
    const vessel = this.snapshot.vessels.find((v) => v.id === id);
    if (!vessel) {
      throw new NotFoundFailure(`Vessel ${id} not found`);
    }
    return vessel;
  }

  /**
   * Serve a fleet read with an optional speed multiplier
   *
   * The multiplier is validated before anything else happens. In request mode
   * a running controller ticks once with it; in interval mode it becomes the
   * multiplier for subsequent ticks.
   */
  readFleet(speedMultiplier?: number): FleetSnapshot {
    const multiplier =
      speedMultiplier === undefined ? undefined : validateSpeedMultiplier(speedMultiplier, this.config);

    if (this.tickMode === 'request') {
      if (this.status === 'running') {
        this.runTick(multiplier ?? 1);
      }
    } else if (multiplier !== undefined && multiplier !== this.speedMultiplier) {
      this.setSpeed(multiplier);
    }

    return this.snapshot;
  }

  /**
   * Restore every vessel to its initial state
   *
   * Ticks are suspended for the duration. If the store rolls back, the arena and
   * the published snapshot still hold the pre-reset fleet and the error propagates.
   */
  reset(): number {
    const wasRunning = this.status === 'running';
    if (wasRunning) this.pause();

    try {
      const count = this.store.resetAll(this.clock.now());
      this.loadFromStore();
      this.clock.reset();
      this.publishSnapshot();
      this.publish({ type: 'reset', data: { boatsReset: count } });
      console.log(`[SimulationController] Reset ${count} vessels`);
      return count;
    } finally {
      if (wasRunning) this.resume();
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private loadFromStore(): void {
    const rows = this.store.getAllWithStates();
    const vessels = new Map<VesselId, Vessel>();
    const arena = new Map<VesselId, VesselState>();

    for (const { vessel, state } of rows) {
      vessels.set(vessel.id, vessel);
      arena.set(vessel.id, state);
    }

    this.vessels = vessels;
    this.arena = arena;
  }

  private publishSnapshot(): void {
    this.snapshot = serializeFleet(this.vessels.values(), this.arena, this.tickCount, this.clock.now());
    this.publish({ type: 'snapshot', data: this.snapshot });
  }

  private startTimer(): void {
    if (this.tickMode !== 'interval' || this.tickInterval) return;
    this.tickInterval = setInterval(() => this.scheduledTick(), this.tickIntervalMs);
  }

  private stopTimer(): void {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
  }

  private scheduledTick(): void {
    if (this.status !== 'running') return;

    try {
      this.runTick();
    } catch (error) {
      console.error('[SimulationController] Tick error:', error);
    }
  }
}
