import { RivetError } from '../errors.js';

export type LoadPattern = 'constant' | 'ramp-up' | 'spike';

export const LOAD_PATTERNS: readonly LoadPattern[] = ['constant', 'ramp-up', 'spike'];

const SPIKE_CYCLE_MS = 30_000;
const SPIKE_LENGTH_MS = 5_000;
const SPIKE_MULTIPLIER = 2;

export function parseLoadPattern(name: string): LoadPattern {
  const pattern = LOAD_PATTERNS.find(p => p === name);
  if (!pattern) {
    throw new RivetError('CONFIG', `Invalid load pattern '${name}'. Use: ${LOAD_PATTERNS.join(', ')}`);
  }
  return pattern;
}

export interface LoadControllerOptions {
  pattern: LoadPattern;
  targetRps?: number;
  concurrentUsers: number;
  /** Length of the ramp for `ramp-up`, in milliseconds */
  warmupDuration: number;
  now?: () => number;
}

/**
 * Computes the target request rate from the time elapsed since construction.
 * Holds no state besides its start time, so every worker can consult the
 * same instance.
 */
export class LoadController {
  private readonly pattern: LoadPattern;
  private readonly targetRps?: number;
  private readonly concurrentUsers: number;
  private readonly warmupDuration: number;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(options: LoadControllerOptions) {
    this.pattern = options.pattern;
    this.targetRps = options.targetRps;
    this.concurrentUsers = options.concurrentUsers;
    this.warmupDuration = options.warmupDuration;
    this.now = options.now ?? (() => performance.now());
    this.startedAt = this.now();
  }

  elapsed(): number {
    return this.now() - this.startedAt;
  }

  get baseRps(): number {
    return this.targetRps ?? this.concurrentUsers * 10;
  }

  currentTargetRps(elapsed = this.elapsed()): number {
    const base = this.baseRps;

    switch (this.pattern) {
      case 'constant':
        return base;
      case 'ramp-up':
        if (elapsed < this.warmupDuration) {
          return base * (elapsed / this.warmupDuration);
        }
        return base;
      case 'spike':
        return elapsed % SPIKE_CYCLE_MS < SPIKE_LENGTH_MS ? base * SPIKE_MULTIPLIER : base;
    }
  }

  currentConcurrentUsers(elapsed = this.elapsed()): number {
    switch (this.pattern) {
      case 'constant':
        return this.concurrentUsers;
      case 'ramp-up':
        if (elapsed < this.warmupDuration) {
          return Math.floor(Math.max(this.concurrentUsers * (elapsed / this.warmupDuration), 1));
        }
        return this.concurrentUsers;
      case 'spike':
        return elapsed % SPIKE_CYCLE_MS < SPIKE_LENGTH_MS ? this.concurrentUsers * SPIKE_MULTIPLIER : this.concurrentUsers;
    }
  }

  /**
   * Whole milliseconds to wait between two requests of one worker, or
   * undefined when no target RPS was configured. Each worker applies the
   * full delay on its own, so total throughput grows with the worker count.
   * While a ramp is still at zero the delay is capped at one second.
   */
  requestDelay(elapsed = this.elapsed()): number | undefined {
    if (this.targetRps === undefined) {
      return undefined;
    }
    const rps = this.currentTargetRps(elapsed);
    if (rps <= 1) {
      return 1000;
    }
    return Math.floor(1000 / rps);
  }

  currentPhaseDescription(elapsed = this.elapsed()): string {
    switch (this.pattern) {
      case 'constant':
        return 'Constant load';
      case 'ramp-up':
        if (elapsed < this.warmupDuration) {
          return `Ramping up (${Math.floor((elapsed / this.warmupDuration) * 100)}%)`;
        }
        return 'Full load';
      case 'spike': {
        const cycle = elapsed % SPIKE_CYCLE_MS;
        if (cycle < SPIKE_LENGTH_MS) {
          return `Spike phase (${((SPIKE_LENGTH_MS - cycle) / 1000).toFixed(1)}s remaining)`;
        }
        return `Normal phase (${((SPIKE_CYCLE_MS - cycle) / 1000).toFixed(1)}s to spike)`;
      }
    }
  }
}
