import { toSignal, type HealthSignal } from './classifier';
import { RingBuffer } from './ring-buffer';
import type { HealthChange, HealthState, RoundResult } from './types';

const LOOKBACK_SECONDS = 10;

/**
 * Number of consecutive samples covering the lookback, at most ten.
 */
export function healthWindowSize(intervalMs: number): number {
  const intervalSeconds = intervalMs / 1000;
  return Math.max(1, Math.min(LOOKBACK_SECONDS, Math.floor(LOOKBACK_SECONDS / intervalSeconds)));
}

/**
 * Traffic light for the primary target.
 *
 * The first result sets the light on its own. After that the light only
 * flips once a full window agrees: no green sample turns it red, no bad
 * sample turns it green. Yellow samples count for both sides, so a window
 * mixing green and bad leaves the light where it was.
 */
export class HealthAggregator {
  private readonly window: RingBuffer<HealthSignal>;
  private state: HealthState = 'unknown';
  private lastRound = 0;
  private bootstrapped = false;

  constructor(readonly windowSize: number) {
    this.window = new RingBuffer<HealthSignal>(windowSize);
  }

  current(): HealthState {
    return this.state;
  }

  record(result: RoundResult): HealthChange | null {
    if (result.round <= this.lastRound) {
      return null;
    }
    this.lastRound = result.round;

    const signal = toSignal(result.severity);

    if (!this.bootstrapped) {
      this.bootstrapped = true;
      return this.transition(signal === 'bad' ? 'red' : 'green', result);
    }

    this.window.push(signal);
    if (this.window.size < this.windowSize) {
      return null;
    }

    const samples = this.window.toArray();
    let candidate = this.state;
    if (!samples.includes('green')) {
      candidate = 'red';
    } else if (!samples.includes('bad')) {
      candidate = 'green';
    }

    return this.transition(candidate, result);
  }

  private transition(candidate: HealthState, result: RoundResult): HealthChange | null {
    if (candidate === this.state) {
      return null;
    }

    const change: HealthChange = {
      previous: this.state,
      current: candidate,
      round: result.round,
      at: result.timestamp
    };
    this.state = candidate;
    return change;
  }
}
