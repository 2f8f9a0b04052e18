import { UnknownTargetError } from './errors';
import { RingBuffer } from './ring-buffer';
import type { RoundResult, Target, TargetStatistics } from './types';

type TargetTrack = {
  target: Target;
  history: RingBuffer<RoundResult>;
  deviations: number;
  lastRound: number;
};

export function historyCapacity(preservedMinutes: number, intervalMs: number): number {
  const intervalSeconds = intervalMs / 1000;
  return Math.max(1, Math.floor((preservedMinutes * 60) / intervalSeconds));
}

/**
 * Rolling per-target statistics over the preserved history window.
 *
 * The deviation counter is not bounded by the window; it only drops back to
 * zero on reset.
 */
export class StatisticsTracker {
  private readonly tracks = new Map<string, TargetTrack>();

  constructor(targets: Target[], readonly capacity: number) {
    for (const target of targets) {
      this.tracks.set(target.name, {
        target,
        history: new RingBuffer<RoundResult>(capacity),
        deviations: 0,
        lastRound: 0
      });
    }
  }

  targets(): Target[] {
    return Array.from(this.tracks.values(), (track) => track.target);
  }

  /** Returns false when the result was already recorded. */
  record(result: RoundResult): boolean {
    const track = this.track(result.target.name);
    if (result.round <= track.lastRound) {
      return false;
    }

    track.lastRound = result.round;
    track.history.push(result);
    if (result.isDeviation) {
      track.deviations += 1;
    }
    return true;
  }

  history(name: string): RoundResult[] {
    return this.track(name).history.toArray();
  }

  get(name: string): TargetStatistics {
    const track = this.track(name);
    const history = track.history.toArray();
    const latencies = history
      .map((result) => result.latencyMs)
      .filter((value): value is number => typeof value === 'number');

    let averageMs: number | null = null;
    let minMs: number | null = null;
    let maxMs: number | null = null;
    if (latencies.length > 0) {
      averageMs = latencies.reduce((total, value) => total + value, 0) / latencies.length;
      minMs = Math.min(...latencies);
      maxMs = Math.max(...latencies);
    }

    return {
      target: track.target.name,
      address: track.target.address,
      averageMs,
      minMs,
      maxMs,
      deviations: track.deviations,
      samples: history.length,
      latencySamples: latencies.length
    };
  }

  all(): TargetStatistics[] {
    return Array.from(this.tracks.keys(), (name) => this.get(name));
  }

  reset(name: string): void {
    const track = this.track(name);
    track.history.clear();
    track.deviations = 0;
  }

  resetAll(): void {
    for (const name of this.tracks.keys()) {
      this.reset(name);
    }
  }

  private track(name: string): TargetTrack {
    const track = this.tracks.get(name);
    if (!track) {
      throw new UnknownTargetError(name);
    }
    return track;
  }
}
