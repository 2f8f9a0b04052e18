import type { Subscription } from 'rxjs';
import { formatResultLine } from './format';
import type { NetworkMonitor } from './monitor';
import type { RoundResult, Severity, Target, TargetStatistics } from './types';

export type FeedLine = {
  seq: number;
  target: string;
  round: number;
  text: string;
  tone: Severity;
  latencyMs: number | null;
};

export type FeedPage = {
  lines: FeedLine[];
  lastSeq: number;
  statistics: Record<string, TargetStatistics>;
};

/**
 * Adds fetched lines to the per-target lists the window holds, skipping any
 * line at or below the newest sequence number already held for its target.
 */
export function mergeFeedLines(
  current: Record<string, FeedLine[]>,
  incoming: FeedLine[],
  limit: number
): Record<string, FeedLine[]> {
  const next = { ...current };
  for (const line of incoming) {
    const existing = next[line.target] ?? [];
    const newest = existing[existing.length - 1]?.seq ?? 0;
    if (line.seq <= newest) {
      continue;
    }
    next[line.target] = [...existing, line].slice(-limit);
  }
  return next;
}

/**
 * Window-side consumer: formatted log lines per target plus the latest
 * statistics, readable incrementally by sequence number.
 */
export class WindowFeed {
  private readonly lines = new Map<string, FeedLine[]>();
  private readonly latest = new Map<string, TargetStatistics>();
  private seq = 0;
  private subscription: Subscription | undefined;

  constructor(
    targets: Target[],
    private readonly capacity: number
  ) {
    for (const target of targets) {
      this.lines.set(target.name, []);
    }
  }

  attach(monitor: NetworkMonitor): void {
    this.detach();
    this.subscription = monitor.onResult((target, result, statistics) => this.push(target, result, statistics));
  }

  detach(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
  }

  push(target: Target, result: RoundResult, statistics: TargetStatistics): void {
    const lines = this.lines.get(target.name);
    if (!lines) {
      return;
    }

    this.seq += 1;
    lines.push({
      seq: this.seq,
      target: target.name,
      round: result.round,
      text: formatResultLine(result),
      tone: result.severity,
      latencyMs: result.latencyMs
    });
    if (lines.length > this.capacity) {
      lines.splice(0, lines.length - this.capacity);
    }
    this.latest.set(target.name, statistics);
  }

  /** Lines newer than `after`, oldest first. */
  since(after: number): FeedPage {
    const lines: FeedLine[] = [];
    for (const targetLines of this.lines.values()) {
      for (const line of targetLines) {
        if (line.seq > after) {
          lines.push(line);
        }
      }
    }
    lines.sort((a, b) => a.seq - b.seq);

    return {
      lines,
      lastSeq: this.seq,
      statistics: Object.fromEntries(this.latest)
    };
  }

  clear(target?: string): void {
    if (target === undefined) {
      for (const name of this.lines.keys()) {
        this.clear(name);
      }
      return;
    }
    this.lines.get(target)?.splice(0);
    this.latest.delete(target);
  }
}
