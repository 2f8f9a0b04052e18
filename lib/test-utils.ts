import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { classify, DEFAULT_THRESHOLDS } from './classifier';
import type { MonitorConfig, ProbeOutcome, ProbeResult, RoundResult, Target } from './types';

export const TARGET_A: Target = { name: 'A', address: '10.0.0.1' };
export const TARGET_B: Target = { name: 'B', address: '10.0.0.2' };
export const TARGET_C: Target = { name: 'C', address: '10.0.0.3' };

export function probeResult(
  target: Target,
  latencyMs: number | null,
  outcome: ProbeOutcome = latencyMs === null ? 'timeout' : 'success',
  timestamp: Date = new Date(2026, 0, 15, 12, 0, 0)
): ProbeResult {
  return { target, latencyMs, outcome, timestamp };
}

/** A classified result for `round`; `null` latency means a timeout. */
export function roundResult(target: Target, round: number, latencyMs: number | null): RoundResult {
  return { ...classify(probeResult(target, latencyMs), DEFAULT_THRESHOLDS), round };
}

export function testConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    targets: [TARGET_A, TARGET_B, TARGET_C],
    primaryTarget: 'A',
    intervalMs: 1000,
    probeTimeoutMs: 500,
    preservedMinutes: 10,
    thresholds: DEFAULT_THRESHOLDS,
    deviationLog: {
      path: 'deviations.txt',
      retentionHours: 24,
      cleanupIntervalMs: 60 * 60 * 1000
    },
    lockFile: 'pingwatch.lock',
    warmUp: false,
    pingCommand: 'ping',
    ...overrides
  };
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'pingwatch-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Lets queued microtasks and asap deliveries run. */
export function flush(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
