import type { ClassifiedResult, ProbeResult, Severity, Thresholds } from './types';

export const DEFAULT_THRESHOLDS: Thresholds = {
  excellentBelowMs: 40,
  goodUpToMs: 60,
  deviationMs: 60
};

/** Window signal used by the health aggregator. */
export type HealthSignal = 'green' | 'yellow' | 'bad';

export function severityOf(latencyMs: number, thresholds: Thresholds): Severity {
  if (latencyMs < thresholds.excellentBelowMs) {
    return 'excellent';
  }
  if (latencyMs <= thresholds.goodUpToMs) {
    return 'good';
  }
  return 'bad';
}

export function classify(result: ProbeResult, thresholds: Thresholds = DEFAULT_THRESHOLDS): ClassifiedResult {
  if (result.outcome !== 'success' || result.latencyMs === null) {
    return { ...result, severity: 'bad', isDeviation: true };
  }

  return {
    ...result,
    severity: severityOf(result.latencyMs, thresholds),
    isDeviation: result.latencyMs >= thresholds.deviationMs
  };
}

export function toSignal(severity: Severity): HealthSignal {
  if (severity === 'excellent') return 'green';
  if (severity === 'good') return 'yellow';
  return 'bad';
}
