export type ProbeOutcome = 'success' | 'timeout' | 'error';

export type Severity = 'excellent' | 'good' | 'bad';

export type HealthState = 'unknown' | 'green' | 'red';

export interface Target {
  name: string;
  address: string;
}

export interface ProbeResult {
  target: Target;
  latencyMs: number | null;
  timestamp: Date;
  outcome: ProbeOutcome;
  error?: string;
}

export interface ClassifiedResult extends ProbeResult {
  severity: Severity;
  isDeviation: boolean;
}

export interface RoundResult extends ClassifiedResult {
  round: number;
}

export interface Thresholds {
  excellentBelowMs: number;
  goodUpToMs: number;
  deviationMs: number;
}

export interface TargetStatistics {
  target: string;
  address: string;
  averageMs: number | null;
  minMs: number | null;
  maxMs: number | null;
  deviations: number;
  samples: number;
  latencySamples: number;
}

export interface HealthChange {
  previous: HealthState;
  current: HealthState;
  round: number;
  at: Date;
}

export type RoundPhase = 'idle' | 'dispatching' | 'collecting' | 'fanning-out';

export type MonitorState = 'created' | 'starting' | 'running' | 'stopping' | 'stopped';

export interface MonitorConfig {
  targets: Target[];
  primaryTarget: string;
  intervalMs: number;
  probeTimeoutMs: number;
  preservedMinutes: number;
  thresholds: Thresholds;
  deviationLog: {
    path: string;
    retentionHours: number;
    cleanupIntervalMs: number;
  };
  lockFile: string;
  warmUp: boolean;
  pingCommand: string;
}

export interface MonitorSnapshot {
  state: MonitorState;
  phase: RoundPhase;
  round: number;
  health: HealthState;
  primaryTarget: string;
  intervalMs: number;
  targets: TargetStatistics[];
}
