import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { DEFAULT_THRESHOLDS } from './classifier';
import { DEFAULT_CLEANUP_INTERVAL_MS, DEFAULT_RETENTION_HOURS } from './deviation-log';
import { ConfigError, errorMessage, hasErrorCode } from './errors';
import { DEFAULT_PROBE_TIMEOUT_MS } from './ping';
import type { MonitorConfig, Target, Thresholds } from './types';

const DEFAULT_CONFIG_PATH = 'monitor.config.json';

const DEFAULT_TARGETS: Target[] = [
  { name: 'cloudflare', address: '1.1.1.1' },
  { name: 'google', address: '8.8.8.8' },
  { name: 'quad9', address: '9.9.9.9' }
];

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function positiveNumber(field: string, value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = toNumber(value);
  if (parsed === undefined || parsed <= 0) {
    throw new ConfigError(field, `expected a positive number, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function nonEmptyString(field: string, value: unknown, fallback: string): string {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || !value.trim()) {
    throw new ConfigError(field, 'expected a non-empty string');
  }
  return value.trim();
}

function section(field: string, value: unknown): Record<string, unknown> {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(field, 'expected an object');
  }
  return value;
}

function parseTargets(value: unknown): Target[] {
  if (value === undefined) {
    return DEFAULT_TARGETS;
  }
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('targets', 'expected a non-empty array');
  }

  const seen = new Set<string>();
  return value.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new ConfigError(`targets[${index}]`, 'expected an object with name and address');
    }
    const name = nonEmptyString(`targets[${index}].name`, entry.name ?? null, '');
    const address = nonEmptyString(`targets[${index}].address`, entry.address ?? null, '');
    if (seen.has(name)) {
      throw new ConfigError(`targets[${index}].name`, `duplicate target name "${name}"`);
    }
    seen.add(name);
    return { name, address };
  });
}

function parseThresholds(value: unknown): Thresholds {
  const raw = section('thresholds', value);
  const thresholds: Thresholds = {
    excellentBelowMs: positiveNumber('thresholds.excellentBelowMs', raw.excellentBelowMs, DEFAULT_THRESHOLDS.excellentBelowMs),
    goodUpToMs: positiveNumber('thresholds.goodUpToMs', raw.goodUpToMs, DEFAULT_THRESHOLDS.goodUpToMs),
    deviationMs: positiveNumber('thresholds.deviationMs', raw.deviationMs, DEFAULT_THRESHOLDS.deviationMs)
  };
  if (thresholds.goodUpToMs < thresholds.excellentBelowMs) {
    throw new ConfigError('thresholds.goodUpToMs', 'must not be below thresholds.excellentBelowMs');
  }
  return thresholds;
}

/**
 * Builds a validated config from parsed JSON plus environment overrides.
 */
export function parseConfig(raw: unknown, env: Env = process.env): MonitorConfig {
  const file = section('config', raw);
  const log = section('deviationLog', file.deviationLog);

  const targets = parseTargets(file.targets);
  const primaryTarget = nonEmptyString('primaryTarget', file.primaryTarget, targets[0].name);
  if (!targets.some((target) => target.name === primaryTarget)) {
    throw new ConfigError('primaryTarget', `"${primaryTarget}" is not a configured target`);
  }

  const intervalMs = positiveNumber('intervalMs', env.PINGWATCH_INTERVAL_MS ?? file.intervalMs, 1000);
  const probeTimeoutMs = positiveNumber(
    'probeTimeoutMs',
    env.PINGWATCH_PROBE_TIMEOUT_MS ?? file.probeTimeoutMs,
    DEFAULT_PROBE_TIMEOUT_MS
  );

  const warmUp = file.warmUp ?? true;
  if (typeof warmUp !== 'boolean') {
    throw new ConfigError('warmUp', 'expected a boolean');
  }

  return {
    targets,
    primaryTarget,
    intervalMs,
    probeTimeoutMs,
    preservedMinutes: positiveNumber('preservedMinutes', file.preservedMinutes, 10),
    thresholds: parseThresholds(file.thresholds),
    deviationLog: {
      path: nonEmptyString('deviationLog.path', env.PINGWATCH_DEVIATION_LOG ?? log.path, 'deviations.txt'),
      retentionHours: positiveNumber('deviationLog.retentionHours', log.retentionHours, DEFAULT_RETENTION_HOURS),
      cleanupIntervalMs: positiveNumber(
        'deviationLog.cleanupIntervalMs',
        log.cleanupIntervalMs,
        DEFAULT_CLEANUP_INTERVAL_MS
      )
    },
    lockFile: nonEmptyString('lockFile', env.PINGWATCH_LOCK_FILE ?? file.lockFile, 'pingwatch.lock'),
    warmUp,
    pingCommand: nonEmptyString('pingCommand', env.PINGWATCH_PING_BIN ?? file.pingCommand, 'ping')
  };
}

/**
 * Reads the JSON config named by PINGWATCH_CONFIG (default
 * `monitor.config.json`). A missing file yields the defaults.
 */
export function loadConfig(env: Env = process.env): MonitorConfig {
  const path = resolve(env.PINGWATCH_CONFIG || DEFAULT_CONFIG_PATH);

  let raw: unknown = {};
  let text: string | undefined;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    if (!hasErrorCode(err, 'ENOENT')) {
      throw new ConfigError('config', `cannot read ${path}: ${errorMessage(err)}`);
    }
  }

  if (text !== undefined) {
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError('config', `${path} is not valid JSON: ${errorMessage(err)}`);
    }
  }

  return parseConfig(raw, env);
}
