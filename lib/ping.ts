import { spawn } from 'node:child_process';
import { errorMessage, ProbeTimeoutError, ProbeTransportError } from './errors';
import type { AppLogger } from './logger';
import type { ProbeResult, Target } from './types';

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export type ProbeFn = (target: Target, timeoutMs: number) => Promise<ProbeResult>;

export type PingOptions = {
  command?: string;
  platform?: NodeJS.Platform;
};

export function buildPingArgs(
  address: string,
  timeoutMs: number,
  platform: NodeJS.Platform = process.platform
): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-w', String(timeoutMs), address];
  }
  if (platform === 'darwin') {
    return ['-c', '1', '-W', String(timeoutMs), address];
  }
  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return ['-c', '1', '-W', String(seconds), address];
}

export function parseLatencyMs(text: string): number | undefined {
  const match = text.match(/time\s*[=<]\s*([0-9]+(?:\.[0-9]+)?)\s*ms\b/i);
  if (!match) {
    return undefined;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

/** A timeout error maps to a `timeout` outcome, anything else to `error`. */
export function failedProbe(target: Target, error: ProbeTimeoutError | ProbeTransportError): ProbeResult {
  return {
    target,
    latencyMs: null,
    timestamp: new Date(),
    outcome: error instanceof ProbeTimeoutError ? 'timeout' : 'error',
    error: error.message
  };
}

/**
 * Sends one echo request through the system ping binary.
 *
 * Resolves within `timeoutMs`; every failure is reported as a timeout or
 * error result.
 */
export function probeHost(target: Target, timeoutMs: number, options: PingOptions = {}): Promise<ProbeResult> {
  const command = options.command || 'ping';
  const args = buildPingArgs(target.address, timeoutMs, options.platform);

  return new Promise<ProbeResult>((resolve) => {
    let stdout = '';
    let settled = false;

    const settle = (result: ProbeResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      resolve(result);
    };

    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'ignore'],
        windowsHide: true
      });
    } catch (err) {
      resolve(failedProbe(target, new ProbeTransportError(errorMessage(err), { cause: err })));
      return;
    }

    const timeout = setTimeout(() => {
      child.kill('SIGTERM');
      settle(failedProbe(target, new ProbeTimeoutError(`ping timed out after ${timeoutMs}ms`)));
    }, timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf8');
    });

    child.on('error', (err: Error) => {
      settle(failedProbe(target, new ProbeTransportError(err.message, { cause: err })));
    });

    child.on('close', (code: number | null) => {
      if (code !== 0) {
        const reason = code === null ? 'ping terminated' : `ping exited with code ${code}`;
        settle(failedProbe(target, new ProbeTimeoutError(reason)));
        return;
      }

      settle({
        target,
        latencyMs: parseLatencyMs(stdout) ?? 0,
        timestamp: new Date(),
        outcome: 'success'
      });
    });
  });
}

export function createPingProbe(options: PingOptions = {}): ProbeFn {
  return (target, timeoutMs) => probeHost(target, timeoutMs, options);
}

/**
 * Probes every target once and discards the results, so DNS, ARP and
 * connection setup do not land in the first real round.
 */
export async function warmUp(
  targets: Target[],
  probe: ProbeFn,
  timeoutMs: number,
  logger: AppLogger
): Promise<void> {
  const outcomes = await Promise.allSettled(targets.map((target) => probe(target, timeoutMs)));
  outcomes.forEach((outcome, index) => {
    const name = targets[index]?.name ?? 'unknown';
    if (outcome.status === 'rejected') {
      logger.debug(`Warm-up probe for ${name} failed: ${errorMessage(outcome.reason)}`);
    } else if (outcome.value.outcome !== 'success') {
      logger.debug(`Warm-up probe for ${name}: ${outcome.value.outcome}`);
    }
  });
}
