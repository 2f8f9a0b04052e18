import { appendFile, readFile, rename, writeFile } from 'node:fs/promises';
import { errorMessage, hasErrorCode, LogWriteError } from './errors';
import { formatTimestamp } from './format';
import type { AppLogger } from './logger';
import type { RoundResult } from './types';

export const DEFAULT_RETENTION_HOURS = 24;
export const DEFAULT_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

const HOUR_MS = 60 * 60 * 1000;
const ENTRY_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) - (.+?) \(([^)]*)\): (.+)$/;

export type DeviationLogOptions = {
  path: string;
  retentionHours?: number;
  cleanupIntervalMs?: number;
  logger: AppLogger;
  now?: () => Date;
};

export type ParsedEntry = {
  timestamp: Date;
  target: string;
  address: string;
  value: string;
};

export function formatDeviationValue(result: RoundResult): string {
  if (result.outcome === 'success' && result.latencyMs !== null) {
    return `${Math.round(result.latencyMs)}ms`;
  }
  return result.outcome === 'timeout' ? 'TIMEOUT' : 'ERROR';
}

export function formatDeviationLine(result: RoundResult): string {
  return `${formatTimestamp(result.timestamp)} - ${result.target.name} (${result.target.address}): ${formatDeviationValue(result)}\n`;
}

export function parseDeviationLine(line: string): ParsedEntry | undefined {
  const match = line.match(ENTRY_PATTERN);
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hours, minutes, seconds, target, address, value] = match;
  const timestamp = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds)
  );
  if (Number.isNaN(timestamp.getTime())) {
    return undefined;
  }
  return { timestamp, target, address, value };
}

/**
 * Append-only text log of adverse probe results with age-based retention.
 *
 * Appends and cleanups go through one write queue, so a cleanup never
 * rewrites the file underneath a pending append.
 */
export class DeviationLog {
  readonly path: string;
  private readonly retentionHours: number;
  private readonly cleanupIntervalMs: number;
  private readonly logger: AppLogger;
  private readonly now: () => Date;
  private readonly lastRounds = new Map<string, number>();
  private cleanupTimer: NodeJS.Timeout | undefined;
  private writes: Promise<unknown> = Promise.resolve();

  constructor(options: DeviationLogOptions) {
    this.path = options.path;
    this.retentionHours = options.retentionHours ?? DEFAULT_RETENTION_HOURS;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async append(result: RoundResult): Promise<boolean> {
    const lastRound = this.lastRounds.get(result.target.name) ?? 0;
    if (result.round <= lastRound) {
      return false;
    }
    this.lastRounds.set(result.target.name, result.round);

    const line = formatDeviationLine(result);
    await this.enqueue(async () => {
      try {
        await appendFile(this.path, line, 'utf8');
      } catch (err) {
        throw new LogWriteError(`Failed to append to ${this.path}: ${errorMessage(err)}`, { cause: err });
      }
    });
    return true;
  }

  /**
   * Drops entries older than the retention horizon. Lines that do not parse
   * are kept. Returns the number of removed lines.
   */
  cleanup(): Promise<number> {
    return this.enqueue(() => this.removeExpired());
  }

  private async removeExpired(): Promise<number> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return 0;
      }
      throw new LogWriteError(`Failed to read ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    if (!content) {
      return 0;
    }

    const cutoff = this.now().getTime() - this.retentionHours * HOUR_MS;
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }

    const kept = lines.filter((line) => {
      const entry = parseDeviationLine(line);
      return !entry || entry.timestamp.getTime() > cutoff;
    });

    const removed = lines.length - kept.length;
    if (removed === 0) {
      return 0;
    }

    const tempPath = `${this.path}.tmp`;
    try {
      await writeFile(tempPath, kept.map((line) => `${line}\n`).join(''), 'utf8');
      await rename(tempPath, this.path);
    } catch (err) {
      throw new LogWriteError(`Failed to rewrite ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    this.logger.info(`Removed ${removed} deviation entr${removed === 1 ? 'y' : 'ies'} older than ${this.retentionHours}h`);
    return removed;
  }

  async countRecent(targetName: string, hours: number = this.retentionHours): Promise<number> {
    const counts = await this.countRecentByTarget(hours);
    return counts[targetName] ?? 0;
  }

  /** Entries per target name within the last `hours`, from a single read. */
  async countRecentByTarget(hours: number = this.retentionHours): Promise<Record<string, number>> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return {};
      }
      throw new LogWriteError(`Failed to read ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    const cutoff = this.now().getTime() - hours * HOUR_MS;
    const counts: Record<string, number> = {};
    for (const line of content.split('\n')) {
      const entry = parseDeviationLine(line);
      if (entry && entry.timestamp.getTime() > cutoff) {
        counts[entry.target] = (counts[entry.target] ?? 0) + 1;
      }
    }
    return counts;
  }

  startCleanup(): void {
    if (this.cleanupTimer) {
      return;
    }
    this.cleanupTimer = setInterval(() => {
      this.cleanup().catch((err) => {
        this.logger.error(`Deviation log cleanup failed: ${errorMessage(err)}`);
      });
    }, this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(task, task);
    // the queue only orders writes; failures reach the caller through `run`
    this.writes = run.catch(() => undefined);
    return run;
  }
}
