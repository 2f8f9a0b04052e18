import { readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { errorMessage, hasErrorCode, LockFileError } from './errors';
import type { AppLogger } from './logger';

export type ProcessProbe = (pid: number) => boolean;

/**
 * Signal 0 checks for existence without delivering anything. EPERM means
 * the process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return hasErrorCode(err, 'EPERM');
  }
}

function readHolderPid(path: string): number | undefined {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      return undefined;
    }
    throw new LockFileError(`Failed to read lock file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  const pid = Number(text.trim());
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

/**
 * PID lock file guarding against a second running instance.
 */
export class InstanceLock {
  private held = false;

  constructor(
    readonly path: string,
    private readonly logger: AppLogger,
    private readonly isAlive: ProcessProbe = isProcessAlive,
    private readonly pid: number = process.pid
  ) {}

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Returns false when another live process holds the lock. Lock file I/O
   * failures are logged and startup is allowed.
   */
  acquire(): boolean {
    try {
      const holder = readHolderPid(this.path);
      if (holder !== undefined && holder !== this.pid && this.isAlive(holder)) {
        this.logger.warn(`Another instance is already running (pid ${holder})`);
        return false;
      }

      try {
        writeFileSync(this.path, String(this.pid), 'utf8');
      } catch (err) {
        throw new LockFileError(`Failed to write lock file ${this.path}: ${errorMessage(err)}`, { cause: err });
      }
      this.held = true;
      return true;
    } catch (err) {
      this.logger.warn(`Lock file check failed: ${errorMessage(err)}`);
      return true;
    }
  }

  release(): void {
    if (!this.held) {
      return;
    }
    this.held = false;

    try {
      if (readHolderPid(this.path) === this.pid) {
        unlinkSync(this.path);
      }
    } catch (err) {
      this.logger.error(`Failed to remove lock file ${this.path}: ${errorMessage(err)}`);
    }
  }
}
