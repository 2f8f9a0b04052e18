export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProbeTimeoutError extends MonitorError {}

export class ProbeTransportError extends MonitorError {}

export class LogWriteError extends MonitorError {}

export class LockFileError extends MonitorError {}

/**
 * Raised while loading configuration. Fatal at startup only.
 */
export class ConfigError extends MonitorError {
  constructor(
    readonly field: string,
    message: string
  ) {
    super(`Invalid config "${field}": ${message}`);
  }
}

export class UnknownTargetError extends MonitorError {
  constructor(readonly target: string) {
    super(`Unknown target: ${target}`);
  }
}

/**
 * Shape checks: errors from Node's fs and process APIs can come from another
 * realm, where `instanceof Error` is false.
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
