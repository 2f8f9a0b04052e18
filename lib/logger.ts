import { Logger, type ILogObj } from 'tslog';

const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6
};

function resolveLogType(): 'json' | 'pretty' | 'hidden' {
  if (process.env.NODE_ENV === 'test') {
    return 'hidden';
  }
  return process.env.PINGWATCH_LOG_FORMAT === 'json' ? 'json' : 'pretty';
}

function resolveMinLevel(): number {
  const configured = (process.env.PINGWATCH_LOG_LEVEL || '').trim().toLowerCase();
  return LOG_LEVELS[configured] ?? LOG_LEVELS.info;
}

export type AppLogger = Logger<ILogObj>;

export const rootLogger: AppLogger = new Logger<ILogObj>({
  name: 'pingwatch',
  type: resolveLogType(),
  minLevel: resolveMinLevel()
});

export function createLogger(name: string): AppLogger {
  return rootLogger.getSubLogger({ name });
}
