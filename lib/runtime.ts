import { loadConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { InstanceLock } from './instance-lock';
import { createLogger } from './logger';
import { NetworkMonitor } from './monitor';
import { historyCapacity } from './statistics';
import { TrayIndicator, type TrayIntent } from './tray';
import type { MonitorConfig } from './types';
import { WindowFeed } from './window-feed';

const logger = createLogger('runtime');

export type MonitorRuntime = {
  monitor: NetworkMonitor;
  feed: WindowFeed;
  tray: TrayIndicator;
  lock: InstanceLock;
  quit: (exitCode?: number) => Promise<void>;
  dispatch: (intent: TrayIntent, target?: string) => void;
};

declare global {
  // eslint-disable-next-line no-var -- shared between route bundles
  var __pingwatchRuntime: Promise<MonitorRuntime> | undefined;
}

function exit(code: number): never {
  process.exit(code);
}

async function boot(): Promise<MonitorRuntime> {
  let config: MonitorConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal(err.message);
      return exit(1);
    }
    throw err;
  }

  const lock = new InstanceLock(config.lockFile, logger);
  if (!lock.acquire()) {
    logger.fatal('Another instance of pingwatch is already running');
    return exit(1);
  }

  const monitor = new NetworkMonitor(config);
  const feed = new WindowFeed(config.targets, historyCapacity(config.preservedMinutes, config.intervalMs));
  let quitting: Promise<void> | undefined;

  const quit = (exitCode = 0): Promise<void> => {
    if (!quitting) {
      quitting = (async () => {
        logger.info('Shutting down');
        tray.detach();
        try {
          await monitor.stop();
        } catch (err) {
          logger.error(`Monitor did not stop cleanly: ${errorMessage(err)}`);
        } finally {
          feed.detach();
          lock.release();
        }
        exit(exitCode);
      })();
    }
    return quitting;
  };

  const tray = new TrayIndicator('pingwatch', {
    resetStats: (target) => {
      monitor.resetStats(target);
      feed.clear(target);
    },
    quit: () => {
      void quit(0);
    }
  });

  feed.attach(monitor);
  tray.attach(monitor);

  process.once('SIGINT', () => void quit(0));
  process.once('SIGTERM', () => void quit(0));

  await monitor.start();

  return {
    monitor,
    feed,
    tray,
    lock,
    quit,
    dispatch: (intent, target) => tray.handle(intent, target)
  };
}

/**
 * Returns the process-wide runtime, booting it on first use.
 */
export function getRuntime(): Promise<MonitorRuntime> {
  if (!globalThis.__pingwatchRuntime) {
    globalThis.__pingwatchRuntime = boot();
  }
  return globalThis.__pingwatchRuntime;
}
