import { asapScheduler, observeOn, Subject, type Observable, type Subscription } from 'rxjs';
import { DeviationLog } from './deviation-log';
import { errorMessage } from './errors';
import { HealthAggregator, healthWindowSize } from './health';
import { createLogger, type AppLogger } from './logger';
import { createPingProbe, warmUp, type ProbeFn } from './ping';
import { RoundScheduler, type ResultSink } from './scheduler';
import { historyCapacity, StatisticsTracker } from './statistics';
import type {
  HealthChange,
  HealthState,
  MonitorConfig,
  MonitorSnapshot,
  MonitorState,
  RoundResult,
  Target,
  TargetStatistics
} from './types';

export type ResultEvent = {
  target: Target;
  result: RoundResult;
  statistics: TargetStatistics;
};

export type ResultListener = (target: Target, result: RoundResult, statistics: TargetStatistics) => void;

export type HealthListener = (change: HealthChange) => void;

export type MonitorDeps = {
  probe?: ProbeFn;
  logger?: AppLogger;
  now?: () => Date;
};

/**
 * Lifecycle owner of one monitoring session: the scheduler, the per-target
 * statistics, the primary target's traffic light and the deviation log.
 *
 * Presentation code subscribes through `onResult` and `onHealthChanged`.
 * Events are queued and delivered asynchronously, so a slow or absent
 * consumer never holds up a round.
 */
export class NetworkMonitor {
  readonly config: MonitorConfig;
  readonly statistics: StatisticsTracker;
  readonly health: HealthAggregator;
  readonly deviationLog: DeviationLog;

  private readonly logger: AppLogger;
  private readonly probe: ProbeFn;
  private readonly scheduler: RoundScheduler;
  private readonly results = new Subject<ResultEvent>();
  private readonly healthChanges = new Subject<HealthChange>();
  private readonly emittedRounds = new Map<string, number>();
  private lifecycle: MonitorState = 'created';

  readonly results$: Observable<ResultEvent> = this.results.pipe(observeOn(asapScheduler));
  readonly health$: Observable<HealthChange> = this.healthChanges.pipe(observeOn(asapScheduler));

  constructor(config: MonitorConfig, deps: MonitorDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? createLogger('monitor');
    this.probe = deps.probe ?? createPingProbe({ command: config.pingCommand });

    this.statistics = new StatisticsTracker(
      config.targets,
      historyCapacity(config.preservedMinutes, config.intervalMs)
    );
    this.health = new HealthAggregator(healthWindowSize(config.intervalMs));
    this.deviationLog = new DeviationLog({
      path: config.deviationLog.path,
      retentionHours: config.deviationLog.retentionHours,
      cleanupIntervalMs: config.deviationLog.cleanupIntervalMs,
      logger: this.logger.getSubLogger({ name: 'deviation-log' }),
      now: deps.now
    });

    this.scheduler = new RoundScheduler({
      targets: config.targets,
      intervalMs: config.intervalMs,
      probeTimeoutMs: config.probeTimeoutMs,
      thresholds: config.thresholds,
      probe: this.probe,
      sinks: this.createSinks(),
      logger: this.logger.getSubLogger({ name: 'scheduler' })
    });
  }

  state(): MonitorState {
    return this.lifecycle;
  }

  async start(): Promise<void> {
    if (this.lifecycle !== 'created') {
      return;
    }
    this.lifecycle = 'starting';
    this.logger.info(
      `Monitoring ${this.config.targets.length} target(s) every ${this.config.intervalMs}ms (primary: ${this.config.primaryTarget})`
    );

    if (this.config.warmUp) {
      await warmUp(this.config.targets, this.probe, this.config.probeTimeoutMs, this.logger);
    }

    // stop() may have been requested during warm-up
    if (this.state() !== 'starting') {
      return;
    }

    try {
      await this.deviationLog.cleanup();
    } catch (err) {
      this.logger.error(`Initial deviation log cleanup failed: ${errorMessage(err)}`);
    }
    this.deviationLog.startCleanup();
    this.scheduler.start();
    this.lifecycle = 'running';
  }

  async stop(): Promise<void> {
    if (this.lifecycle === 'stopping' || this.lifecycle === 'stopped') {
      return;
    }
    this.lifecycle = 'stopping';

    await this.scheduler.stop();
    this.deviationLog.stopCleanup();
    this.results.complete();
    this.healthChanges.complete();

    this.lifecycle = 'stopped';
    this.logger.info(`Monitoring stopped after ${this.scheduler.round()} round(s)`);
  }

  /**
   * Runs one round outside the cadence. While it is in flight the loop skips
   * its tick instead of starting a second round.
   */
  runRoundNow(): Promise<RoundResult[]> {
    return this.scheduler.runRound();
  }

  onResult(listener: ResultListener): Subscription {
    return this.results$.subscribe(({ target, result, statistics }) => listener(target, result, statistics));
  }

  onHealthChanged(listener: HealthListener): Subscription {
    return this.health$.subscribe(listener);
  }

  /** Clears one target's history and counters, or every target's when omitted. */
  resetStats(target?: string): void {
    if (target === undefined) {
      this.statistics.resetAll();
      this.logger.info('Statistics reset for all targets');
      return;
    }
    this.statistics.reset(target);
    this.logger.info(`Statistics reset for ${target}`);
  }

  currentHealth(): HealthState {
    return this.health.current();
  }

  snapshot(): MonitorSnapshot {
    return {
      state: this.lifecycle,
      phase: this.scheduler.phase(),
      round: this.scheduler.round(),
      health: this.health.current(),
      primaryTarget: this.config.primaryTarget,
      intervalMs: this.config.intervalMs,
      targets: this.statistics.all()
    };
  }

  private createSinks(): ResultSink[] {
    return [
      {
        name: 'statistics',
        accept: (result) => {
          this.statistics.record(result);
        }
      },
      {
        name: 'deviation-log',
        accept: async (result) => {
          if (!result.isDeviation) {
            return;
          }
          try {
            await this.deviationLog.append(result);
          } catch (err) {
            this.logger.error(errorMessage(err));
          }
        }
      },
      {
        name: 'health',
        accept: (result) => {
          if (result.target.name !== this.config.primaryTarget) {
            return;
          }
          const change = this.health.record(result);
          if (change) {
            this.logger.info(`Health of ${result.target.name} changed: ${change.previous} -> ${change.current}`);
            this.healthChanges.next(change);
          }
        }
      },
      {
        name: 'outbound',
        accept: (result) => {
          const lastRound = this.emittedRounds.get(result.target.name) ?? 0;
          if (result.round <= lastRound) {
            return;
          }
          this.emittedRounds.set(result.target.name, result.round);
          this.results.next({
            target: result.target,
            result,
            statistics: this.statistics.get(result.target.name)
          });
        }
      }
    ];
  }
}
