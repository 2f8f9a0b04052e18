import { classify } from './classifier';
import { errorMessage, ProbeTimeoutError, ProbeTransportError } from './errors';
import type { AppLogger } from './logger';
import { failedProbe, type ProbeFn } from './ping';
import type { ProbeResult, RoundPhase, RoundResult, Target, Thresholds } from './types';

/**
 * Receives every result of a round once the whole round is classified.
 * Implementations ignore a result whose round they have already seen.
 */
export interface ResultSink {
  readonly name: string;
  accept(result: RoundResult): void | Promise<void>;
}

export type SchedulerOptions = {
  targets: Target[];
  intervalMs: number;
  probeTimeoutMs: number;
  thresholds: Thresholds;
  probe: ProbeFn;
  sinks: ResultSink[];
  logger: AppLogger;
};

/**
 * Fixed-cadence probe rounds.
 *
 * Each round probes every target concurrently, waits for all of them (each
 * bounded by its own timeout), classifies the results and hands them to the
 * sinks one by one. Rounds never overlap: a round that overruns the interval
 * delays the next dispatch instead of stacking.
 */
export class RoundScheduler {
  private readonly options: SchedulerOptions;
  private currentPhase: RoundPhase = 'idle';
  private roundNumber = 0;
  private running = false;
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | undefined;
  private wake: (() => void) | undefined;

  constructor(options: SchedulerOptions) {
    this.options = options;
  }

  phase(): RoundPhase {
    return this.currentPhase;
  }

  round(): number {
    return this.roundNumber;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.runLoop();
  }

  /**
   * Resolves once the in-flight round, if any, has finished fanning out.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = undefined;
    }
    this.wake?.();

    const loop = this.loop;
    this.loop = null;
    if (loop) {
      await loop;
    }
  }

  async runRound(): Promise<RoundResult[]> {
    if (this.currentPhase !== 'idle') {
      throw new Error(`Cannot start a round while ${this.currentPhase}`);
    }

    const { targets, thresholds, sinks, logger } = this.options;
    const round = this.roundNumber + 1;
    this.roundNumber = round;

    try {
      this.currentPhase = 'dispatching';
      const pending = targets.map((target) => this.probeWithTimeout(target));

      this.currentPhase = 'collecting';
      const probed = await Promise.all(pending);
      const results: RoundResult[] = probed.map((result) => ({ ...classify(result, thresholds), round }));

      this.currentPhase = 'fanning-out';
      for (const result of results) {
        for (const sink of sinks) {
          try {
            // eslint-disable-next-line no-await-in-loop -- sinks run in order for each result
            await sink.accept(result);
          } catch (err) {
            logger.error(`Sink ${sink.name} failed for ${result.target.name} in round ${round}: ${errorMessage(err)}`);
          }
        }
      }

      return results;
    } finally {
      this.currentPhase = 'idle';
    }
  }

  private async probeWithTimeout(target: Target): Promise<ProbeResult> {
    const { probe, probeTimeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<ProbeResult>((resolve) => {
      timer = setTimeout(() => {
        resolve(failedProbe(target, new ProbeTimeoutError(`probe exceeded ${probeTimeoutMs}ms`)));
      }, probeTimeoutMs);
    });

    const attempt = Promise.resolve()
      .then(() => probe(target, probeTimeoutMs))
      .catch((err: unknown) => failedProbe(target, new ProbeTransportError(errorMessage(err), { cause: err })));

    try {
      return await Promise.race([attempt, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runLoop(): Promise<void> {
    const { intervalMs, logger } = this.options;

    while (this.running) {
      const startedAt = Date.now();
      if (this.currentPhase !== 'idle') {
        // a manual round is still in flight; its results stand for this tick
        logger.debug(`Skipping tick while a round is ${this.currentPhase}`);
      } else {
        try {
          // eslint-disable-next-line no-await-in-loop -- rounds are sequential
          await this.runRound();
        } catch (err) {
          logger.error(`Round ${this.roundNumber} failed: ${errorMessage(err)}`);
        }
      }

      if (!this.running) {
        break;
      }

      const elapsed = Date.now() - startedAt;
      if (elapsed >= intervalMs) {
        logger.debug(`Round ${this.roundNumber} took ${elapsed}ms, dispatching next round immediately`);
      }
      // eslint-disable-next-line no-await-in-loop -- cadence wait
      await this.sleep(Math.max(0, intervalMs - elapsed));
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = () => {
        this.wake = undefined;
        resolve();
      };
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = undefined;
        this.wake?.();
      }, ms);
    });
  }
}
