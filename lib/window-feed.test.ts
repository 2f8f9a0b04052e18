import { describe, expect, it } from '@jest/globals';
import { createLogger } from './logger';
import { NetworkMonitor } from './monitor';
import { StatisticsTracker } from './statistics';
import { flush, probeResult, roundResult, TARGET_A, TARGET_B, testConfig } from './test-utils';
import { mergeFeedLines, WindowFeed } from './window-feed';
import type { RoundResult } from './types';

function pushAll(feed: WindowFeed, results: RoundResult[]) {
  const tracker = new StatisticsTracker([TARGET_A, TARGET_B], 10);
  for (const result of results) {
    tracker.record(result);
    feed.push(result.target, result, tracker.get(result.target.name));
  }
}

describe('WindowFeed', () => {
  it('formats results into sequenced lines', () => {
    const feed = new WindowFeed([TARGET_A, TARGET_B], 10);
    pushAll(feed, [roundResult(TARGET_A, 1, 20), roundResult(TARGET_B, 1, null)]);

    const page = feed.since(0);

    expect(page.lines).toEqual([
      { seq: 1, target: 'A', round: 1, text: '[12:00:00] A: 20ms', tone: 'excellent', latencyMs: 20 },
      { seq: 2, target: 'B', round: 1, text: '[12:00:00] B: Request timeout', tone: 'bad', latencyMs: null }
    ]);
    expect(page.lastSeq).toBe(2);
    expect(page.statistics.A?.averageMs).toBe(20);
  });

  it('returns only lines after the given sequence, oldest first', () => {
    const feed = new WindowFeed([TARGET_A, TARGET_B], 10);
    pushAll(feed, [
      roundResult(TARGET_A, 1, 20),
      roundResult(TARGET_B, 1, 30),
      roundResult(TARGET_A, 2, 45),
      roundResult(TARGET_B, 2, 70)
    ]);

    expect(feed.since(2).lines.map((line) => line.seq)).toEqual([3, 4]);
    expect(feed.since(4).lines).toEqual([]);
  });

  it('keeps at most its capacity per target', () => {
    const feed = new WindowFeed([TARGET_A], 2);
    pushAll(
      feed,
      [1, 2, 3].map((round) => roundResult(TARGET_A, round, round * 10))
    );

    expect(feed.since(0).lines.map((line) => line.round)).toEqual([2, 3]);
  });

  it('drops lines for unknown targets', () => {
    const feed = new WindowFeed([TARGET_A], 10);
    pushAll(feed, [roundResult(TARGET_B, 1, 20)]);

    expect(feed.since(0)).toEqual({ lines: [], lastSeq: 0, statistics: {} });
  });

  it('clears one target or all of them', () => {
    const feed = new WindowFeed([TARGET_A, TARGET_B], 10);
    pushAll(feed, [roundResult(TARGET_A, 1, 20), roundResult(TARGET_B, 1, 30)]);

    feed.clear('A');
    expect(feed.since(0).lines.map((line) => line.target)).toEqual(['B']);

    feed.clear();
    expect(feed.since(0).lines).toEqual([]);
    expect(feed.since(0).lastSeq).toBe(2);
  });

  it('follows a monitor until detached', async () => {
    const config = testConfig({ deviationLog: { path: '/nonexistent-dir/deviations.txt', retentionHours: 24, cleanupIntervalMs: 3_600_000 } });
    const monitor = new NetworkMonitor(config, {
      probe: async (target) => probeResult(target, 15),
      logger: createLogger('test')
    });
    const feed = new WindowFeed(config.targets, 10);
    feed.attach(monitor);

    await monitor.runRoundNow();
    await flush();
    expect(feed.since(0).lines.map((line) => line.text)).toEqual([
      '[12:00:00] A: 15ms',
      '[12:00:00] B: 15ms',
      '[12:00:00] C: 15ms'
    ]);

    feed.detach();
    await monitor.runRoundNow();
    await flush();
    expect(feed.since(0).lastSeq).toBe(3);
  });
});

describe('mergeFeedLines', () => {
  it('does not repeat a page that was fetched twice', () => {
    const feed = new WindowFeed([TARGET_A, TARGET_B], 10);
    pushAll(feed, [roundResult(TARGET_A, 1, 20), roundResult(TARGET_B, 1, 30), roundResult(TARGET_A, 2, 25)]);
    const page = feed.since(0);

    const once = mergeFeedLines({}, page.lines, 600);
    const twice = mergeFeedLines(once, page.lines, 600);

    expect(twice.A?.map((line) => line.seq)).toEqual([1, 3]);
    expect(twice.B?.map((line) => line.seq)).toEqual([2]);
  });

  it('appends only the newer part of an overlapping page', () => {
    const feed = new WindowFeed([TARGET_A], 10);
    pushAll(feed, [roundResult(TARGET_A, 1, 20), roundResult(TARGET_A, 2, 25)]);
    const held = mergeFeedLines({}, feed.since(0).lines, 600);

    pushAll(feed, [roundResult(TARGET_A, 3, 30)]);
    const merged = mergeFeedLines(held, feed.since(1).lines, 600);

    expect(merged.A?.map((line) => line.round)).toEqual([1, 2, 3]);
  });

  it('keeps at most the limit per target', () => {
    const feed = new WindowFeed([TARGET_A], 10);
    pushAll(
      feed,
      [1, 2, 3, 4].map((round) => roundResult(TARGET_A, round, 20))
    );

    expect(mergeFeedLines({}, feed.since(0).lines, 2).A?.map((line) => line.seq)).toEqual([3, 4]);
  });
});
