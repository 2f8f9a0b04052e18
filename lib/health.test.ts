import { describe, expect, it } from '@jest/globals';
import { HealthAggregator, healthWindowSize } from './health';
import { roundResult, TARGET_A } from './test-utils';

const GREEN = 20;
const YELLOW = 50;
const BAD = 90;
const TIMEOUT = null;

/** Feeds latencies as consecutive rounds, starting at `firstRound`. */
function feed(aggregator: HealthAggregator, latencies: (number | null)[], firstRound: number) {
  return latencies.map((latency, index) => aggregator.record(roundResult(TARGET_A, firstRound + index, latency)));
}

describe('healthWindowSize', () => {
  it('covers ten seconds, capped at ten samples', () => {
    expect(healthWindowSize(1000)).toBe(10);
    expect(healthWindowSize(2000)).toBe(5);
    expect(healthWindowSize(3000)).toBe(3);
    expect(healthWindowSize(500)).toBe(10);
    expect(healthWindowSize(20_000)).toBe(1);
  });
});

describe('HealthAggregator', () => {
  it('starts unknown', () => {
    expect(new HealthAggregator(10).current()).toBe('unknown');
  });

  it('turns red on a bad first sample', () => {
    const aggregator = new HealthAggregator(10);
    const change = aggregator.record(roundResult(TARGET_A, 1, BAD));

    expect(change).toEqual({
      previous: 'unknown',
      current: 'red',
      round: 1,
      at: new Date(2026, 0, 15, 12, 0, 0)
    });
    expect(aggregator.current()).toBe('red');
  });

  it('turns red on a failed first probe', () => {
    const aggregator = new HealthAggregator(10);
    aggregator.record(roundResult(TARGET_A, 1, TIMEOUT));
    expect(aggregator.current()).toBe('red');
  });

  it('turns green on a good or excellent first sample', () => {
    const yellow = new HealthAggregator(10);
    expect(yellow.record(roundResult(TARGET_A, 1, YELLOW))?.current).toBe('green');

    const green = new HealthAggregator(10);
    expect(green.record(roundResult(TARGET_A, 1, GREEN))?.current).toBe('green');
  });

  it('holds its state until a full window has been seen', () => {
    const aggregator = new HealthAggregator(10);
    feed(aggregator, [GREEN], 1);

    const changes = feed(aggregator, Array<number>(9).fill(BAD), 2);
    expect(changes.every((change) => change === null)).toBe(true);
    expect(aggregator.current()).toBe('green');

    const change = aggregator.record(roundResult(TARGET_A, 11, BAD));
    expect(change).toMatchObject({ previous: 'green', current: 'red', round: 11 });
  });

  it('turns red on a full window of bad or yellow samples', () => {
    const aggregator = new HealthAggregator(10);
    feed(aggregator, [GREEN], 1);
    feed(aggregator, [BAD, YELLOW, TIMEOUT, YELLOW, BAD, BAD, YELLOW, YELLOW, TIMEOUT, BAD], 2);

    expect(aggregator.current()).toBe('red');
  });

  it('treats a window of only yellow samples as red', () => {
    const aggregator = new HealthAggregator(10);
    feed(aggregator, [GREEN], 1);
    feed(aggregator, Array<number>(10).fill(YELLOW), 2);

    expect(aggregator.current()).toBe('red');
  });

  it('turns green on a full window of green or yellow samples', () => {
    const aggregator = new HealthAggregator(10);
    feed(aggregator, [BAD], 1);
    feed(aggregator, [GREEN, YELLOW, GREEN, GREEN, YELLOW, YELLOW, GREEN, GREEN, GREEN, YELLOW], 2);

    expect(aggregator.current()).toBe('green');
  });

  it('keeps red through a mixed window', () => {
    const aggregator = new HealthAggregator(10);
    feed(aggregator, [GREEN], 1);
    feed(aggregator, Array<number>(10).fill(BAD), 2);
    expect(aggregator.current()).toBe('red');

    const changes = feed(aggregator, [GREEN, BAD, GREEN, BAD, GREEN, BAD, GREEN, BAD, GREEN, BAD], 12);

    expect(changes.every((change) => change === null)).toBe(true);
    expect(aggregator.current()).toBe('red');
  });

  it('keeps green through a mixed window in any order', () => {
    const aggregator = new HealthAggregator(10);
    feed(aggregator, [GREEN], 1);

    const changes = feed(aggregator, [BAD, BAD, GREEN, GREEN, GREEN, BAD, TIMEOUT, GREEN, BAD, GREEN], 2);

    expect(changes.every((change) => change === null)).toBe(true);
    expect(aggregator.current()).toBe('green');
  });

  it('slides the window one sample at a time', () => {
    const aggregator = new HealthAggregator(3);
    feed(aggregator, [GREEN], 1);
    feed(aggregator, [GREEN, BAD, BAD], 2);
    expect(aggregator.current()).toBe('green');

    // window is now [BAD, BAD, BAD]
    const change = aggregator.record(roundResult(TARGET_A, 5, BAD));
    expect(change?.current).toBe('red');
  });

  it('ignores a result from a round it has already seen', () => {
    const aggregator = new HealthAggregator(2);
    feed(aggregator, [GREEN], 1);

    expect(aggregator.record(roundResult(TARGET_A, 2, BAD))).toBeNull();
    expect(aggregator.record(roundResult(TARGET_A, 2, BAD))).toBeNull();
    expect(aggregator.current()).toBe('green');

    expect(aggregator.record(roundResult(TARGET_A, 3, BAD))?.current).toBe('red');
  });
});
