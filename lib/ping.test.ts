import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { TARGET_A, TARGET_B } from './test-utils';

jest.mock('node:child_process', () => ({
  spawn: jest.fn()
}));

type MockChild = EventEmitter & {
  stdout: EventEmitter;
  kill: jest.Mock;
};

function createMockChild(): MockChild {
  const child = new EventEmitter() as MockChild;
  child.stdout = new EventEmitter();
  child.kill = jest.fn();
  return child;
}

async function loadPing() {
  return import('./ping');
}

function mockSpawn(child: MockChild): jest.Mock {
  const { spawn } = jest.requireMock('node:child_process') as {
    spawn: jest.Mock;
  };
  spawn.mockReturnValue(child);
  return spawn;
}

describe('probeHost', () => {
  beforeEach(() => {
    jest.resetModules();
    jest.clearAllMocks();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('spawns one echo and parses the round-trip time', async () => {
    const child = createMockChild();
    const spawn = mockSpawn(child);
    const { probeHost } = await loadPing();

    const resultPromise = probeHost(TARGET_A, 5000, { platform: 'linux' });

    child.stdout.emit('data', Buffer.from('PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.\n'));
    child.stdout.emit('data', Buffer.from('64 bytes from 10.0.0.1: icmp_seq=1 ttl=57 time=12.4 ms\n'));
    child.emit('close', 0);

    const result = await resultPromise;

    expect(spawn).toHaveBeenCalledWith(
      'ping',
      ['-c', '1', '-W', '5', '10.0.0.1'],
      expect.objectContaining({ stdio: ['ignore', 'pipe', 'ignore'] })
    );
    expect(result.outcome).toBe('success');
    expect(result.latencyMs).toBe(12.4);
    expect(result.target).toBe(TARGET_A);
  });

  it('reads sub-millisecond replies on Windows', async () => {
    const child = createMockChild();
    const spawn = mockSpawn(child);
    const { probeHost } = await loadPing();

    const resultPromise = probeHost(TARGET_B, 5000, { platform: 'win32', command: 'PING.EXE' });

    child.stdout.emit('data', Buffer.from('Reply from 10.0.0.2: bytes=32 time<1ms TTL=128\r\n'));
    child.emit('close', 0);

    const result = await resultPromise;

    expect(spawn).toHaveBeenCalledWith('PING.EXE', ['-n', '1', '-w', '5000', '10.0.0.2'], expect.anything());
    expect(result.outcome).toBe('success');
    expect(result.latencyMs).toBe(1);
  });

  it('treats a successful exit without a time as zero latency', async () => {
    const child = createMockChild();
    mockSpawn(child);
    const { probeHost } = await loadPing();

    const resultPromise = probeHost(TARGET_A, 5000, { platform: 'linux' });
    child.emit('close', 0);

    const result = await resultPromise;
    expect(result.outcome).toBe('success');
    expect(result.latencyMs).toBe(0);
  });

  it('reports a non-zero exit as a timeout', async () => {
    const child = createMockChild();
    mockSpawn(child);
    const { probeHost } = await loadPing();

    const resultPromise = probeHost(TARGET_A, 5000, { platform: 'linux' });
    child.emit('close', 1);

    const result = await resultPromise;
    expect(result.outcome).toBe('timeout');
    expect(result.latencyMs).toBeNull();
    expect(result.error).toBe('ping exited with code 1');
  });

  it('reports a spawn failure as an error', async () => {
    const child = createMockChild();
    mockSpawn(child);
    const { probeHost } = await loadPing();

    const resultPromise = probeHost(TARGET_A, 5000);
    child.emit('error', new Error('spawn ping ENOENT'));

    const result = await resultPromise;
    expect(result.outcome).toBe('error');
    expect(result.error).toBe('spawn ping ENOENT');
    expect(result.latencyMs).toBeNull();
  });

  it('kills the child once the budget elapses', async () => {
    jest.useFakeTimers();

    const child = createMockChild();
    mockSpawn(child);
    const { probeHost } = await loadPing();

    const resultPromise = probeHost(TARGET_A, 5000, { platform: 'linux' });

    await jest.advanceTimersByTimeAsync(4999);
    expect(child.kill).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    const result = await resultPromise;

    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result.outcome).toBe('timeout');
    expect(result.error).toBe('ping timed out after 5000ms');

    // the close that follows the kill must not replace the result
    child.emit('close', null);
    expect((await resultPromise).error).toBe('ping timed out after 5000ms');
  });
});

describe('buildPingArgs', () => {
  it('uses whole seconds for the Linux deadline', async () => {
    const { buildPingArgs } = await loadPing();
    expect(buildPingArgs('1.1.1.1', 1500, 'linux')).toEqual(['-c', '1', '-W', '2', '1.1.1.1']);
    expect(buildPingArgs('1.1.1.1', 200, 'linux')).toEqual(['-c', '1', '-W', '1', '1.1.1.1']);
  });

  it('uses milliseconds on macOS and Windows', async () => {
    const { buildPingArgs } = await loadPing();
    expect(buildPingArgs('1.1.1.1', 1500, 'darwin')).toEqual(['-c', '1', '-W', '1500', '1.1.1.1']);
    expect(buildPingArgs('1.1.1.1', 1500, 'win32')).toEqual(['-n', '1', '-w', '1500', '1.1.1.1']);
  });
});

describe('warmUp', () => {
  it('probes every target once and swallows failures', async () => {
    const { warmUp } = await loadPing();
    const { createLogger } = await import('./logger');
    const probe = jest.fn(async (target: { name: string; address: string }) => {
      if (target.name === 'B') {
        throw new Error('unreachable');
      }
      return {
        target,
        latencyMs: 10,
        timestamp: new Date(),
        outcome: 'success' as const
      };
    });

    await expect(warmUp([TARGET_A, TARGET_B], probe, 1000, createLogger('test'))).resolves.toBeUndefined();
    expect(probe).toHaveBeenCalledTimes(2);
    expect(probe).toHaveBeenCalledWith(TARGET_A, 1000);
  });
});
