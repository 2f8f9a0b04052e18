'use client';

import { useCallback, useEffect, useRef, useState } from 'react';
import TrayIndicator from '@/components/tray-indicator';
import { formatMs, formatStatistics } from '@/lib/format';
import type { TrayIntent, TrayView } from '@/lib/tray';
import type { MonitorSnapshot } from '@/lib/types';
import { mergeFeedLines, type FeedLine, type FeedPage } from '@/lib/window-feed';

const MAX_LINES_PER_TARGET = 600;

type StatusResponse = MonitorSnapshot & {
  tray: TrayView;
  recentDeviations: Record<string, number | null>;
};

const healthLabels: Record<MonitorSnapshot['health'], string> = {
  unknown: 'Waiting for data',
  green: 'Connection good',
  red: 'Connection degraded'
};

function toneClass(tone: FeedLine['tone']): string {
  if (tone === 'excellent') return 'line line-excellent';
  if (tone === 'good') return 'line line-good';
  return 'line line-bad';
}

async function postIntent(intent: TrayIntent, target?: string): Promise<void> {
  const response = await fetch('/api/control', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ intent, target })
  });
  if (!response.ok) {
    const json = (await response.json()) as { error?: string };
    throw new Error(json.error || `Request failed with status ${response.status}`);
  }
}

export default function Dashboard() {
  const [status, setStatus] = useState<StatusResponse | null>(null);
  const [lines, setLines] = useState<Record<string, FeedLine[]>>({});
  const [selected, setSelected] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [stopped, setStopped] = useState(false);
  const lastSeq = useRef(0);
  const inFlight = useRef(false);
  const logEnd = useRef<HTMLDivElement | null>(null);

  const refresh = useCallback(async () => {
    if (inFlight.current) {
      return;
    }
    inFlight.current = true;
    try {
      const [statusResponse, feedResponse] = await Promise.all([
        fetch('/api/status', { cache: 'no-store' }),
        fetch(`/api/feed?since=${lastSeq.current}`, { cache: 'no-store' })
      ]);
      const nextStatus = (await statusResponse.json()) as StatusResponse;
      const page = (await feedResponse.json()) as FeedPage;

      setStatus(nextStatus);
      lastSeq.current = Math.max(lastSeq.current, page.lastSeq);
      if (page.lines.length > 0) {
        setLines((prev) => mergeFeedLines(prev, page.lines, MAX_LINES_PER_TARGET));
      }
      setError(null);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Network error');
    } finally {
      inFlight.current = false;
    }
  }, []);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  const intervalMs = status?.intervalMs ?? 1000;
  useEffect(() => {
    if (stopped) {
      return;
    }
    const timer = window.setInterval(() => void refresh(), intervalMs);
    return () => window.clearInterval(timer);
  }, [refresh, intervalMs, stopped]);

  const targets = status?.targets ?? [];
  const current = selected ?? targets[0]?.target ?? null;
  const currentStats = targets.find((stats) => stats.target === current);
  const currentLines = current ? lines[current] ?? [] : [];

  useEffect(() => {
    logEnd.current?.scrollIntoView({ behavior: 'smooth', block: 'end' });
  }, [currentLines.length]);

  const handleIntent = useCallback(
    async (intent: TrayIntent, target?: string) => {
      try {
        await postIntent(intent, target);
        if (intent === 'reset' && target) {
          setLines((prev) => ({ ...prev, [target]: [] }));
        } else if (intent === 'reset-all') {
          setLines({});
        } else if (intent === 'quit') {
          setStopped(true);
          return;
        }
        await refresh();
      } catch (err) {
        setError(err instanceof Error ? err.message : 'Request failed');
      }
    },
    [refresh]
  );

  const windowVisible = status?.tray.windowVisible ?? true;

  return (
    <div className="page">
      <header className="topbar">
        <div>
          <p className="eyebrow">pingwatch</p>
          <h1>{status ? healthLabels[status.health] : 'Connecting...'}</h1>
          <p className="subtitle">
            Primary target: <strong>{status?.primaryTarget ?? '-'}</strong> · round {status?.round ?? 0}
          </p>
        </div>
        <TrayIndicator view={status?.tray ?? null} onIntent={(intent) => void handleIntent(intent)} />
      </header>

      {stopped && <div className="alert">pingwatch has been stopped.</div>}
      {error && !stopped && <div className="alert">Error: {error}</div>}

      {windowVisible && (
        <section className="panel">
          <nav className="tabs" role="tablist">
            {targets.map((stats) => (
              <button
                key={stats.target}
                type="button"
                role="tab"
                aria-selected={stats.target === current}
                className={stats.target === current ? 'tab is-active' : 'tab'}
                onClick={() => setSelected(stats.target)}
              >
                {stats.target}
                <span className="tab-address">{stats.address}</span>
              </button>
            ))}
          </nav>

          <div className="log" role="log">
            {currentLines.length === 0 && <p className="empty">No results yet.</p>}
            {currentLines.map((line) => (
              <p key={line.seq} className={toneClass(line.tone)}>
                {line.text}
              </p>
            ))}
            <div ref={logEnd} />
          </div>

          <footer className="stats">
            <p>{currentStats ? formatStatistics(currentStats) : '-'}</p>
            <p>
              Samples: {currentStats?.samples ?? 0} · Last 24h deviations:{' '}
              {current ? status?.recentDeviations[current] ?? '-' : '-'} · Latest:{' '}
              {formatMs(currentLines[currentLines.length - 1]?.latencyMs)}
            </p>
            <div className="actions">
              <button
                type="button"
                disabled={!current || stopped}
                onClick={() => current && void handleIntent('reset', current)}
              >
                Reset current
              </button>
              <button type="button" disabled={stopped} onClick={() => void handleIntent('reset-all')}>
                Reset all
              </button>
            </div>
          </footer>
        </section>
      )}
    </div>
  );
}
