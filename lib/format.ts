import type { ClassifiedResult, TargetStatistics } from './types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatMs(value: number | null | undefined): string {
  if (value === null || value === undefined) return '-';
  if (value < 1) {
    const rounded = Number(value.toFixed(2));
    return rounded === 0 ? '0ms' : `${rounded.toFixed(2)}ms`;
  }
  return `${Math.round(value)}ms`;
}

export function formatResultLine(result: ClassifiedResult): string {
  const prefix = `[${formatClock(result.timestamp)}] ${result.target.name}`;
  if (result.outcome === 'success' && result.latencyMs !== null) {
    return `${prefix}: ${formatMs(result.latencyMs)}`;
  }
  if (result.outcome === 'timeout') {
    return `${prefix}: Request timeout`;
  }
  return `${prefix}: Error - ${result.error || 'Unknown error'}`;
}

export function formatStatistics(stats: TargetStatistics): string {
  const average = stats.averageMs === null ? '-' : `${stats.averageMs.toFixed(1)}ms`;
  return `Avg: ${average} | Min: ${formatMs(stats.minMs)} | Max: ${formatMs(stats.maxMs)} | Deviations: ${stats.deviations}`;
}
