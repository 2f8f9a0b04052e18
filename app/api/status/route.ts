import { NextResponse } from 'next/server';
import { errorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { getRuntime } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const logger = createLogger('api');

export async function GET() {
  const { monitor, tray } = await getRuntime();
  const snapshot = monitor.snapshot();

  let recentDeviations: Record<string, number | null>;
  try {
    const counts = await monitor.deviationLog.countRecentByTarget();
    recentDeviations = Object.fromEntries(
      snapshot.targets.map((stats): [string, number] => [stats.target, counts[stats.target] ?? 0])
    );
  } catch (err) {
    logger.error(`Failed to count recent deviations: ${errorMessage(err)}`);
    recentDeviations = Object.fromEntries(snapshot.targets.map((stats): [string, null] => [stats.target, null]));
  }

  return NextResponse.json(
    { ...snapshot, tray: tray.view(), recentDeviations },
    { headers: { 'Cache-Control': 'no-store, max-age=0' } }
  );
}
