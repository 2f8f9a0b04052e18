import { NextResponse, type NextRequest } from 'next/server';
import { getRuntime } from '@/lib/runtime';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const since = Number(request.nextUrl.searchParams.get('since') ?? '0');
  const { feed } = await getRuntime();

  return NextResponse.json(feed.since(Number.isFinite(since) ? since : 0), {
    headers: { 'Cache-Control': 'no-store, max-age=0' }
  });
}
