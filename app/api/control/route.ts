import { NextResponse } from 'next/server';
import { errorMessage, UnknownTargetError } from '@/lib/errors';
import { getRuntime } from '@/lib/runtime';
import { isTrayIntent } from '@/lib/tray';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ ok: false, error: 'Request body must be JSON' }, { status: 400 });
  }

  if (typeof body !== 'object' || body === null || !('intent' in body) || !isTrayIntent(body.intent)) {
    return NextResponse.json({ ok: false, error: 'Unknown intent' }, { status: 400 });
  }

  const target = 'target' in body && typeof body.target === 'string' ? body.target : undefined;
  if (body.intent === 'reset' && !target) {
    return NextResponse.json({ ok: false, error: 'reset requires a target' }, { status: 400 });
  }

  const { dispatch, tray } = await getRuntime();
  try {
    dispatch(body.intent, target);
  } catch (err) {
    const status = err instanceof UnknownTargetError ? 404 : 500;
    return NextResponse.json({ ok: false, error: errorMessage(err) }, { status });
  }

  return NextResponse.json({ ok: true, tray: tray.view() });
}
