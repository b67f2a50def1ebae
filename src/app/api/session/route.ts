import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { internalError, jsonError, parseJsonBody, requireSession } from '../../../lib/http';
import { SESSION_COOKIE, getSessionStore, sessionCookieValue } from '../../../lib/session';
import { toSessionView } from '../../../lib/sessionView';
import { passwordMatches } from '../../../utils/encryption';

export const runtime = 'nodejs';
export const revalidate = 0;

const loginSchema = z.object({
  password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
});

export async function POST(request: NextRequest) {
  const parsed = await parseJsonBody(request, loginSchema);
  if (!parsed.ok) return parsed.response;

  const expected = process.env.APP_PASSWORD;
  if (!expected) {
    console.error('[api/session] APP_PASSWORD is not configured');
    return jsonError('Sign-in is not configured', 500, 'INTERNAL_ERROR');
  }
  if (!passwordMatches(parsed.data.password, expected)) {
    return jsonError('Incorrect password', 401, 'UNAUTHORIZED');
  }

  try {
    const session = getSessionStore().create();
    const response = NextResponse.json({ session: toSessionView(session) });
    response.cookies.set(SESSION_COOKIE, sessionCookieValue(session), {
      httpOnly: true,
      sameSite: 'lax',
      secure: process.env.NODE_ENV === 'production',
      path: '/',
    });
    return response;
  } catch (err) {
    return internalError('api/session', err);
  }
}

export async function GET(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  return NextResponse.json({ session: toSessionView(session) });
}

export async function DELETE(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  getSessionStore().destroy(session.id);
  const response = NextResponse.json({ ok: true });
  response.cookies.delete(SESSION_COOKIE);
  return response;
}
