import { NextRequest, NextResponse } from 'next/server';
import { WRITER_CONFIG } from '../../../config/writer';
import { loadClientProfile } from '../../../lib/clientProfiles';
import { internalError, jsonError, requireSession } from '../../../lib/http';

export const runtime = 'nodejs';
export const revalidate = 0;

export async function GET(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  const name = request.nextUrl.searchParams.get('name')?.trim() || WRITER_CONFIG.DEFAULT_CLIENT;

  try {
    const profile = await loadClientProfile(name);
    if (!profile) {
      return jsonError(`Client profile "${name}" not found`, 404, 'NOT_FOUND');
    }
    return NextResponse.json({ profile });
  } catch (err) {
    return internalError('api/profiles', err);
  }
}
