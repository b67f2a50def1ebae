import { NextRequest, NextResponse } from 'next/server';
import { jsonError, requireSession } from '../../../lib/http';
import { processLogo } from '../../../lib/logo';

export const runtime = 'nodejs';
export const revalidate = 0;

const ACCEPTED_TYPES = new Set(['image/png', 'image/jpeg', 'image/jpg']);

export async function POST(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    return jsonError('Expected multipart form data');
  }

  const file = form.get('logo');
  if (!(file instanceof File) || file.size === 0) {
    return jsonError('Logo file is required');
  }
  if (file.type && !ACCEPTED_TYPES.has(file.type)) {
    return jsonError('Logo must be a PNG or JPEG image');
  }

  try {
    const logo = await processLogo(Buffer.from(await file.arrayBuffer()));
    session.logo = logo;
    return NextResponse.json({ width: logo.width, height: logo.height });
  } catch (err) {
    console.warn('[api/logo] could not process logo', err);
    return jsonError('Could not read the uploaded image');
  }
}

export async function DELETE(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  session.logo = null;
  return NextResponse.json({ ok: true });
}
