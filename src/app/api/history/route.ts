import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { loadHistoryEntry } from '../../../lib/articleWorkflow';
import { jsonError, parseJsonBody, requireSession } from '../../../lib/http';
import { toSessionView } from '../../../lib/sessionView';

export const runtime = 'nodejs';
export const revalidate = 0;

const historySchema = z.object({
  sequenceId: z.number().int().positive(),
});

export async function POST(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  const parsed = await parseJsonBody(request, historySchema);
  if (!parsed.ok) return parsed.response;

  if (!loadHistoryEntry(session, parsed.data.sequenceId)) {
    return jsonError('History entry not found', 404, 'NOT_FOUND');
  }
  return NextResponse.json({ session: toSessionView(session) });
}
