import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { WRITER_CONFIG } from '../../../config/writer';
import { suggestTitle } from '../../../lib/articleWorkflow';
import { loadClientProfile } from '../../../lib/clientProfiles';
import {
  createRequestGateway,
  failureResponse,
  internalError,
  jsonError,
  parseJsonBody,
  requireSession,
} from '../../../lib/http';

export const runtime = 'nodejs';
export const revalidate = 0;

const titleSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required'),
  keywords: z.string().optional(),
  client: z.string().trim().min(1).optional(),
});

export async function POST(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  const parsed = await parseJsonBody(request, titleSchema);
  if (!parsed.ok) return parsed.response;

  try {
    const clientName = parsed.data.client ?? WRITER_CONFIG.DEFAULT_CLIENT;
    const profile = await loadClientProfile(clientName);
    if (!profile) {
      return jsonError(`Client profile "${clientName}" not found`, 404, 'NOT_FOUND');
    }

    const notices: string[] = [];
    const outcome = await suggestTitle(session, parsed.data.topic, profile, parsed.data.keywords, {
      gateway: createRequestGateway(notices),
    });
    if (!outcome.ok) {
      return failureResponse(outcome.failure);
    }
    return NextResponse.json({ title: outcome.title, notices });
  } catch (err) {
    return internalError('api/title', err);
  }
}
