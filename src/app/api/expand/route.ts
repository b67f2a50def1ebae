import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { expandCurrentArticle } from '../../../lib/articleWorkflow';
import {
  createRequestGateway,
  internalError,
  jsonError,
  parseJsonBody,
  requireSession,
} from '../../../lib/http';
import { toArticleView } from '../../../lib/sessionView';

export const runtime = 'nodejs';
export const revalidate = 0;

const expandSchema = z.object({
  variant: z.enum(['UK', 'US']),
});

export async function POST(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  const parsed = await parseJsonBody(request, expandSchema);
  if (!parsed.ok) return parsed.response;

  try {
    const notices: string[] = [];
    const result = await expandCurrentArticle(session, parsed.data.variant, {
      gateway: createRequestGateway(notices),
    });
    if (!result) {
      return jsonError(`No ${parsed.data.variant} article to expand`, 404, 'NOT_FOUND');
    }

    return NextResponse.json({
      article: toArticleView(result.article),
      rounds: result.rounds,
      metMinimum: result.metMinimum,
      notices: [...notices, ...result.notices],
    });
  } catch (err) {
    return internalError('api/expand', err);
  }
}
