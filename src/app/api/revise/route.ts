import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { reviseCurrentArticle } from '../../../lib/articleWorkflow';
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

const reviseSchema = z.object({
  variant: z.enum(['UK', 'US']),
  changeRequest: z.string().trim().min(1, 'Describe the change you want'),
});

export async function POST(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  const parsed = await parseJsonBody(request, reviseSchema);
  if (!parsed.ok) return parsed.response;

  try {
    const notices: string[] = [];
    const outcome = await reviseCurrentArticle(session, parsed.data.variant, parsed.data.changeRequest, {
      gateway: createRequestGateway(notices),
    });

    switch (outcome.status) {
      case 'missing':
        return jsonError(`No ${parsed.data.variant} article to revise`, 404, 'NOT_FOUND');
      case 'unchanged':
        return jsonError('Revision failed. The article was left unchanged.', 502, 'GENERATION_FAILED');
      case 'revised':
        return NextResponse.json({ article: toArticleView(outcome.article), notices });
    }
  } catch (err) {
    return internalError('api/revise', err);
  }
}
