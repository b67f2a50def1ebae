import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { DOCX_MIME_TYPE, exportArticleDocument } from '../../../lib/docx';
import { internalError, jsonError, requireSession } from '../../../lib/http';

export const runtime = 'nodejs';
export const revalidate = 0;

const variantSchema = z.enum(['UK', 'US'], {
  errorMap: () => ({ message: 'variant must be UK or US' }),
});

export async function GET(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  const parsed = variantSchema.safeParse(request.nextUrl.searchParams.get('variant'));
  if (!parsed.success) {
    return jsonError(parsed.error.issues[0]?.message ?? 'Invalid variant');
  }

  const variant = parsed.data;
  const current = session.current;
  const article = current?.articles[variant];
  if (!current || !article) {
    return jsonError(`No ${variant} article to export`, 404, 'NOT_FOUND');
  }

  try {
    const exported = await exportArticleDocument({
      title: current.title,
      body: article.body,
      variant,
      keywords: current.keywords,
      logo: session.logo,
    });

    return new NextResponse(new Uint8Array(exported.data), {
      status: 200,
      headers: {
        'Content-Type': DOCX_MIME_TYPE,
        'Content-Disposition': `attachment; filename="${exported.fileName.replace(/[^\x20-\x7e]/g, '_')}"; filename*=UTF-8''${encodeURIComponent(exported.fileName)}`,
        'Cache-Control': 'no-store',
      },
    });
  } catch (err) {
    return internalError('api/export', err);
  }
}
