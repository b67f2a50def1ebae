import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { WRITER_CONFIG } from '../../../config/writer';
import { parseWordCountBand } from '../../../constants/lengthOptions';
import { generateArticles, recordFileProcessed } from '../../../lib/articleWorkflow';
import { loadClientProfile } from '../../../lib/clientProfiles';
import { extractDocumentText } from '../../../lib/extraction';
import {
  createRequestGateway,
  failureResponse,
  internalError,
  jsonError,
  requireSession,
} from '../../../lib/http';
import { toSessionView } from '../../../lib/sessionView';
import type { GenerationRequest } from '../../../types/article';

export const runtime = 'nodejs';
export const revalidate = 0;

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const generateSchema = z.object({
  topic: z.string({ required_error: 'Topic is required' }).trim().min(1, 'Topic is required'),
  facts: optionalText,
  quotes: optionalText,
  keywords: optionalText,
  wordCount: optionalText,
  client: optionalText,
  variants: z.array(z.enum(['UK', 'US'])).min(1, 'Select at least one language variant'),
  includeImpactSection: z.boolean(),
  aiFriendlyFormat: z.boolean(),
});

function textField(form: FormData, name: string): string | undefined {
  const value = form.get(name);
  return typeof value === 'string' ? value : undefined;
}

function flagField(form: FormData, name: string): boolean {
  const value = textField(form, name);
  return value === 'true' || value === 'on' || value === '1';
}

async function readDocument(form: FormData): Promise<{ text: string; error?: string } | null> {
  const file = form.get('document');
  if (!(file instanceof File) || file.size === 0) {
    return null;
  }
  return extractDocumentText(Buffer.from(await file.arrayBuffer()), file.name);
}

export async function POST(request: NextRequest) {
  const session = requireSession(request);
  if (session instanceof NextResponse) return session;

  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    return jsonError('Expected multipart form data');
  }

  const parsed = generateSchema.safeParse({
    topic: textField(form, 'topic'),
    facts: textField(form, 'facts'),
    quotes: textField(form, 'quotes'),
    keywords: textField(form, 'keywords'),
    wordCount: textField(form, 'wordCount'),
    client: textField(form, 'client'),
    variants: form.getAll('variants').filter((value) => typeof value === 'string'),
    includeImpactSection: flagField(form, 'includeImpactSection'),
    aiFriendlyFormat: flagField(form, 'aiFriendlyFormat'),
  });
  if (!parsed.success) {
    return jsonError(parsed.error.issues[0]?.message ?? 'Invalid request');
  }
  const input = parsed.data;

  try {
    const clientName = input.client ?? WRITER_CONFIG.DEFAULT_CLIENT;
    const profile = await loadClientProfile(clientName);
    if (!profile) {
      return jsonError(`Client profile "${clientName}" not found`, 404, 'NOT_FOUND');
    }

    const warnings: string[] = [];
    const document = await readDocument(form);
    if (document?.error) {
      warnings.push(document.error);
    } else if (document) {
      recordFileProcessed(session);
    }

    const generationRequest: GenerationRequest = {
      topic: input.topic,
      languageVariants: input.variants,
      band: parseWordCountBand(input.wordCount),
      facts: input.facts,
      quotes: input.quotes,
      documentExcerpt: document?.text || undefined,
      includeImpactSection: input.includeImpactSection,
      aiFriendlyFormat: input.aiFriendlyFormat,
      extraKeywords: input.keywords,
    };

    const notices: string[] = [];
    const outcome = await generateArticles(session, generationRequest, profile, {
      gateway: createRequestGateway(notices),
    });

    if (!outcome.current) {
      const overloaded = outcome.failures.find(({ failure }) => failure.kind === 'overloaded');
      const first = overloaded ?? outcome.failures[0];
      return first
        ? failureResponse(first.failure)
        : jsonError('No articles were generated', 502, 'GENERATION_FAILED');
    }

    return NextResponse.json({
      session: toSessionView(session),
      notices: [...notices, ...outcome.notices],
      warnings,
      failures: outcome.failures.map(({ variant, failure }) => ({ variant, message: failure.message })),
    });
  } catch (err) {
    return internalError('api/generate', err);
  }
}
