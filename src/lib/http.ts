import { NextRequest, NextResponse } from 'next/server';
import type { ZodType, ZodTypeDef } from 'zod';
import { createGenerationGateway, type GenerationFailure, type GenerationGateway } from './generation';
import { createOpenAITextGenerator } from './openai';
import { resolveSession, type SessionContext } from './session';

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'GENERATION_OVERLOADED'
  | 'GENERATION_FAILED'
  | 'INTERNAL_ERROR';

export function jsonError(message: string, status = 400, code: ErrorCode = 'INVALID_INPUT') {
  return NextResponse.json({ error: message, code }, { status });
}

export function failureResponse(failure: GenerationFailure) {
  return failure.kind === 'overloaded'
    ? jsonError(failure.message, 503, 'GENERATION_OVERLOADED')
    : jsonError(failure.message, 502, 'GENERATION_FAILED');
}

export function internalError(scope: string, err: unknown) {
  console.error(`[${scope}] unexpected error`, err);
  return jsonError('Internal server error', 500, 'INTERNAL_ERROR');
}

/** Resolves the caller's session or produces the 401 response to return instead. */
export function requireSession(request: NextRequest): SessionContext | NextResponse {
  const session = resolveSession(request);
  return session ?? jsonError('Not signed in', 401, 'UNAUTHORIZED');
}

export async function parseJsonBody<T>(
  request: NextRequest,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<{ ok: true; data: T } | { ok: false; response: NextResponse }> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return { ok: false, response: jsonError('Invalid JSON body') };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'Invalid request';
    return { ok: false, response: jsonError(message) };
  }
  return { ok: true, data: parsed.data };
}

/** A gateway over the configured OpenAI model that collects retry advisories into `notices`. */
export function createRequestGateway(notices: string[]): GenerationGateway {
  return createGenerationGateway({
    generator: createOpenAITextGenerator(),
    onNotice: (message) => notices.push(message),
  });
}
