import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NextRequest } from 'next/server';

const { mockComplete, mockLoadClientProfile } = vi.hoisted(() => ({
  mockComplete: vi.fn(),
  mockLoadClientProfile: vi.fn(),
}));

vi.mock('../../lib/openai', () => ({
  createOpenAITextGenerator: () => ({ complete: mockComplete }),
}));

vi.mock('../../lib/clientProfiles', () => ({
  loadClientProfile: mockLoadClientProfile,
}));

import { POST } from '../../app/api/generate/route';
import { SESSION_COOKIE, getSessionStore, sessionCookieValue, type SessionContext } from '../../lib/session';
import { words } from '../helpers/gateway';

const originalSecret = process.env.SESSION_SECRET;

function makeRequest(form: FormData, session?: SessionContext): NextRequest {
  return new NextRequest('http://localhost/api/generate', {
    method: 'POST',
    headers: session ? { cookie: `${SESSION_COOKIE}=${sessionCookieValue(session)}` } : {},
    body: form,
  });
}

function articleForm(fields: Record<string, string | string[]>): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    for (const entry of Array.isArray(value) ? value : [value]) {
      form.append(name, entry);
    }
  }
  return form;
}

describe('POST /api/generate', () => {
  let session: SessionContext;

  beforeEach(() => {
    process.env.SESSION_SECRET = 'test-secret';
    mockComplete.mockReset();
    mockLoadClientProfile.mockReset();
    mockLoadClientProfile.mockResolvedValue({ name: 'default', tone: 'friendly', baseKeywords: ['hiring'] });
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    session = getSessionStore().create();
  });

  afterEach(() => {
    if (originalSecret === undefined) {
      delete process.env.SESSION_SECRET;
    } else {
      process.env.SESSION_SECRET = originalSecret;
    }
    vi.restoreAllMocks();
  });

  it('requires a session', async () => {
    const response = await POST(makeRequest(articleForm({ topic: 'Hiring', variants: 'UK' })));

    expect(response.status).toBe(401);
    expect(mockComplete).not.toHaveBeenCalled();
  });

  it('generates the selected variant and returns the updated session', async () => {
    mockComplete.mockResolvedValue(words(150, 'talent'));

    const response = await POST(
      makeRequest(
        articleForm({ topic: 'Hiring graduates', variants: ['UK'], wordCount: '100-200', keywords: 'Interns' }),
        session
      )
    );
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(mockComplete).toHaveBeenCalledTimes(1);
    expect(mockComplete.mock.calls[0][0].maxTokens).toBe(8000);
    expect(mockComplete.mock.calls[0][0].prompt).toContain('Write a comprehensive 200-word blog article');
    expect(body.failures).toEqual([]);
    expect(body.warnings).toEqual([]);
    expect(body.session.current.keywords).toEqual(['hiring', 'interns']);
    expect(body.session.current.articles).toHaveLength(1);
    expect(body.session.current.articles[0]).toMatchObject({ variant: 'UK', wordCount: 150 });
    expect(body.session.history).toHaveLength(1);
    expect(session.stats.totalWords).toBe(150);
  });

  it('uses the named client profile', async () => {
    mockComplete.mockResolvedValue(words(150));

    await POST(makeRequest(articleForm({ topic: 'Hiring', variants: 'US', wordCount: '100-200', client: 'acme' }), session));

    expect(mockLoadClientProfile).toHaveBeenCalledWith('acme');
  });

  it('answers 404 for an unknown client profile', async () => {
    mockLoadClientProfile.mockResolvedValue(null);

    const response = await POST(makeRequest(articleForm({ topic: 'Hiring', variants: 'UK', client: 'ghost' }), session));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Client profile "ghost" not found', code: 'NOT_FOUND' });
  });

  it('validates the topic and the variant selection', async () => {
    const noVariant = await POST(makeRequest(articleForm({ topic: 'Hiring' }), session));
    const noTopic = await POST(makeRequest(articleForm({ topic: '  ', variants: 'UK' }), session));

    expect(noVariant.status).toBe(400);
    expect(await noVariant.json()).toEqual({ error: 'Select at least one language variant', code: 'INVALID_INPUT' });
    expect(noTopic.status).toBe(400);
    expect(await noTopic.json()).toEqual({ error: 'Topic is required', code: 'INVALID_INPUT' });
  });

  it('maps a rejected request to 502 and keeps the session empty', async () => {
    mockComplete.mockRejectedValue(Object.assign(new Error('Incorrect API key provided'), { status: 401 }));

    const response = await POST(makeRequest(articleForm({ topic: 'Hiring', variants: 'UK' }), session));

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({ error: 'Incorrect API key provided', code: 'GENERATION_FAILED' });
    expect(session.current).toBeNull();
    expect(session.history).toEqual([]);
  });

  it('records an unsupported upload as a warning and still generates', async () => {
    mockComplete.mockResolvedValue(words(150));
    const form = articleForm({ topic: 'Hiring', variants: 'UK', wordCount: '100-200' });
    form.append('document', new File(['binary'], 'deck.pptx'));

    const response = await POST(makeRequest(form, session));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.warnings).toEqual(['Unsupported file type: pptx']);
    expect(session.stats.filesProcessed).toBe(0);
  });
});
