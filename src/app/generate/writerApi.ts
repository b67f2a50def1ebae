import type { LanguageVariant } from '../../types/article';
import type { ArticleView, SessionView } from '../../lib/sessionView';

export type GenerateResponse = {
  session: SessionView;
  notices: string[];
  warnings: string[];
  failures: { variant: LanguageVariant; message: string }[];
};

export type ArticleResponse = {
  article: ArticleView;
  notices: string[];
  rounds?: number;
  metMinimum?: boolean;
};

export class WriterApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string
  ) {
    super(message);
    this.name = 'WriterApiError';
  }
}

function parseErrorBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

async function requestJson<T>(url: string, init?: RequestInit): Promise<T> {
  const response = await fetch(url, init);
  const text = await response.text();

  if (!response.ok) {
    const body = parseErrorBody(text);
    const error = body && typeof body === 'object' && 'error' in body ? body.error : null;
    const code = body && typeof body === 'object' && 'code' in body ? body.code : undefined;
    throw new WriterApiError(
      typeof error === 'string' ? error : `Request failed with status ${response.status}`,
      response.status,
      typeof code === 'string' ? code : undefined
    );
  }

  const data: T = JSON.parse(text);
  return data;
}

function postJson<T>(url: string, payload: unknown): Promise<T> {
  return requestJson<T>(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  });
}

export function signIn(password: string) {
  return postJson<{ session: SessionView }>('/api/session', { password });
}

export function signOut() {
  return requestJson<{ ok: boolean }>('/api/session', { method: 'DELETE' });
}

export function fetchSession() {
  return requestJson<{ session: SessionView }>('/api/session');
}

export function generateArticles(form: FormData) {
  return requestJson<GenerateResponse>('/api/generate', { method: 'POST', body: form });
}

export function reviseArticle(variant: LanguageVariant, changeRequest: string) {
  return postJson<ArticleResponse>('/api/revise', { variant, changeRequest });
}

export function expandArticle(variant: LanguageVariant) {
  return postJson<ArticleResponse>('/api/expand', { variant });
}

export function suggestTitle(topic: string, keywords: string) {
  return postJson<{ title: string; notices: string[] }>('/api/title', { topic, keywords });
}

export function loadHistoryEntry(sequenceId: number) {
  return postJson<{ session: SessionView }>('/api/history', { sequenceId });
}

export function uploadLogo(file: File) {
  const form = new FormData();
  form.append('logo', file);
  return requestJson<{ width: number; height: number }>('/api/logo', { method: 'POST', body: form });
}

export function clearLogo() {
  return requestJson<{ ok: boolean }>('/api/logo', { method: 'DELETE' });
}

export function exportUrl(variant: LanguageVariant): string {
  return `/api/export?variant=${variant}`;
}
