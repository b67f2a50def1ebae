import { randomUUID } from 'crypto';
import type { NextRequest } from 'next/server';
import type {
  ArticleSet,
  CurrentArticles,
  GenerationStats,
  HistoryEntry,
  ProcessedLogo,
} from '../types/article';
import { sign, unsign } from '../utils/encryption';

export const HISTORY_LIMIT = 10;
export const SESSION_COOKIE = 'writer_session';

export interface SessionContext {
  id: string;
  createdAt: string;
  history: HistoryEntry[];
  current: CurrentArticles | null;
  stats: GenerationStats;
  logo: ProcessedLogo | null;
  titleGenerationCount: number;
  nextSequenceId: number;
}

export interface SessionStore {
  create(): SessionContext;
  get(id: string): SessionContext | null;
  destroy(id: string): void;
}

export function createSessionContext(id: string, now: Date = new Date()): SessionContext {
  return {
    id,
    createdAt: now.toISOString(),
    history: [],
    current: null,
    stats: { totalArticles: 0, totalWords: 0, filesProcessed: 0 },
    logo: null,
    titleGenerationCount: 0,
    nextSequenceId: 1,
  };
}

export function createSessionStore(newId: () => string = randomUUID): SessionStore {
  const sessions = new Map<string, SessionContext>();
  return {
    create() {
      const context = createSessionContext(newId());
      sessions.set(context.id, context);
      return context;
    },
    get(id) {
      return sessions.get(id) ?? null;
    },
    destroy(id) {
      sessions.delete(id);
    },
  };
}

let cachedStore: SessionStore | null = null;

export function getSessionStore(): SessionStore {
  if (!cachedStore) {
    cachedStore = createSessionStore();
  }
  return cachedStore;
}

function cloneArticles(articles: ArticleSet): ArticleSet {
  const copy: ArticleSet = {};
  for (const variant of ['UK', 'US'] as const) {
    const article = articles[variant];
    if (article) {
      copy[variant] = { ...article };
    }
  }
  return copy;
}

/**
 * Records a snapshot at the front of the session history, dropping the oldest entries past
 * {@link HISTORY_LIMIT}.
 */
export function addHistoryEntry(
  context: SessionContext,
  entry: { title: string; articles: ArticleSet; keywords: string[] },
  now: Date = new Date()
): HistoryEntry {
  const snapshot: HistoryEntry = {
    sequenceId: context.nextSequenceId,
    timestamp: now.toISOString(),
    title: entry.title,
    articles: cloneArticles(entry.articles),
    keywords: [...entry.keywords],
  };
  context.nextSequenceId += 1;
  context.history = [snapshot, ...context.history].slice(0, HISTORY_LIMIT);
  return snapshot;
}

export function findHistoryEntry(context: SessionContext, sequenceId: number): HistoryEntry | null {
  return context.history.find((entry) => entry.sequenceId === sequenceId) ?? null;
}

export function sessionCookieValue(context: SessionContext): string {
  return sign(context.id);
}

export function resolveSession(request: NextRequest, store: SessionStore = getSessionStore()): SessionContext | null {
  const token = request.cookies.get(SESSION_COOKIE)?.value;
  if (!token) {
    return null;
  }
  const id = unsign(token);
  return id ? store.get(id) : null;
}
