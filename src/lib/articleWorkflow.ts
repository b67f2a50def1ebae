import { WRITER_CONFIG } from '../config/writer';
import { DEFAULT_BAND, LANGUAGE_VARIANTS } from '../constants/lengthOptions';
import type {
  Article,
  ArticleSet,
  ClientProfile,
  CurrentArticles,
  GenerationRequest,
  HistoryEntry,
  LanguageVariant,
} from '../types/article';
import { createArticle } from './article';
import type { GenerationFailure, GenerationGateway } from './generation';
import { mergeKeywords } from './keywords';
import { ensureLength, type LengthEnforcementResult } from './lengthEnforcer';
import { buildTitlePrompt, composePrompt } from './prompts';
import { reviseArticle } from './revision';
import { addHistoryEntry, findHistoryEntry, type SessionContext } from './session';

const TITLE_TEMPERATURE = 0.9;
const TITLE_MAX_TOKENS = 100;

export type WorkflowDeps = {
  gateway: GenerationGateway;
  now?: () => Date;
};

export type VariantFailure = {
  variant: LanguageVariant;
  failure: GenerationFailure;
};

export type GenerateOutcome = {
  current: CurrentArticles | null;
  history: HistoryEntry | null;
  failures: VariantFailure[];
  notices: string[];
};

export type RevisionOutcome =
  | { status: 'revised'; article: Article }
  | { status: 'unchanged'; article: Article }
  | { status: 'missing' };

export type TitleOutcome = { ok: true; title: string } | { ok: false; failure: GenerationFailure };

function orderedVariants(selected: readonly LanguageVariant[]): LanguageVariant[] {
  return LANGUAGE_VARIANTS.filter((variant) => selected.includes(variant));
}

/** Swaps in a revised or expanded article; `totalWords` follows the change in length. */
function replaceArticle(context: SessionContext, article: Article): void {
  if (!context.current) return;
  const previous = context.current.articles[article.languageVariant];
  context.stats.totalWords += article.wordCount - (previous?.wordCount ?? 0);
  context.current = {
    ...context.current,
    articles: { ...context.current.articles, [article.languageVariant]: article },
  };
}

export function recordFileProcessed(context: SessionContext): void {
  context.stats.filesProcessed += 1;
}

/**
 * Generates one article per selected variant, UK before US, each topped up to the band
 * minimum. The session's working set and counters change only when at least one variant
 * succeeds, and the history snapshot is recorded after every variant has finished.
 */
export async function generateArticles(
  context: SessionContext,
  request: GenerationRequest,
  profile: ClientProfile,
  { gateway, now = () => new Date() }: WorkflowDeps
): Promise<GenerateOutcome> {
  const articles: ArticleSet = {};
  const failures: VariantFailure[] = [];
  const notices: string[] = [];
  let keywords = mergeKeywords(profile.baseKeywords, request.extraKeywords);

  for (const variant of orderedVariants(request.languageVariants)) {
    const composed = composePrompt(request, profile, variant);
    keywords = composed.keywords;

    const result = await gateway.generate(composed.prompt, WRITER_CONFIG.MAX_OUTPUT_TOKENS);
    if (!result.ok) {
      console.warn(`[workflow] ${variant} article failed`, result.failure);
      failures.push({ variant, failure: result.failure });
      continue;
    }

    const enforced = await ensureLength(
      createArticle(result.text, variant),
      request.band,
      { title: request.topic, languageVariant: variant },
      gateway
    );
    notices.push(...enforced.notices.map((notice) => `${variant}: ${notice}`));
    articles[variant] = enforced.article;
  }

  const produced = Object.values(articles);
  if (produced.length === 0) {
    return { current: null, history: null, failures, notices };
  }

  context.current = {
    title: request.topic,
    articles,
    keywords,
    band: request.band,
    aiFriendlyFormat: request.aiFriendlyFormat,
    documentAnalysis: request.documentExcerpt ?? '',
  };
  context.stats.totalArticles += produced.length;
  context.stats.totalWords += produced.reduce((sum, article) => sum + article.wordCount, 0);

  const history = addHistoryEntry(context, { title: request.topic, articles, keywords }, now());
  return { current: context.current, history, failures, notices };
}

export async function reviseCurrentArticle(
  context: SessionContext,
  variant: LanguageVariant,
  changeRequest: string,
  { gateway }: WorkflowDeps
): Promise<RevisionOutcome> {
  const current = context.current;
  const article = current?.articles[variant];
  if (!current || !article) {
    return { status: 'missing' };
  }

  const revised = await reviseArticle(
    article,
    changeRequest,
    { languageVariant: variant, aiFriendlyFormat: current.aiFriendlyFormat },
    gateway
  );
  if (!revised) {
    return { status: 'unchanged', article };
  }

  replaceArticle(context, revised);
  return { status: 'revised', article: revised };
}

export async function expandCurrentArticle(
  context: SessionContext,
  variant: LanguageVariant,
  { gateway }: WorkflowDeps
): Promise<LengthEnforcementResult | null> {
  const current = context.current;
  const article = current?.articles[variant];
  if (!current || !article) {
    return null;
  }

  const result = await ensureLength(
    article,
    current.band,
    { title: current.title, languageVariant: variant },
    gateway
  );
  replaceArticle(context, result.article);
  return result;
}

export function loadHistoryEntry(context: SessionContext, sequenceId: number): CurrentArticles | null {
  const entry = findHistoryEntry(context, sequenceId);
  if (!entry) {
    return null;
  }

  const articles: ArticleSet = {};
  for (const variant of LANGUAGE_VARIANTS) {
    const article = entry.articles[variant];
    if (article) {
      articles[variant] = { ...article };
    }
  }

  context.current = {
    title: entry.title,
    articles,
    keywords: [...entry.keywords],
    band: context.current?.band ?? DEFAULT_BAND,
    aiFriendlyFormat: context.current?.aiFriendlyFormat ?? false,
    documentAnalysis: '',
  };
  return context.current;
}

function stripQuotes(value: string): string {
  return value.replace(/^["'\s]+|["'\s]+$/g, '');
}

function cleanTitle(text: string): string {
  return stripQuotes(stripQuotes(text.split('\n')[0]).replace(/^title:\s*/i, ''));
}

export async function suggestTitle(
  context: SessionContext,
  topic: string,
  profile: ClientProfile,
  extraKeywords: string | undefined,
  { gateway }: WorkflowDeps
): Promise<TitleOutcome> {
  const keywords = mergeKeywords(profile.baseKeywords, extraKeywords);
  const result = await gateway.generate(
    buildTitlePrompt(topic, keywords, context.titleGenerationCount),
    TITLE_MAX_TOKENS,
    { temperature: TITLE_TEMPERATURE }
  );
  if (!result.ok) {
    return { ok: false, failure: result.failure };
  }

  context.titleGenerationCount += 1;
  const title = cleanTitle(result.text);
  return title ? { ok: true, title } : { ok: false, failure: { kind: 'error', message: 'Model returned no title' } };
}
