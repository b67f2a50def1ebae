import { LANGUAGE_VARIANTS } from '../constants/lengthOptions';
import type { Article, ArticleSet, GenerationStats, LanguageVariant, WordCountBand } from '../types/article';
import { renderPreviewHtml } from './preview';
import type { SessionContext } from './session';

export type ArticleView = {
  variant: LanguageVariant;
  body: string;
  wordCount: number;
  previewHtml: string;
};

export type HistoryItemView = {
  sequenceId: number;
  timestamp: string;
  title: string;
  variants: LanguageVariant[];
  wordCounts: Partial<Record<LanguageVariant, number>>;
};

export type CurrentView = {
  title: string;
  keywords: string[];
  band: WordCountBand;
  aiFriendlyFormat: boolean;
  documentAnalysis: string;
  articles: ArticleView[];
};

export type SessionView = {
  current: CurrentView | null;
  history: HistoryItemView[];
  stats: GenerationStats;
  hasLogo: boolean;
};

export function toArticleView(article: Article): ArticleView {
  return {
    variant: article.languageVariant,
    body: article.body,
    wordCount: article.wordCount,
    previewHtml: renderPreviewHtml(article.body),
  };
}

function articleList(articles: ArticleSet): Article[] {
  return LANGUAGE_VARIANTS.flatMap((variant) => {
    const article = articles[variant];
    return article ? [article] : [];
  });
}

export function toSessionView(context: SessionContext): SessionView {
  const current = context.current;
  return {
    current: current
      ? {
          title: current.title,
          keywords: current.keywords,
          band: current.band,
          aiFriendlyFormat: current.aiFriendlyFormat,
          documentAnalysis: current.documentAnalysis,
          articles: articleList(current.articles).map(toArticleView),
        }
      : null,
    history: context.history.map((entry) => {
      const articles = articleList(entry.articles);
      return {
        sequenceId: entry.sequenceId,
        timestamp: entry.timestamp,
        title: entry.title,
        variants: articles.map((article) => article.languageVariant),
        wordCounts: Object.fromEntries(articles.map((article) => [article.languageVariant, article.wordCount])),
      };
    }),
    stats: { ...context.stats },
    hasLogo: context.logo !== null,
  };
}
