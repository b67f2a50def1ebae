export type LanguageVariant = 'UK' | 'US';

export type WordCountBand = {
  min: number;
  max: number;
};

export interface ClientProfile {
  name: string;
  tone: string;
  baseKeywords: string[];
}

export interface GenerationRequest {
  topic: string;
  languageVariants: LanguageVariant[];
  band: WordCountBand;
  facts?: string;
  quotes?: string;
  documentExcerpt?: string;
  includeImpactSection: boolean;
  aiFriendlyFormat: boolean;
  extraKeywords?: string;
}

export interface Article {
  body: string;
  wordCount: number;
  languageVariant: LanguageVariant;
}

export type ArticleSet = Partial<Record<LanguageVariant, Article>>;

export interface HistoryEntry {
  sequenceId: number;
  timestamp: string;
  title: string;
  articles: ArticleSet;
  keywords: string[];
}

export interface CurrentArticles {
  title: string;
  articles: ArticleSet;
  keywords: string[];
  band: WordCountBand;
  aiFriendlyFormat: boolean;
  documentAnalysis: string;
}

export interface GenerationStats {
  totalArticles: number;
  totalWords: number;
  filesProcessed: number;
}

export interface ProcessedLogo {
  data: Buffer;
  width: number;
  height: number;
}
