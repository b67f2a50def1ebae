import type { Article, LanguageVariant } from '../types/article';
import { countWords } from './sanitize';

export function createArticle(body: string, languageVariant: LanguageVariant): Article {
  return {
    body,
    wordCount: countWords(body),
    languageVariant,
  };
}
