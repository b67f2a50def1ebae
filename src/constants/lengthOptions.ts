import type { LanguageVariant, WordCountBand } from '../types/article';

export const DEFAULT_BAND: WordCountBand = { min: 750, max: 1500 };

export const DEFAULT_BAND_TEXT = `${DEFAULT_BAND.min}-${DEFAULT_BAND.max}`;

// Generation always runs in this order; history is written after the last variant.
export const LANGUAGE_VARIANTS: readonly LanguageVariant[] = ['UK', 'US'];

export function parseWordCountBand(value: string | null | undefined): WordCountBand {
  const match = (value ?? '').trim().match(/^(\d+)\s*[-–]\s*(\d+)$/);
  if (!match) {
    return { ...DEFAULT_BAND };
  }
  const min = Number.parseInt(match[1], 10);
  const max = Number.parseInt(match[2], 10);
  if (!Number.isFinite(min) || !Number.isFinite(max) || min <= 0 || min > max) {
    return { ...DEFAULT_BAND };
  }
  return { min, max };
}
