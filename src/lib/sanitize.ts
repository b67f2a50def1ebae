/**
 * Line filters for generator meta-commentary.
 *
 * The phrase lists are collected from output seen in practice and will never be complete;
 * a missed phrase is a known limitation, not something to chase with broader patterns.
 * Each list is exported so the length enforcer and tests can compose their own sets.
 */

export type LinePredicate = (line: string) => boolean;

export const WORD_COUNT_REPORT_PHRASES = [
  'word count:',
  'total words:',
  '[total word',
  'additional words',
  '---expanded',
  "here's an additional",
  'to expand the article',
  'words to expand',
];

export const SEPARATOR_LINES = ['---', '___', '---EXPANDED CONTENT---'];

export const EXPANSION_META_PHRASES = [
  'additional paragraph',
  'additional content',
  "here's",
  'here is',
  'here are',
  'to expand',
  'this adds',
  'adding to',
  'section:',
  "i'll add",
  'let me add',
  'to the section',
  'building on',
  'furthermore to',
  'expanding on the',
];

const LABEL_MAX_LENGTH = 50;

function normalizeLine(line: string): string {
  return line.replace(/[‘’]/g, "'").toLowerCase();
}

export function containsAnyPhrase(phrases: readonly string[]): LinePredicate {
  const lowered = phrases.map((phrase) => phrase.toLowerCase());
  return (line) => {
    const normalized = normalizeLine(line);
    return lowered.some((phrase) => normalized.includes(phrase));
  };
}

export const isSeparatorLine: LinePredicate = (line) => SEPARATOR_LINES.includes(line.trim());

/** Short lines ending in a colon, e.g. "Additional insights for section two:". */
export const isLabelLine: LinePredicate = (line) => {
  const trimmed = line.trim();
  return trimmed.endsWith(':') && trimmed.length < LABEL_MAX_LENGTH;
};

export const isWordCountReport = containsAnyPhrase(WORD_COUNT_REPORT_PHRASES);

export const DISPLAY_PREDICATES: readonly LinePredicate[] = [isWordCountReport, isSeparatorLine];

export const EXPANSION_PREDICATES: readonly LinePredicate[] = [
  containsAnyPhrase(EXPANSION_META_PHRASES),
  isLabelLine,
  ...DISPLAY_PREDICATES,
];

export function removeLines(text: string, predicates: readonly LinePredicate[]): string {
  return text
    .split('\n')
    .filter((line) => !predicates.some((matches) => matches(line)))
    .join('\n');
}

export function collapseBlankRuns(text: string): string {
  const kept: string[] = [];
  for (const line of text.split('\n')) {
    const blank = line.trim() === '';
    if (blank && kept.length > 0 && kept[kept.length - 1] === '') {
      continue;
    }
    kept.push(blank ? '' : line);
  }
  return kept.join('\n');
}

export function sanitize(text: string, predicates: readonly LinePredicate[] = DISPLAY_PREDICATES): string {
  if (!text) {
    return '';
  }
  return collapseBlankRuns(removeLines(text.replace(/\r\n?/g, '\n'), predicates)).trim();
}

export function stripHighlights(text: string): string {
  return text.replace(/<[^>]+>/g, '');
}

export function sanitizeForExport(text: string): string {
  return sanitize(stripHighlights(text));
}

export function countWords(text: string): number {
  if (!text) {
    return 0;
  }
  return text
    .replace(/<[^>]+>/g, ' ')
    .split(/\s+/)
    .filter(Boolean).length;
}
