import type { Article, LanguageVariant } from '../types/article';
import { createArticle } from './article';
import type { GenerationGateway } from './generation';
import { languageName } from './prompts';
import { countWords, sanitize, stripHighlights } from './sanitize';

export const REVISED_START = '[REVISED]';
export const REVISED_END = '[/REVISED]';
export const HIGHLIGHT_OPEN = '<span style="color: #0066CC;">';
export const HIGHLIGHT_CLOSE = '</span>';

export const REVISION_SLACK_WORDS = 100;
const REVISION_MAX_TOKENS = 8000;

export const ELISION_PHRASES = [
  'rest remains',
  'continue with',
  'remaining sections',
  'rest of the article',
  'continues unchanged',
  '[remaining',
  'would continue',
];

export type RevisionOptions = {
  languageVariant: LanguageVariant;
  aiFriendlyFormat?: boolean;
};

/** Phrases already present in `source` are part of the article's own prose and never count. */
export function detectTruncation(text: string, source = ''): boolean {
  const lowered = text.toLowerCase();
  const original = source.toLowerCase();
  return ELISION_PHRASES.some((phrase) => lowered.includes(phrase) && !original.includes(phrase));
}

function wrapLines(marked: string): string {
  return marked
    .split('\n')
    .map((line) => (line.trim() ? `${HIGHLIGHT_OPEN}${line}${HIGHLIGHT_CLOSE}` : line))
    .join('\n');
}

/**
 * Turns `[REVISED]…[/REVISED]` pairs into highlight spans. Each line inside a pair is wrapped
 * on its own so a span never crosses a paragraph break; unpaired markers are dropped.
 */
export function applyRevisionHighlights(text: string): string {
  return text
    .replace(/\[REVISED\]([\s\S]*?)\[\/REVISED\]/g, (_match, marked: string) => wrapLines(marked))
    .split(REVISED_START)
    .join('')
    .split(REVISED_END)
    .join('');
}

function buildRevisionPrompt(
  article: string,
  currentWords: number,
  changeRequest: string,
  options: RevisionOptions
): string {
  const formatNotes = options.aiFriendlyFormat
    ? [
        '- Maintain AI-friendly format with question-based headings',
        '- Keep paragraphs short (2-3 sentences max)',
        '- Preserve the FAQ section and TL;DR summary',
        '- Maintain conversational, scannable style',
      ]
    : [];

  return [
    'I need you to revise a blog article. You MUST output the ENTIRE revised article, not just parts of it.',
    '',
    `CURRENT ARTICLE (${currentWords} words):`,
    '=========================================',
    article,
    '=========================================',
    '',
    `REVISION REQUEST: ${changeRequest}`,
    '',
    'CRITICAL INSTRUCTIONS - READ CAREFULLY:',
    '',
    '1. OUTPUT THE COMPLETE ARTICLE - Every single paragraph, every single section, from beginning to end',
    '2. DO NOT use phrases like "[rest remains unchanged]" or "[continue with original]" or any similar shortcuts',
    '3. DO NOT provide meta-commentary about what you changed',
    '4. DO NOT truncate or abbreviate ANY part of the article',
    '',
    `5. For CHANGED content: Wrap it with ${REVISED_START} and ${REVISED_END} tags`,
    '6. For UNCHANGED content: Include it exactly as it was, without any tags',
    '',
    `7. The output must be AT LEAST ${currentWords} words (can be up to ${currentWords + REVISION_SLACK_WORDS} words)`,
    '8. If revisions make it shorter, expand other sections to maintain word count',
    `9. Maintain ${languageName(options.languageVariant)}`,
    '10. Keep all formatting with ** for bold headings',
    '11. DO NOT add a heading called "Conclusion"',
    ...formatNotes,
    '',
    'EXAMPLE OF CORRECT OUTPUT:',
    '**First Heading**',
    'This paragraph stays the same from original.',
    '',
    `${REVISED_START}This paragraph has been changed based on the revision request.${REVISED_END}`,
    '',
    '**Second Heading**',
    'Another unchanged paragraph here.',
    '',
    'NOW PROVIDE THE COMPLETE REVISED ARTICLE:',
    `Every paragraph, every section, everything - with ${REVISED_START} tags only around changed parts:`,
  ].join('\n');
}

function buildCompleteOutputPrompt(article: string, currentWords: number, changeRequest: string): string {
  return [
    'The previous response was incomplete. I need the COMPLETE article.',
    '',
    'Starting from this article:',
    article,
    '',
    `Apply this revision: ${changeRequest}`,
    '',
    'OUTPUT RULES:',
    '- Write out EVERY SINGLE WORD of the complete article',
    `- Use ${REVISED_START}${REVISED_END} tags ONLY around changed parts`,
    '- Include EVERYTHING - no shortcuts, no summaries, no "rest continues" phrases',
    `- Minimum ${currentWords} words`,
    '',
    'Output the FULL article now:',
  ].join('\n');
}

/**
 * Rewrites an article according to a free-text request and highlights what changed.
 *
 * Returns `null` when the generator fails or keeps eliding content, in which case the caller
 * must keep the article it already has.
 */
export async function reviseArticle(
  article: Article,
  changeRequest: string,
  options: RevisionOptions,
  gateway: GenerationGateway
): Promise<Article | null> {
  const cleanArticle = sanitize(stripHighlights(article.body));
  const currentWords = countWords(cleanArticle);

  const first = await gateway.generate(
    buildRevisionPrompt(cleanArticle, currentWords, changeRequest, options),
    REVISION_MAX_TOKENS
  );
  if (!first.ok) {
    console.warn('[revision] revision call failed', first.failure);
    return null;
  }

  let revised = first.text;
  if (detectTruncation(revised, cleanArticle)) {
    console.warn('[revision] response elided content, requesting the complete article');
    const second = await gateway.generate(
      buildCompleteOutputPrompt(cleanArticle, currentWords, changeRequest),
      REVISION_MAX_TOKENS
    );
    if (!second.ok) {
      console.warn('[revision] corrective call failed', second.failure);
      return null;
    }
    if (detectTruncation(second.text, cleanArticle)) {
      console.warn('[revision] corrective response still elided content');
      return null;
    }
    revised = second.text;
  }

  return createArticle(applyRevisionHighlights(sanitize(revised)), options.languageVariant);
}
