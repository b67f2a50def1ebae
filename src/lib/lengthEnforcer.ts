import type { Article, LanguageVariant, WordCountBand } from '../types/article';
import { createArticle } from './article';
import type { GenerationGateway } from './generation';
import { languageName } from './prompts';
import { EXPANSION_PREDICATES, collapseBlankRuns, countWords, removeLines, sanitize } from './sanitize';

export const EXPANSION_BUFFER_WORDS = 50;
export const MAX_EXPANSION_ROUNDS = 2;

const FIRST_ROUND_MAX_TOKENS = 4000;
const SECOND_ROUND_MAX_TOKENS = 2000;

export type LengthContext = {
  title: string;
  languageVariant: LanguageVariant;
};

export type LengthEnforcementResult = {
  article: Article;
  rounds: number;
  metMinimum: boolean;
  notices: string[];
};

function buildFirstRoundPrompt(article: string, wordsNeeded: number, context: LengthContext): string {
  return [
    `I need you to write ${wordsNeeded} words of additional content that naturally expands on this article about "${context.title}".`,
    '',
    'Current article structure:',
    article,
    '',
    '---',
    '',
    `Write ${wordsNeeded} words of additional paragraphs that expand the existing topics.`,
    '',
    'CRITICAL RULES:',
    '1. DO NOT include any labels like "Additional paragraph for..." or "Here\'s more content..."',
    '2. DO NOT describe where content should go or what section it\'s for',
    '3. DO NOT use phrases like "To expand on...", "Building on...", "Furthermore to the section on..."',
    '4. Just write natural, flowing paragraphs as if they were always part of the article',
    '5. Each paragraph should be 100-150 words of substantive content',
    '6. Focus on concrete examples, data, analysis, and insights',
    `7. Write in ${languageName(context.languageVariant)}`,
    '',
    `Output ONLY the new paragraphs with no meta-commentary. Write ${wordsNeeded} words now:`,
  ].join('\n');
}

function buildSecondRoundPrompt(wordsNeeded: number, context: LengthContext): string {
  return [
    `Write exactly ${wordsNeeded} words about: "${context.title}"`,
    '',
    `Create natural paragraphs with concrete examples and analysis in ${languageName(context.languageVariant)}.`,
    '',
    'DO NOT write any introductory text, labels, or descriptions.',
    'DO NOT say what section this is for.',
    `Just write ${wordsNeeded} words of content:`,
  ].join('\n');
}

export function filterExpansion(text: string): string {
  return removeLines(text, EXPANSION_PREDICATES).trim();
}

function appendParagraphs(body: string, addition: string): string {
  return addition ? collapseBlankRuns(`${body}\n\n${addition}`) : body;
}

/**
 * Tops an article up to the band minimum with at most two supplementary generation rounds.
 *
 * Expand-only: nothing already generated is removed, and the band maximum is never enforced,
 * since trimming could drop the facts and quotes the user asked for. A shortfall that survives
 * both rounds is reported through `notices` and the longest article is returned.
 */
export async function ensureLength(
  article: Article,
  band: WordCountBand,
  context: LengthContext,
  gateway: GenerationGateway
): Promise<LengthEnforcementResult> {
  const notices: string[] = [];
  let body = sanitize(article.body);
  const startingCount = countWords(body);

  const finish = (rounds: number): LengthEnforcementResult => {
    const result = createArticle(body, article.languageVariant);
    return { article: result, rounds, metMinimum: result.wordCount >= band.min, notices };
  };

  if (startingCount >= band.min) {
    return finish(0);
  }

  let rounds = 0;
  let wordCount = startingCount;

  while (wordCount < band.min && rounds < MAX_EXPANSION_ROUNDS) {
    const wordsNeeded = band.min - wordCount + EXPANSION_BUFFER_WORDS;
    const firstRound = rounds === 0;
    notices.push(
      firstRound
        ? `Article has ${wordCount} words. Adding about ${wordsNeeded} more to reach the ${band.min}-word minimum...`
        : `Still ${band.min - wordCount} words short. Adding more content...`
    );

    const result = await gateway.generate(
      firstRound ? buildFirstRoundPrompt(body, wordsNeeded, context) : buildSecondRoundPrompt(wordsNeeded, context),
      firstRound ? FIRST_ROUND_MAX_TOKENS : SECOND_ROUND_MAX_TOKENS
    );
    rounds += 1;

    if (!result.ok) {
      console.warn('[length] expansion call failed', result.failure);
      notices.push(`Expansion stopped: ${result.failure.message}`);
      break;
    }

    body = appendParagraphs(body, filterExpansion(result.text));
    wordCount = countWords(body);
  }

  if (wordCount >= band.min) {
    notices.push(`Expanded article from ${startingCount} to ${wordCount} words.`);
  } else {
    notices.push(
      `Could not reach the minimum: ${wordCount} words (need ${band.min}). Request a revision such as "Add 200-300 more words with additional examples and analysis".`
    );
  }

  return finish(rounds);
}
