import type { ClientProfile, GenerationRequest, LanguageVariant } from '../types/article';
import { mergeKeywords } from './keywords';

export const DOCUMENT_EXCERPT_LIMIT = 500;

export type ComposedPrompt = {
  prompt: string;
  keywords: string[];
};

const LANGUAGE_NAMES: Record<LanguageVariant, string> = {
  UK: 'UK English',
  US: 'US English',
};

const SPELLING_NOTES: Record<LanguageVariant, string> = {
  UK: "(use British spelling, 's' instead of 'z' in words like 'organisation')",
  US: "(use American spelling, 'z' instead of 's' in words like 'organization')",
};

const TITLE_STYLE_HINTS = [
  'Make it compelling and action-oriented',
  'Focus on the value and benefits',
  'Make it intriguing and thought-provoking',
];

export function languageInstruction(variant: LanguageVariant): string {
  return `${LANGUAGE_NAMES[variant]} ${SPELLING_NOTES[variant]}`;
}

export function languageName(variant: LanguageVariant): string {
  return LANGUAGE_NAMES[variant];
}

type SupplementaryInputs = Pick<GenerationRequest, 'facts' | 'quotes' | 'documentExcerpt'>;

function buildSupplementaryLines(inputs: SupplementaryInputs, bullet: string): string[] {
  const lines: string[] = [];
  const facts = inputs.facts?.trim();
  const quotes = inputs.quotes?.trim();
  const excerpt = inputs.documentExcerpt?.trim();
  if (facts) {
    lines.push(`${bullet}Include these facts: ${facts}`);
  }
  if (quotes) {
    lines.push(`${bullet}Include these quotes: ${quotes}`);
  }
  if (excerpt) {
    lines.push(`${bullet}Reference this material: ${excerpt.slice(0, DOCUMENT_EXCERPT_LIMIT)}`);
  }
  return lines;
}

function buildStandardPrompt(
  request: GenerationRequest,
  variant: LanguageVariant,
  targetWords: number,
  keywords: string[],
  tone: string
): string {
  const sections = [
    '- **[Opening/Lead Section - use a descriptive title, NOT "Introduction"]**:',
    '',
    'Comprehensive overview with context and preview of main points and can be more than one paragraph. Name this section something relevant to the topic, not "Introduction"',
    '',
    '- **[Main Section 1]**:',
    '',
    'Deep dive into first key aspect with examples and analysis and can be more than one paragraph',
    '',
    '- **[Main Section 2]**:',
    '',
    'Exploration of second aspect with case studies and data and can be more than one paragraph',
    '',
    '- **[Main Section 3]**:',
    '',
    'Discussion of challenges, opportunities, and solutions',
  ];

  if (request.includeImpactSection) {
    sections.push(
      '',
      '- **The Impact on Hiring**:',
      '',
      'Detailed section on how this affects recruitment, talent acquisition, hiring managers, employer branding, and recruitment strategies'
    );
  }

  sections.push(
    '',
    '- **[Forward-Looking Section]**:',
    '',
    'Future outlook and actionable takeaways (NOT a conclusion, and never headed "Conclusion" or "Summary")'
  );

  const requirements = [
    '- DO NOT use the word "Introduction" as a heading',
    '- DO NOT use "Conclusion" or "Summary" as a heading',
    '- Start with an engaging, topic-specific heading for the opening section',
    '- Write detailed, expansive paragraphs (100-150 words each)',
    '- Include specific examples, statistics, and expert insights throughout',
    '- Use transitions and elaborate on every point',
    '- Add single line after headings',
    '- Format headings with ** for bold (e.g., **Understanding the Digital Transformation**)',
  ];
  if (tone) {
    requirements.push(`- Write in a ${tone} tone of voice`);
  }
  requirements.push(`- Incorporate these keywords naturally: ${keywords.join(', ')}`);
  requirements.push(...buildSupplementaryLines(request, '- '));

  return [
    `Write a comprehensive ${targetWords}-word blog article in ${languageInstruction(variant)} about: "${request.topic}"`,
    '',
    `IMPORTANT: Write EXACTLY ${targetWords} words. This is a hard requirement.`,
    '',
    'Include these sections:',
    ...sections,
    '',
    'Requirements:',
    ...requirements,
    '',
    `Write the full ${targetWords}-word article now:`,
  ].join('\n');
}

function buildAiFriendlyPrompt(
  request: GenerationRequest,
  variant: LanguageVariant,
  targetWords: number,
  keywords: string[],
  tone: string
): string {
  const requiredSections = [
    '1. **What is [topic]?** - Clear definition with immediate answer',
    '2. **Why does [topic] matter?** - Key benefits with **Key takeaway:** statement',
    '3. **How do you implement [topic]?** - Step-by-step numbered process',
    '4. **What are the best practices for [topic]?** - Bullet points with actionable tips',
    '5. **What challenges might you face?** - Common issues and solutions',
  ];
  if (request.includeImpactSection) {
    requiredSections.push(
      '6. **How does this impact hiring?** - Effects on recruitment, talent acquisition, hiring managers, and employer branding'
    );
  }
  const offset = requiredSections.length;
  requiredSections.push(
    `${offset + 1}. **Frequently Asked Questions** - Exactly 5 Q&A pairs`,
    `${offset + 2}. **TL;DR Summary** - 3-4 short bullet points summarizing key points`
  );

  const writingStyle = [
    '- Conversational and easy to scan',
    '- Do not create quotes on your own',
    '- Always put line breaks after every item on a list',
    '- No jargon - explain complex terms simply',
    '- Question-based headings throughout',
    '- Direct answers immediately following questions',
    '- Clear, practical, and actionable',
  ];
  if (tone) {
    writingStyle.push(`- Write in a ${tone} tone of voice`);
  }

  return [
    `Write a comprehensive ${targetWords}-word blog article in ${languageInstruction(variant)} about: "${request.topic}"`,
    '',
    `IMPORTANT: Write EXACTLY ${targetWords} words. This is a hard requirement.`,
    '',
    'FORMAT FOR AI-FRIENDLY/AEO OPTIMIZED CONTENT:',
    '',
    'Structure Requirements:',
    '- Use question headings formatted as **What is X?** or **How do I do Y?**',
    '- Answer each question immediately with 1-2 clear sentences right after the heading',
    '- Start major sections with **Key takeaway:** in bold',
    '- Include one numbered step-by-step process somewhere in the article',
    '- End with a FAQ section containing exactly 5 Q&A pairs',
    '- Include a TL;DR summary at the very end',
    '',
    'Content Must Include:',
    '- 2-3 specific examples with real numbers/results (use actual industry data, not fictional)',
    '- At least one "how-to" section with clear numbered steps',
    '- Actionable tips readers can implement immediately',
    '- Short paragraphs (2-3 sentences maximum)',
    '- Use bullet points where helpful for scannability',
    '',
    'Writing Style:',
    ...writingStyle,
    '',
    'Required Sections (use these as question-based headings):',
    ...requiredSections,
    '',
    `Keywords to incorporate naturally: ${keywords.join(', ')}`,
    ...buildSupplementaryLines(request, ''),
    '',
    'Remember: Use real examples and data only. Keep paragraphs short. Make it scannable.',
  ].join('\n');
}

/**
 * Builds the article instruction for one language variant.
 *
 * The instructed length is the band maximum rather than its midpoint: generators reliably
 * under-deliver against a stated length, so aiming at the top of the band lands most drafts
 * inside it. The length enforcer only ever tops up toward the minimum.
 */
export function composePrompt(
  request: GenerationRequest,
  profile: ClientProfile,
  variant: LanguageVariant
): ComposedPrompt {
  const keywords = mergeKeywords(profile.baseKeywords, request.extraKeywords);
  const targetWords = request.band.max;
  const tone = profile.tone.trim();

  const prompt = request.aiFriendlyFormat
    ? buildAiFriendlyPrompt(request, variant, targetWords, keywords, tone)
    : buildStandardPrompt(request, variant, targetWords, keywords, tone);

  return { prompt, keywords };
}

export function buildTitlePrompt(topic: string, keywords: string[], variation: number): string {
  const styleHint = TITLE_STYLE_HINTS[Math.abs(variation) % TITLE_STYLE_HINTS.length];
  return [
    `Generate ONLY a compelling, SEO-friendly blog title for this topic: "${topic}"`,
    '',
    'Requirements:',
    '- Professional and engaging',
    '- Incorporate relevant keywords naturally',
    '- Clear and specific',
    '- 8-15 words long',
    `- Keywords to consider: ${keywords.join(', ')}`,
    `- Style: ${styleHint}`,
    '',
    'Respond with ONLY the title, nothing else. No explanation, no "Title:" prefix, just the title text.',
  ].join('\n');
}
