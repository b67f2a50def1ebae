import { stripHighlights } from './sanitize';

export type HeadingLevelNumber = 1 | 2 | 3;

export type ContentBlock =
  | { type: 'heading'; level: HeadingLevelNumber; text: string; highlighted: boolean }
  | { type: 'paragraph'; text: string }
  | { type: 'listItem'; ordered: boolean; text: string };

const TITLE_PREFIX = 'TITLE:';

function toLevel(hashes: string): HeadingLevelNumber {
  if (hashes.length === 1) return 1;
  if (hashes.length === 3) return 3;
  return 2;
}

function parseHeading(plain: string): { level: HeadingLevelNumber; text: string } | null {
  if (plain.length > 4 && plain.startsWith('**') && plain.endsWith('**')) {
    const inner = plain.slice(2, -2).trim();
    if (inner && !inner.startsWith('*') && !inner.includes('**')) {
      const marked = inner.match(/^(#{1,3})\s+(.+)$/);
      return marked ? { level: toLevel(marked[1]), text: marked[2].trim() } : { level: 2, text: inner };
    }
  }

  const marked = plain.match(/^(#{1,3})\s+(.+)$/);
  if (marked) {
    return { level: toLevel(marked[1]), text: marked[2].replace(/\*\*/g, '').trim() };
  }
  return null;
}

/**
 * Splits the article markup into headings, list items and paragraphs.
 *
 * Headings are whole `**bold**` lines or `#` lines (the `#` count sets the level, default 2).
 * Consecutive plain lines join into one paragraph; a blank line ends it. Inline `**bold**` and
 * highlight spans stay inside block text for the renderers.
 */
export function parseContentBlocks(markup: string): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  let paragraph: string[] = [];

  const flush = () => {
    if (paragraph.length > 0) {
      blocks.push({ type: 'paragraph', text: paragraph.join(' ') });
      paragraph = [];
    }
  };

  for (const line of markup.split(/\r?\n/)) {
    const trimmed = line.trim();
    const plain = stripHighlights(trimmed).trim();

    if (!plain) {
      flush();
      continue;
    }
    if (plain.startsWith(TITLE_PREFIX)) {
      continue;
    }

    const heading = parseHeading(plain);
    if (heading) {
      flush();
      blocks.push({ type: 'heading', ...heading, highlighted: plain !== trimmed });
      continue;
    }

    const listMarker = plain.match(/^(?:[-•*]|(\d+)[.)])\s+/);
    if (listMarker) {
      flush();
      const ordered = Boolean(listMarker[1]);
      const text = ordered ? trimmed : trimmed.replace(/^((?:<[^>]+>)*)\s*[-•*]\s+/, '$1');
      blocks.push({ type: 'listItem', ordered, text });
      continue;
    }

    paragraph.push(trimmed);
  }

  flush();
  return blocks;
}

/** Reads a leading `TITLE:` line the generator sometimes emits. */
export function extractTitleLine(markup: string): { title: string | null; body: string } {
  const [firstLine, ...rest] = markup.split('\n');
  if (firstLine !== undefined && firstLine.trim().startsWith(TITLE_PREFIX)) {
    const title = firstLine.trim().slice(TITLE_PREFIX.length).trim();
    return { title: title || null, body: rest.join('\n') };
  }
  return { title: null, body: markup };
}
