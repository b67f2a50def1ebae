import { AlignmentType, Document, HeadingLevel, ImageRun, Packer, Paragraph, TextRun } from 'docx';
import type { LanguageVariant, ProcessedLogo } from '../types/article';
import { extractTitleLine, parseContentBlocks, type ContentBlock } from './markup';
import { countWords, sanitizeForExport } from './sanitize';

export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const LOGO_WIDTH_PX = 200;

const HEADING_LEVELS = {
  1: HeadingLevel.HEADING_1,
  2: HeadingLevel.HEADING_2,
  3: HeadingLevel.HEADING_3,
} as const;

export type DocxInput = {
  title: string;
  blocks: ContentBlock[];
  wordCount: number;
  keywords: string[];
  logo?: ProcessedLogo | null;
};

export function toTextRuns(text: string): TextRun[] {
  return text
    .split(/\*\*([^*]+)\*\*/)
    .map((part, index) => ({ part, bold: index % 2 === 1 }))
    .filter(({ part }) => part.length > 0)
    .map(({ part, bold }) => new TextRun({ text: part, bold }));
}

function blockToParagraph(block: ContentBlock): Paragraph {
  switch (block.type) {
    case 'heading':
      return new Paragraph({
        heading: HEADING_LEVELS[block.level],
        children: [new TextRun({ text: block.text, bold: true })],
      });
    case 'listItem':
      return block.ordered
        ? new Paragraph({ children: toTextRuns(block.text) })
        : new Paragraph({ bullet: { level: 0 }, children: toTextRuns(block.text) });
    case 'paragraph':
      return new Paragraph({ children: toTextRuns(block.text) });
  }
}

function logoParagraph(logo: ProcessedLogo): Paragraph {
  const height = Math.max(1, Math.round((logo.height / logo.width) * LOGO_WIDTH_PX));
  return new Paragraph({
    alignment: AlignmentType.CENTER,
    children: [
      new ImageRun({
        type: 'png',
        data: logo.data,
        transformation: { width: LOGO_WIDTH_PX, height },
      }),
    ],
  });
}

export async function renderDocx({ title, blocks, wordCount, keywords, logo }: DocxInput): Promise<Buffer> {
  const children: Paragraph[] = [];
  if (logo) {
    children.push(logoParagraph(logo), new Paragraph(''));
  }
  children.push(new Paragraph({ heading: HeadingLevel.TITLE, children: [new TextRun(title)] }));
  children.push(...blocks.map(blockToParagraph));
  children.push(
    new Paragraph(''),
    new Paragraph('---'),
    new Paragraph(`Word Count: ${wordCount}`),
    new Paragraph(`Keywords: ${keywords.join(', ')}`)
  );

  const document = new Document({
    title,
    sections: [{ children }],
  });
  return Packer.toBuffer(document);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function buildExportFileName(title: string, variant: LanguageVariant, now: Date): string {
  const safeTitle =
    title
      .replace(/[^\p{L}\p{N} _-]/gu, '')
      .trimEnd()
      .replace(/ /g, '_') || 'article';
  const timestamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${safeTitle}_${variant}_${timestamp}.docx`;
}

export type ExportInput = {
  title: string;
  body: string;
  variant: LanguageVariant;
  keywords: string[];
  logo?: ProcessedLogo | null;
  now?: Date;
};

export type ExportedDocument = {
  fileName: string;
  title: string;
  data: Buffer;
};

/** Strips highlights and meta lines, honours a leading `TITLE:` line, and renders the file. */
export async function exportArticleDocument({
  title,
  body,
  variant,
  keywords,
  logo,
  now = new Date(),
}: ExportInput): Promise<ExportedDocument> {
  const cleaned = sanitizeForExport(body);
  const extracted = extractTitleLine(cleaned);
  const documentTitle = extracted.title ?? title;
  const data = await renderDocx({
    title: documentTitle,
    blocks: parseContentBlocks(extracted.body),
    wordCount: countWords(extracted.body),
    keywords,
    logo,
  });
  return {
    fileName: buildExportFileName(title, variant, now),
    title: documentTitle,
    data,
  };
}
