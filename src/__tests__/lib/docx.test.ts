import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { buildExportFileName, exportArticleDocument, renderDocx, toTextRuns } from '../../lib/docx';
import { processLogo } from '../../lib/logo';

async function sampleImage(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 4, background: { r: 200, g: 30, b: 30, alpha: 0.5 } },
  })
    .png()
    .toBuffer();
}

describe('buildExportFileName', () => {
  it('uses the sanitized title, variant and local timestamp', () => {
    const now = new Date(2024, 2, 5, 9, 7, 3);
    expect(buildExportFileName('Skills: the new CV?', 'UK', now)).toBe('Skills_the_new_CV_UK_20240305_090703.docx');
  });

  it('falls back to a generic name when nothing survives sanitizing', () => {
    const now = new Date(2024, 11, 31, 23, 59, 59);
    expect(buildExportFileName('???', 'US', now)).toBe('article_US_20241231_235959.docx');
  });
});

describe('toTextRuns', () => {
  it('splits inline bold into separate runs', () => {
    expect(toTextRuns('plain **bold** tail')).toHaveLength(3);
    expect(toTextRuns('**only bold**')).toHaveLength(1);
  });
});

describe('exportArticleDocument', () => {
  it('renders a docx and lets a TITLE line override the document title', async () => {
    const exported = await exportArticleDocument({
      title: 'Original',
      body: `TITLE: Override\n**Heading**\n<span style="color: #0066CC;">Changed text.</span>\n\n---`,
      variant: 'UK',
      keywords: ['hiring'],
      now: new Date(2024, 0, 2, 3, 4, 5),
    });

    expect(exported.title).toBe('Override');
    expect(exported.fileName).toBe('Original_UK_20240102_030405.docx');
    expect(exported.data.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});

describe('processLogo', () => {
  it('caps the width at 300 pixels and keeps the aspect ratio', async () => {
    const logo = await processLogo(await sampleImage(600, 300));

    expect(logo.width).toBe(300);
    expect(logo.height).toBe(150);
    expect(logo.data.subarray(1, 4).toString('latin1')).toBe('PNG');
  });

  it('does not enlarge small images', async () => {
    const logo = await processLogo(await sampleImage(120, 40));
    expect(logo.width).toBe(120);
    expect(logo.height).toBe(40);
  });

  it('embeds the logo in the rendered document', async () => {
    const logo = await processLogo(await sampleImage(400, 100));
    const data = await renderDocx({
      title: 'With logo',
      blocks: [{ type: 'paragraph', text: 'Body' }],
      wordCount: 1,
      keywords: [],
      logo,
    });

    expect(data.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});
