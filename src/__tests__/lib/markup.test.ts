import { describe, expect, it } from 'vitest';
import { extractTitleLine, parseContentBlocks } from '../../lib/markup';
import { renderPreviewHtml } from '../../lib/preview';

const open = '<span style="color: #0066CC;">';
const close = '</span>';

describe('parseContentBlocks', () => {
  it('splits markup into headings, paragraphs and list items', () => {
    const markup = [
      'TITLE: Ignored',
      '**Opening Heading**',
      'First line',
      'continues here.',
      '',
      '- point one',
      '• point two',
      '1. step one',
      '## Sub heading',
      '**### Small heading**',
      '# Big heading',
    ].join('\n');

    expect(parseContentBlocks(markup)).toEqual([
      { type: 'heading', level: 2, text: 'Opening Heading', highlighted: false },
      { type: 'paragraph', text: 'First line continues here.' },
      { type: 'listItem', ordered: false, text: 'point one' },
      { type: 'listItem', ordered: false, text: 'point two' },
      { type: 'listItem', ordered: true, text: '1. step one' },
      { type: 'heading', level: 2, text: 'Sub heading', highlighted: false },
      { type: 'heading', level: 3, text: 'Small heading', highlighted: false },
      { type: 'heading', level: 1, text: 'Big heading', highlighted: false },
    ]);
  });

  it('keeps inline bold lines as paragraphs', () => {
    expect(parseContentBlocks('**Key takeaway:** skills beat pedigree.')).toEqual([
      { type: 'paragraph', text: '**Key takeaway:** skills beat pedigree.' },
    ]);
  });

  it('marks headings that sit inside a revision highlight', () => {
    expect(parseContentBlocks(`${open}**Revised Heading**${close}`)).toEqual([
      { type: 'heading', level: 2, text: 'Revised Heading', highlighted: true },
    ]);
  });
});

describe('extractTitleLine', () => {
  it('reads a leading TITLE line', () => {
    expect(extractTitleLine('TITLE: My Title\nBody')).toEqual({ title: 'My Title', body: 'Body' });
  });

  it('leaves markup without a TITLE line alone', () => {
    expect(extractTitleLine('**Heading**\nBody')).toEqual({ title: null, body: '**Heading**\nBody' });
  });
});

describe('renderPreviewHtml', () => {
  it('escapes text and renders bold, headings and bullet lists', () => {
    const html = renderPreviewHtml('**Heading & More**\n\nText with **bold** <b>\n\n- item');
    expect(html).toBe(
      '<h3>Heading &#x26; More</h3>\n<p>Text with <strong>bold</strong> &#x3C;b&#x3E;</p>\n<ul>\n<li>item</li>\n</ul>'
    );
  });

  it('keeps revision highlights', () => {
    expect(renderPreviewHtml(`${open}Changed text.${close}`)).toBe(`<p>${open}Changed text.${close}</p>`);
  });
});
