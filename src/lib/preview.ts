import he from 'he';
import { parseContentBlocks, type ContentBlock } from './markup';
import { HIGHLIGHT_CLOSE, HIGHLIGHT_OPEN } from './revision';

const HIGHLIGHT_TOKEN = /(<span style="color: #0066CC;">|<\/span>)/;

export function renderInline(text: string): string {
  return text
    .split(HIGHLIGHT_TOKEN)
    .map((part) => {
      if (part === HIGHLIGHT_OPEN || part === HIGHLIGHT_CLOSE) {
        return part;
      }
      return he.encode(part).replace(/\*\*([^*]+)\*\*/g, '<strong>$1</strong>');
    })
    .join('');
}

function renderHeading(block: Extract<ContentBlock, { type: 'heading' }>): string {
  const tag = `h${block.level + 1}`;
  const text = he.encode(block.text);
  const inner = block.highlighted ? `${HIGHLIGHT_OPEN}${text}${HIGHLIGHT_CLOSE}` : text;
  return `<${tag}>${inner}</${tag}>`;
}

/** Preview markup for the article tabs; only the revision highlight span survives unescaped. */
export function renderPreviewHtml(body: string): string {
  const html: string[] = [];
  let openList = false;

  for (const block of parseContentBlocks(body)) {
    const bullet = block.type === 'listItem' && !block.ordered;
    if (openList && !bullet) {
      html.push('</ul>');
      openList = false;
    }

    if (block.type === 'heading') {
      html.push(renderHeading(block));
    } else if (bullet) {
      if (!openList) {
        html.push('<ul>');
        openList = true;
      }
      html.push(`<li>${renderInline(block.text)}</li>`);
    } else {
      html.push(`<p>${renderInline(block.text)}</p>`);
    }
  }

  if (openList) {
    html.push('</ul>');
  }
  return html.join('\n');
}
