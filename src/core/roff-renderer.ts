/**
 * Roff renderer for marked.
 *
 * Writes either `ms` (technical document) or `man` macros. The two share
 * inline escapes and differ in how headings and code displays are marked
 * up.
 *
 * @module core/roff-renderer
 */

import type { Renderer, RendererObject, Tokens } from 'marked';

import { MarkedRenderer } from './renderer.js';
import type { DocumentRenderer } from './types.js';

// ---------------------------------------------------------------------------
// Escaping
// ---------------------------------------------------------------------------

const ENTITY_DECODE_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

/**
 * Undo the HTML escaping `marked` applies to some inline tokens.
 */
function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITY_DECODE_MAP[entity] ?? entity);
}

/**
 * Escape text that lands in the body of a roff document.
 *
 * Backslashes become `\e`; a `.` or `'` that would start a line gets a
 * zero-width `\&` so it is not read as a request.
 */
export function escapeRoffText(text: string): string {
  return text.replace(/\\/g, '\\e').replace(/(^|\n)([.'])/g, '$1\\&$2');
}

/** Separator between `tbl` cells. */
const TBL_TAB = '|';

const TBL_ALIGN: Record<string, string> = {
  left: 'l',
  center: 'c',
  right: 'r',
};

// ---------------------------------------------------------------------------
// Roff renderer
// ---------------------------------------------------------------------------

/**
 * Render one list item with the given `.IP` tag.
 */
function renderListItem(renderer: Renderer, item: Tokens.ListItem, tag: string): string {
  let content = '';
  for (const tok of item.tokens) {
    if (tok.type === 'paragraph') {
      content += `${renderer.parser.parseInline((tok as Tokens.Paragraph).tokens)}\n`;
    } else if (tok.type === 'text') {
      const text = tok as Tokens.Text;
      content += `${text.tokens ? renderer.parser.parseInline(text.tokens) : escapeRoffText(decodeEntities(text.text))}\n`;
    } else if (tok.type === 'list') {
      content += `.RS\n${renderer.list(tok as Tokens.List)}.RE\n`;
    } else {
      content += renderer.parser.parse([tok]);
    }
  }

  if (item.task) {
    content = `${item.checked ? '[x]' : '[ ]'} ${content}`;
  }

  return `.IP ${tag}\n${content}`;
}

class RoffRenderer extends MarkedRenderer {
  readonly kind = 'roff';

  constructor(
    oflags: number,
    private readonly isMan: boolean,
  ) {
    super(oflags);
  }

  protected buildOverrides(): RendererObject {
    const { isMan } = this;

    return {
      // ------------------------------------------------------------------
      // Block-level overrides
      // ------------------------------------------------------------------

      heading(this: Renderer, { tokens, depth }: Tokens.Heading): string {
        const text = this.parser.parseInline(tokens);
        const macro = isMan && depth > 1 ? '.SS' : '.SH';
        return `${macro}\n${text}\n`;
      },

      code({ text }: Tokens.Code): string {
        const escaped = escapeRoffText(text);
        if (isMan) {
          return `.PP\n.nf\n.ft CW\n${escaped}\n.ft\n.fi\n`;
        }
        return `.DS\n.nf\n.ft CW\n${escaped}\n.ft\n.fi\n.DE\n`;
      },

      blockquote(this: Renderer, { tokens }: Tokens.Blockquote): string {
        return `.RS\n${this.parser.parse(tokens)}.RE\n`;
      },

      hr(): string {
        return '.sp\n';
      },

      list(this: Renderer, token: Tokens.List): string {
        const start = typeof token.start === 'number' ? token.start : 1;
        let body = '';
        token.items.forEach((item, index) => {
          const tag = token.ordered ? `${String(start + index)}.` : '\\(bu';
          body += renderListItem(this, item, tag);
        });
        return body;
      },

      listitem(this: Renderer, item: Tokens.ListItem): string {
        return renderListItem(this, item, '\\(bu');
      },

      paragraph(this: Renderer, { tokens }: Tokens.Paragraph): string {
        return `.PP\n${this.parser.parseInline(tokens)}\n`;
      },

      table(this: Renderer, token: Tokens.Table): string {
        const cell = (c: Tokens.TableCell): string =>
          this.parser.parseInline(c.tokens).split(TBL_TAB).join('\\(ba');

        const layout = token.align.map((a) => (a ? TBL_ALIGN[a] : 'l')).join(' ');
        const header = token.header.map(cell).join(TBL_TAB);
        const rows = token.rows.map((row) => `${row.map(cell).join(TBL_TAB)}\n`).join('');

        return `.TS\ntab(${TBL_TAB});\n${layout}.\n${header}\n_\n${rows}.TE\n`;
      },

      html(): string {
        return '';
      },

      space(): string {
        return '';
      },

      // ------------------------------------------------------------------
      // Inline-level overrides
      // ------------------------------------------------------------------

      strong(this: Renderer, { tokens }: Tokens.Strong): string {
        return `\\fB${this.parser.parseInline(tokens)}\\fP`;
      },

      em(this: Renderer, { tokens }: Tokens.Em): string {
        return `\\fI${this.parser.parseInline(tokens)}\\fP`;
      },

      codespan({ text }: Tokens.Codespan): string {
        return `\\f(CW${escapeRoffText(decodeEntities(text))}\\fP`;
      },

      del(this: Renderer, { tokens }: Tokens.Del): string {
        return this.parser.parseInline(tokens);
      },

      link(this: Renderer, { href, tokens }: Tokens.Link): string {
        const text = this.parser.parseInline(tokens);
        const url = escapeRoffText(href);
        return text === url ? `\\(la${url}\\(ra` : `${text} \\(la${url}\\(ra`;
      },

      image({ text }: Tokens.Image): string {
        return escapeRoffText(decodeEntities(text));
      },

      br(): string {
        return '\n.br\n';
      },

      text(this: Renderer, token: Tokens.Text | Tokens.Escape | Tokens.Tag): string {
        if ('tokens' in token && token.tokens) {
          return this.parser.parseInline(token.tokens);
        }
        return escapeRoffText(decodeEntities(token.text));
      },
    };
  }
}

/**
 * Create a roff renderer handle.
 *
 * @param oflags - Bitset of `OutputFlags`.
 * @param isMan - Write `man` macros instead of `ms`.
 */
export function createRoffRenderer(oflags: number, isMan: boolean): DocumentRenderer {
  return new RoffRenderer(oflags, isMan);
}
