/**
 * HTML renderer for marked.
 *
 * Produces an HTML5 fragment. Output flags decide what happens to raw
 * HTML in the source (pass, skip, or escape) and whether headings carry
 * `id` attributes.
 */

import type { Renderer, RendererObject, Tokens } from 'marked';

import { OutputFlags, hasFlag } from '../config.js';
import type { DocumentRenderer, RendererKind } from './types.js';

// ---------------------------------------------------------------------------
// HTML entity escaping
// ---------------------------------------------------------------------------

const ENTITY_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape HTML special characters so that arbitrary text can be safely
 * embedded inside an HTML document.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

/**
 * Turn rendered heading HTML into an `id`: tags and entities dropped,
 * lower-cased, runs of anything but letters and digits joined by `-`.
 */
export function slugify(html: string): string {
  return html
    .replace(/<[^>]*>/g, '')
    .replace(/&[#a-z0-9]+;/gi, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

// ---------------------------------------------------------------------------
// Renderer handle base
// ---------------------------------------------------------------------------

/**
 * Base class for renderer handles built on `marked` overrides.
 *
 * Subclasses supply the overrides, built on first use. A destroyed handle
 * throws instead of handing them out again.
 */
export abstract class MarkedRenderer implements DocumentRenderer {
  abstract readonly kind: RendererKind;
  private rendererOverrides: RendererObject | null = null;
  private destroyed = false;

  constructor(public readonly oflags: number) {}

  get overrides(): RendererObject {
    if (this.destroyed) {
      throw new Error(`${this.kind} renderer used after destroy()`);
    }
    if (!this.rendererOverrides) {
      this.rendererOverrides = this.buildOverrides();
    }
    return this.rendererOverrides;
  }

  destroy(): void {
    this.rendererOverrides = null;
    this.destroyed = true;
  }

  protected abstract buildOverrides(): RendererObject;
}

// ---------------------------------------------------------------------------
// HTML renderer
// ---------------------------------------------------------------------------

class HtmlRenderer extends MarkedRenderer {
  readonly kind = 'html';

  protected buildOverrides(): RendererObject {
    const { oflags } = this;

    return {
      heading(this: Renderer, { tokens, depth }: Tokens.Heading): string {
        const text = this.parser.parseInline(tokens);
        const id = hasFlag(oflags, OutputFlags.HeadIds) ? slugify(text) : '';
        const idAttr = id ? ` id="${id}"` : '';
        return `<h${depth}${idAttr}>${text}</h${depth}>\n`;
      },

      code({ text, lang }: Tokens.Code): string {
        // One trailing newline inside <code>, as marked writes it.
        const escaped = `${escapeHtml(text.replace(/\n$/, ''))}\n`;
        if (lang) {
          return `<pre><code class="language-${escapeHtml(lang)}">${escaped}</code></pre>\n`;
        }
        return `<pre><code>${escaped}</code></pre>\n`;
      },

      hr(): string {
        return '<hr />\n';
      },

      br(): string {
        return '<br />\n';
      },

      link(this: Renderer, { href, title, tokens }: Tokens.Link): string {
        const text = this.parser.parseInline(tokens);
        const titleAttr = title ? ` title="${escapeHtml(title)}"` : '';
        return `<a href="${escapeHtml(href)}"${titleAttr}>${text}</a>`;
      },

      image({ href, title, text }: Tokens.Image): string {
        const altAttr = ` alt="${escapeHtml(text)}"`;
        const titleAttr = title ? ` title="${escapeHtml(title)}"` : '';
        return `<img src="${escapeHtml(href)}"${altAttr}${titleAttr} />`;
      },

      html({ text }: Tokens.HTML | Tokens.Tag): string {
        if (hasFlag(oflags, OutputFlags.SkipHtml)) {
          return '';
        }
        if (hasFlag(oflags, OutputFlags.EscapeHtml)) {
          return escapeHtml(text);
        }
        return text;
      },
    };
  }
}

/**
 * Create an HTML renderer handle.
 *
 * @param oflags - Bitset of `OutputFlags`.
 *
 * @example
 * ```ts
 * const renderer = createHtmlRenderer(OutputFlags.HeadIds);
 * // headings render as <h1 id="hello-world">Hello world</h1>
 * renderer.destroy();
 * ```
 */
export function createHtmlRenderer(oflags: number): DocumentRenderer {
  return new HtmlRenderer(oflags);
}
