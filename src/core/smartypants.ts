/**
 * md2out - Typographic substitution
 *
 * Replaces straight quotes, double and triple hyphens, and three dots in
 * already-rendered output with their typographic forms. Markup is left
 * alone: HTML tags and `pre`/`code` contents, roff requests, escapes and
 * no-fill (code) regions.
 *
 * @module core/smartypants
 */
import { ByteBuffer } from './buffer.js';

/** Output text for each typographic glyph. */
interface GlyphSet {
  ldquo: string;
  rdquo: string;
  lsquo: string;
  rsquo: string;
  ndash: string;
  mdash: string;
  hellip: string;
}

const HTML_GLYPHS: GlyphSet = {
  ldquo: '&ldquo;',
  rdquo: '&rdquo;',
  lsquo: '&lsquo;',
  rsquo: '&rsquo;',
  ndash: '&ndash;',
  mdash: '&mdash;',
  hellip: '&hellip;',
};

const ROFF_GLYPHS: GlyphSet = {
  ldquo: '\\(lq',
  rdquo: '\\(rq',
  lsquo: '\\(oq',
  rsquo: '\\(cq',
  ndash: '\\(en',
  mdash: '\\(em',
  hellip: '\\&.\\|.\\|.',
};

/** Characters after which a quote opens rather than closes. */
const OPENING_CONTEXT = new Set(['(', '[', '{', '-', '–', '—', '“', '‘']);

/** HTML elements whose contents are never touched. */
const HTML_SKIP_TAGS = new Set(['pre', 'code', 'kbd', 'samp', 'script', 'style', 'math']);

/** A roff escape sequence starting at a backslash. */
const ROFF_ESCAPE_RE = /\\(?:\(..|\[[^\]]*\]|[fs*]\(..|[fs*]\[[^\]]*\]|[fs*].|.)/y;

/** Any HTML entity other than the two quote entities. */
const HTML_ENTITY_RE = /&[#a-zA-Z0-9]+;/y;

function opensQuote(prev: string): boolean {
  return /\s/.test(prev) || OPENING_CONTEXT.has(prev);
}

/**
 * Substitute one run of plain text.
 *
 * @param prev - The character before the run; carries quote context
 *   across markup.
 * @returns The substituted text and the new context character.
 */
function educate(
  text: string,
  prev: string,
  glyphs: GlyphSet,
  flavor: 'html' | 'roff',
): { text: string; prev: string } {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (flavor === 'roff' && ch === '\\') {
      ROFF_ESCAPE_RE.lastIndex = i;
      const match = ROFF_ESCAPE_RE.exec(text);
      const escape = match ? match[0] : ch;
      out += escape;
      i += escape.length;
      continue;
    }

    let quote: '"' | "'" | null = null;
    let width = 1;
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (flavor === 'html' && text.startsWith('&quot;', i)) {
      quote = '"';
      width = 6;
    } else if (flavor === 'html' && text.startsWith('&#39;', i)) {
      quote = "'";
      width = 5;
    }

    if (quote !== null) {
      const open = opensQuote(prev);
      if (quote === '"') {
        out += open ? glyphs.ldquo : glyphs.rdquo;
        prev = open ? '“' : '”';
      } else {
        out += open ? glyphs.lsquo : glyphs.rsquo;
        prev = open ? '‘' : '’';
      }
      i += width;
      continue;
    }

    if (text.startsWith('---', i)) {
      out += glyphs.mdash;
      prev = '—';
      i += 3;
      continue;
    }
    if (text.startsWith('--', i)) {
      out += glyphs.ndash;
      prev = '–';
      i += 2;
      continue;
    }
    if (text.startsWith('...', i)) {
      out += glyphs.hellip;
      prev = '…';
      i += 3;
      continue;
    }

    if (flavor === 'html' && ch === '&') {
      HTML_ENTITY_RE.lastIndex = i;
      const match = HTML_ENTITY_RE.exec(text);
      if (match) {
        out += match[0];
        prev = ';';
        i += match[0].length;
        continue;
      }
    }

    out += ch;
    prev = ch;
    i++;
  }

  return { text: out, prev };
}

function decode(input: Uint8Array): string {
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('utf8');
}

/**
 * Typographic substitution over HTML text, skipping tags and the contents
 * of `pre`, `code` and similar elements.
 *
 * @example
 * ```ts
 * smartypantsHtml('<p>&quot;Hi&quot; -- it&#39;s...</p>');
 * // => '<p>&ldquo;Hi&rdquo; &ndash; it&rsquo;s&hellip;</p>'
 * ```
 */
export function smartypantsHtml(html: string): string {
  // With a capturing split, odd indices are tags and even ones text.
  const parts = html.split(/(<[^>]*>)/);
  let out = '';
  let prev = ' ';
  let skipDepth = 0;

  parts.forEach((part, index) => {
    if (index % 2 === 1) {
      const tag = /^<(\/?)([a-zA-Z][a-zA-Z0-9]*)/.exec(part);
      if (tag && HTML_SKIP_TAGS.has(tag[2].toLowerCase())) {
        skipDepth = tag[1] ? Math.max(0, skipDepth - 1) : skipDepth + 1;
      }
      // Closing tags keep the quote context; anything else starts afresh.
      if (!tag || !tag[1]) {
        prev = ' ';
      }
      out += part;
      return;
    }

    if (skipDepth > 0) {
      out += part;
      if (part.length > 0) {
        prev = part[part.length - 1];
      }
      return;
    }

    const educated = educate(part, prev, HTML_GLYPHS, 'html');
    out += educated.text;
    prev = educated.prev;
  });

  return out;
}

/**
 * Typographic substitution over roff text. Request lines (starting with
 * `.` or `'`) and no-fill regions (`.nf` to `.fi`) are copied unchanged.
 */
export function smartypantsRoff(roff: string): string {
  let noFill = false;

  return roff
    .split('\n')
    .map((line) => {
      if (line.startsWith('.') || line.startsWith("'")) {
        if (/^\.nf\b/.test(line)) {
          noFill = true;
        } else if (/^\.fi\b/.test(line)) {
          noFill = false;
        }
        return line;
      }
      if (noFill) {
        return line;
      }
      return educate(line, ' ', ROFF_GLYPHS, 'roff').text;
    })
    .join('\n');
}

/**
 * Substitution pass over rendered HTML bytes into a fresh buffer.
 */
export function substituteHtml(input: Uint8Array): Buffer {
  return new ByteBuffer().put(smartypantsHtml(decode(input))).take();
}

/**
 * Substitution pass over rendered roff bytes into a fresh buffer.
 */
export function substituteRoff(input: Uint8Array): Buffer {
  return new ByteBuffer().put(smartypantsRoff(decode(input))).take();
}
