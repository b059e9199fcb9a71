/**
 * Escaping for text the standalone wrapper writes outside the rendered
 * body: the HTML `<title>` and roff macro arguments.
 *
 * @module core/escape
 */

const WHITESPACE = new Set([' ', '\t', '\n', '\v', '\f', '\r']);

function isSpace(ch: string): boolean {
  return WHITESPACE.has(ch);
}

function skipLeadingSpace(value: string): number {
  let i = 0;
  while (i < value.length && isSpace(value[i])) {
    i++;
  }
  return i;
}

/**
 * Escape a document title for the HTML `<title>` element.
 *
 * Only `<` and `>` are replaced; `&` and `"` pass through unchanged.
 * Whitespace runs collapse to one space.
 *
 * @example
 * ```ts
 * escapeHtmlTitle('  <Hi>\t\tthere'); // => '&lt;Hi&gt; there'
 * ```
 */
export function escapeHtmlTitle(value: string): string {
  let out = '';
  let inSpace = false;

  for (let i = skipLeadingSpace(value); i < value.length; i++) {
    const ch = value[i];
    if (isSpace(ch)) {
      if (!inSpace) {
        out += ' ';
      }
      inSpace = true;
      continue;
    }
    inSpace = false;
    if (ch === '<') {
      out += '&lt;';
    } else if (ch === '>') {
      out += '&gt;';
    } else {
      out += ch;
    }
  }

  return out;
}

/**
 * Escape text for roff.
 *
 * Block text sits on a line of its own: a leading `.` gets a zero-width
 * `\&` so it is not read as a request, and a newline ends the line.
 * Inline text sits inside a quoted macro argument, so `"` becomes `\(dq`.
 *
 * @param value - Text to escape; leading whitespace is dropped.
 * @param isBlock - Whether the text occupies its own line.
 */
export function escapeRoff(value: string, isBlock: boolean): string {
  const start = skipLeadingSpace(value);
  let out = isBlock && value[start] === '.' ? '\\&' : '';

  for (let i = start; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\') {
      out += '\\e';
    } else if (!isBlock && ch === '"') {
      out += '\\(dq';
    } else if (isSpace(ch)) {
      out += ' ';
    } else {
      out += ch;
    }
  }

  return isBlock ? `${out}\n` : out;
}
