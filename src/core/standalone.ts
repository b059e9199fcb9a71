/**
 * Standalone document wrapper.
 *
 * Builds the bytes that go before and after a rendered body to make a
 * complete document: an HTML shell, an `ms` title block, or a `man`
 * title line.
 *
 * @module core/standalone
 */
import { resolveOptions } from '../config.js';
import type { RenderOptions } from '../config.js';
import type { MetadataEntry } from '../types.js';
import { ByteBuffer } from './buffer.js';
import { currentLocalDate, normalizeDate, normalizeRcsDate } from './date.js';
import { escapeHtmlTitle, escapeRoff } from './escape.js';

/** Title used when the metadata has none. */
export const DEFAULT_TITLE = 'Untitled article';

/** Metadata the wrapper reads. */
export interface DocumentInfo {
  title: string;
  author: string | null;
  date: string;
}

/**
 * Resolve title, author and date from the metadata.
 *
 * One pass in document order; every matching key overwrites its slot.
 * `date` and `rcsdate` share a slot, so whichever comes last wins, and a
 * malformed later date clears an earlier good one. An empty date slot
 * falls back to today's local date.
 */
export function resolveDocumentInfo(metadata: readonly MetadataEntry[]): DocumentInfo {
  let title = DEFAULT_TITLE;
  let author: string | null = null;
  let date: string | null = null;

  for (const { key, value } of metadata) {
    if (key === 'title') {
      title = value;
    } else if (key === 'author') {
      author = value;
    } else if (key === 'rcsdate') {
      date = normalizeRcsDate(value);
    } else if (key === 'date') {
      date = normalizeDate(value);
    }
  }

  return { title, author, date: date ?? currentLocalDate() };
}

/**
 * Bytes that open a standalone document.
 *
 * @example
 * ```ts
 * standaloneOpen({ type: 'man' }, [{ key: 'title', value: 'grep' }]).toString();
 * // => '.TH "grep" 7 2024-01-09\n' when run on 9 January 2024
 * ```
 */
export function standaloneOpen(
  options: Partial<RenderOptions> | undefined,
  metadata: readonly MetadataEntry[],
): Buffer {
  const { type } = resolveOptions(options);
  const { title, author, date } = resolveDocumentInfo(metadata);
  const op = new ByteBuffer();

  switch (type) {
    case 'html':
      op.put(
        '<!DOCTYPE html>\n' +
          '<html>\n' +
          '<head>\n' +
          '<meta charset="utf-8">\n' +
          '<meta name="viewport" content="width=device-width,initial-scale=1">\n' +
          '<title>',
      );
      op.put(escapeHtmlTitle(title));
      op.put('</title>\n</head>\n<body>\n');
      break;
    case 'nroff':
      op.putf('.DA %s\n.TL\n', date);
      op.put(escapeRoff(title, true));
      if (author !== null) {
        op.put('.AU\n');
        op.put(escapeRoff(author, true));
      }
      break;
    case 'man':
      op.put('.TH "');
      op.put(escapeRoff(title, false));
      op.putf('" 7 %s\n', date);
      break;
  }

  return op.take();
}

/**
 * Bytes that close a standalone document. Only HTML has any.
 */
export function standaloneClose(options?: Partial<RenderOptions>): Buffer {
  const op = new ByteBuffer();
  if (resolveOptions(options).type === 'html') {
    op.put('</body>\n</html>\n');
  }
  return op.take();
}
