/**
 * md2out - Markdown Preprocessor
 *
 * Normalizes Markdown input before lexing: line endings and the leading
 * metadata block.
 *
 * @module core/preprocessor
 */
import { ParseErrorCode } from '../errors.js';
import type { MetadataEntry } from '../types.js';

/** What the preprocessor hands to the lexer, plus what it found on the way. */
export interface PreprocessResult {
  /** Markdown with the metadata block removed. */
  markdown: string;
  /** Metadata entries in document order. */
  metadata: MetadataEntry[];
  /** Diagnostics in the order they were found. */
  diagnostics: ParseErrorCode[];
}

export interface PreprocessOptions {
  /** Read a leading `key: value` block. */
  metadata: boolean;
}

/** First line of a metadata block: a key starting with a letter or digit, then a colon. */
const METADATA_START_RE = /^[A-Za-z0-9][^:\n]*:/;

/** Characters kept in a normalized metadata key. */
const METADATA_KEY_CHAR_RE = /[a-z0-9_-]/;

/**
 * Convert CRLF and lone CR line endings to LF.
 */
function normalizeLineEndings(markdown: string): string {
  return markdown.replace(/\r\n?/g, '\n');
}

/**
 * Lower-case a metadata key and drop whitespace. Any other character
 * outside `[a-z0-9_-]` is dropped as well and reported.
 */
function normalizeMetadataKey(raw: string, diagnostics: ParseErrorCode[]): string {
  let key = '';
  let reported = false;
  for (const ch of raw.toLowerCase()) {
    if (/\s/.test(ch)) {
      continue;
    }
    if (METADATA_KEY_CHAR_RE.test(ch)) {
      key += ch;
    } else if (!reported) {
      diagnostics.push(ParseErrorCode.MetadataKeyChar);
      reported = true;
    }
  }
  return key;
}

/**
 * Split a MultiMarkdown-style metadata block off the top of the document.
 *
 * The block runs to the first blank line. Lines starting with whitespace
 * continue the previous value.
 */
function extractMetadata(
  markdown: string,
  diagnostics: ParseErrorCode[],
): { body: string; metadata: MetadataEntry[] } {
  if (!METADATA_START_RE.test(markdown)) {
    return { body: markdown, metadata: [] };
  }

  const lines = markdown.split('\n');
  const metadata: MetadataEntry[] = [];
  let i = 0;

  for (; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim().length === 0) {
      i++;
      break;
    }

    const last = metadata[metadata.length - 1];
    if (/^\s/.test(line) && last) {
      const continuation = line.trim();
      last.value = last.value ? `${last.value}\n${continuation}` : continuation;
      continue;
    }

    const colon = line.indexOf(':');
    if (colon < 0) {
      // Not metadata after all: the block ends here and the line is body text.
      break;
    }
    metadata.push({
      key: normalizeMetadataKey(line.slice(0, colon), diagnostics),
      value: line.slice(colon + 1).trim(),
    });
  }

  return { body: lines.slice(i).join('\n'), metadata };
}

/**
 * Apply all preprocessor transformations in sequence.
 *
 * The order matters:
 * 1. Normalize line endings (metadata extraction splits on `\n`)
 * 2. Extract metadata (only at the very top of the document)
 *
 * @param source - Raw markdown input.
 * @returns The body for the lexer, the metadata, and any diagnostics.
 */
export function preprocessMarkdown(source: string, options: PreprocessOptions): PreprocessResult {
  const diagnostics: ParseErrorCode[] = [];
  let result = normalizeLineEndings(source);

  let metadata: MetadataEntry[] = [];
  if (options.metadata) {
    const extracted = extractMetadata(result, diagnostics);
    result = extracted.body;
    metadata = extracted.metadata;
  }

  return { markdown: result, metadata, diagnostics };
}
