/**
 * Document parser.
 *
 * Preprocesses the input, tokenizes it with a `marked` instance bound to
 * one renderer handle, trims the token tree (nesting limit, raw HTML for
 * roff) and renders it into a byte buffer. Spaced links are reported while
 * the inline content is tokenized.
 *
 * @module core/parser
 */
import { Marked } from 'marked';
import type { Token, Tokens } from 'marked';

import { Features, GFM_FEATURES, OutputFlags, hasFlag } from '../config.js';
import { ParseErrorCode, errorMessage } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { ByteBuffer } from './buffer.js';
import { preprocessMarkdown } from './preprocessor.js';
import { spacedLinkExtension } from './spaced-link.js';
import type { DocumentRenderer, ParseResult, ParserOptions } from './types.js';

const log = createChildLogger({ module: 'parser' });

/**
 * The child-token arrays of a token.
 *
 * Handles the various child-token shapes that `marked` uses (`tokens`,
 * `items`, table `header`/`rows`) so callers do not need to know about the
 * internal structure of each token type.
 */
function childTokenLists(token: Token): Token[][] {
  const lists: Token[][] = [];

  if ('tokens' in token && Array.isArray(token.tokens)) {
    lists.push(token.tokens);
  }

  if ('items' in token && Array.isArray(token.items)) {
    // List -> ListItem[]
    lists.push(token.items as Token[]);
  }

  if (token.type === 'table') {
    const table = token as Tokens.Table;
    for (const cell of table.header) {
      lists.push(cell.tokens);
    }
    for (const row of table.rows) {
      for (const cell of row) {
        lists.push(cell.tokens);
      }
    }
  }

  return lists;
}

/**
 * Empty every child list that would sit deeper than `maxNesting`.
 * Top-level tokens are at depth 1.
 */
function limitNesting(tokens: Token[], maxNesting: number, depth = 1): void {
  for (const token of tokens) {
    for (const children of childTokenLists(token)) {
      if (depth + 1 > maxNesting) {
        children.length = 0;
      } else {
        limitNesting(children, maxNesting, depth + 1);
      }
    }
  }
}

/**
 * Remove raw HTML tokens, block and inline, in place.
 */
function dropRawHtml(tokens: Token[]): void {
  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token.type === 'html') {
      tokens.splice(i, 1);
      continue;
    }
    for (const children of childTokenLists(token)) {
      dropRawHtml(children);
    }
  }
}

function decodeInput(input: Uint8Array | string): string {
  if (typeof input === 'string') {
    return input;
  }
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('utf8');
}

/**
 * Parses markdown and renders it through one renderer handle.
 *
 * A parser serves a single render call: create it, call
 * {@link DocumentParser.render}, then {@link DocumentParser.destroy} it.
 *
 * @example
 * ```ts
 * const renderer = createHtmlRenderer(0);
 * const parser = new DocumentParser(renderer, { feat: 0, maxNesting: 16, roffSafe: false });
 * const { body } = parser.render('# Hello');
 * parser.destroy();
 * renderer.destroy();
 * body.take().toString(); // => '<h1>Hello</h1>\n'
 * ```
 */
export class DocumentParser {
  private destroyed = false;

  constructor(
    private readonly renderer: DocumentRenderer,
    private readonly options: ParserOptions,
  ) {}

  /**
   * Render `input`. The returned body buffer and metadata belong to the
   * caller.
   */
  render(input: Uint8Array | string): ParseResult {
    if (this.destroyed) {
      throw new Error('DocumentParser used after destroy()');
    }

    const { feat, maxNesting, roffSafe } = this.options;
    const pre = preprocessMarkdown(decodeInput(input), {
      metadata: hasFlag(feat, Features.Metadata),
    });
    for (const code of pre.diagnostics) {
      this.report(code);
    }

    const body = new ByteBuffer();

    // Whitespace-only documents produce no tokens worth rendering.
    if (pre.markdown.trim().length === 0) {
      return { body, metadata: pre.metadata };
    }

    const breaks = hasFlag(this.renderer.oflags, OutputFlags.HardWrap);
    const marked = new Marked({
      // Hard breaks are part of the GFM inline grammar in marked.
      gfm: breaks || hasFlag(feat, GFM_FEATURES),
      breaks,
      renderer: this.renderer.overrides,
      extensions: [spacedLinkExtension(() => this.report(ParseErrorCode.SpaceBeforeLink))],
    });

    const tokens = marked.lexer(pre.markdown);
    limitNesting(tokens, maxNesting);
    if (roffSafe) {
      dropRawHtml(tokens);
    }

    body.put(marked.parser(tokens));
    return { body, metadata: pre.metadata };
  }

  destroy(): void {
    this.destroyed = true;
  }

  private report(code: ParseErrorCode): void {
    log.warn({ code }, errorMessage(code));
    this.options.onError?.(code);
  }
}
