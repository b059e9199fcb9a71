import { DEFAULT_MAX_NESTING, OutputFlags, hasFlag, resolveOptions } from './config.js';
import type { RenderOptions } from './config.js';
import { ByteBuffer } from './core/buffer.js';
import type { ByteSource } from './core/buffer.js';
import { DocumentParser } from './core/parser.js';
import { createHtmlRenderer } from './core/renderer.js';
import { createRoffRenderer } from './core/roff-renderer.js';
import { substituteHtml, substituteRoff } from './core/smartypants.js';
import { standaloneClose, standaloneOpen } from './core/standalone.js';
import type { DocumentRenderer, ParseResult, ParserOptions } from './core/types.js';
import { InputReadError } from './errors.js';
import type { ParseErrorCode } from './errors.js';
import { createChildLogger } from './logger.js';
import type { RenderFileResult, RenderResult } from './types.js';

const log = createChildLogger({ module: 'converter' });

/**
 * Pick the renderer for the output type. Absent options mean HTML.
 */
function createRenderer(options: RenderOptions | undefined): DocumentRenderer {
  if (!options || options.type === 'html') {
    return createHtmlRenderer(options?.oflags ?? 0);
  }
  return createRoffRenderer(options.oflags, options.type === 'man');
}

/**
 * Render a markdown document held in memory.
 *
 * Runs the full pipeline:
 * 1. Pick the renderer (HTML, or roff with `ms`/`man` macros)
 * 2. Parse and render with a parser bound to it
 * 3. Release the parser and renderer
 * 4. Run typographic substitution when `OutputFlags.Smarty` is set
 *
 * The returned output is either the rendered body or the substituted
 * copy of it, never both.
 *
 * @param options - Render options; `undefined` means HTML with no flags.
 * @param input - Markdown source, as bytes or a string.
 * @param onError - Receives parser diagnostics, in document order.
 *
 * @example
 * ```ts
 * const { output } = renderBuffer(undefined, '# Hello\n\nWorld');
 * output.toString(); // => '<h1>Hello</h1>\n<p>World</p>\n'
 * ```
 */
export function renderBuffer(
  options: RenderOptions | undefined,
  input: Uint8Array | string,
  onError?: (code: ParseErrorCode) => void,
): RenderResult {
  const renderer = createRenderer(options);
  const parserOptions: ParserOptions = {
    feat: options?.feat ?? 0,
    maxNesting: DEFAULT_MAX_NESTING,
    roffSafe: options !== undefined && options.type !== 'html',
    onError,
  };
  const parser = new DocumentParser(renderer, parserOptions);

  let parsed: ParseResult;
  try {
    parsed = parser.render(input);
  } finally {
    parser.destroy();
    renderer.destroy();
  }

  const { body, metadata } = parsed;
  const rendered = body.take();
  body.free();

  if (!options || !hasFlag(options.oflags, OutputFlags.Smarty)) {
    return { output: rendered, metadata };
  }

  const output = options.type === 'html' ? substituteHtml(rendered) : substituteRoff(rendered);
  return { output, metadata };
}

/**
 * Read a whole stream, then render it with {@link renderBuffer}.
 *
 * A read error is the one failure this function reports: the partial
 * input is dropped and the result carries an {@link InputReadError}.
 *
 * @example
 * ```ts
 * const result = await renderFile({ type: 'man', oflags: 0, feat: 0 }, fs.createReadStream('grep.md'));
 * if (result.ok) process.stdout.write(result.output);
 * ```
 */
export async function renderFile(
  options: RenderOptions | undefined,
  input: ByteSource,
  onError?: (code: ParseErrorCode) => void,
): Promise<RenderFileResult> {
  const ib = new ByteBuffer();

  try {
    await ib.drain(input);
  } catch (err) {
    ib.free();
    const error = new InputReadError(err);
    log.error({ err }, error.message);
    return { ok: false, error };
  }

  const source = ib.take();
  ib.free();
  return { ok: true, ...renderBuffer(options, source, onError) };
}

/**
 * Render a document and, when `OutputFlags.Standalone` is set, wrap it in
 * the preamble and postamble built from its own metadata.
 *
 * @example
 * ```ts
 * const { output } = renderStandalone(
 *   { type: 'html', oflags: OutputFlags.Standalone, feat: Features.Metadata },
 *   'title: Notes\n\nHello',
 * );
 * // output starts with '<!DOCTYPE html>' and ends with '</html>\n'
 * ```
 */
export function renderStandalone(
  options: Partial<RenderOptions> | undefined,
  input: Uint8Array | string,
  onError?: (code: ParseErrorCode) => void,
): RenderResult {
  const resolved = options ? resolveOptions(options) : undefined;
  const result = renderBuffer(resolved, input, onError);
  if (!resolved || !hasFlag(resolved.oflags, OutputFlags.Standalone)) {
    return result;
  }

  const op = new ByteBuffer();
  op.put(standaloneOpen(resolved, result.metadata));
  op.put(result.output);
  op.put(standaloneClose(resolved));
  return { output: op.take(), metadata: result.metadata };
}
