/**
 * Render options, flag bitsets and their defaults.
 *
 * @module config
 */

/** Supported output formats. */
export type OutputType = 'html' | 'nroff' | 'man';

/**
 * Output-flag bits, read by the renderers and the pipeline.
 */
export const OutputFlags = {
  /** Drop raw HTML from HTML output. */
  SkipHtml: 1 << 0,
  /** Escape raw HTML in HTML output instead of passing it through. */
  EscapeHtml: 1 << 1,
  /** Turn soft line breaks into hard breaks. */
  HardWrap: 1 << 2,
  /** Give HTML headings an `id` derived from their text. */
  HeadIds: 1 << 3,
  /** Run the typographic substitution pass over the rendered body. */
  Smarty: 1 << 4,
  /** Wrap the body in a complete document (see `renderStandalone`). */
  Standalone: 1 << 5,
} as const;

/**
 * Feature-flag bits, read by the document parser only.
 */
export const Features = {
  Tables: 1 << 0,
  Strike: 1 << 1,
  Autolink: 1 << 2,
  /** Read a leading `key: value` metadata block. */
  Metadata: 1 << 3,
} as const;

/** Features that need the GFM grammar of the lexer. */
export const GFM_FEATURES = Features.Tables | Features.Strike | Features.Autolink;

/**
 * Options for one render call. Callers own them; nothing in the
 * pipeline writes to them.
 */
export interface RenderOptions {
  /** Output format. */
  readonly type: OutputType;
  /** Bitset of {@link OutputFlags}. */
  readonly oflags: number;
  /** Bitset of {@link Features}. */
  readonly feat: number;
}

/** Options used when a caller passes none. */
export const DEFAULT_RENDER_OPTIONS: Readonly<RenderOptions> = Object.freeze({
  type: 'html',
  oflags: 0,
  feat: 0,
});

/** Deepest block/inline nesting the parser keeps. Not configurable. */
export const DEFAULT_MAX_NESTING = 16;

/**
 * Fill in every field of a partial options object.
 *
 * @example
 * ```ts
 * resolveOptions({ type: 'man' });
 * // => { type: 'man', oflags: 0, feat: 0 }
 * ```
 */
export function resolveOptions(options?: Partial<RenderOptions>): RenderOptions {
  return {
    type: options?.type ?? DEFAULT_RENDER_OPTIONS.type,
    oflags: options?.oflags ?? DEFAULT_RENDER_OPTIONS.oflags,
    feat: options?.feat ?? DEFAULT_RENDER_OPTIONS.feat,
  };
}

/** Whether any bit of `flag` is set in `bits`. */
export function hasFlag(bits: number, flag: number): boolean {
  return (bits & flag) !== 0;
}
