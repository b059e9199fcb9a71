/**
 * Core type definitions shared by the parser and the renderers.
 */
import type { RendererObject } from 'marked';

import type { ParseErrorCode } from '../errors.js';
import type { MetadataEntry } from '../types.js';
import type { ByteBuffer } from './buffer.js';

/** Output family a renderer writes. */
export type RendererKind = 'html' | 'roff';

/**
 * A renderer handle: the `marked` overrides for one output format plus
 * the output flags they were built with.
 *
 * Handles are created per render call and destroyed at its end.
 */
export interface DocumentRenderer {
  readonly kind: RendererKind;
  /** Bitset of `OutputFlags` this renderer was created with. */
  readonly oflags: number;
  /** `marked` renderer overrides. Throws once the renderer is destroyed. */
  readonly overrides: RendererObject;
  destroy(): void;
}

/**
 * Options that control how a {@link DocumentParser} reads its input.
 */
export interface ParserOptions {
  /** Bitset of `Features`. */
  feat: number;
  /** Nesting deeper than this is dropped from the token tree. */
  maxNesting: number;
  /**
   * Drop raw HTML before rendering, for outputs (roff) that cannot
   * represent it.
   */
  roffSafe: boolean;
  /** Called for every diagnostic, in document order. */
  onError?: (code: ParseErrorCode) => void;
}

/**
 * Result of rendering one document. Ownership of both fields passes to
 * the caller.
 */
export interface ParseResult {
  body: ByteBuffer;
  metadata: MetadataEntry[];
}
