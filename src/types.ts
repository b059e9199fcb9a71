import type { InputReadError } from './errors.js';

/**
 * One `key: value` pair from a document's metadata block.
 *
 * Entries keep document order and keys may repeat.
 */
export interface MetadataEntry {
  /** Lower-cased key with whitespace and invalid characters removed. */
  key: string;
  /** Value text, continuation lines joined with newlines. */
  value: string;
}

/**
 * Result of one pipeline run. The caller owns both fields.
 */
export interface RenderResult {
  /** Final rendered bytes (substituted when typographic substitution ran). */
  output: Buffer;
  /** Document metadata in document order. */
  metadata: MetadataEntry[];
}

/**
 * Result of {@link renderFile}: either the rendered document or the read
 * error that stopped it.
 */
export type RenderFileResult =
  | ({ ok: true } & RenderResult)
  | { ok: false; error: InputReadError };
