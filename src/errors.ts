/**
 * Error types and the parser diagnostic table.
 */

// --- Parser diagnostics ---

/**
 * Diagnostics the document parser reports without stopping.
 */
export const ParseErrorCode = {
  /** `[text] (url)`: whitespace between the link text and destination. */
  SpaceBeforeLink: 0,
  /** A metadata key contained a character outside `[a-z0-9_-]`. */
  MetadataKeyChar: 1,
} as const;

export type ParseErrorCode = (typeof ParseErrorCode)[keyof typeof ParseErrorCode];

const ERROR_MESSAGES: readonly string[] = Object.freeze([
  'space before link (CommonMark violation)',
  'bad character in metadata key (MultiMarkdown violation)',
]);

/**
 * Human-readable text for a parser diagnostic.
 *
 * @throws {RangeError} When `code` is not one of {@link ParseErrorCode}.
 */
export function errorMessage(code: number): string {
  const message = Number.isInteger(code) ? ERROR_MESSAGES[code] : undefined;
  if (message === undefined) {
    throw new RangeError(`Unknown parse error code: ${String(code)}`);
  }
  return message;
}

// --- Error classes ---

/** Base error class for md2out failures. */
export class Md2OutError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'Md2OutError';
  }
}

/** Reading the input stream failed before the document could be rendered. */
export class InputReadError extends Md2OutError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('INPUT_READ', `Failed to read input: ${detail}`, { cause });
    this.name = 'InputReadError';
  }
}
