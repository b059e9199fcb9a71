/**
 * md2out - Markdown to HTML, ms and man converter
 */

// High-level rendering API
export { renderBuffer, renderFile, renderStandalone } from './converter.js';

// Options
export {
  OutputFlags,
  Features,
  DEFAULT_RENDER_OPTIONS,
  DEFAULT_MAX_NESTING,
  resolveOptions,
  hasFlag,
} from './config.js';
export type { OutputType, RenderOptions } from './config.js';

// Errors
export { ParseErrorCode, errorMessage, Md2OutError, InputReadError } from './errors.js';

// Types
export type { MetadataEntry, RenderResult, RenderFileResult } from './types.js';

// Logging
export { logger } from './logger.js';

// Core module re-exports
export {
  ByteBuffer,
  DocumentParser,
  createHtmlRenderer,
  createRoffRenderer,
  normalizeDate,
  normalizeRcsDate,
  escapeHtmlTitle,
  escapeRoff,
  substituteHtml,
  substituteRoff,
  standaloneOpen,
  standaloneClose,
} from './core/index.js';

export type { ByteSource, DocumentRenderer, ParserOptions, ParseResult } from './core/index.js';
