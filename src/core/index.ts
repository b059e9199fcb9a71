/**
 * Core module barrel exports.
 *
 * Re-exports the buffer, date, escaping, parser, renderer, substitution
 * and standalone-wrapper APIs.
 *
 * @module core
 */

// Buffer
export { ByteBuffer } from './buffer.js';
export type { ByteSource } from './buffer.js';

// Dates
export { normalizeDate, normalizeRcsDate, formatCanonicalDate, currentLocalDate } from './date.js';

// Escaping
export { escapeHtmlTitle, escapeRoff } from './escape.js';

// Parser
export { DocumentParser } from './parser.js';
export { preprocessMarkdown } from './preprocessor.js';
export { spacedLinkExtension } from './spaced-link.js';

// Renderers
export { createHtmlRenderer, escapeHtml } from './renderer.js';
export { createRoffRenderer, escapeRoffText } from './roff-renderer.js';

// Typographic substitution
export { substituteHtml, substituteRoff, smartypantsHtml, smartypantsRoff } from './smartypants.js';

// Standalone wrapper
export { standaloneOpen, standaloneClose, resolveDocumentInfo, DEFAULT_TITLE } from './standalone.js';
export type { DocumentInfo } from './standalone.js';

// Types
export type { DocumentRenderer, RendererKind, ParserOptions, ParseResult } from './types.js';
