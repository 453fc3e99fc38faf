/**
 * mdreader
 *
 * Regex-based Markdown reader producing plain structured records.
 *
 * ## API:
 * - MarkdownDocumentParser - Load Markdown from a file or string, parse it, split it into sections
 * - extract* functions - The individual extraction passes, usable on any string
 * - MarkdownReaderError and subclasses - Typed failures with an ErrorCode
 */

export * from './base/index.js';
export * from './markdown/index.js';
