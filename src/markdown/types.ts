/**
 * Types for the Markdown reader
 *
 * Plain records derived from raw Markdown text:
 * - Headings, paragraphs, code blocks
 * - Links and images
 * - Sections (by headings)
 *
 * @since 2026-10-18
 */

import type { Logger } from '../base/logger.js';

/**
 * ATX heading (`#` to `######`)
 */
export interface Heading {
  /** Heading level (1-6) */
  level: number;

  /** Heading text, trimmed */
  text: string;

  /** Line number (1-indexed) */
  lineNumber: number;
}

/**
 * Fenced code block
 */
export interface CodeBlock {
  /** Language tag from the opening fence */
  language?: string;

  /** Code content, trimmed */
  code: string;
}

/**
 * Inline link or reference definition
 */
export interface Link {
  text: string;
  url: string;
}

export interface Image {
  /** Alt text (may be empty) */
  altText: string;

  url: string;
}

/**
 * Content governed by one heading, up to the next heading of any level
 */
export interface Section {
  level: number;

  /** Heading text */
  heading: string;

  /** Lines under the heading joined by newlines, trimmed */
  content: string;
}

/**
 * Parse result
 */
export interface ParsedDocument {
  /** First level-1 heading */
  readonly title?: string;

  readonly headings: readonly Readonly<Heading>[];
  readonly paragraphs: readonly string[];
  readonly codeBlocks: readonly Readonly<CodeBlock>[];
  readonly links: readonly Readonly<Link>[];
  readonly images: readonly Readonly<Image>[];

  /** Raw Markdown content */
  readonly raw: string;
}

/**
 * Where the current content came from
 */
export interface DocumentSource {
  /** Unique identifier, new on every load */
  uuid: string;

  /** Resolved file path (absent for string loads) */
  filePath?: string;

  /** Content hash */
  hash: string;

  /** Total lines */
  lineCount: number;

  loadedAt: Date;
}

/**
 * Reader options
 */
export interface MarkdownReaderOptions {
  /** Load this file on construction */
  filePath?: string;

  /** Encoding for file loads (default: utf-8) */
  encoding?: BufferEncoding;

  /** Logger (default: console logger prefixed [MarkdownReader]) */
  logger?: Logger;
}
