/**
 * Markdown Document Parser
 *
 * Loads Markdown from a file or a string and derives structured data from
 * it: title, headings, paragraphs, code blocks, links, images and sections.
 * The parse result is computed lazily and cached until the next load.
 *
 * @since 2026-10-18
 */

import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { TextDecoder } from 'util';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../base/logger.js';
import type { Logger } from '../base/logger.js';
import {
  FileReadError,
  InvalidInputError,
  NoContentError,
  NotFoundError,
} from '../base/errors.js';
import {
  extractCodeBlocks,
  extractHeadings,
  extractImages,
  extractLinks,
  extractParagraphs,
  extractSections,
  extractTitle,
} from './extractors.js';
import type {
  DocumentSource,
  MarkdownReaderOptions,
  ParsedDocument,
  Section,
} from './types.js';

function freezeAll<T extends object>(items: T[]): readonly Readonly<T>[] {
  return Object.freeze(items.map(item => Object.freeze(item)));
}

export class MarkdownDocumentParser {
  private readonly encoding: BufferEncoding;
  private readonly logger: Logger;

  private content?: string;
  private source?: DocumentSource;
  private parsed?: ParsedDocument;

  constructor(options: MarkdownReaderOptions = {}) {
    this.encoding = options.encoding ?? 'utf-8';
    this.logger = options.logger ?? createLogger('MarkdownReader');

    if (options.filePath) {
      this.loadFromFile(options.filePath);
    }
  }

  /**
   * Read a Markdown file from disk, replacing any loaded content
   */
  loadFromFile(filePath: string): string {
    const resolved = path.resolve(filePath);

    if (!fs.existsSync(resolved)) {
      throw new NotFoundError(filePath);
    }
    if (!fs.statSync(resolved).isFile()) {
      throw new InvalidInputError(filePath);
    }

    let text: string;
    try {
      text = this.decode(fs.readFileSync(resolved));
    } catch (error) {
      throw new FileReadError(filePath, error);
    }

    this.setContent(text, resolved);
    return text;
  }

  /**
   * Use a string as the Markdown content, replacing any loaded content
   */
  loadFromString(text: string): string {
    this.setContent(text, undefined);
    return text;
  }

  getRawContent(): string | undefined {
    return this.content;
  }

  /**
   * Path of the last file load (undefined after a string load)
   */
  getFilePath(): string | undefined {
    return this.source?.filePath;
  }

  getSource(): DocumentSource | undefined {
    if (!this.source) {
      return undefined;
    }
    return { ...this.source, loadedAt: new Date(this.source.loadedAt.getTime()) };
  }

  /**
   * Parse the loaded content into structured data
   *
   * @throws NoContentError if nothing (or an empty string) is loaded
   */
  parse(): ParsedDocument {
    if (!this.content) {
      throw new NoContentError();
    }

    if (this.parsed) {
      return this.parsed;
    }

    const startTime = Date.now();
    const content = this.content;

    // Frozen so callers cannot alter the cached result
    const parsed: ParsedDocument = Object.freeze({
      title: extractTitle(content),
      headings: freezeAll(extractHeadings(content)),
      paragraphs: Object.freeze(extractParagraphs(content)),
      codeBlocks: freezeAll(extractCodeBlocks(content)),
      links: freezeAll(extractLinks(content)),
      images: freezeAll(extractImages(content)),
      raw: content,
    });

    this.parsed = parsed;
    this.logger.debug(
      `Parsed ${parsed.headings.length} headings, ${parsed.paragraphs.length} paragraphs, ` +
        `${parsed.codeBlocks.length} code blocks in ${Date.now() - startTime}ms`
    );

    return parsed;
  }

  /**
   * Heading texts at a given level (1-6), in document order
   */
  getHeadingsByLevel(level: number): string[] {
    return this.parse()
      .headings.filter(h => h.level === level)
      .map(h => h.text);
  }

  /**
   * Get the document organized by sections (based on headings)
   *
   * Rescans the raw content on every call; returns [] if nothing is loaded.
   */
  getSections(): Section[] {
    if (!this.content) {
      return [];
    }
    return extractSections(this.content);
  }

  /**
   * Decode file bytes; invalid UTF-8 throws instead of becoming U+FFFD
   */
  private decode(buffer: Buffer): string {
    if (this.encoding === 'utf-8' || this.encoding === 'utf8') {
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
    }
    return buffer.toString(this.encoding);
  }

  private setContent(text: string, filePath: string | undefined): void {
    this.content = text;
    this.parsed = undefined;
    this.source = {
      uuid: uuidv4(),
      filePath,
      hash: createHash('sha256').update(text).digest('hex').slice(0, 16),
      lineCount: text.split('\n').length,
      loadedAt: new Date(),
    };

    this.logger.debug(
      `Loaded ${filePath ?? 'string content'} (${this.source.lineCount} lines, ${this.source.hash})`
    );
  }
}
