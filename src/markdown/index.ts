/**
 * Markdown Reader
 *
 * Extracts structure from Markdown documents:
 * - Title and headings
 * - Paragraphs
 * - Code blocks
 * - Links and images
 * - Sections (by headings)
 *
 * @since 2026-10-18
 */

export { MarkdownDocumentParser } from './MarkdownDocumentParser.js';
export {
  extractTitle,
  extractHeadings,
  extractParagraphs,
  extractCodeBlocks,
  extractLinks,
  extractImages,
  extractSections,
} from './extractors.js';
export type {
  Heading,
  CodeBlock,
  Link,
  Image,
  Section,
  ParsedDocument,
  DocumentSource,
  MarkdownReaderOptions,
} from './types.js';
