/**
 * Markdown extraction passes
 *
 * Each pass is a pure function of the raw text. Line-based passes split on
 * `\n` and test patterns against the trimmed line.
 *
 * @since 2026-10-18
 */

import type { CodeBlock, Heading, Image, Link, Section } from './types.js';

const TITLE_PATTERN = /^#\s+(.+)$/;
const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/;
const BULLET_ITEM_PATTERN = /^[-*+]\s+/;
const NUMBERED_ITEM_PATTERN = /^\d+\.\s+/;
const REFERENCE_DEFINITION_PATTERN = /^\[([^\]]+)\]:\s+(.+)$/;

function splitLines(content: string): string[] {
  return content.split('\n');
}

/**
 * Extract the first H1 heading as the title
 */
export function extractTitle(content: string): string | undefined {
  for (const line of splitLines(content)) {
    const match = line.trim().match(TITLE_PATTERN);
    if (match) {
      return match[1].trim();
    }
  }
  return undefined;
}

/**
 * Extract all ATX headings with their levels and line numbers
 */
export function extractHeadings(content: string): Heading[] {
  const headings: Heading[] = [];
  const lines = splitLines(content);

  for (let i = 0; i < lines.length; i++) {
    const match = lines[i].trim().match(HEADING_PATTERN);
    if (match) {
      headings.push({
        level: match[1].length,
        text: match[2].trim(),
        lineNumber: i + 1,
      });
    }
  }

  return headings;
}

/**
 * Extract paragraphs
 *
 * Blank lines flush the current run. Heading, fence and list-item lines are
 * skipped without flushing, so text on either side of one joins up.
 */
export function extractParagraphs(content: string): string[] {
  const paragraphs: string[] = [];
  let current: string[] = [];

  for (const line of splitLines(content)) {
    const stripped = line.trim();

    if (!stripped) {
      if (current.length > 0) {
        paragraphs.push(current.join(' '));
        current = [];
      }
      continue;
    }

    if (
      stripped.startsWith('#') ||
      stripped.startsWith('```') ||
      BULLET_ITEM_PATTERN.test(stripped) ||
      NUMBERED_ITEM_PATTERN.test(stripped)
    ) {
      continue;
    }

    current.push(stripped);
  }

  if (current.length > 0) {
    paragraphs.push(current.join(' '));
  }

  return paragraphs.filter(p => p.length > 0);
}

/**
 * Extract fenced code blocks
 */
export function extractCodeBlocks(content: string): CodeBlock[] {
  const blocks: CodeBlock[] = [];
  // Language tag must sit directly on the opening fence line
  const fencePattern = /```(\w+)?\n([\s\S]*?)```/g;

  for (const match of content.matchAll(fencePattern)) {
    blocks.push({
      language: match[1] || undefined,
      code: match[2].trim(),
    });
  }

  return blocks;
}

/**
 * Extract links (excludes images)
 *
 * Inline links come first, then reference definitions from a separate line
 * scan. `[text][ref]` usages are not resolved against the definitions.
 */
export function extractLinks(content: string): Link[] {
  const links: Link[] = [];
  const linkPattern = /\[([^\]]+)\]\(([^)]+)\)/g;

  for (const match of content.matchAll(linkPattern)) {
    const index = match.index ?? 0;
    if (index > 0 && content[index - 1] === '!') continue;

    links.push({
      text: match[1],
      url: match[2],
    });
  }

  for (const line of splitLines(content)) {
    const refMatch = line.trim().match(REFERENCE_DEFINITION_PATTERN);
    if (refMatch) {
      links.push({
        text: refMatch[1],
        url: refMatch[2].trim(),
      });
    }
  }

  return links;
}

/**
 * Extract images
 */
export function extractImages(content: string): Image[] {
  const images: Image[] = [];
  const imagePattern = /!\[([^\]]*)\]\(([^)]+)\)/g;

  for (const match of content.matchAll(imagePattern)) {
    images.push({
      altText: match[1],
      url: match[2],
    });
  }

  return images;
}

/**
 * Split the document into sections by heading
 *
 * Anything before the first heading belongs to no section. Content keeps
 * the raw (untrimmed) lines, blank ones included, and is trimmed once
 * the section closes.
 */
export function extractSections(content: string): Section[] {
  const sections: Section[] = [];
  let current: { level: number; heading: string } | undefined;
  let currentLines: string[] = [];

  const close = (): void => {
    if (current) {
      sections.push({
        level: current.level,
        heading: current.heading,
        content: currentLines.join('\n').trim(),
      });
    }
  };

  for (const line of splitLines(content)) {
    const match = line.trim().match(HEADING_PATTERN);
    if (match) {
      close();
      current = { level: match[1].length, heading: match[2].trim() };
      currentLines = [];
    } else if (current) {
      currentLines.push(line);
    }
  }

  close();

  return sections;
}
