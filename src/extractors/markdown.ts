/**
 * Markdown extractor: one `heading_section` chunk per ATX heading, running to the next
 * heading of any level. Headings inside fenced code blocks are ignored.
 */

import type { Chunk } from '../types/index.js';
import { buildChunk, lazyChunks, wholeFileChunk } from './source.js';
import type { ChunkExtractor, SourceFile, SourceRef } from './types.js';

const MARKDOWN_EXTENSIONS: ReadonlySet<string> = new Set(['.md', '.markdown', '.mdx']);

const HEADING_PATTERN = /^ {0,3}#{1,6}(?:\s+(.*?))?\s*$/;
const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

export interface MarkdownExtractorOptions {
  maxFileSize: number;
  splitByHeadings: boolean;
}

export interface MarkdownHeading {
  line: number;
  text: string;
}

export function findHeadings(lines: string[]): MarkdownHeading[] {
  const headings: MarkdownHeading[] = [];
  let fence: string | null = null;

  lines.forEach((line, index) => {
    const fenceMatch = FENCE_PATTERN.exec(line);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (!fence) {
        fence = marker;
      } else if (marker[0] === fence[0] && marker.length >= fence.length) {
        fence = null;
      }
      return;
    }
    if (fence) return;

    const match = HEADING_PATTERN.exec(line);
    if (match) {
      // Closing sequence: "## Title ##"
      const text = (match[1] ?? '').replace(/\s+#+$/, '').trim();
      headings.push({ line: index + 1, text });
    }
  });

  return headings;
}

function lastContentLine(lines: string[], from: number, to: number): number {
  let line = to;
  while (line > from && !lines[line - 1].trim()) line--;
  return line;
}

export class MarkdownExtractor implements ChunkExtractor {
  readonly language = 'markdown';

  constructor(private readonly options: MarkdownExtractorOptions) {}

  getSupportedExtensions(): ReadonlySet<string> {
    return MARKDOWN_EXTENSIONS;
  }

  extractChunks(file: SourceRef): AsyncIterable<Chunk> {
    return lazyChunks(file, this.options.maxFileSize, (source) => this.chunk(source));
  }

  private chunk(source: SourceFile): Chunk[] {
    const headings = this.options.splitByHeadings ? findHeadings(source.lines) : [];
    if (headings.length === 0) {
      return [wholeFileChunk(source, this.language)];
    }

    const chunks: Chunk[] = [];
    const firstHeading = headings[0].line;
    const preambleStart = source.lines.findIndex((line) => line.trim() !== '') + 1;
    if (preambleStart > 0 && preambleStart < firstHeading) {
      chunks.push(
        buildChunk(source, this.language, {
          chunkType: 'other',
          name: '',
          startLine: preambleStart,
          endLine: lastContentLine(source.lines, preambleStart, firstHeading - 1)
        })
      );
    }

    headings.forEach((heading, index) => {
      const next = index + 1 < headings.length ? headings[index + 1].line : source.lines.length + 1;
      chunks.push(
        buildChunk(source, this.language, {
          chunkType: 'heading_section',
          name: heading.text,
          startLine: heading.line,
          endLine: lastContentLine(source.lines, heading.line, next - 1)
        })
      );
    });

    return chunks;
  }
}
