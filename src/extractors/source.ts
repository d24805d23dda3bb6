import { promises as fs } from 'fs';
import path from 'path';

import type { Chunk, ChunkType } from '../types/index.js';
import { ExtractionError, errorMessage } from '../errors/index.js';
import { contentHash } from '../utils/hashing.js';
import type { SourceFile, SourceRef } from './types.js';

export interface ChunkSpan {
  chunkType: ChunkType;
  name: string;
  startLine: number;
  endLine: number;
  parent?: string;
  /** Source line prepended to the body, e.g. the enclosing class header of a method */
  contextLine?: number;
}

export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Reads a source file, refusing files above `maxFileSize` bytes before loading them.
 */
export async function readSourceFile(ref: SourceRef, maxFileSize: number): Promise<SourceFile> {
  let size: number;
  try {
    size = (await fs.stat(ref.absolutePath)).size;
  } catch (error) {
    throw new ExtractionError(`Cannot stat file: ${errorMessage(error)}`, ref.relativePath, {
      cause: error
    });
  }

  if (size > maxFileSize) {
    throw new ExtractionError(
      `File exceeds max_file_size (${size} > ${maxFileSize} bytes)`,
      ref.relativePath,
      { permanent: true }
    );
  }

  let content: string;
  try {
    content = await fs.readFile(ref.absolutePath, 'utf-8');
  } catch (error) {
    throw new ExtractionError(`Cannot read file: ${errorMessage(error)}`, ref.relativePath, {
      cause: error
    });
  }

  return { ...ref, content, lines: splitLines(content) };
}

export function buildChunk(source: SourceFile, language: string, span: ChunkSpan): Chunk {
  const body = source.lines.slice(span.startLine - 1, span.endLine).join('\n');
  const text =
    span.contextLine !== undefined
      ? `${source.lines[span.contextLine - 1].trimEnd()}\n${body}`
      : body;

  const chunk: Chunk = {
    filePath: source.relativePath,
    chunkType: span.chunkType,
    name: span.name,
    text,
    startLine: span.startLine,
    endLine: span.endLine,
    contentHash: contentHash(text),
    language
  };
  if (span.parent) {
    chunk.parent = span.parent;
  }
  return chunk;
}

export function wholeFileChunk(source: SourceFile, language: string): Chunk {
  return buildChunk(source, language, {
    chunkType: 'other',
    name: path.posix.basename(source.relativePath),
    startLine: 1,
    endLine: Math.max(1, source.lines.length)
  });
}

/**
 * Moves `startLine` up over directly adjacent comment lines (no blank line in between).
 */
export function attachLeadingComments(
  lines: string[],
  startLine: number,
  isComment: (trimmed: string, lineNumber: number) => boolean
): number {
  let line = startLine;
  while (line > 1) {
    const previous = lines[line - 2].trim();
    if (!previous || !isComment(previous, line - 1)) break;
    line--;
  }
  return line;
}

/** Source order; an enclosing chunk comes before the chunks nested in it. */
export function compareChunks(a: Chunk, b: Chunk): number {
  if (a.startLine !== b.startLine) return a.startLine - b.startLine;
  return b.endLine - a.endLine;
}

/**
 * Wraps a chunker into a lazy, restartable sequence. Each iteration re-reads the file.
 * Whitespace-only files yield nothing.
 */
export function lazyChunks(
  ref: SourceRef,
  maxFileSize: number,
  chunker: (source: SourceFile) => Promise<Chunk[]> | Chunk[]
): AsyncIterable<Chunk> {
  return {
    async *[Symbol.asyncIterator]() {
      const source = await readSourceFile(ref, maxFileSize);
      if (!source.content.trim()) return;

      let chunks: Chunk[];
      try {
        chunks = await chunker(source);
      } catch (error) {
        if (error instanceof ExtractionError) throw error;
        throw new ExtractionError(`Parse failed: ${errorMessage(error)}`, ref.relativePath, {
          cause: error
        });
      }
      yield* chunks;
    }
  };
}
