/**
 * Python extractor.
 *
 * Definitions come from the tree-sitter grammar when it loads and the file parses cleanly;
 * otherwise an indentation scanner builds the same outline. Functions, classes and methods
 * become chunks with their decorators, docstrings and (optionally) leading `#` comments.
 */

import path from 'path';

import type { Chunk } from '../types/index.js';
import { visitSyntaxTree, type SyntaxNode } from '../utils/tree-sitter.js';
import {
  attachLeadingComments,
  buildChunk,
  compareChunks,
  lazyChunks,
  wholeFileChunk
} from './source.js';
import type { ChunkExtractor, SourceFile, SourceRef } from './types.js';

const PYTHON_EXTENSIONS: ReadonlySet<string> = new Set(['.py', '.pyi']);

export interface PythonDefinition {
  kind: 'function' | 'class';
  name: string;
  /** First line, decorators included */
  startLine: number;
  /** Line holding the `def`/`class` keyword */
  headerLine: number;
  endLine: number;
  /** Enclosing class when defined directly in a class body */
  parent?: string;
  parentHeaderLine?: number;
  /** False for definitions nested inside a function body */
  topLevel: boolean;
}

export interface PythonOutline {
  definitions: PythonDefinition[];
  moduleDoc: { startLine: number; endLine: number } | null;
}

export interface PythonExtractorOptions {
  maxFileSize: number;
  includeComments: boolean;
}

export class PythonExtractor implements ChunkExtractor {
  readonly language = 'python';

  constructor(private readonly options: PythonExtractorOptions) {}

  getSupportedExtensions(): ReadonlySet<string> {
    return PYTHON_EXTENSIONS;
  }

  extractChunks(file: SourceRef): AsyncIterable<Chunk> {
    return lazyChunks(file, this.options.maxFileSize, (source) => this.chunk(source));
  }

  private async chunk(source: SourceFile): Promise<Chunk[]> {
    const outline =
      (await visitSyntaxTree(source.content, 'python', outlineFromTree)) ??
      scanPythonOutline(source.lines);
    return chunksFromOutline(source, outline, this.options.includeComments);
  }
}

export function chunksFromOutline(
  source: SourceFile,
  outline: PythonOutline,
  includeComments: boolean
): Chunk[] {
  const definitions = outline.definitions.filter((definition) => definition.topLevel);
  if (definitions.length === 0) {
    return [wholeFileChunk(source, 'python')];
  }

  const chunks: Chunk[] = [];
  if (outline.moduleDoc) {
    chunks.push(
      buildChunk(source, 'python', {
        chunkType: 'module_doc',
        name: path.posix.basename(source.relativePath).replace(/\.pyi?$/, ''),
        startLine: outline.moduleDoc.startLine,
        endLine: outline.moduleDoc.endLine
      })
    );
  }

  for (const definition of definitions) {
    const startLine = includeComments
      ? attachLeadingComments(source.lines, definition.startLine, (line) => line.startsWith('#'))
      : definition.startLine;
    chunks.push(
      buildChunk(source, 'python', {
        chunkType:
          definition.kind === 'class' ? 'class' : definition.parent ? 'method' : 'function',
        name: definition.name,
        startLine,
        endLine: definition.endLine,
        parent: definition.parent,
        contextLine: definition.parentHeaderLine
      })
    );
  }

  return chunks.sort(compareChunks);
}

// ============================================================================
// TREE-SITTER OUTLINE
// ============================================================================

function endLineOf(node: SyntaxNode): number {
  const { row, column } = node.endPosition;
  return column === 0 && row > node.startPosition.row ? row : row + 1;
}

function enclosingDefinition(node: SyntaxNode): SyntaxNode | null {
  let cursor = node.parent;
  while (cursor) {
    if (cursor.type === 'function_definition' || cursor.type === 'class_definition') {
      return cursor;
    }
    cursor = cursor.parent;
  }
  return null;
}

function insideFunction(node: SyntaxNode): boolean {
  let cursor = enclosingDefinition(node);
  while (cursor) {
    if (cursor.type === 'function_definition') return true;
    cursor = enclosingDefinition(cursor);
  }
  return false;
}

function moduleDocFromTree(root: SyntaxNode): PythonOutline['moduleDoc'] {
  for (const child of root.namedChildren) {
    if (!child || child.type === 'comment') continue;
    if (child.type === 'expression_statement' && child.firstNamedChild?.type === 'string') {
      return { startLine: child.startPosition.row + 1, endLine: endLineOf(child) };
    }
    return null;
  }
  return null;
}

export function outlineFromTree(root: SyntaxNode): PythonOutline {
  const definitions: PythonDefinition[] = [];

  for (const node of root.descendantsOfType(['function_definition', 'class_definition'])) {
    if (!node) continue;
    const name = node.childForFieldName('name')?.text;
    if (!name) continue;

    const rangeNode = node.parent?.type === 'decorated_definition' ? node.parent : node;
    const enclosing = enclosingDefinition(node);
    const definition: PythonDefinition = {
      kind: node.type === 'class_definition' ? 'class' : 'function',
      name,
      startLine: rangeNode.startPosition.row + 1,
      headerLine: node.startPosition.row + 1,
      endLine: endLineOf(rangeNode),
      topLevel: !insideFunction(node)
    };

    if (enclosing?.type === 'class_definition') {
      definition.parent = enclosing.childForFieldName('name')?.text;
      definition.parentHeaderLine = enclosing.startPosition.row + 1;
    }
    definitions.push(definition);
  }

  return { definitions, moduleDoc: moduleDocFromTree(root) };
}

// ============================================================================
// INDENTATION SCANNER (fallback)
// ============================================================================

const DEFINITION_PATTERN = /^(\s*)(?:async\s+)?(def|class)\s+([A-Za-z_]\w*)/;
const DECORATOR_PATTERN = /^\s*@/;
const DOCSTRING_OPEN_PATTERN = /^[rRuUbB]{0,2}("""|'''|"|')/;

interface LineScan {
  /** Triple-quote delimiter still open at the end of the line */
  openString: string | null;
  bracketDelta: number;
}

/** Tracks string literals, comments and bracket balance across one physical line. */
function scanLine(line: string, openString: string | null): LineScan {
  let state = openString;
  let bracketDelta = 0;
  let i = 0;

  while (i < line.length) {
    if (state) {
      const end = line.indexOf(state, i);
      if (end === -1) return { openString: state, bracketDelta };
      i = end + state.length;
      state = null;
      continue;
    }

    const ch = line[i];
    if (ch === '#') break;
    if (line.startsWith('"""', i) || line.startsWith("'''", i)) {
      state = line.slice(i, i + 3);
      i += 3;
      continue;
    }
    if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < line.length && line[j] !== ch) {
        j += line[j] === '\\' ? 2 : 1;
      }
      i = j + 1;
      continue;
    }
    if (ch === '(' || ch === '[' || ch === '{') bracketDelta++;
    if (ch === ')' || ch === ']' || ch === '}') bracketDelta--;
    i++;
  }

  return { openString: state, bracketDelta };
}

function indentWidth(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') width++;
    else if (ch === '\t') width += 4;
    else break;
  }
  return width;
}

function scanModuleDoc(lines: string[]): PythonOutline['moduleDoc'] {
  const first = lines.findIndex((line) => {
    const trimmed = line.trim();
    return trimmed !== '' && !trimmed.startsWith('#');
  });
  if (first === -1) return null;

  const match = DOCSTRING_OPEN_PATTERN.exec(lines[first].trim());
  if (!match) return null;

  const delimiter = match[1];
  const opening = lines[first].indexOf(delimiter) + delimiter.length;
  if (lines[first].indexOf(delimiter, opening) !== -1) {
    return { startLine: first + 1, endLine: first + 1 };
  }
  if (delimiter.length === 1) return null;

  for (let index = first + 1; index < lines.length; index++) {
    if (lines[index].includes(delimiter)) {
      return { startLine: first + 1, endLine: index + 1 };
    }
  }
  return null;
}

/**
 * Builds an outline from indentation alone. Used when the grammar is unavailable or the
 * file does not parse. Block ends are the last code line before a dedent; trailing
 * comments and blank lines stay outside the block.
 */
export function scanPythonOutline(lines: string[]): PythonOutline {
  const definitions: PythonDefinition[] = [];
  const open: Array<{ indent: number; definition: PythonDefinition }> = [];
  let lastCodeLine = 0;
  let openString: string | null = null;
  let bracketDepth = 0;
  let decoratorStart: number | null = null;

  const closeBlocks = (indent: number): void => {
    while (open.length > 0 && indent <= open[open.length - 1].indent) {
      const block = open.pop();
      if (block) {
        block.definition.endLine = Math.max(block.definition.headerLine, lastCodeLine);
      }
    }
  };

  lines.forEach((line, index) => {
    const lineNumber = index + 1;

    if (openString) {
      openString = scanLine(line, openString).openString;
      lastCodeLine = lineNumber;
      return;
    }

    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return;

    if (bracketDepth === 0) {
      const indent = indentWidth(line);
      closeBlocks(indent);

      const match = DEFINITION_PATTERN.exec(line);
      if (DECORATOR_PATTERN.test(line)) {
        decoratorStart ??= lineNumber;
      } else if (match) {
        const enclosing = open.length > 0 ? open[open.length - 1].definition : undefined;
        const definition: PythonDefinition = {
          kind: match[2] === 'class' ? 'class' : 'function',
          name: match[3],
          startLine: decoratorStart ?? lineNumber,
          headerLine: lineNumber,
          endLine: lineNumber,
          topLevel: !enclosing || (enclosing.kind === 'class' && enclosing.topLevel)
        };
        if (enclosing?.kind === 'class') {
          definition.parent = enclosing.name;
          definition.parentHeaderLine = enclosing.headerLine;
        }
        definitions.push(definition);
        open.push({ indent, definition });
        decoratorStart = null;
      } else {
        decoratorStart = null;
      }
    }

    lastCodeLine = lineNumber;
    const scan = scanLine(line, null);
    openString = scan.openString;
    bracketDepth = Math.max(0, bracketDepth + scan.bracketDelta);
  });

  closeBlocks(-1);

  return { definitions, moduleDoc: scanModuleDoc(lines) };
}
