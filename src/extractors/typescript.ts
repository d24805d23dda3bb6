/**
 * TypeScript / JavaScript extractor backed by @typescript-eslint/typescript-estree.
 * Top-level declarations and class members become chunks; export wrappers and the
 * comment block directly above a declaration are part of its chunk.
 */

import path from 'path';
import { AST_NODE_TYPES, parse, type TSESTree } from '@typescript-eslint/typescript-estree';

import type { Chunk } from '../types/index.js';
import {
  attachLeadingComments,
  buildChunk,
  compareChunks,
  lazyChunks,
  wholeFileChunk,
  type ChunkSpan
} from './source.js';
import type { ChunkExtractor, SourceFile, SourceRef } from './types.js';

const SCRIPT_EXTENSIONS: ReadonlySet<string> = new Set([
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.js',
  '.jsx',
  '.mjs',
  '.cjs'
]);

export interface TypeScriptExtractorOptions {
  maxFileSize: number;
  includeComments: boolean;
}

type Declaration =
  | TSESTree.ProgramStatement
  | TSESTree.NamedExportDeclarations
  | TSESTree.DefaultExportDeclarations;

export function scriptLanguage(filePath: string): 'typescript' | 'javascript' {
  const ext = path.extname(filePath).toLowerCase();
  return ext.includes('ts') ? 'typescript' : 'javascript';
}

export class TypeScriptExtractor implements ChunkExtractor {
  readonly language = 'typescript';

  constructor(private readonly options: TypeScriptExtractorOptions) {}

  getSupportedExtensions(): ReadonlySet<string> {
    return SCRIPT_EXTENSIONS;
  }

  extractChunks(file: SourceRef): AsyncIterable<Chunk> {
    return lazyChunks(file, this.options.maxFileSize, (source) => this.chunk(source));
  }

  private chunk(source: SourceFile): Chunk[] {
    const language = scriptLanguage(source.relativePath);
    const ast = parse(source.content, {
      loc: true,
      range: true,
      comment: true,
      jsx: source.relativePath.endsWith('x')
    });

    const commentLines = new Set<number>();
    for (const comment of ast.comments ?? []) {
      for (let line = comment.loc.start.line; line <= comment.loc.end.line; line++) {
        commentLines.add(line);
      }
    }

    const spans: ChunkSpan[] = [];
    for (const statement of ast.body) {
      collectStatement(statement, spans);
    }

    if (spans.length === 0) {
      return [wholeFileChunk(source, language)];
    }

    return spans
      .map((span) => {
        const startLine = this.options.includeComments
          ? attachLeadingComments(source.lines, span.startLine, (_trimmed, lineNumber) =>
              commentLines.has(lineNumber)
            )
          : span.startLine;
        return buildChunk(source, language, { ...span, startLine });
      })
      .sort(compareChunks);
  }
}

function unwrapExport(statement: TSESTree.ProgramStatement): Declaration | null {
  if (statement.type === AST_NODE_TYPES.ExportNamedDeclaration) {
    return statement.declaration;
  }
  if (statement.type === AST_NODE_TYPES.ExportDefaultDeclaration) {
    return statement.declaration;
  }
  return statement;
}

function isFunctionValue(node: TSESTree.Node | null | undefined): boolean {
  return (
    node?.type === AST_NODE_TYPES.ArrowFunctionExpression ||
    node?.type === AST_NODE_TYPES.FunctionExpression
  );
}

function isMethodLike(member: TSESTree.ClassElement): boolean {
  switch (member.type) {
    case AST_NODE_TYPES.MethodDefinition:
    case AST_NODE_TYPES.TSAbstractMethodDefinition:
      return true;
    case AST_NODE_TYPES.PropertyDefinition:
      return isFunctionValue(member.value);
    default:
      return false;
  }
}

function memberName(key: TSESTree.Node): string | null {
  if (key.type === AST_NODE_TYPES.Identifier) return key.name;
  if (key.type === AST_NODE_TYPES.PrivateIdentifier) return `#${key.name}`;
  if (key.type === AST_NODE_TYPES.Literal) return String(key.value);
  return null;
}

function span(
  node: TSESTree.Node,
  chunkType: ChunkSpan['chunkType'],
  name: string,
  extra: Partial<ChunkSpan> = {}
): ChunkSpan {
  return { chunkType, name, startLine: node.loc.start.line, endLine: node.loc.end.line, ...extra };
}

function collectStatement(statement: TSESTree.ProgramStatement, spans: ChunkSpan[]): void {
  const declaration = unwrapExport(statement);
  if (!declaration) return;

  switch (declaration.type) {
    case AST_NODE_TYPES.FunctionDeclaration:
    case AST_NODE_TYPES.TSDeclareFunction:
      spans.push(span(statement, 'function', declaration.id?.name ?? 'default'));
      return;
    case AST_NODE_TYPES.ClassDeclaration:
      collectClass(statement, declaration, spans);
      return;
    case AST_NODE_TYPES.TSInterfaceDeclaration:
      spans.push(span(statement, 'interface', declaration.id.name));
      return;
    case AST_NODE_TYPES.TSTypeAliasDeclaration:
      spans.push(span(statement, 'type', declaration.id.name));
      return;
    case AST_NODE_TYPES.TSEnumDeclaration:
      spans.push(span(statement, 'enum', declaration.id.name));
      return;
    case AST_NODE_TYPES.VariableDeclaration: {
      const functions = declaration.declarations.filter(
        (declarator) =>
          declarator.id.type === AST_NODE_TYPES.Identifier && isFunctionValue(declarator.init)
      );
      for (const declarator of functions) {
        if (declarator.id.type !== AST_NODE_TYPES.Identifier) continue;
        // A lone declarator owns the whole statement, `export const` included.
        const rangeNode = declaration.declarations.length === 1 ? statement : declarator;
        spans.push(span(rangeNode, 'function', declarator.id.name));
      }
      return;
    }
    default:
      return;
  }
}

function collectClass(
  statement: TSESTree.ProgramStatement,
  declaration: TSESTree.ClassDeclaration,
  spans: ChunkSpan[]
): void {
  const className = declaration.id?.name ?? 'default';
  spans.push(span(statement, 'class', className));

  const headerLine = declaration.id?.loc.start.line ?? declaration.body.loc.start.line;

  for (const member of declaration.body.body) {
    if (!isMethodLike(member) || !('key' in member)) continue;

    const name = memberName(member.key);
    if (!name) continue;

    spans.push(span(member, 'method', name, { parent: className, contextLine: headerLine }));
  }
}
