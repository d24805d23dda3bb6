import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

vi.mock('../src/utils/tree-sitter.js', () => ({
  // Grammar unavailable: the Python extractor falls back to its scanner.
  visitSyntaxTree: vi.fn(async () => null)
}));

import { ConfigurationError, ExtractionError } from '../src/errors/index.js';
import {
  ExtractorRegistry,
  MarkdownExtractor,
  PythonExtractor,
  TypeScriptExtractor,
  createDefaultExtractorRegistry,
  type ChunkExtractor
} from '../src/extractors/index.js';
import type { Chunk } from '../src/types/index.js';
import { contentHash } from '../src/utils/hashing.js';
import { makeTempDir, rmWithRetries, writeTree } from './test-helpers.js';

const MAX_FILE_SIZE = 1024 * 1024;

async function collect(extractor: ChunkExtractor, root: string, relativePath: string) {
  const chunks: Chunk[] = [];
  for await (const chunk of extractor.extractChunks({
    absolutePath: path.join(root, relativePath),
    relativePath
  })) {
    chunks.push(chunk);
  }
  return chunks;
}

function outline(chunks: Chunk[]) {
  return chunks.map((chunk) => [chunk.chunkType, chunk.name, chunk.startLine, chunk.endLine]);
}

const PYTHON_SOURCE = [
  '"""Service helpers."""',
  '',
  'import os',
  '',
  '',
  '# Loads settings.',
  'def load(path):',
  '    return open(path).read()',
  '',
  '',
  '@dataclass',
  'class Store:',
  '    """Keeps items."""',
  '',
  '    def get(self, key):',
  '        def inner():',
  '            return key',
  '        return inner()',
  '',
  '    async def put(self, key, value):',
  '        self.items[key] = value',
  '# trailing comment',
  ''
].join('\n');

const TYPESCRIPT_SOURCE = [
  "import { x } from './x';",
  '',
  '/** Adds numbers. */',
  'export function add(a: number, b: number): number {',
  '  return a + b;',
  '}',
  '',
  'export interface Shape {',
  '  area(): number;',
  '}',
  '',
  'export class Circle implements Shape {',
  '  constructor(private r: number) {}',
  '',
  '  area(): number {',
  '    return Math.PI * this.r ** 2;',
  '  }',
  '',
  '  scale = (k: number) => new Circle(this.r * k);',
  '}',
  '',
  'export const double = (n: number) => n * 2;',
  '',
  'type Id = string;',
  'enum Color { Red }',
  ''
].join('\n');

const MARKDOWN_SOURCE = [
  'Intro text.',
  '',
  '# Title',
  '',
  'Body one.',
  '',
  '## Usage ##',
  '',
  '```bash',
  '# not a heading',
  '```',
  '',
  '### Empty',
  ''
].join('\n');

describe('extractors', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('ccr-extractors-');
  });

  afterEach(async () => {
    await rmWithRetries(root);
  });

  describe('PythonExtractor', () => {
    it('chunks top-level definitions and methods, skipping nested functions', async () => {
      await writeTree(root, { 'pkg/service.py': PYTHON_SOURCE });
      const extractor = new PythonExtractor({ maxFileSize: MAX_FILE_SIZE, includeComments: true });

      const chunks = await collect(extractor, root, 'pkg/service.py');

      expect(outline(chunks)).toEqual([
        ['module_doc', 'service', 1, 1],
        ['function', 'load', 6, 8],
        ['class', 'Store', 11, 21],
        ['method', 'get', 15, 18],
        ['method', 'put', 20, 21]
      ]);
      expect(chunks.every((chunk) => chunk.filePath === 'pkg/service.py')).toBe(true);
      expect(chunks.every((chunk) => chunk.language === 'python')).toBe(true);
    });

    it('prefixes methods with their class header and hashes the chunk text', async () => {
      await writeTree(root, { 'pkg/service.py': PYTHON_SOURCE });
      const extractor = new PythonExtractor({ maxFileSize: MAX_FILE_SIZE, includeComments: true });

      const chunks = await collect(extractor, root, 'pkg/service.py');
      const get = chunks.find((chunk) => chunk.name === 'get');

      expect(get?.parent).toBe('Store');
      expect(get?.text).toBe(
        [
          'class Store:',
          '    def get(self, key):',
          '        def inner():',
          '            return key',
          '        return inner()'
        ].join('\n')
      );
      expect(get?.contentHash).toBe(contentHash(get?.text ?? ''));
    });

    it('leaves leading comments out when include_comments is off', async () => {
      await writeTree(root, { 'pkg/service.py': PYTHON_SOURCE });
      const extractor = new PythonExtractor({ maxFileSize: MAX_FILE_SIZE, includeComments: false });

      const chunks = await collect(extractor, root, 'pkg/service.py');
      const load = chunks.find((chunk) => chunk.name === 'load');

      expect(load?.startLine).toBe(7);
      expect(load?.text).toBe('def load(path):\n    return open(path).read()');
    });

    it('returns the whole file as one chunk when nothing is defined', async () => {
      await writeTree(root, { 'settings.py': 'DEBUG = True\nPORT = 8000\n' });
      const extractor = new PythonExtractor({ maxFileSize: MAX_FILE_SIZE, includeComments: true });

      const chunks = await collect(extractor, root, 'settings.py');

      expect(outline(chunks)).toEqual([['other', 'settings.py', 1, 2]]);
      expect(chunks[0].text).toBe('DEBUG = True\nPORT = 8000');
    });

    it('yields nothing for whitespace-only files', async () => {
      await writeTree(root, { 'empty.py': '\n   \n' });
      const extractor = new PythonExtractor({ maxFileSize: MAX_FILE_SIZE, includeComments: true });

      expect(await collect(extractor, root, 'empty.py')).toEqual([]);
    });

    it('refuses files above max_file_size', async () => {
      await writeTree(root, { 'big.py': 'x = 1\n'.repeat(10) });
      const extractor = new PythonExtractor({ maxFileSize: 20, includeComments: true });

      await expect(collect(extractor, root, 'big.py')).rejects.toBeInstanceOf(ExtractionError);
    });

    it('re-reads the file on every iteration', async () => {
      await writeTree(root, { 'mod.py': 'def a():\n    pass\n' });
      const extractor = new PythonExtractor({ maxFileSize: MAX_FILE_SIZE, includeComments: true });
      const sequence = extractor.extractChunks({
        absolutePath: path.join(root, 'mod.py'),
        relativePath: 'mod.py'
      });

      const first: string[] = [];
      for await (const chunk of sequence) first.push(chunk.name);
      await fs.writeFile(path.join(root, 'mod.py'), 'def b():\n    pass\n');
      const second: string[] = [];
      for await (const chunk of sequence) second.push(chunk.name);

      expect(first).toEqual(['a']);
      expect(second).toEqual(['b']);
    });
  });

  describe('TypeScriptExtractor', () => {
    it('chunks declarations and class members with their doc comments', async () => {
      await writeTree(root, { 'src/shapes.ts': TYPESCRIPT_SOURCE });
      const extractor = new TypeScriptExtractor({
        maxFileSize: MAX_FILE_SIZE,
        includeComments: true
      });

      const chunks = await collect(extractor, root, 'src/shapes.ts');

      expect(outline(chunks)).toEqual([
        ['function', 'add', 3, 6],
        ['interface', 'Shape', 8, 10],
        ['class', 'Circle', 12, 20],
        ['method', 'constructor', 13, 13],
        ['method', 'area', 15, 17],
        ['method', 'scale', 19, 19],
        ['function', 'double', 22, 22],
        ['type', 'Id', 24, 24],
        ['enum', 'Color', 25, 25]
      ]);
      expect(chunks[0].text).toBe(
        '/** Adds numbers. */\nexport function add(a: number, b: number): number {\n  return a + b;\n}'
      );
      const area = chunks.find((chunk) => chunk.name === 'area');
      expect(area?.parent).toBe('Circle');
      expect(area?.text.split('\n')[0]).toBe('export class Circle implements Shape {');
      expect(chunks.every((chunk) => chunk.language === 'typescript')).toBe(true);
    });

    it('treats files without declarations as one javascript chunk', async () => {
      await writeTree(root, { 'boot.js': "console.log('ready');\n" });
      const extractor = new TypeScriptExtractor({
        maxFileSize: MAX_FILE_SIZE,
        includeComments: true
      });

      const chunks = await collect(extractor, root, 'boot.js');

      expect(outline(chunks)).toEqual([['other', 'boot.js', 1, 1]]);
      expect(chunks[0].language).toBe('javascript');
    });

    it('reports syntax errors as ExtractionError', async () => {
      await writeTree(root, { 'broken.ts': 'export function (\n' });
      const extractor = new TypeScriptExtractor({
        maxFileSize: MAX_FILE_SIZE,
        includeComments: true
      });

      await expect(collect(extractor, root, 'broken.ts')).rejects.toThrow(/^Parse failed/);
    });
  });

  describe('MarkdownExtractor', () => {
    it('splits by headings and ignores headings inside code fences', async () => {
      await writeTree(root, { 'docs/guide.md': MARKDOWN_SOURCE });
      const extractor = new MarkdownExtractor({ maxFileSize: MAX_FILE_SIZE, splitByHeadings: true });

      const chunks = await collect(extractor, root, 'docs/guide.md');

      expect(outline(chunks)).toEqual([
        ['other', '', 1, 1],
        ['heading_section', 'Title', 3, 5],
        ['heading_section', 'Usage', 7, 11],
        ['heading_section', 'Empty', 13, 13]
      ]);
      expect(chunks[1].text).toBe('# Title\n\nBody one.');
    });

    it('keeps the whole document together when split_by_headings is off', async () => {
      await writeTree(root, { 'docs/guide.md': MARKDOWN_SOURCE });
      const extractor = new MarkdownExtractor({
        maxFileSize: MAX_FILE_SIZE,
        splitByHeadings: false
      });

      const chunks = await collect(extractor, root, 'docs/guide.md');

      expect(outline(chunks)).toEqual([['other', 'guide.md', 1, 13]]);
    });
  });
});

describe('ExtractorRegistry', () => {
  const stub = (language: string, extensions: string[]): ChunkExtractor => ({
    language,
    getSupportedExtensions: () => new Set(extensions),
    extractChunks: () => ({
      async *[Symbol.asyncIterator]() {}
    })
  });

  it('dispatches by lowercase extension', () => {
    const registry = new ExtractorRegistry();
    const rst = stub('rst', ['.rst', 'TXT']);
    registry.register(rst);

    expect(registry.forPath('docs/INDEX.RST')).toBe(rst);
    expect(registry.forPath('notes.txt')).toBe(rst);
    expect(registry.forPath('main.go')).toBeUndefined();
    expect(registry.supportedExtensions()).toEqual(['.rst', '.txt']);
  });

  it('rejects an extension claimed twice and registers nothing of the loser', () => {
    const registry = new ExtractorRegistry();
    registry.register(stub('first', ['.a']));

    expect(() => registry.register(stub('second', ['.b', '.a']))).toThrow(ConfigurationError);
    expect(registry.forPath('x.b')).toBeUndefined();
    expect(registry.getAll().map((extractor) => extractor.language)).toEqual(['first']);
  });

  it('registers the built-in languages by default', () => {
    const registry = createDefaultExtractorRegistry({
      max_file_size: MAX_FILE_SIZE,
      python: { include_comments: true },
      typescript: { include_comments: true },
      markdown: { split_by_headings: true }
    });

    expect(registry.forPath('a.py')?.language).toBe('python');
    expect(registry.forPath('a.tsx')?.language).toBe('typescript');
    expect(registry.forPath('README.md')?.language).toBe('markdown');
  });
});
