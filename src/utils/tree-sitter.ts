import { createRequire } from 'module';
import { Language, Parser, type Node } from 'web-tree-sitter';
import { resolveGrammarPath, supportsGrammar } from '../grammars/manifest.js';
import { debugLog } from './debug.js';

const require = createRequire(import.meta.url);

const MAX_TREE_SITTER_PARSE_BYTES = 1024 * 1024;
const TREE_SITTER_PARSE_TIMEOUT_MICROS = 30_000_000n;

let initPromise: Promise<void> | null = null;
const languageCache = new Map<string, Promise<Language>>();
const parserCache = new Map<string, Promise<Parser>>();

export type SyntaxNode = Node;

function maybeResetParser(parser: Parser): void {
  const maybeReset = (parser as Parser & { reset?: () => void }).reset;
  if (typeof maybeReset === 'function') {
    maybeReset.call(parser);
  }
}

function evictParser(language: string, parser?: Parser): void {
  if (parser) {
    maybeResetParser(parser);
  }
  parserCache.delete(language);
}

function setParseTimeout(parser: Parser): void {
  const maybeSetTimeout = (
    parser as Parser & { setTimeoutMicros?: (timeout: number | bigint) => void }
  ).setTimeoutMicros;
  if (typeof maybeSetTimeout !== 'function') return;

  try {
    maybeSetTimeout.call(parser, TREE_SITTER_PARSE_TIMEOUT_MICROS);
  } catch {
    // Older builds take a number.
    maybeSetTimeout.call(parser, Number(TREE_SITTER_PARSE_TIMEOUT_MICROS));
  }
}

export function supportsTreeSitter(language: string): boolean {
  return supportsGrammar(language);
}

async function ensureParserInitialized(): Promise<void> {
  if (!initPromise) {
    initPromise = Parser.init({
      locateFile(scriptName: string) {
        if (scriptName === 'tree-sitter.wasm') {
          return require.resolve('web-tree-sitter/tree-sitter.wasm');
        }
        return scriptName;
      }
    }).catch((err: unknown) => {
      initPromise = null;
      throw err;
    });
  }

  await initPromise;
}

async function loadLanguage(language: string): Promise<Language> {
  let cachedLanguage = languageCache.get(language);
  if (!cachedLanguage) {
    const { wasmPath } = resolveGrammarPath(language);
    cachedLanguage = Language.load(wasmPath).catch((err: unknown) => {
      // Evict failed entry so later calls can retry after fixes
      languageCache.delete(language);
      throw err;
    });
    languageCache.set(language, cachedLanguage);
  }

  return cachedLanguage;
}

async function getParserForLanguage(language: string): Promise<Parser> {
  let cachedParser = parserCache.get(language);
  if (!cachedParser) {
    cachedParser = (async () => {
      await ensureParserInitialized();
      const parser = new Parser();
      try {
        parser.setLanguage(await loadLanguage(language));
      } catch (err) {
        parserCache.delete(language);
        languageCache.delete(language);
        throw err;
      }
      return parser;
    })();
    parserCache.set(language, cachedParser);
  }

  return cachedParser;
}

function rootHasError(root: Node): boolean {
  const hasErrorValue = root.hasError as unknown;
  return typeof hasErrorValue === 'function'
    ? Boolean((hasErrorValue as () => unknown)())
    : Boolean(hasErrorValue);
}

/**
 * Parses `content` and hands the root node to `visit`. The tree is freed afterwards.
 *
 * Returns null when the language has no grammar, the grammar fails to load, the input is
 * too large, or the tree contains syntax errors, so callers can fall back to a scanner.
 */
export async function visitSyntaxTree<T>(
  content: string,
  language: string,
  visit: (root: SyntaxNode) => T
): Promise<T | null> {
  if (!supportsTreeSitter(language) || !content.trim()) {
    return null;
  }

  if (Buffer.byteLength(content, 'utf8') > MAX_TREE_SITTER_PARSE_BYTES) {
    return null;
  }

  try {
    const parser = await getParserForLanguage(language);
    setParseTimeout(parser);

    let tree: ReturnType<Parser['parse']>;
    try {
      tree = parser.parse(content);
    } catch (error) {
      evictParser(language, parser);
      throw error;
    }

    if (!tree) {
      evictParser(language, parser);
      return null;
    }

    try {
      if (rootHasError(tree.rootNode)) {
        return null;
      }
      return visit(tree.rootNode);
    } finally {
      tree.delete();
    }
  } catch (error) {
    evictParser(language);

    debugLog(
      `Tree-sitter parse failed for '${language}':`,
      error instanceof Error ? error.message : String(error)
    );
    return null;
  }
}
