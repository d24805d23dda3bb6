import { createRequire } from 'module';
import path from 'path';

const require = createRequire(import.meta.url);

/**
 * Language-to-wasm mapping. Grammars are taken from the tree-sitter-wasms package.
 */
export const LANGUAGE_TO_WASM: Record<string, string> = {
  python: 'tree-sitter-python.wasm'
};

export function supportsGrammar(language: string): boolean {
  return language in LANGUAGE_TO_WASM;
}

/**
 * Resolves the full path to a grammar wasm file for a given language.
 *
 * Honors the `CCR_GRAMMAR_DIR` env override; otherwise resolves inside tree-sitter-wasms.
 * Throws when the language has no grammar or the package cannot be resolved.
 */
export function resolveGrammarPath(language: string): { wasmFile: string; wasmPath: string } {
  const wasmFile = LANGUAGE_TO_WASM[language];
  if (!wasmFile) {
    throw new Error(`No grammar configured for language '${language}'.`);
  }

  const override = process.env.CCR_GRAMMAR_DIR;
  if (override) {
    return { wasmFile, wasmPath: path.join(path.resolve(override), wasmFile) };
  }

  return { wasmFile, wasmPath: require.resolve(`tree-sitter-wasms/out/${wasmFile}`) };
}
