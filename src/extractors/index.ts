export * from './types.js';
export * from './registry.js';
export { PythonExtractor } from './python.js';
export { TypeScriptExtractor } from './typescript.js';
export { MarkdownExtractor } from './markdown.js';

import type { ExtractorsConfig } from '../config/index.js';
import { MarkdownExtractor } from './markdown.js';
import { PythonExtractor } from './python.js';
import { ExtractorRegistry } from './registry.js';
import { TypeScriptExtractor } from './typescript.js';

export function createDefaultExtractorRegistry(config: ExtractorsConfig): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  const maxFileSize = config.max_file_size;

  registry.register(
    new PythonExtractor({ maxFileSize, includeComments: config.python.include_comments })
  );
  registry.register(
    new TypeScriptExtractor({ maxFileSize, includeComments: config.typescript.include_comments })
  );
  registry.register(
    new MarkdownExtractor({ maxFileSize, splitByHeadings: config.markdown.split_by_headings })
  );

  return registry;
}
