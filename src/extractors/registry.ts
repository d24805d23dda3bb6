/**
 * Extractor Registry - maps file extensions to chunk extractors.
 * Dispatch is a lookup by lowercase extension; an extension belongs to exactly one extractor.
 */

import path from 'path';

import { ConfigurationError } from '../errors/index.js';
import { debugLog } from '../utils/debug.js';
import type { ChunkExtractor } from './types.js';

export class ExtractorRegistry {
  private byExtension: Map<string, ChunkExtractor> = new Map();
  private extractors: ChunkExtractor[] = [];

  /**
   * Registers an extractor for all of its extensions.
   * Fails without registering anything when one of them is already claimed.
   */
  register(extractor: ChunkExtractor): void {
    const extensions = [...extractor.getSupportedExtensions()].map(normalizeExtension);

    for (const extension of extensions) {
      const owner = this.byExtension.get(extension);
      if (owner) {
        throw new ConfigurationError(
          `Extension '${extension}' is already claimed by the ${owner.language} extractor; cannot register ${extractor.language}`
        );
      }
    }

    for (const extension of extensions) {
      this.byExtension.set(extension, extractor);
    }
    this.extractors.push(extractor);

    debugLog(`Registered extractor: ${extractor.language} (${extensions.join(', ')})`);
  }

  forPath(filePath: string): ChunkExtractor | undefined {
    return this.byExtension.get(path.extname(filePath).toLowerCase());
  }

  supportedExtensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  getAll(): ChunkExtractor[] {
    return [...this.extractors];
  }
}

export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}
