export * from './types.js';
export * from './scoring.js';
export * from './flat.js';
export * from './lancedb.js';
export * from './vector-index.js';

import { ConfigurationError } from '../errors/index.js';
import { FlatAnnBackend } from './flat.js';
import { LanceDBAnnBackend } from './lancedb.js';
import type { AnnBackend } from './types.js';

export function createAnnBackend(kind: string): AnnBackend {
  switch (kind) {
    case 'flat':
      return new FlatAnnBackend();
    case 'lancedb':
      return new LanceDBAnnBackend();
    default:
      throw new ConfigurationError(`Unknown vector_index.backend '${kind}'`);
  }
}
