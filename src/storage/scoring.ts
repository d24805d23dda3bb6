import type { Metric, ScoredRecord } from '../types/index.js';

/**
 * Similarity on a shared [0, 1] scale so one threshold works for both metrics.
 *
 * - cosine: dot(a, b) / (|a| * |b|), negatives clamped to 0. Zero vectors score 0.
 * - l2: 1 / (1 + ||a - b||)
 *
 * Identical vectors score exactly 1 under both.
 */
export function similarity(metric: Metric, a: number[], b: number[]): number {
  if (metric === 'cosine') {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
      dot += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }
    const denominator = Math.sqrt(normA * normB);
    if (denominator === 0) return 0;
    return Math.min(1, Math.max(0, dot / denominator));
  }

  let sumSquares = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sumSquares += diff * diff;
  }
  return 1 / (1 + Math.sqrt(sumSquares));
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Score descending; ties by file path, then start line, then record id. */
export function compareScored(a: ScoredRecord, b: ScoredRecord): number {
  if (a.score !== b.score) return b.score - a.score;
  const byPath = compareText(a.chunk.filePath, b.chunk.filePath);
  if (byPath !== 0) return byPath;
  if (a.chunk.startLine !== b.chunk.startLine) return a.chunk.startLine - b.chunk.startLine;
  return compareText(a.id, b.id);
}
