/**
 * Vector helpers for similarity search
 */

/**
 * Cosine similarity of two equal-length vectors; 0 when either has zero norm
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Decode a stored embedding; anything but an array of finite numbers yields null
 */
export function parseVector(stored: string | null): number[] | null {
  if (stored === null) {
    return null;
  }

  const value: unknown = JSON.parse(stored);
  if (!Array.isArray(value)) {
    return null;
  }

  const vector: number[] = [];
  for (const x of value) {
    if (typeof x !== 'number' || !Number.isFinite(x)) {
      return null;
    }
    vector.push(x);
  }
  return vector;
}
