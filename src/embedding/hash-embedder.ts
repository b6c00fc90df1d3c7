/**
 * Deterministic hash-based embeddings
 *
 * The vector is read from SHA-256 digests of "<block>:<text>" for
 * block = 0, 1, 2, ...; every 2-byte big-endian word w becomes
 * (w / 65535) * 2 - 1. The same text always yields the same vector.
 */
import { createHash } from 'crypto';
import { EmbeddingStrategy } from './types';

const VALUES_PER_DIGEST = 16;

export function hashEmbedding(text: string, dimensions: number): number[] {
  const vector: number[] = [];

  for (let block = 0; vector.length < dimensions; block++) {
    const digest = createHash('sha256').update(`${block}:${text}`).digest();
    for (let i = 0; i < VALUES_PER_DIGEST && vector.length < dimensions; i++) {
      const word = digest.readUInt16BE(i * 2);
      vector.push((word / 65535) * 2 - 1);
    }
  }

  return vector;
}

export class HashEmbeddingStrategy implements EmbeddingStrategy {
  readonly kind = 'hash' as const;

  constructor(readonly dimensions: number) {}

  async embed(text: string): Promise<number[]> {
    return hashEmbedding(text, this.dimensions);
  }
}
