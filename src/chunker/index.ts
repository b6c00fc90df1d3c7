/**
 * Chunker - Splits document text into overlapping fixed-size windows
 *
 * Sizes count Unicode code points so a window never splits a surrogate pair.
 * Chunk i starts at i * (chunkSize - chunkOverlap); the last chunk ends at
 * the end of the text.
 */
import { ConfigurationError } from '../errors';
import { TextChunk } from '../types/graph';

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export class Chunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor({ chunkSize, chunkOverlap }: ChunkerOptions) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
      throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got ${chunkOverlap}`);
    }
    if (chunkOverlap >= chunkSize) {
      throw new ConfigurationError(
        `Chunk overlap (${chunkOverlap}) must be smaller than chunk size (${chunkSize})`
      );
    }

    this.chunkSize = chunkSize;
    this.chunkOverlap = chunkOverlap;
  }

  /**
   * Split text into ordered, overlapping chunks covering the whole input
   */
  split(text: string): TextChunk[] {
    const points = Array.from(text);
    const step = this.chunkSize - this.chunkOverlap;
    const chunks: TextChunk[] = [];

    for (let start = 0; ; start += step) {
      const end = Math.min(start + this.chunkSize, points.length);
      chunks.push({
        index: chunks.length,
        text: points.slice(start, end).join(''),
        start,
        end,
      });

      if (end >= points.length) {
        break;
      }
    }

    return chunks;
  }

  /**
   * Rebuild the original text from chunks produced by split()
   */
  reassemble(chunks: TextChunk[]): string {
    return chunks
      .map((chunk, i) => (i === 0 ? chunk.text : Array.from(chunk.text).slice(this.chunkOverlap).join('')))
      .join('');
  }
}
