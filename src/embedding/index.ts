/**
 * Embedding service
 *
 * Wraps a primary strategy (remote when a credential is configured, hash
 * otherwise) and degrades to the hash strategy for any call where the
 * remote strategy fails. Degradation is logged and counted, never thrown.
 */
import { AppConfig } from '../config';
import { describeError } from '../errors';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { createHttpClient, HttpClient } from '../utils/http';
import { HashEmbeddingStrategy } from './hash-embedder';
import { RemoteEmbeddingStrategy } from './remote-embedder';
import { EmbeddingOutcome, EmbeddingStrategy } from './types';

export { HashEmbeddingStrategy, hashEmbedding } from './hash-embedder';
export { RemoteEmbeddingStrategy, parseEmbeddingResponse } from './remote-embedder';
export type { EmbeddingOutcome, EmbeddingStrategy } from './types';

export class EmbeddingService {
  constructor(
    private readonly primary: EmbeddingStrategy,
    private readonly fallback: HashEmbeddingStrategy
  ) {
    if (primary.dimensions !== fallback.dimensions) {
      throw new Error(
        `Embedding strategies disagree on dimensions (${primary.dimensions} vs ${fallback.dimensions})`
      );
    }
  }

  get dimensions(): number {
    return this.fallback.dimensions;
  }

  get primaryStrategy(): EmbeddingStrategy['kind'] {
    return this.primary.kind;
  }

  async embed(text: string): Promise<EmbeddingOutcome> {
    if (this.primary.kind === 'hash') {
      return { vector: await this.primary.embed(text), strategy: 'hash', degraded: false };
    }

    try {
      const vector = await this.primary.embed(text);
      return { vector, strategy: this.primary.kind, degraded: false };
    } catch (error) {
      logger.warn({ error: describeError(error) }, 'Remote embedding failed, using hash fallback');
      metrics.providerDegradations.inc({ stage: 'embedding' });

      return { vector: await this.fallback.embed(text), strategy: 'hash', degraded: true };
    }
  }
}

/**
 * Build the embedding service from configuration.
 * The remote strategy is primary only when an API key is present.
 */
export function createEmbeddingService(config: AppConfig['embedding'], http?: HttpClient): EmbeddingService {
  const fallback = new HashEmbeddingStrategy(config.dimensions);

  if (!config.apiKey) {
    logger.info({ dimensions: config.dimensions }, 'No embedding API key configured, using hash embeddings');
    return new EmbeddingService(fallback, fallback);
  }

  const client =
    http ??
    createHttpClient({ baseUrl: config.baseUrl, apiKey: config.apiKey, timeoutMs: config.timeoutMs });

  const remote = new RemoteEmbeddingStrategy(client, {
    model: config.model,
    dimensions: config.dimensions,
    timeoutMs: config.timeoutMs,
  });

  logger.info({ model: config.model, dimensions: config.dimensions }, 'Using remote embeddings with hash fallback');
  return new EmbeddingService(remote, fallback);
}
