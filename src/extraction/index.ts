/**
 * Extraction service
 *
 * Runs the primary strategy (LLM when a credential is configured, pattern
 * matching otherwise) on each chunk. A chunk whose LLM call fails is
 * extracted with the pattern strategy instead; other chunks are unaffected.
 */
import { AppConfig } from '../config';
import { describeError } from '../errors';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { createHttpClient, HttpClient } from '../utils/http';
import { LlmExtractionStrategy } from './llm-extractor';
import { PatternExtractionStrategy } from './pattern-extractor';
import { ExtractionOutcome, ExtractionStrategy } from './types';

export { LlmExtractionStrategy, parseModelJson, toExtraction, buildSystemPrompt } from './llm-extractor';
export { PatternExtractionStrategy, extractWithPatterns } from './pattern-extractor';
export { normalizeExtraction, normalizeRelationType } from './normalize';
export type { ExtractionOutcome, ExtractionOutput, ExtractionStrategy } from './types';

export class ExtractionService {
  constructor(
    private readonly primary: ExtractionStrategy,
    private readonly fallback: PatternExtractionStrategy
  ) {}

  get primaryStrategy(): ExtractionStrategy['kind'] {
    return this.primary.kind;
  }

  async extract(text: string): Promise<ExtractionOutcome> {
    if (this.primary.kind === 'pattern') {
      return { ...(await this.primary.extract(text)), strategy: 'pattern', degraded: false };
    }

    try {
      const output = await this.primary.extract(text);
      return { ...output, strategy: this.primary.kind, degraded: false };
    } catch (error) {
      logger.warn({ error: describeError(error) }, 'LLM extraction failed, using pattern fallback');
      metrics.providerDegradations.inc({ stage: 'extraction' });

      return { ...(await this.fallback.extract(text)), strategy: 'pattern', degraded: true };
    }
  }
}

/**
 * Build the extraction service from configuration.
 * The LLM strategy is primary only when an API key is present.
 */
export function createExtractionService(config: AppConfig['extraction'], http?: HttpClient): ExtractionService {
  const fallback = new PatternExtractionStrategy(config.maxEntitiesPerChunk);

  if (!config.apiKey) {
    logger.info('No extraction API key configured, using pattern extraction');
    return new ExtractionService(fallback, fallback);
  }

  const client =
    http ??
    createHttpClient({ baseUrl: config.baseUrl, apiKey: config.apiKey, timeoutMs: config.timeoutMs });

  const llm = new LlmExtractionStrategy(client, {
    model: config.model,
    maxEntities: config.maxEntitiesPerChunk,
    timeoutMs: config.timeoutMs,
  });

  logger.info({ model: config.model }, 'Using LLM extraction with pattern fallback');
  return new ExtractionService(llm, fallback);
}
