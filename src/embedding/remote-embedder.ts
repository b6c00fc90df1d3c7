/**
 * Remote embedding strategy for OpenAI-compatible /embeddings endpoints
 */
import { ProviderError } from '../errors';
import { metrics } from '../metrics/metrics';
import { assertSuccessStatus, HttpClient, toProviderError } from '../utils/http';
import { EmbeddingStrategy } from './types';

const PROVIDER = 'embedding';

export interface RemoteEmbeddingOptions {
  model: string;
  dimensions: number;
  timeoutMs: number;
}

function isVector(value: unknown, dimensions: number): value is number[] {
  return (
    Array.isArray(value) &&
    value.length === dimensions &&
    value.every((x) => typeof x === 'number' && Number.isFinite(x))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a vector of the expected length out of the response body.
 * Accepts a bare array, {embedding: [...]} and {data: [{embedding: [...]}]};
 * anything else yields null.
 */
export function parseEmbeddingResponse(body: unknown, dimensions: number): number[] | null {
  if (isVector(body, dimensions)) {
    return body;
  }

  if (!isRecord(body)) {
    return null;
  }

  if (isVector(body.embedding, dimensions)) {
    return body.embedding;
  }

  if (Array.isArray(body.data) && body.data.length > 0) {
    const first: unknown = body.data[0];
    if (isVector(first, dimensions)) {
      return first;
    }
    if (isRecord(first) && isVector(first.embedding, dimensions)) {
      return first.embedding;
    }
  }

  return null;
}

function describeShape(body: unknown): string {
  if (Array.isArray(body)) {
    return `array of length ${body.length}`;
  }
  return body === null ? 'null' : typeof body;
}

export class RemoteEmbeddingStrategy implements EmbeddingStrategy {
  readonly kind = 'remote' as const;
  readonly dimensions: number;

  constructor(
    private readonly http: HttpClient,
    private readonly options: RemoteEmbeddingOptions
  ) {
    this.dimensions = options.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const start = Date.now();

    try {
      const response = await this.http.post<unknown>(
        '/embeddings',
        {
          model: this.options.model,
          input: text,
          dimensions: this.dimensions,
        },
        { timeout: this.options.timeoutMs }
      );

      assertSuccessStatus(PROVIDER, response.status);

      const vector = parseEmbeddingResponse(response.data, this.dimensions);
      if (!vector) {
        throw new ProviderError(
          PROVIDER,
          `Malformed embedding response: expected ${this.dimensions} numbers, got ${describeShape(response.data)}`,
          { status: response.status }
        );
      }

      metrics.providerCallTime.observe({ stage: PROVIDER, outcome: 'success' }, Date.now() - start);
      return vector;
    } catch (error) {
      metrics.providerCallTime.observe({ stage: PROVIDER, outcome: 'failure' }, Date.now() - start);
      throw toProviderError(PROVIDER, error);
    }
  }
}
