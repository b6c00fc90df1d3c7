/**
 * Query engine - retrieval over stored chunks and graph
 */
import { EmbeddingService } from '../embedding';
import { ValidationError, ValidationIssue } from '../errors';
import { GraphStore } from '../graph-store';
import { metrics } from '../metrics/metrics';
import { EntityRecord, QueryRequest, QueryResult, RelationRecord } from '../types/graph';
import { logger } from '../utils/logger';

export const DEFAULT_TOP_K = 5;
export const MAX_TOP_K = 50;

export interface QueryEngineDeps {
  embedding: EmbeddingService;
  store: GraphStore;
}

export class QueryEngine {
  constructor(private readonly deps: QueryEngineDeps) {}

  /**
   * Answer a free-text query with the most similar chunks, the entities
   * matching the query text and, optionally, the relations among them.
   *
   * Relations are restricted to the documents of the returned chunks.
   */
  async query(request: QueryRequest): Promise<QueryResult> {
    const topK = request.topK ?? DEFAULT_TOP_K;
    const includeRelations = request.includeRelations ?? true;
    validateQuery(request.query, topK);

    const start = process.hrtime.bigint();
    const { embedding, store } = this.deps;

    try {
      const { vector, degraded } = await embedding.embed(request.query);
      const chunks = await store.similaritySearch(vector, topK);

      const contained = await store.matchEntities(request.query, topK, { mode: 'contains' });
      const mentioned = await store.matchEntities(request.query, topK, { mode: 'mentioned' });
      const entities = dedupeById([...contained, ...mentioned]).slice(0, topK);

      let relations: RelationRecord[] = [];
      if (includeRelations && chunks.length > 0 && entities.length > 0) {
        relations = await store.findRelations(
          entities.map((entity) => entity.id),
          { documentIds: [...new Set(chunks.map((chunk) => chunk.documentId))] }
        );
      }

      metrics.queriesProcessed.inc({ status: 'success' });
      metrics.queryDuration.observe(Number(process.hrtime.bigint() - start) / 1e9);

      logger.debug(
        { chunks: chunks.length, entities: entities.length, relations: relations.length, degraded },
        'Query answered'
      );

      return { query: request.query, chunks, entities, relations, degraded: { embedding: degraded } };
    } catch (error) {
      metrics.queriesProcessed.inc({ status: 'failure' });
      logger.error({ error }, 'Query failed');
      throw error;
    }
  }
}

function validateQuery(query: string, topK: number): void {
  const errors: ValidationIssue[] = [];

  if (typeof query !== 'string' || query.trim() === '') {
    errors.push({ path: '/query', message: 'must contain non-whitespace text' });
  }
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    errors.push({ path: '/top_k', message: `must be an integer between 1 and ${MAX_TOP_K}` });
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid query request', errors);
  }
}

function dedupeById(entities: EntityRecord[]): EntityRecord[] {
  const seen = new Set<string>();
  return entities.filter((entity) => {
    if (seen.has(entity.id)) {
      return false;
    }
    seen.add(entity.id);
    return true;
  });
}
