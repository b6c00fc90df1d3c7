/**
 * Ingestion pipeline - document text to stored chunks and graph
 *
 * Chunks the document, embeds and extracts each chunk, merges the per-chunk
 * extraction results into one graph for the document and persists
 * everything in a single transaction. Provider outages degrade the result;
 * only validation and storage failures fail the call.
 */
import { Chunker } from '../chunker';
import { EmbeddingService } from '../embedding';
import { ExtractionService } from '../extraction';
import { ValidationError, ValidationIssue } from '../errors';
import { GraphStore } from '../graph-store';
import { metrics } from '../metrics/metrics';
import {
  ChunkWithEmbedding,
  entityKey,
  ExtractedEntity,
  ExtractedRelation,
  IngestRequest,
  IngestResult,
} from '../types/graph';
import { logger } from '../utils/logger';

export interface IngestionPipelineDeps {
  chunker: Chunker;
  embedding: EmbeddingService;
  extraction: ExtractionService;
  store: GraphStore;
}

interface EntityAggregate {
  entity: ExtractedEntity;
  strategies: string[];
  chunks: number[];
  mentions: number;
}

interface RelationAggregate {
  relation: ExtractedRelation;
  chunks: number[];
}

export interface DocumentGraphDraft {
  entities: ExtractedEntity[];
  relations: ExtractedRelation[];
  relationsDropped: number;
}

export function validateIngestRequest(request: IngestRequest): void {
  const errors: ValidationIssue[] = [];

  if (typeof request.documentId !== 'string' || request.documentId.trim() === '') {
    errors.push({ path: '/document_id', message: 'must be a non-empty string' });
  }
  if (typeof request.content !== 'string' || request.content.trim() === '') {
    errors.push({ path: '/content', message: 'must contain non-whitespace text' });
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid ingest request', errors);
  }
}

/**
 * Merge per-chunk extraction results into one graph for the document.
 *
 * Entities are unique by entity key; their metadata records the strategies,
 * chunk ordinals and mention count. Relations are unique by
 * (source, target, type) and keep the highest confidence. Relations whose
 * endpoints are not among the merged entities are dropped and counted.
 */
export function mergeChunkGraphs(
  perChunk: Array<{ chunkIndex: number; strategy: string; entities: ExtractedEntity[]; relations: ExtractedRelation[] }>
): DocumentGraphDraft {
  const entities = new Map<string, EntityAggregate>();
  const relations = new Map<string, RelationAggregate>();
  let relationsDropped = 0;

  for (const { chunkIndex, strategy, entities: chunkEntities } of perChunk) {
    for (const entity of chunkEntities) {
      const key = entityKey(entity.text, entity.type);
      const existing = entities.get(key);

      if (!existing) {
        entities.set(key, { entity, strategies: [strategy], chunks: [chunkIndex], mentions: 1 });
        continue;
      }

      existing.mentions += 1;
      if (!existing.strategies.includes(strategy)) {
        existing.strategies.push(strategy);
      }
      if (!existing.chunks.includes(chunkIndex)) {
        existing.chunks.push(chunkIndex);
      }
    }
  }

  for (const { chunkIndex, relations: chunkRelations } of perChunk) {
    for (const relation of chunkRelations) {
      if (!entities.has(relation.source) || !entities.has(relation.target)) {
        relationsDropped += 1;
        continue;
      }

      const edge = `${relation.source}->${relation.target}|${relation.type}`;
      const existing = relations.get(edge);

      if (!existing) {
        relations.set(edge, { relation: { ...relation }, chunks: [chunkIndex] });
        continue;
      }

      existing.relation.confidence = Math.max(existing.relation.confidence, relation.confidence);
      if (!existing.chunks.includes(chunkIndex)) {
        existing.chunks.push(chunkIndex);
      }
    }
  }

  return {
    entities: [...entities.values()].map(({ entity, strategies, chunks, mentions }) => ({
      text: entity.text,
      type: entity.type,
      metadata: { ...entity.metadata, strategies, chunks, mentions },
    })),
    relations: [...relations.values()].map(({ relation, chunks }) => ({
      ...relation,
      metadata: { chunks },
    })),
    relationsDropped,
  };
}

export class IngestionPipeline {
  constructor(private readonly deps: IngestionPipelineDeps) {}

  async ingest(request: IngestRequest): Promise<IngestResult> {
    validateIngestRequest(request);

    const start = process.hrtime.bigint();
    const { documentId, content } = request;
    const { chunker, embedding, extraction, store } = this.deps;

    try {
      const textChunks = chunker.split(content);
      const chunks: ChunkWithEmbedding[] = [];
      const perChunk: Parameters<typeof mergeChunkGraphs>[0] = [];
      const degraded = { embedding: false, extraction: false };

      for (const chunk of textChunks) {
        const [embedded, extracted] = await Promise.all([
          embedding.embed(chunk.text),
          extraction.extract(chunk.text),
        ]);

        degraded.embedding = degraded.embedding || embedded.degraded;
        degraded.extraction = degraded.extraction || extracted.degraded;

        chunks.push({ ...chunk, embedding: embedded.vector, embeddingStrategy: embedded.strategy });
        perChunk.push({
          chunkIndex: chunk.index,
          strategy: extracted.strategy,
          entities: extracted.entities,
          relations: extracted.relations,
        });
      }

      const graph = mergeChunkGraphs(perChunk);

      const stored = await store.transaction(async (tx) => {
        await tx.upsertDocument(documentId, request.title ?? null, content, request.metadata ?? {});
        const chunkRecords = await tx.insertChunks(documentId, chunks);
        const inserted = await tx.insertEntitiesAndRelations(documentId, graph.entities, graph.relations);
        return { chunkRecords, inserted };
      });

      let relationsDropped = graph.relationsDropped;
      if (stored.inserted.integrityError) {
        relationsDropped += stored.inserted.relationsSkipped;
        logger.warn(
          { documentId, error: stored.inserted.integrityError.message },
          'Relations skipped by the graph store'
        );
      }

      const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

      metrics.documentsIngested.inc({ status: 'success' });
      metrics.ingestDuration.observe(durationSeconds);
      metrics.chunksCreated.inc(stored.chunkRecords.length);
      metrics.entitiesCreated.inc(stored.inserted.entities.length);
      metrics.relationsCreated.inc(stored.inserted.relations.length);
      metrics.relationsDropped.inc(relationsDropped);

      const result: IngestResult = {
        documentId,
        chunksCreated: stored.chunkRecords.length,
        entitiesCreated: stored.inserted.entities.length,
        relationsCreated: stored.inserted.relations.length,
        relationsDropped,
        durationSeconds: Math.round(durationSeconds * 1000) / 1000,
        status: 'success',
        degraded,
      };

      logger.info(
        {
          documentId,
          chunks: result.chunksCreated,
          entities: result.entitiesCreated,
          relations: result.relationsCreated,
          relationsDropped,
          degraded,
        },
        'Document ingested'
      );

      return result;
    } catch (error) {
      metrics.documentsIngested.inc({ status: 'failure' });
      logger.error({ error, documentId }, 'Document ingestion failed');
      throw error;
    }
  }
}
