/**
 * Knowledge graph service - composition root
 *
 * Wires the chunker, the embedding and extraction services, the graph store,
 * the ingestion pipeline and the query engine from configuration. The
 * database is the only state; nothing is cached in process.
 */
import Config, { AppConfig } from '../config';
import { Chunker } from '../chunker';
import { createEmbeddingService, EmbeddingService } from '../embedding';
import { createExtractionService, ExtractionService } from '../extraction';
import { GraphStore, openDatabase } from '../graph-store';
import { IngestionPipeline } from '../pipeline/ingest';
import { QueryEngine } from '../query';
import { DocumentGraph, HealthStatus, IngestRequest, IngestResult, QueryRequest, QueryResult } from '../types/graph';
import { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';

export interface KnowledgeGraphComponents {
  chunker: Chunker;
  embedding: EmbeddingService;
  extraction: ExtractionService;
  store: GraphStore;
}

/** Optional HTTP clients for the remote strategies, mainly for tests */
export interface ProviderClients {
  embedding?: HttpClient;
  extraction?: HttpClient;
}

export class KnowledgeGraphService {
  private readonly pipeline: IngestionPipeline;
  private readonly engine: QueryEngine;
  private readonly store: GraphStore;

  constructor(components: KnowledgeGraphComponents) {
    this.store = components.store;
    this.pipeline = new IngestionPipeline(components);
    this.engine = new QueryEngine(components);
  }

  async ingest(request: IngestRequest): Promise<IngestResult> {
    return this.pipeline.ingest(request);
  }

  async query(request: QueryRequest): Promise<QueryResult> {
    return this.engine.query(request);
  }

  async getDocumentGraph(documentId: string): Promise<DocumentGraph> {
    return this.store.getDocumentGraph(documentId);
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.store.deleteDocument(documentId);
    logger.info({ documentId }, 'Document deleted');
  }

  async healthCheck(): Promise<HealthStatus> {
    return this.store.healthCheck();
  }

  async close(): Promise<void> {
    await this.store.close();
    logger.info('Knowledge graph service closed');
  }
}

/**
 * Build the service from configuration, opening (and migrating) the database
 */
export function createKnowledgeGraphService(
  config: AppConfig = Config,
  clients: ProviderClients = {}
): KnowledgeGraphService {
  const chunker = new Chunker(config.chunking);
  const embedding = createEmbeddingService(config.embedding, clients.embedding);
  const extraction = createExtractionService(config.extraction, clients.extraction);
  const store = GraphStore.fromConnection(openDatabase(config.storage));

  logger.info(
    {
      chunkSize: config.chunking.chunkSize,
      chunkOverlap: config.chunking.chunkOverlap,
      embedding: embedding.primaryStrategy,
      extraction: extraction.primaryStrategy,
      storage: config.storage.path,
    },
    'Knowledge graph service ready'
  );

  return new KnowledgeGraphService({ chunker, embedding, extraction, store });
}
