/**
 * HTTP API server
 *
 * Exposes ingestion, retrieval and document graph endpoints, plus health
 * and Prometheus metrics for monitoring. Responses use snake_case keys.
 */
import express from 'express';
import { Server } from 'http';
import Config from '../config';
import { KnowledgeGraphError, NotFoundError, ValidationError } from '../errors';
import MetricsService, { getMetrics } from '../metrics/metrics';
import { KnowledgeGraphService } from '../service';
import {
  DocumentGraph,
  EntityRecord,
  IngestResult,
  QueryResult,
  RelationRecord,
  ScoredChunk,
} from '../types/graph';
import { logger } from '../utils/logger';
import { validateIngestRequest, validateQueryRequest } from '../utils/schema-validator';

export const API_PREFIX = '/api/v1/kg-index';

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

// express 4 does not forward rejected promises to the error handler
function asyncHandler(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function serializeChunk(chunk: ScoredChunk) {
  return {
    chunk_id: chunk.chunkId,
    document_id: chunk.documentId,
    chunk_index: chunk.chunkIndex,
    content: chunk.content,
    score: chunk.score,
  };
}

export function serializeEntity(entity: EntityRecord) {
  return {
    entity_id: entity.id,
    document_id: entity.documentId,
    text: entity.text,
    type: entity.type,
    metadata: entity.metadata,
  };
}

export function serializeRelation(relation: RelationRecord) {
  return {
    relation_id: relation.id,
    document_id: relation.documentId,
    source: relation.source,
    target: relation.target,
    type: relation.type,
    confidence: relation.confidence,
  };
}

export function serializeIngestResult(result: IngestResult) {
  return {
    document_id: result.documentId,
    chunks_created: result.chunksCreated,
    entities_created: result.entitiesCreated,
    relations_created: result.relationsCreated,
    relations_dropped: result.relationsDropped,
    duration_seconds: result.durationSeconds,
    status: result.status,
    degraded: result.degraded,
  };
}

export function serializeQueryResult(result: QueryResult) {
  return {
    query: result.query,
    chunks: result.chunks.map(serializeChunk),
    entities: result.entities.map(serializeEntity),
    relations: result.relations.map(serializeRelation),
    degraded: result.degraded,
  };
}

export function serializeDocumentGraph(graph: DocumentGraph) {
  return {
    document_id: graph.documentId,
    title: graph.title,
    metadata: graph.metadata,
    entities: graph.entities.map(serializeEntity),
    relations: graph.relations.map(serializeRelation),
    chunks_count: graph.chunksCount,
  };
}

/**
 * Build the express application around a knowledge graph service
 */
export function createApp(service: KnowledgeGraphService): express.Express {
  const app = express();

  app.use(express.json({ limit: '10mb' }));

  // Log incoming requests
  app.use((req, res, next) => {
    logger.debug(
      {
        method: req.method,
        url: req.url,
      },
      'HTTP request received'
    );
    next();
  });

  // Health check endpoint; healthy means the database answers
  app.get(
    '/health',
    asyncHandler(async (req, res) => {
      const storage = await service.healthCheck();

      const health = {
        status: storage.ok ? 'healthy' : 'unhealthy',
        service: Config.service.name,
        version: Config.service.version,
        timestamp: new Date().toISOString(),
        storage: storage.ok ? 'ok' : storage.error,
      };

      res.status(storage.ok ? 200 : 503).json(health);
    })
  );

  // Prometheus metrics endpoint
  app.get(
    '/metrics',
    asyncHandler(async (req, res) => {
      const metrics = await getMetrics();

      // Set the content type for Prometheus
      res.set('Content-Type', MetricsService.register.contentType);
      res.end(metrics);
    })
  );

  app.post(
    `${API_PREFIX}/ingest`,
    asyncHandler(async (req, res) => {
      const body = validateIngestRequest(req.body);

      const result = await service.ingest({
        documentId: body.document_id,
        content: body.content,
        title: body.title ?? null,
        metadata: body.metadata ?? {},
      });

      res.status(201).json(serializeIngestResult(result));
    })
  );

  app.post(
    `${API_PREFIX}/query`,
    asyncHandler(async (req, res) => {
      const body = validateQueryRequest(req.body);

      const result = await service.query({
        query: body.query,
        topK: body.top_k,
        includeRelations: body.include_relations,
      });

      res.json(serializeQueryResult(result));
    })
  );

  app.get(
    `${API_PREFIX}/document/:documentId`,
    asyncHandler(async (req, res) => {
      const graph = await service.getDocumentGraph(req.params.documentId);
      res.json(serializeDocumentGraph(graph));
    })
  );

  app.delete(
    `${API_PREFIX}/document/:documentId`,
    asyncHandler(async (req, res) => {
      await service.deleteDocument(req.params.documentId);
      res.status(204).end();
    })
  );

  // Catch-all for 404s
  app.use((req, res) => {
    logger.info(
      {
        method: req.method,
        url: req.url,
      },
      'Unknown route'
    );

    res.status(404).json({
      status: 'error',
      message: 'Not found',
    });
  });

  // Error handler
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ValidationError) {
      res.status(400).json({ status: 'error', message: err.message, errors: err.errors });
      return;
    }

    if (err instanceof NotFoundError) {
      res.status(404).json({ status: 'error', message: err.message });
      return;
    }

    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError) {
      res.status(400).json({ status: 'error', message: 'Malformed JSON body', errors: [] });
      return;
    }

    logger.error(
      {
        error: err,
        code: err instanceof KnowledgeGraphError ? err.code : undefined,
        method: req.method,
        url: req.url,
      },
      'Server error'
    );

    res.status(500).json({
      status: 'error',
      message: 'Internal server error',
    });
  });

  return app;
}

/**
 * Start listening on the configured host and port
 */
export function startServer(
  service: KnowledgeGraphService,
  port: number = Config.http.port,
  host: string = Config.http.host
): Promise<Server> {
  const app = createApp(service);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve(server);
    });

    server.on('error', (error: Error) => {
      logger.error({ error }, 'API server error');
      reject(error);
    });
  });
}

/**
 * Stop the HTTP server
 */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.info('Stopping API server');

    server.close((err: Error | undefined) => {
      if (err) {
        logger.error({ error: err }, 'Error closing API server');
        return reject(err);
      }

      logger.info('API server stopped');
      resolve();
    });
  });
}
