/**
 * Metrics module for the knowledge graph index using Prometheus client
 */
import client from 'prom-client';
import { logger } from '../utils/logger';

// Initialize Prometheus registry
const register = new client.Registry();

// Add default metrics (CPU, memory, event loop, etc.)
client.collectDefaultMetrics({ register });

// Application-specific metrics
export const metrics = {
  // Counter for ingest calls by outcome
  documentsIngested: new client.Counter({
    name: 'kg_documents_ingested_total',
    help: 'Total number of ingest calls',
    labelNames: ['status'] as const,
    registers: [register],
  }),

  // Histogram for ingest duration
  ingestDuration: new client.Histogram({
    name: 'kg_ingest_duration_seconds',
    help: 'Time taken to ingest a document',
    buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60],
    registers: [register],
  }),

  chunksCreated: new client.Counter({
    name: 'kg_chunks_created_total',
    help: 'Total number of chunks written',
    registers: [register],
  }),

  entitiesCreated: new client.Counter({
    name: 'kg_entities_created_total',
    help: 'Total number of entities written',
    registers: [register],
  }),

  relationsCreated: new client.Counter({
    name: 'kg_relations_created_total',
    help: 'Total number of relations written',
    registers: [register],
  }),

  // Counter for relations dropped because an endpoint was unknown
  relationsDropped: new client.Counter({
    name: 'kg_relations_dropped_total',
    help: 'Relations dropped for referencing an unknown entity',
    registers: [register],
  }),

  // Counter for remote provider failures replaced by the local fallback
  providerDegradations: new client.Counter({
    name: 'kg_provider_degradations_total',
    help: 'Remote provider calls that degraded to the local fallback',
    labelNames: ['stage'] as const,
    registers: [register],
  }),

  // Histogram for remote provider latency in milliseconds
  providerCallTime: new client.Histogram({
    name: 'kg_provider_call_time_ms',
    help: 'Remote provider call time in milliseconds',
    labelNames: ['stage', 'outcome'] as const,
    buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
    registers: [register],
  }),

  // Counter for queries by outcome
  queriesProcessed: new client.Counter({
    name: 'kg_queries_processed_total',
    help: 'Total number of queries processed',
    labelNames: ['status'] as const,
    registers: [register],
  }),

  queryDuration: new client.Histogram({
    name: 'kg_query_duration_seconds',
    help: 'Time taken to answer a query',
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
    registers: [register],
  }),

  // Counter for storage failures
  storageErrors: new client.Counter({
    name: 'kg_storage_errors_total',
    help: 'Failures reading or writing the graph store',
    labelNames: ['operation'] as const,
    registers: [register],
  }),
};

/**
 * Get all metrics for Prometheus scraping
 * @returns Promise resolving to metrics string
 */
export async function getMetrics(): Promise<string> {
  try {
    return await register.metrics();
  } catch (err) {
    logger.error({ error: err }, 'Error collecting metrics');
    throw err;
  }
}

export default {
  metrics,
  getMetrics,
  register
};
