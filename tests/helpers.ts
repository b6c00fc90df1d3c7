/**
 * Shared fixtures for tests: an in-memory graph store and service wiring
 */
import { Chunker } from '../src/chunker';
import { EmbeddingService, HashEmbeddingStrategy } from '../src/embedding';
import { ExtractionService, PatternExtractionStrategy } from '../src/extraction';
import { GraphStore, IN_MEMORY, openDatabase } from '../src/graph-store';
import { KnowledgeGraphComponents } from '../src/service';

export const TEST_DIMENSIONS = 16;

export function createTestStore(): GraphStore {
  return GraphStore.fromConnection(openDatabase({ path: IN_MEMORY, timeoutMs: 1000 }));
}

/**
 * Offline components: hash embeddings, pattern extraction, in-memory SQLite
 */
export function createTestComponents(
  overrides: Partial<KnowledgeGraphComponents> = {}
): KnowledgeGraphComponents {
  const hash = new HashEmbeddingStrategy(TEST_DIMENSIONS);
  const pattern = new PatternExtractionStrategy(10);

  return {
    chunker: new Chunker({ chunkSize: 300, chunkOverlap: 50 }),
    embedding: new EmbeddingService(hash, hash),
    extraction: new ExtractionService(pattern, pattern),
    store: createTestStore(),
    ...overrides,
  };
}
