/**
 * Unit tests for the ingestion pipeline
 */
import { Chunker } from '../../src/chunker';
import { ValidationError, StorageError, NotFoundError } from '../../src/errors';
import { ExtractionService, LlmExtractionStrategy, PatternExtractionStrategy } from '../../src/extraction';
import { GraphStore } from '../../src/graph-store';
import { IngestionPipeline, mergeChunkGraphs } from '../../src/pipeline/ingest';
import { KnowledgeGraphComponents } from '../../src/service';
import { createTestComponents, TEST_DIMENSIONS } from '../helpers';

const SENTENCE = 'Google developed TensorFlow for machine learning research.';

function llmReply(content: string) {
  return { status: 200, data: { choices: [{ message: { content } }] } };
}

describe('IngestionPipeline', () => {
  let components: KnowledgeGraphComponents;
  let pipeline: IngestionPipeline;

  beforeEach(() => {
    components = createTestComponents();
    pipeline = new IngestionPipeline(components);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await components.store.close();
  });

  it('should store four embedded chunks for 1000 characters at 300/50', async () => {
    const content = 'Knowledge graphs connect facts. '.repeat(40).slice(0, 1000);

    const result = await pipeline.ingest({ documentId: 'doc-a', content });

    expect(result.chunksCreated).toBe(4);
    expect(result.status).toBe('success');
    expect(result.degraded).toEqual({ embedding: false, extraction: false });

    const stored = await components.store.similaritySearch(new Array(TEST_DIMENSIONS).fill(1), 10);
    expect(stored.map((c) => c.chunkIndex).sort()).toEqual([0, 1, 2, 3]);
    expect((await components.store.getDocumentGraph('doc-a')).chunksCount).toBe(4);
  });

  it('should fall back to pattern extraction when the LLM fails', async () => {
    const post = jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const llm = new LlmExtractionStrategy({ post }, { model: 'test-model', maxEntities: 10, timeoutMs: 100 });
    components = createTestComponents({
      extraction: new ExtractionService(llm, new PatternExtractionStrategy(10)),
    });
    pipeline = new IngestionPipeline(components);

    const result = await pipeline.ingest({ documentId: 'doc-b', content: SENTENCE, title: 'TF' });

    expect(result.degraded).toEqual({ embedding: false, extraction: true });
    expect(result.entitiesCreated).toBe(3);
    expect(result.relationsCreated).toBe(3);
    expect(result.relationsDropped).toBe(0);

    const graph = await components.store.getDocumentGraph('doc-b');
    expect(graph.title).toBe('TF');
    expect(graph.entities.map((e) => e.text)).toEqual(['Google', 'TensorFlow', 'Machine Learning']);
    expect(graph.relations.every((r) => r.type === 'RELATED_TO' && r.confidence === 0.3)).toBe(true);
  });

  it('should degrade extraction per chunk', async () => {
    const post = jest
      .fn()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(llmReply('{"entities": [{"text": "Grace Hopper", "type": "PERSON"}]}'));
    const llm = new LlmExtractionStrategy({ post }, { model: 'test-model', maxEntities: 10, timeoutMs: 100 });
    components = createTestComponents({
      chunker: new Chunker({ chunkSize: 60, chunkOverlap: 0 }),
      extraction: new ExtractionService(llm, new PatternExtractionStrategy(10)),
    });
    pipeline = new IngestionPipeline(components);

    const result = await pipeline.ingest({
      documentId: 'doc-c',
      content: SENTENCE.padEnd(60) + 'Grace Hopper wrote compilers.',
    });

    expect(result.degraded.extraction).toBe(true);
    expect(result.entitiesCreated).toBe(4);

    const graph = await components.store.getDocumentGraph('doc-c');
    const hopper = graph.entities.find((e) => e.text === 'Grace Hopper');
    expect(hopper?.metadata).toEqual({ strategy: 'llm', strategies: ['llm'], chunks: [1], mentions: 1 });
  });

  it('should merge entities repeated across chunks', async () => {
    components = createTestComponents({ chunker: new Chunker({ chunkSize: 60, chunkOverlap: 0 }) });
    pipeline = new IngestionPipeline(components);

    const result = await pipeline.ingest({
      documentId: 'doc-d',
      content: 'Docker runs on Linux.'.padEnd(60) + 'Docker again.',
    });

    expect(result.chunksCreated).toBe(2);
    expect(result.entitiesCreated).toBe(2);
    expect(result.relationsCreated).toBe(1);

    const graph = await components.store.getDocumentGraph('doc-d');
    expect(graph.entities[0]).toMatchObject({
      text: 'Docker',
      type: 'TECHNOLOGY',
      metadata: { strategy: 'pattern', strategies: ['pattern'], chunks: [0, 1], mentions: 2 },
    });
    expect(graph.relations[0]).toMatchObject({ source: 'Docker', target: 'Linux', metadata: { chunks: [0] } });
  });

  it('should replace the previous version on re-ingest', async () => {
    await pipeline.ingest({ documentId: 'doc-e', content: SENTENCE, metadata: { version: 1 } });
    await pipeline.ingest({ documentId: 'doc-e', content: 'Docker runs on Linux.', metadata: { version: 2 } });

    const graph = await components.store.getDocumentGraph('doc-e');

    expect(graph.entities.map((e) => e.text)).toEqual(['Docker', 'Linux']);
    expect(graph.relations).toHaveLength(1);
    expect(graph.chunksCount).toBe(1);
    expect(graph.metadata).toEqual({ version: 2 });
  });

  it('should reject empty identifiers and blank content', async () => {
    await expect(pipeline.ingest({ documentId: '', content: SENTENCE })).rejects.toBeInstanceOf(ValidationError);
    await expect(pipeline.ingest({ documentId: 'doc-f', content: '  \n\t ' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      errors: [{ path: '/content', message: 'must contain non-whitespace text' }],
    });
  });

  it('should leave nothing behind when storage fails', async () => {
    jest
      .spyOn(GraphStore.prototype, 'insertEntitiesAndRelations')
      .mockRejectedValueOnce(new Error('disk I/O error'));

    await expect(pipeline.ingest({ documentId: 'doc-g', content: SENTENCE })).rejects.toBeInstanceOf(StorageError);

    await expect(components.store.getDocumentGraph('doc-g')).rejects.toBeInstanceOf(NotFoundError);
    await expect(components.store.similaritySearch(new Array(TEST_DIMENSIONS).fill(1), 5)).resolves.toEqual([]);
  });

  it('should keep the previous version when a re-ingest fails', async () => {
    await pipeline.ingest({ documentId: 'doc-h', content: SENTENCE });
    jest
      .spyOn(GraphStore.prototype, 'insertEntitiesAndRelations')
      .mockRejectedValueOnce(new Error('disk I/O error'));

    await expect(pipeline.ingest({ documentId: 'doc-h', content: 'Docker runs on Linux.' })).rejects.toBeInstanceOf(
      StorageError
    );

    const graph = await components.store.getDocumentGraph('doc-h');
    expect(graph.entities.map((e) => e.text)).toEqual(['Google', 'TensorFlow', 'Machine Learning']);
  });
});

describe('mergeChunkGraphs', () => {
  it('should keep the highest confidence and count dangling relations', () => {
    const merged = mergeChunkGraphs([
      {
        chunkIndex: 0,
        strategy: 'llm',
        entities: [
          { text: 'Ada', type: 'PERSON', metadata: {} },
          { text: 'Babbage', type: 'PERSON', metadata: {} },
        ],
        relations: [{ source: 'ada|PERSON', target: 'babbage|PERSON', type: 'KNEW', confidence: 0.4 }],
      },
      {
        chunkIndex: 1,
        strategy: 'pattern',
        entities: [{ text: 'ADA', type: 'PERSON', metadata: {} }],
        relations: [
          { source: 'ada|PERSON', target: 'babbage|PERSON', type: 'KNEW', confidence: 0.7 },
          { source: 'ada|PERSON', target: 'lovelace|PERSON', type: 'KNEW', confidence: 0.7 },
        ],
      },
    ]);

    expect(merged.entities[0]).toEqual({
      text: 'Ada',
      type: 'PERSON',
      metadata: { strategies: ['llm', 'pattern'], chunks: [0, 1], mentions: 2 },
    });
    expect(merged.relations).toEqual([
      { source: 'ada|PERSON', target: 'babbage|PERSON', type: 'KNEW', confidence: 0.7, metadata: { chunks: [0, 1] } },
    ]);
    expect(merged.relationsDropped).toBe(1);
  });
});
