/**
 * Unit tests for LLM extraction and the extraction service
 */
import { AxiosError } from 'axios';
import {
  createExtractionService,
  ExtractionService,
  extractWithPatterns,
  LlmExtractionStrategy,
  parseModelJson,
  PatternExtractionStrategy,
} from '../../src/extraction';
import { ProviderError } from '../../src/errors';
import { HttpClient } from '../../src/utils/http';
import { logger } from '../../src/utils/logger';
import { loadConfig } from '../../src/config';

const CHUNK = 'Google developed TensorFlow for machine learning research.';

function reply(content: string) {
  return { status: 200, data: { choices: [{ message: { role: 'assistant', content } }] } };
}

describe('parseModelJson', () => {
  it('should parse plain JSON', () => {
    expect(parseModelJson('{"entities": []}')).toEqual({ entities: [] });
  });

  it('should parse a fenced JSON block', () => {
    expect(parseModelJson('Sure:\n```json\n{"entities": [{"text": "A", "type": "OTHER"}]}\n```\nDone.')).toEqual({
      entities: [{ text: 'A', type: 'OTHER' }],
    });
  });

  it('should parse the first brace-delimited span', () => {
    expect(parseModelJson('Result: {"entities": []} (end)')).toEqual({ entities: [] });
  });

  it('should reject replies without JSON', () => {
    expect(() => parseModelJson('I cannot help with that.')).toThrow(ProviderError);
  });
});

describe('LlmExtractionStrategy', () => {
  let post: jest.Mock;
  let strategy: LlmExtractionStrategy;

  beforeEach(() => {
    post = jest.fn();
    const http: HttpClient = { post };
    strategy = new LlmExtractionStrategy(http, { model: 'test-model', maxEntities: 10, timeoutMs: 500 });
  });

  it('should send a JSON-mode chat completion request', async () => {
    post.mockResolvedValue(reply('{"entities": [], "relations": []}'));

    await strategy.extract('Some text.');

    expect(post).toHaveBeenCalledWith(
      '/chat/completions',
      expect.objectContaining({
        model: 'test-model',
        temperature: 0.1,
        response_format: { type: 'json_object' },
      }),
      { timeout: 500 }
    );
    const body = post.mock.calls[0][1];
    expect(body.messages[1]).toEqual({ role: 'user', content: 'Some text.' });
    expect(body.messages[0].content).toContain('at most 10 entities');
  });

  it('should map types, resolve endpoints and clamp confidence', async () => {
    post.mockResolvedValue(
      reply(
        '```json\n' +
          JSON.stringify({
            entities: [
              { text: 'Ada Lovelace', type: 'person' },
              { text: 'Analytical Engine', type: 'machine' },
            ],
            relations: [{ source: 'ada lovelace', target: 'Analytical Engine', type: 'worked on', confidence: 1.7 }],
          }) +
          '\n```'
      )
    );

    const output = await strategy.extract('Ada Lovelace wrote about the Analytical Engine.');

    expect(output.entities).toEqual([
      { text: 'Ada Lovelace', type: 'PERSON', metadata: { strategy: 'llm' } },
      { text: 'Analytical Engine', type: 'OTHER', metadata: { strategy: 'llm' } },
    ]);
    expect(output.relations).toEqual([
      { source: 'ada lovelace|PERSON', target: 'analytical engine|OTHER', type: 'WORKED_ON', confidence: 1 },
    ]);
  });

  it('should default confidence and discard relations to unknown entities', async () => {
    post.mockResolvedValue(
      reply(
        JSON.stringify({
          entities: [
            { text: 'Grace Hopper', type: 'PERSON' },
            { text: 'COBOL', type: 'TECHNOLOGY' },
          ],
          relations: [
            { source: 'Grace Hopper', target: 'COBOL', type: 'CREATED' },
            { source: 'Grace Hopper', target: 'Harvard', type: 'WORKED_AT', confidence: 0.8 },
          ],
        })
      )
    );

    const output = await strategy.extract('Grace Hopper influenced COBOL.');

    expect(output.relations).toEqual([
      { source: 'grace hopper|PERSON', target: 'cobol|TECHNOLOGY', type: 'CREATED', confidence: 0.9 },
    ]);
  });

  it('should treat an error body as a provider failure', async () => {
    post.mockResolvedValue({ status: 200, data: { error: { message: 'No endpoints found matching your data policy' } } });

    await expect(strategy.extract(CHUNK)).rejects.toThrow('Model request rejected: No endpoints found matching your data policy');
  });

  it('should treat output that violates the schema as a provider failure', async () => {
    post.mockResolvedValue(reply('{"entities": "none"}'));

    await expect(strategy.extract(CHUNK)).rejects.toThrow('Model reply does not match the extraction output schema');
  });
});

describe('ExtractionService', () => {
  let post: jest.Mock;
  let service: ExtractionService;

  beforeEach(() => {
    jest.clearAllMocks();
    post = jest.fn();
    service = new ExtractionService(
      new LlmExtractionStrategy({ post }, { model: 'test-model', maxEntities: 10, timeoutMs: 500 }),
      new PatternExtractionStrategy(10)
    );
  });

  it('should return the LLM output when the call succeeds', async () => {
    post.mockResolvedValue(reply('{"entities": [{"text": "Google", "type": "ORGANIZATION"}]}'));

    const outcome = await service.extract(CHUNK);

    expect(outcome).toEqual({
      entities: [{ text: 'Google', type: 'ORGANIZATION', metadata: { strategy: 'llm' } }],
      relations: [],
      strategy: 'llm',
      degraded: false,
    });
  });

  it('should fall back to pattern extraction on an error body', async () => {
    post.mockResolvedValue({ status: 200, data: { error: { message: 'rejected' } } });

    const outcome = await service.extract(CHUNK);

    expect(outcome).toEqual({ ...extractWithPatterns(CHUNK, 10), strategy: 'pattern', degraded: true });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should fall back on invalid JSON and on timeouts', async () => {
    post
      .mockResolvedValueOnce(reply('not json at all'))
      .mockRejectedValueOnce(new AxiosError('timeout of 500ms exceeded', 'ECONNABORTED'));

    const first = await service.extract(CHUNK);
    const second = await service.extract(CHUNK);

    expect(first.degraded).toBe(true);
    expect(second.degraded).toBe(true);
    expect(second.entities.map((e) => e.text)).toEqual(['Google', 'TensorFlow', 'Machine Learning']);
  });
});

describe('createExtractionService', () => {
  it('should choose pattern extraction without an API key', () => {
    const service = createExtractionService(loadConfig({}).extraction);

    expect(service.primaryStrategy).toBe('pattern');
  });

  it('should accept the OpenRouter key as the extraction credential', () => {
    const config = loadConfig({ OPENROUTER_API_KEY: 'test-secret' });

    expect(config.extraction.apiKey).toBe('test-secret');
    expect(createExtractionService(config.extraction, { post: jest.fn() }).primaryStrategy).toBe('llm');
  });
});
