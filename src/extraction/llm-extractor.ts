/**
 * LLM extraction strategy for OpenAI-compatible chat completion endpoints
 *
 * The model is asked for a single JSON object of entities and relations.
 * Its reply is parsed leniently (plain JSON, a fenced block, or the first
 * brace-delimited span), validated against the extraction output schema and
 * normalized like any other strategy's output.
 */
import { ProviderError } from '../errors';
import { metrics } from '../metrics/metrics';
import { entityKey, ENTITY_TYPES, EntityType, isEntityType, normalizeEntityText } from '../types/graph';
import { RawExtractionOutput } from '../types/api';
import { assertSuccessStatus, HttpClient, toProviderError } from '../utils/http';
import { validateExtractionOutput } from '../utils/schema-validator';
import { CandidateEntity, CandidateRelation, normalizeExtraction } from './normalize';
import { ExtractionOutput, ExtractionStrategy } from './types';

const PROVIDER = 'extraction';

export const DEFAULT_LLM_CONFIDENCE = 0.9;

export interface LlmExtractionOptions {
  model: string;
  maxEntities: number;
  timeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildSystemPrompt(maxEntities: number): string {
  return [
    'You extract a knowledge graph from text.',
    `Return at most ${maxEntities} entities, each with "text" and "type".`,
    `Allowed types: ${ENTITY_TYPES.join(', ')}.`,
    'Return relations between the extracted entities, each with "source" and "target" (entity text),',
    '"type" (an upper-case label such as WORKS_FOR or USES) and an optional "confidence" between 0 and 1.',
    'Respond with a single JSON object: {"entities": [...], "relations": [...]}. No prose.',
  ].join('\n');
}

/**
 * Parse the model's reply into a JSON value.
 * Tries the whole reply, then a ```json fenced block, then the first {...} span.
 */
export function parseModelJson(content: string): unknown {
  const attempts: string[] = [content.trim()];

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(content);
  if (fenced) {
    attempts.push(fenced[1].trim());
  }

  const open = content.indexOf('{');
  const close = content.lastIndexOf('}');
  if (open !== -1 && close > open) {
    attempts.push(content.slice(open, close + 1));
  }

  for (const attempt of attempts) {
    try {
      return JSON.parse(attempt);
    } catch {
      continue;
    }
  }

  throw new ProviderError(PROVIDER, 'Model reply is not valid JSON');
}

function readMessageContent(body: unknown): string {
  if (!isRecord(body)) {
    throw new ProviderError(PROVIDER, 'Malformed chat completion response');
  }

  if (body.error !== undefined && body.error !== null) {
    const detail = isRecord(body.error) && typeof body.error.message === 'string' ? body.error.message : 'unknown error';
    throw new ProviderError(PROVIDER, `Model request rejected: ${detail}`);
  }

  const choices = body.choices;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(first) ? first.message : undefined;
  const content = isRecord(message) ? message.content : undefined;

  if (typeof content !== 'string' || content.trim() === '') {
    throw new ProviderError(PROVIDER, 'Chat completion response has no message content');
  }
  return content;
}

/**
 * Map validated model output onto extraction candidates.
 * Unknown entity types become OTHER; relation endpoints are matched to
 * entities by case-insensitive text.
 */
export function toExtraction(raw: RawExtractionOutput, maxEntities: number): ExtractionOutput {
  const entities: CandidateEntity[] = [];
  const keysByText = new Map<string, string>();

  for (const entity of raw.entities) {
    const upper = entity.type.trim().toUpperCase();
    const type: EntityType = isEntityType(upper) ? upper : 'OTHER';
    const text = normalizeEntityText(entity.text);

    entities.push({ text, type, metadata: { ...(entity.metadata ?? {}), strategy: 'llm' } });

    const lower = text.toLowerCase();
    if (!keysByText.has(lower)) {
      keysByText.set(lower, entityKey(text, type));
    }
  }

  const relations: CandidateRelation[] = [];
  for (const relation of raw.relations ?? []) {
    const source = keysByText.get(normalizeEntityText(relation.source).toLowerCase());
    const target = keysByText.get(normalizeEntityText(relation.target).toLowerCase());
    if (source === undefined || target === undefined) {
      continue;
    }

    relations.push({
      source,
      target,
      type: relation.type,
      confidence: relation.confidence ?? DEFAULT_LLM_CONFIDENCE,
    });
  }

  return normalizeExtraction(entities, relations, maxEntities);
}

export class LlmExtractionStrategy implements ExtractionStrategy {
  readonly kind = 'llm' as const;

  constructor(
    private readonly http: HttpClient,
    private readonly options: LlmExtractionOptions
  ) {}

  async extract(text: string): Promise<ExtractionOutput> {
    const start = Date.now();

    try {
      const response = await this.http.post<unknown>(
        '/chat/completions',
        {
          model: this.options.model,
          temperature: 0.1,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: buildSystemPrompt(this.options.maxEntities) },
            { role: 'user', content: text },
          ],
        },
        { timeout: this.options.timeoutMs }
      );

      assertSuccessStatus(PROVIDER, response.status);

      const content = readMessageContent(response.data);
      const raw = validateModelOutput(parseModelJson(content));
      const output = toExtraction(raw, this.options.maxEntities);

      metrics.providerCallTime.observe({ stage: PROVIDER, outcome: 'success' }, Date.now() - start);
      return output;
    } catch (error) {
      metrics.providerCallTime.observe({ stage: PROVIDER, outcome: 'failure' }, Date.now() - start);
      throw toProviderError(PROVIDER, error);
    }
  }
}

function validateModelOutput(value: unknown): RawExtractionOutput {
  try {
    return validateExtractionOutput(value);
  } catch (error) {
    throw new ProviderError(PROVIDER, 'Model reply does not match the extraction output schema', { cause: error });
  }
}
