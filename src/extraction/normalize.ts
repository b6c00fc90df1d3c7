/**
 * Shared clean-up for extraction output
 *
 * Every strategy passes its raw candidates through here, so the output
 * contract holds regardless of where the candidates came from: entities are
 * unique by entity key and capped, relations point only at returned entities
 * and carry a confidence in [0, 1].
 */
import {
  clampConfidence,
  entityKey,
  EntityType,
  ExtractedEntity,
  ExtractedRelation,
  Metadata,
  normalizeEntityText,
} from '../types/graph';
import { ExtractionOutput } from './types';

export interface CandidateEntity {
  text: string;
  type: EntityType;
  metadata?: Metadata;
}

export interface CandidateRelation {
  source: string;
  target: string;
  type: string;
  confidence: number;
}

/**
 * Upper-case a relation label and join its words with underscores
 */
export function normalizeRelationType(type: string): string {
  return type
    .trim()
    .replace(/[\s-]+/g, '_')
    .toUpperCase();
}

export function normalizeExtraction(
  entities: CandidateEntity[],
  relations: CandidateRelation[],
  maxEntities: number
): ExtractionOutput {
  const byKey = new Map<string, ExtractedEntity>();

  for (const candidate of entities) {
    const text = normalizeEntityText(candidate.text);
    if (text === '') {
      continue;
    }

    const key = entityKey(text, candidate.type);
    if (byKey.has(key)) {
      continue;
    }
    if (byKey.size >= maxEntities) {
      break;
    }

    byKey.set(key, { text, type: candidate.type, metadata: { ...(candidate.metadata ?? {}) } });
  }

  const seen = new Set<string>();
  const kept: ExtractedRelation[] = [];

  for (const relation of relations) {
    if (!byKey.has(relation.source) || !byKey.has(relation.target)) {
      continue;
    }

    const type = normalizeRelationType(relation.type);
    if (type === '') {
      continue;
    }

    const edge = `${relation.source}->${relation.target}|${type}`;
    if (seen.has(edge)) {
      continue;
    }
    seen.add(edge);

    kept.push({
      source: relation.source,
      target: relation.target,
      type,
      confidence: clampConfidence(relation.confidence),
    });
  }

  return { entities: [...byKey.values()], relations: kept };
}
