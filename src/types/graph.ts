/**
 * Domain types shared by the ingestion and retrieval pipeline
 */

export const ENTITY_TYPES = ['PERSON', 'ORGANIZATION', 'CONCEPT', 'TECHNOLOGY', 'OTHER'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type Metadata = Record<string, JsonValue>;

export type EmbeddingStrategyKind = 'remote' | 'hash';

export type ExtractionStrategyKind = 'llm' | 'pattern';

export interface DocumentRecord {
  id: string;
  title: string | null;
  content: string;
  metadata: Metadata;
  createdAt: string;
  updatedAt: string;
}

/**
 * A slice of a document's text. Offsets count Unicode code points.
 */
export interface TextChunk {
  index: number;
  text: string;
  start: number;
  end: number;
}

export interface ChunkWithEmbedding extends TextChunk {
  embedding: number[] | null;
  embeddingStrategy: EmbeddingStrategyKind | null;
}

export interface ChunkRecord extends ChunkWithEmbedding {
  id: string;
  documentId: string;
}

export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  chunkIndex: number;
  content: string;
  score: number;
}

/**
 * Entity as produced by extraction, before it has a storage identifier
 */
export interface ExtractedEntity {
  text: string;
  type: EntityType;
  metadata: Metadata;
}

/**
 * Relation as produced by extraction; endpoints are entity keys
 */
export interface ExtractedRelation {
  source: string;
  target: string;
  type: string;
  confidence: number;
  metadata?: Metadata;
}

export interface EntityRecord {
  id: string;
  documentId: string;
  text: string;
  type: EntityType;
  metadata: Metadata;
}

export interface RelationRecord {
  id: string;
  documentId: string;
  sourceEntityId: string;
  targetEntityId: string;
  source: string;
  target: string;
  type: string;
  confidence: number;
  metadata: Metadata;
}

export interface DocumentGraph {
  documentId: string;
  title: string | null;
  metadata: Metadata;
  entities: EntityRecord[];
  relations: RelationRecord[];
  chunksCount: number;
}

export interface DegradedFlags {
  embedding: boolean;
  extraction: boolean;
}

export interface IngestRequest {
  documentId: string;
  content: string;
  title?: string | null;
  metadata?: Metadata;
}

export interface IngestResult {
  documentId: string;
  chunksCreated: number;
  entitiesCreated: number;
  relationsCreated: number;
  relationsDropped: number;
  durationSeconds: number;
  status: 'success';
  degraded: DegradedFlags;
}

export interface QueryRequest {
  query: string;
  topK?: number;
  includeRelations?: boolean;
}

export interface QueryResult {
  query: string;
  chunks: ScoredChunk[];
  entities: EntityRecord[];
  relations: RelationRecord[];
  degraded: Pick<DegradedFlags, 'embedding'>;
}

export type HealthStatus =
  | { ok: true }
  | { ok: false; error: string };

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}

/**
 * Trim and collapse internal whitespace of an entity's display text
 */
export function normalizeEntityText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Identity of an entity within one document: case-insensitive text plus type
 */
export function entityKey(text: string, type: EntityType): string {
  return `${normalizeEntityText(text).toLowerCase()}|${type}`;
}

/**
 * Clamp a relation confidence into [0, 1]; non-finite values become 0
 */
export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
