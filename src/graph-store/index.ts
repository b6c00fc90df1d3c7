/**
 * Graph Store - Durable storage for documents, chunks, entities and relations
 *
 * Every write is atomic with respect to one document: it runs in its own
 * transaction unless the store is already bound to one (see transaction()).
 * Driver failures surface as StorageError; domain errors pass through.
 */
import Database from 'better-sqlite3';
import { Kysely, sql } from 'kysely';
import { v4 as uuidv4 } from 'uuid';
import {
  describeError,
  IntegrityError,
  KnowledgeGraphError,
  NotFoundError,
  StorageError,
} from '../errors';
import { metrics } from '../metrics/metrics';
import {
  ChunkRecord,
  ChunkWithEmbedding,
  DocumentGraph,
  DocumentRecord,
  EntityRecord,
  clampConfidence,
  entityKey,
  EntityType,
  ExtractedEntity,
  ExtractedRelation,
  HealthStatus,
  isEntityType,
  Metadata,
  normalizeEntityText,
  RelationRecord,
  ScoredChunk,
} from '../types/graph';
import { logger } from '../utils/logger';
import { DocumentsTable, EntitiesTable, GraphConnection, GraphDatabase } from './database';
import { cosineSimilarity, parseVector } from './vector';

export { openDatabase, migrateSchema, IN_MEMORY } from './database';
export type { GraphConnection, GraphDatabase } from './database';
export { cosineSimilarity } from './vector';

// Rows per multi-row INSERT, well under SQLite's bound parameter limit
const INSERT_BATCH_SIZE = 100;

export type EntityMatchMode = 'contains' | 'mentioned';

export interface EntityMatchOptions {
  /** contains: entity text contains the query; mentioned: the query contains the entity text */
  mode?: EntityMatchMode;
  documentIds?: string[];
}

export interface RelationLookupOptions {
  documentIds?: string[];
}

export interface InsertGraphResult {
  entities: EntityRecord[];
  relations: RelationRecord[];
  relationsSkipped: number;
  integrityError: IntegrityError | null;
}

interface RelationRow {
  id: string;
  document_id: string;
  source_entity_id: string;
  target_entity_id: string;
  type: string;
  confidence: number;
  metadata: string;
  source: string;
  target: string;
}

function isMetadata(value: unknown): value is Metadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseMetadata(stored: string): Metadata {
  const value: unknown = JSON.parse(stored);
  return isMetadata(value) ? value : {};
}

function toDocumentRecord(row: DocumentsTable): DocumentRecord {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toEntityRecord(row: EntitiesTable): EntityRecord {
  const type: EntityType = isEntityType(row.type) ? row.type : 'OTHER';
  return {
    id: row.id,
    documentId: row.document_id,
    text: row.text,
    type,
    metadata: parseMetadata(row.metadata),
  };
}

function toRelationRecord(row: RelationRow): RelationRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    sourceEntityId: row.source_entity_id,
    targetEntityId: row.target_entity_id,
    source: row.source,
    target: row.target,
    type: row.type,
    confidence: row.confidence,
    metadata: parseMetadata(row.metadata),
  };
}

const WORD_CHAR = /[\p{L}\p{N}]/u;

/**
 * Whether term occurs in text as a whole word (or run of words)
 */
export function mentionsTerm(text: string, term: string): boolean {
  if (term === '') {
    return false;
  }

  for (let at = text.indexOf(term); at !== -1; at = text.indexOf(term, at + 1)) {
    const before = at > 0 ? text[at - 1] : '';
    const after = text.charAt(at + term.length);
    if (!WORD_CHAR.test(before) && !WORD_CHAR.test(after)) {
      return true;
    }
  }

  return false;
}

function batches<T>(items: T[], size: number = INSERT_BATCH_SIZE): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

export class GraphStore {
  /**
   * @param sqlite the driver connection, closed by close(); absent for
   *   stores bound to a transaction
   */
  constructor(
    private readonly db: Kysely<GraphDatabase>,
    private readonly sqlite: Database.Database | null = null
  ) {}

  static fromConnection({ db, sqlite }: GraphConnection): GraphStore {
    return new GraphStore(db, sqlite);
  }

  /**
   * Run fn with a store bound to a single transaction.
   * Nested calls reuse the enclosing transaction.
   */
  async transaction<T>(fn: (store: GraphStore) => Promise<T>): Promise<T> {
    return this.atomic('transaction', fn);
  }

  /**
   * Insert a document, or replace the content of an existing one.
   * Replacing removes the document's relations, entities and chunks and
   * merges the new metadata over the stored metadata.
   */
  async upsertDocument(
    id: string,
    title: string | null,
    content: string,
    metadata: Metadata = {}
  ): Promise<DocumentRecord> {
    return this.atomic('upsertDocument', async (store) => {
      const now = new Date().toISOString();
      const existing = await store.db
        .selectFrom('documents')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      if (existing) {
        await store.db.deleteFrom('relations').where('document_id', '=', id).execute();
        await store.db.deleteFrom('entities').where('document_id', '=', id).execute();
        await store.db.deleteFrom('chunks').where('document_id', '=', id).execute();

        const row: DocumentsTable = {
          ...existing,
          title,
          content,
          metadata: JSON.stringify({ ...parseMetadata(existing.metadata), ...metadata }),
          updated_at: now,
        };

        await store.db
          .updateTable('documents')
          .set({ title: row.title, content: row.content, metadata: row.metadata, updated_at: row.updated_at })
          .where('id', '=', id)
          .execute();

        logger.debug({ documentId: id }, 'Replaced existing document');
        return toDocumentRecord(row);
      }

      const row: DocumentsTable = {
        id,
        title,
        content,
        metadata: JSON.stringify(metadata),
        created_at: now,
        updated_at: now,
      };
      await store.db.insertInto('documents').values(row).execute();

      logger.debug({ documentId: id }, 'Inserted document');
      return toDocumentRecord(row);
    });
  }

  /**
   * Insert a document's chunks in ordinal order
   */
  async insertChunks(documentId: string, chunks: ChunkWithEmbedding[]): Promise<ChunkRecord[]> {
    return this.atomic('insertChunks', async (store) => {
      const now = new Date().toISOString();
      const records: ChunkRecord[] = [...chunks]
        .sort((a, b) => a.index - b.index)
        .map((chunk) => ({ ...chunk, id: `${documentId}_chunk_${chunk.index}`, documentId }));

      for (const batch of batches(records)) {
        await store.db
          .insertInto('chunks')
          .values(
            batch.map((chunk) => ({
              id: chunk.id,
              document_id: documentId,
              chunk_index: chunk.index,
              content: chunk.text,
              start_offset: chunk.start,
              end_offset: chunk.end,
              embedding: chunk.embedding ? JSON.stringify(chunk.embedding) : null,
              embedding_strategy: chunk.embeddingStrategy,
              created_at: now,
            }))
          )
          .execute();
      }

      return records;
    });
  }

  /**
   * Insert a batch of entities and the relations between them.
   *
   * Relation endpoints are entity keys of this batch. When any relation
   * points outside the batch, the entities are still written but none of
   * the batch's relations are, and the result carries an IntegrityError.
   */
  async insertEntitiesAndRelations(
    documentId: string,
    entities: ExtractedEntity[],
    relations: ExtractedRelation[]
  ): Promise<InsertGraphResult> {
    return this.atomic('insertEntitiesAndRelations', async (store) => {
      const now = new Date().toISOString();
      const byKey = new Map<string, EntityRecord>();

      for (const entity of entities) {
        if (normalizeEntityText(entity.text) === '') {
          logger.debug({ documentId, type: entity.type }, 'Skipping entity with blank text');
          continue;
        }
        const key = entityKey(entity.text, entity.type);
        if (!byKey.has(key)) {
          byKey.set(key, {
            id: uuidv4(),
            documentId,
            text: normalizeEntityText(entity.text),
            type: entity.type,
            metadata: entity.metadata,
          });
        }
      }

      const entityRecords = [...byKey.values()];
      for (const batch of batches(entityRecords)) {
        await store.db
          .insertInto('entities')
          .values(
            batch.map((entity) => ({
              id: entity.id,
              document_id: documentId,
              text: entity.text,
              type: entity.type,
              metadata: JSON.stringify(entity.metadata),
              created_at: now,
            }))
          )
          .execute();
      }

      const dangling = relations.filter((r) => !byKey.has(r.source) || !byKey.has(r.target)).length;
      if (dangling > 0) {
        logger.warn(
          { documentId, dangling, relations: relations.length },
          'Relations reference entities outside the batch, skipping relations'
        );
        return {
          entities: entityRecords,
          relations: [],
          relationsSkipped: relations.length,
          integrityError: new IntegrityError(
            `${dangling} of ${relations.length} relations reference unknown entities`,
            dangling
          ),
        };
      }

      const relationRecords: RelationRecord[] = [];
      for (const relation of relations) {
        const source = byKey.get(relation.source);
        const target = byKey.get(relation.target);
        if (!source || !target) {
          continue;
        }

        relationRecords.push({
          id: uuidv4(),
          documentId,
          sourceEntityId: source.id,
          targetEntityId: target.id,
          source: source.text,
          target: target.text,
          type: relation.type,
          confidence: clampConfidence(relation.confidence),
          metadata: relation.metadata ?? {},
        });
      }

      for (const batch of batches(relationRecords)) {
        await store.db
          .insertInto('relations')
          .values(
            batch.map((relation) => ({
              id: relation.id,
              document_id: documentId,
              source_entity_id: relation.sourceEntityId,
              target_entity_id: relation.targetEntityId,
              type: relation.type,
              confidence: relation.confidence,
              metadata: JSON.stringify(relation.metadata),
              created_at: now,
            }))
          )
          .execute();
      }

      return { entities: entityRecords, relations: relationRecords, relationsSkipped: 0, integrityError: null };
    });
  }

  /**
   * Rank chunks by cosine similarity to the query vector.
   * Chunks without an embedding, or with one of another dimensionality, are
   * not candidates. Ties are ordered by document id, then chunk ordinal.
   */
  async similaritySearch(queryVector: number[], topK: number): Promise<ScoredChunk[]> {
    return this.run('similaritySearch', async () => {
      const rows = await this.db
        .selectFrom('chunks')
        .select(['id', 'document_id', 'chunk_index', 'content', 'embedding'])
        .where('embedding', 'is not', null)
        .execute();

      const scored: ScoredChunk[] = [];
      for (const row of rows) {
        const embedding = parseVector(row.embedding);
        if (!embedding || embedding.length !== queryVector.length) {
          continue;
        }

        scored.push({
          chunkId: row.id,
          documentId: row.document_id,
          chunkIndex: row.chunk_index,
          content: row.content,
          score: cosineSimilarity(queryVector, embedding),
        });
      }

      scored.sort(
        (a, b) =>
          b.score - a.score ||
          (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0) ||
          a.chunkIndex - b.chunkIndex
      );

      return scored.slice(0, topK);
    });
  }

  /**
   * Case-insensitive entity lookup by text, in insertion order
   */
  async matchEntities(text: string, topK: number, options: EntityMatchOptions = {}): Promise<EntityRecord[]> {
    const needle = normalizeEntityText(text).toLowerCase();
    const { mode = 'contains', documentIds } = options;

    if (needle === '' || topK <= 0 || (documentIds && documentIds.length === 0)) {
      return [];
    }

    return this.run('matchEntities', async () => {
      let query = this.db.selectFrom('entities').selectAll();

      if (documentIds) {
        query = query.where('document_id', 'in', documentIds);
      }

      if (mode === 'contains') {
        const rows = await query
          .where(sql<number>`instr(lower(text), ${needle})`, '>', 0)
          .orderBy(sql`rowid`)
          .limit(topK)
          .execute();
        return rows.map(toEntityRecord);
      }

      // instr narrows the candidates; word boundaries are checked here
      const rows = await query
        .where('text', '!=', '')
        .where(sql<number>`instr(${needle}, lower(text))`, '>', 0)
        .orderBy(sql`rowid`)
        .execute();
      return rows
        .filter((row) => mentionsTerm(needle, row.text.toLowerCase()))
        .slice(0, topK)
        .map(toEntityRecord);
    });
  }

  /**
   * Relations touching any of the given entities, optionally limited to
   * the given documents
   */
  async findRelations(entityIds: string[], options: RelationLookupOptions = {}): Promise<RelationRecord[]> {
    const { documentIds } = options;
    if (entityIds.length === 0 || (documentIds && documentIds.length === 0)) {
      return [];
    }

    return this.run('findRelations', async () => {
      let query = this.selectRelations().where((eb) =>
        eb.or([eb('r.source_entity_id', 'in', entityIds), eb('r.target_entity_id', 'in', entityIds)])
      );

      if (documentIds) {
        query = query.where('r.document_id', 'in', documentIds);
      }

      const rows = await query.orderBy(sql`r.rowid`).execute();
      return rows.map(toRelationRecord);
    });
  }

  /**
   * A document's title, metadata, entities, relations and chunk count
   * @throws NotFoundError if the document does not exist
   */
  async getDocumentGraph(documentId: string): Promise<DocumentGraph> {
    return this.atomic('getDocumentGraph', async (store) => {
      const document = await store.db
        .selectFrom('documents')
        .selectAll()
        .where('id', '=', documentId)
        .executeTakeFirst();

      if (!document) {
        throw new NotFoundError(`Document ${documentId} not found`);
      }

      const entities = await store.db
        .selectFrom('entities')
        .selectAll()
        .where('document_id', '=', documentId)
        .orderBy(sql`rowid`)
        .execute();

      const relations = await store
        .selectRelations()
        .where('r.document_id', '=', documentId)
        .orderBy(sql`r.rowid`)
        .execute();

      const { count } = await store.db
        .selectFrom('chunks')
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .where('document_id', '=', documentId)
        .executeTakeFirstOrThrow();

      return {
        documentId,
        title: document.title,
        metadata: parseMetadata(document.metadata),
        entities: entities.map(toEntityRecord),
        relations: relations.map(toRelationRecord),
        chunksCount: Number(count),
      };
    });
  }

  /**
   * Delete a document together with its chunks, entities and relations
   * @throws NotFoundError if the document does not exist
   */
  async deleteDocument(documentId: string): Promise<void> {
    await this.atomic('deleteDocument', async (store) => {
      const result = await store.db.deleteFrom('documents').where('id', '=', documentId).executeTakeFirst();

      if (Number(result.numDeletedRows) === 0) {
        throw new NotFoundError(`Document ${documentId} not found`);
      }

      logger.debug({ documentId }, 'Deleted document');
    });
  }

  /**
   * Check that the database answers a trivial query
   */
  async healthCheck(): Promise<HealthStatus> {
    try {
      await sql`SELECT 1`.execute(this.db);
      return { ok: true };
    } catch (error) {
      logger.error({ error }, 'Storage health check failed');
      return { ok: false, error: describeError(error) };
    }
  }

  async close(): Promise<void> {
    await this.db.destroy();
    if (this.sqlite?.open) {
      this.sqlite.close();
    }
  }

  private selectRelations() {
    return this.db
      .selectFrom('relations as r')
      .innerJoin('entities as s', 's.id', 'r.source_entity_id')
      .innerJoin('entities as t', 't.id', 'r.target_entity_id')
      .select([
        'r.id',
        'r.document_id',
        'r.source_entity_id',
        'r.target_entity_id',
        'r.type',
        'r.confidence',
        'r.metadata',
        's.text as source',
        't.text as target',
      ]);
  }

  private async atomic<T>(operation: string, fn: (store: GraphStore) => Promise<T>): Promise<T> {
    return this.run(operation, () =>
      this.db.isTransaction
        ? fn(this)
        : this.db.transaction().execute((trx) => fn(new GraphStore(trx)))
    );
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof KnowledgeGraphError) {
        throw error;
      }

      metrics.storageErrors.inc({ operation });
      logger.error({ error, operation }, 'Storage operation failed');
      throw new StorageError(`Storage operation ${operation} failed: ${describeError(error)}`, error);
    }
  }
}
