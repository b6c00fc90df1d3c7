/**
 * SQLite database for the graph store
 *
 * Opens a better-sqlite3 connection, applies the schema (idempotent) and
 * wraps the connection in a Kysely instance. JSON-valued columns (metadata,
 * embeddings) are stored as text.
 */
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import { AppConfig } from '../config';
import { StorageError } from '../errors';
import { ENTITY_TYPES } from '../types/graph';
import { logger } from '../utils/logger';

export const IN_MEMORY = ':memory:';

export interface DocumentsTable {
  id: string;
  title: string | null;
  content: string;
  metadata: string;
  created_at: string;
  updated_at: string;
}

export interface ChunksTable {
  id: string;
  document_id: string;
  chunk_index: number;
  content: string;
  start_offset: number;
  end_offset: number;
  embedding: string | null;
  embedding_strategy: string | null;
  created_at: string;
}

export interface EntitiesTable {
  id: string;
  document_id: string;
  text: string;
  type: string;
  metadata: string;
  created_at: string;
}

export interface RelationsTable {
  id: string;
  document_id: string;
  source_entity_id: string;
  target_entity_id: string;
  type: string;
  confidence: number;
  metadata: string;
  created_at: string;
}

export interface GraphDatabase {
  documents: DocumentsTable;
  chunks: ChunksTable;
  entities: EntitiesTable;
  relations: RelationsTable;
}

/**
 * The Kysely instance and the driver connection underneath it.
 * Kysely only closes the driver if it has run a query, so the owner
 * closes `sqlite` itself.
 */
export interface GraphConnection {
  db: Kysely<GraphDatabase>;
  sqlite: Database.Database;
}

const entityTypeList = ENTITY_TYPES.map((type) => `'${type}'`).join(', ');

const SCHEMA: string[] = [
  `CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY,
    title TEXT,
    content TEXT NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS chunks (
    id TEXT PRIMARY KEY,
    document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
    chunk_index INTEGER NOT NULL CHECK (chunk_index >= 0),
    content TEXT NOT NULL,
    start_offset INTEGER NOT NULL,
    end_offset INTEGER NOT NULL,
    embedding TEXT,
    embedding_strategy TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (document_id, chunk_index)
  )`,
  `CREATE TABLE IF NOT EXISTS entities (
    id TEXT PRIMARY KEY,
    document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
    text TEXT NOT NULL CHECK (length(trim(text)) > 0),
    type TEXT NOT NULL CHECK (type IN (${entityTypeList})),
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS relations (
    id TEXT PRIMARY KEY,
    document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
    source_entity_id TEXT NOT NULL REFERENCES entities(id) ON DELETE CASCADE,
    target_entity_id TEXT NOT NULL REFERENCES entities(id) ON DELETE CASCADE,
    type TEXT NOT NULL,
    confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_entities_document ON entities(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_relations_document ON relations(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_relations_source ON relations(source_entity_id)',
  'CREATE INDEX IF NOT EXISTS idx_relations_target ON relations(target_entity_id)',
];

/**
 * Create tables and indexes that do not exist yet
 */
export function migrateSchema(sqlite: Database.Database): void {
  for (const statement of SCHEMA) {
    sqlite.exec(statement);
  }
}

/**
 * Open (creating if needed) the SQLite database at the configured path
 */
export function openDatabase(config: AppConfig['storage']): GraphConnection {
  try {
    if (config.path !== IN_MEMORY) {
      mkdirSync(dirname(resolve(config.path)), { recursive: true });
    }

    const sqlite = new Database(config.path, { timeout: config.timeoutMs });
    sqlite.pragma('foreign_keys = ON');
    if (config.path !== IN_MEMORY) {
      sqlite.pragma('journal_mode = WAL');
    }

    migrateSchema(sqlite);
    logger.info({ path: config.path }, 'Opened graph database');

    const db = new Kysely<GraphDatabase>({
      dialect: new SqliteDialect({ database: sqlite }),
    });
    return { db, sqlite };
  } catch (error) {
    logger.error({ error, path: config.path }, 'Failed to open graph database');
    throw new StorageError(`Unable to open database at ${config.path}`, error);
  }
}
