/**
 * Wire types for the HTTP API and the extraction model's JSON output.
 * Field names follow the JSON schemas in src/schemas.
 */
import { Metadata } from './graph';

export interface IngestRequestBody {
  document_id: string;
  content: string;
  title?: string | null;
  metadata?: Metadata;
}

export interface QueryRequestBody {
  query: string;
  top_k?: number;
  include_relations?: boolean;
}

export interface RawExtractedEntity {
  text: string;
  type: string;
  metadata?: Metadata;
}

export interface RawExtractedRelation {
  source: string;
  target: string;
  type: string;
  confidence?: number;
}

export interface RawExtractionOutput {
  entities: RawExtractedEntity[];
  relations?: RawExtractedRelation[];
}
