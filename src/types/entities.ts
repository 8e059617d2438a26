/**
 * Plain, fully materialized records handed out by the repositories.
 * Models never leave the storage layer; every read is mapped onto one of
 * these shapes explicitly.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Free-form key/value map stored with every row. Never interpreted by the
 * storage layer.
 */
export type Metadata = { [key: string]: JsonValue };

export interface StoredEntity {
  id: number;
  created_at: Date;
  updated_at: Date;
  metadata: Metadata;
}

export interface ProjectEntity extends StoredEntity {
  name: string;
  description: string | null;
}

export interface TextSourceEntity extends StoredEntity {
  project_id: number;
  title: string | null;
  content: string;
  source_type: string;
  source_url: string | null;
}

export interface SummaryEntity extends StoredEntity {
  text_source_id: number;
  title: string | null;
  content: string;
  summary_type: string;
}

export interface TranslationToken {
  token: string;
  pos: number;
}

export interface TranslationEntity extends StoredEntity {
  text_source_id: number;
  language_code: string;
  title: string | null;
  tokens: TranslationToken[];
  original_text: string | null;
}

export interface VideoEntity extends StoredEntity {
  text_source_id: number;
  title: string | null;
  file_path: string;
  file_url: string | null;
  file_size: number | null;
  duration: number | null;
  format: string | null;
  thumbnail_path: string | null;
}

export interface LinkEntity extends StoredEntity {
  text_source_id: number;
  url: string;
  title: string | null;
  description: string | null;
  link_type: string;
  is_active: boolean;
}

export interface Page {
  limit?: number;
  offset?: number;
}
