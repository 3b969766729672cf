/**
 * Database schema definitions.
 *
 * Timestamps are epoch milliseconds stored as INTEGER. `owner_id` columns are
 * nullable at the SQL level because SQLite cannot add a NOT NULL column to an
 * existing table; the owner backfill migration leaves no NULLs behind.
 */

export type EpochMillis = number;

export interface DocumentsTable {
  uuid: string;
  search_key: string;
  kind: string;
  /** Opaque to the store; JSON for posts */
  payload: string;
  created_at: EpochMillis;
  owner_id: string | null;
}

export interface DocumentTagsTable {
  document_uuid: string;
  name: string;
  kind: string;
}

export interface UploadsTable {
  uuid: string;
  hash: string;
  original_name: string;
  mime_type: string | null;
  size: number | null;
  alt_text: string | null;
  image_width: number | null;
  image_height: number | null;
  created_at: EpochMillis;
  owner_id: string | null;
}

export interface UsersTable {
  uuid: string;
  username: string;
  password_hash: string;
  created_at: EpochMillis;
  updated_at: EpochMillis;
  /** JSON, written by the account settings page */
  settings: string | null;
}

export interface UserSessionsTable {
  uuid: string;
  user_uuid: string;
  token_hash: string;
  refresh_token_hash: string | null;
  expires_at: EpochMillis;
  created_at: EpochMillis;
}

export interface DatabaseSchema {
  documents: DocumentsTable;
  document_tags: DocumentTagsTable;
  uploads: UploadsTable;
  users: UsersTable;
  user_sessions: UserSessionsTable;
}
