export { DataContext } from './data-context.js';
export {
  createDatabase,
  defaultMigrations,
  initializeDatabase,
  type DatabaseManager,
  type InitializeDatabaseOptions,
} from './database.js';
export { ScryptPasswordHasher, type PasswordHasher } from './auth/password-hasher.js';
export { createMigrations, type MigrationOptions } from './migrations/index.js';
export { BaseRepository } from './repositories/base-repository.js';
export {
  DocumentStore,
  type Document,
  type DocumentInput,
  type DocumentOrder,
  type DocumentStoreOptions,
  type Tag,
} from './repositories/document-store.js';
export {
  POST_KIND,
  PostPayloadSchema,
  PostRepository,
  type Post,
  type PostPayload,
} from './repositories/post-repository.js';
export type { DatabaseSchema } from './schema/database-schema.js';
