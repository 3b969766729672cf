import { DataContext } from './data-context.js';
import { initializeDatabase, type DatabaseManager, type InitializeDatabaseOptions } from './database.js';
import type { PasswordHasher } from './auth/password-hasher.js';
import type { DocumentStoreOptions } from './repositories/document-store.js';

/**
 * Skips the key derivation so seeding stays fast in tests.
 */
export const plainTextPasswordHasher: PasswordHasher = {
  hash: (password) => Promise.resolve(`plain$${password}`),
};

/**
 * Create an in-memory database with migrations applied. For use in tests only.
 */
export async function createTestDatabase(options: InitializeDatabaseOptions = {}): Promise<DatabaseManager> {
  const result = await initializeDatabase(':memory:', {
    admin: { username: 'admin', password: 'test-secret' },
    passwordHasher: plainTextPasswordHasher,
    ...options,
  });
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Create an in-memory DataContext with migrations applied. For use in tests only.
 */
export async function createTestDataContext(options: DocumentStoreOptions = {}): Promise<DataContext> {
  return new DataContext(await createTestDatabase(), options);
}
