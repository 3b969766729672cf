import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { sql } from 'kysely';
import { afterEach, describe, expect, it } from 'vitest';

import { closeSqliteDatabase } from '../close.js';
import { createSqliteDatabase } from '../database.js';

describe('createSqliteDatabase', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('creates an in-memory sqlite database with foreign keys enforced', async () => {
    const db = createSqliteDatabase<Record<string, never>>(':memory:')._unsafeUnwrap();

    const row = await sql<{ foreign_keys: number }>`pragma foreign_keys`.execute(db);
    expect(row.rows[0]?.foreign_keys).toBe(1);

    const closeResult = await closeSqliteDatabase(db);
    expect(closeResult.isOk()).toBe(true);
  });

  it('creates missing parent directories and uses WAL for files', async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'postcast-sqlite-'));
    tempDirs.push(root);
    const dbPath = path.join(root, 'nested', 'dir', 'test.db');

    const db = createSqliteDatabase<Record<string, never>>(dbPath, { busyTimeoutMs: 250 })._unsafeUnwrap();
    const mode = await sql<{ journal_mode: string }>`pragma journal_mode`.execute(db);
    const timeout = await sql<{ timeout: number }>`pragma busy_timeout`.execute(db);
    await closeSqliteDatabase(db);

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(mode.rows[0]?.journal_mode).toBe('wal');
    expect(timeout.rows[0]?.timeout).toBe(250);
  });
});
