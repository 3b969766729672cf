import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getDatabasePath, getDefaultAdminCredentials, getPublicBaseUrl, parseEnv, resetEnvCache } from '../config.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.POSTCAST_BASE_URL).toBe('http://localhost:3000');
    expect(env.POSTCAST_ADMIN_USERNAME).toBe('admin');
    expect(env.POSTCAST_ADMIN_PASSWORD).toBe('changeme');
    expect(env.POSTCAST_DATA_DIR).toBeUndefined();
    expect(env.NODE_ENV).toBe('development');
  });

  it('strips trailing slashes from the base URL', () => {
    expect(parseEnv({ POSTCAST_BASE_URL: 'https://posts.example.org//' }).POSTCAST_BASE_URL).toBe(
      'https://posts.example.org'
    );
  });

  it('lists every invalid variable', () => {
    expect(() => parseEnv({ POSTCAST_BASE_URL: 'not a url', NODE_ENV: 'staging' })).toThrow(
      /POSTCAST_BASE_URL[\s\S]*NODE_ENV|NODE_ENV[\s\S]*POSTCAST_BASE_URL/
    );
  });
});

describe('accessors', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    resetEnvCache();
  });

  afterEach(() => {
    process.env = { ...saved };
    resetEnvCache();
  });

  it('prefers the explicit database path', () => {
    process.env['POSTCAST_DATABASE_PATH'] = '/tmp/postcast-test.db';

    expect(getDatabasePath()).toBe('/tmp/postcast-test.db');
  });

  it('derives the database path from the data directory', () => {
    delete process.env['POSTCAST_DATABASE_PATH'];
    process.env['POSTCAST_DATA_DIR'] = '/var/lib/postcast';

    expect(getDatabasePath()).toBe(path.join('/var/lib/postcast', 'postcast.db'));
  });

  it('exposes base URL and admin credentials', () => {
    process.env['POSTCAST_BASE_URL'] = 'https://feed.example.org/';
    process.env['POSTCAST_ADMIN_USERNAME'] = 'owner';
    process.env['POSTCAST_ADMIN_PASSWORD'] = 'test-secret';

    expect(getPublicBaseUrl()).toBe('https://feed.example.org');
    expect(getDefaultAdminCredentials()).toEqual({ username: 'owner', password: 'test-secret' });
  });
});
