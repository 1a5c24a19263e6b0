import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { ValidationError } from '@notesync/shared';

import { cacheFilePath, loadConfig, parseConfig } from './config';

async function createTempDir(): Promise<string> {
  const dir = path.join(
    os.tmpdir(),
    `notesync-config-test-${Date.now()}-${Math.random().toString(16)}`,
  );
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig({ cacheDir: '/var/cache/notesync' }, '/');
    expect(config).toEqual({
      cacheDir: '/var/cache/notesync',
      account: 'default',
      syncArchived: false,
      noteFormat: 'keep',
      remoteTimeoutMs: 30_000,
      retry: { baseDelayMs: 5_000, maxDelayMs: 300_000, staleAfterFailures: 3 },
      liveSearchDebounceMs: 150,
      logLevel: 'warn',
    });
  });

  it('rejects unknown note formats', () => {
    expect(() => parseConfig({ cacheDir: '/tmp', noteFormat: 'org' })).toThrow(ValidationError);
    expect(() => parseConfig({ cacheDir: '/tmp', noteFormat: 'org' })).toThrow(/noteFormat/);
  });

  it('rejects a retry cap below the base delay', () => {
    expect(() =>
      parseConfig({ cacheDir: '/tmp', retry: { baseDelayMs: 1000, maxDelayMs: 10 } }),
    ).toThrow(/retry\.maxDelayMs/);
  });
});

describe('loadConfig', () => {
  it('reads a YAML config file and resolves paths against the directory', async () => {
    const dir = await createTempDir();
    await fs.writeFile(
      path.join(dir, 'notesync.config.yaml'),
      'cacheDir: cache\nsyncDir: notes\nnoteFormat: frontmatter\n',
      'utf8',
    );

    const config = loadConfig(dir, {});
    expect(config.cacheDir).toBe(path.join(dir, 'cache'));
    expect(config.syncDir).toBe(path.join(dir, 'notes'));
    expect(config.noteFormat).toBe('frontmatter');
  });

  it('lets environment variables override the file', async () => {
    const dir = await createTempDir();
    await fs.writeFile(
      path.join(dir, 'notesync.config.json'),
      JSON.stringify({ cacheDir: 'cache', logLevel: 'error' }),
      'utf8',
    );

    const config = loadConfig(dir, {
      NOTESYNC_SYNC_ARCHIVED: '1',
      NOTESYNC_LOG_LEVEL: 'debug',
      NOTESYNC_REMOTE_TIMEOUT_MS: '2500',
    });
    expect(config.syncArchived).toBe(true);
    expect(config.logLevel).toBe('debug');
    expect(config.remoteTimeoutMs).toBe(2500);
  });

  it('reads a .env file but prefers the real environment', async () => {
    const dir = await createTempDir();
    await fs.writeFile(path.join(dir, '.env'), 'NOTESYNC_ACCOUNT=alice\n', 'utf8');

    expect(loadConfig(dir, { NOTESYNC_CACHE_DIR: 'cache' }).account).toBe('alice');
    expect(
      loadConfig(dir, { NOTESYNC_CACHE_DIR: 'cache', NOTESYNC_ACCOUNT: 'bob' }).account,
    ).toBe('bob');
  });

  it('defaults the cache directory under XDG_CACHE_HOME', async () => {
    const dir = await createTempDir();
    const config = loadConfig(dir, { XDG_CACHE_HOME: '/tmp/xdg-cache' });
    expect(config.cacheDir).toBe('/tmp/xdg-cache/notesync');
  });
});

describe('cacheFilePath', () => {
  it('names one cache file per account', () => {
    const config = parseConfig({ cacheDir: '/data', account: 'me@example.com' }, '/');
    expect(cacheFilePath(config)).toBe('/data/notesync-me@example.com.json');
  });
});
