import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { describeError } from '@notesync/shared';

import type { Logger } from '../logger';
import type { StoreSnapshot } from './entityStore';
import type { RawSnapshot } from './snapshot';
import { RawSnapshotSchema, SNAPSHOT_KEYS } from './snapshot';

/**
 * One JSON file per account. Top-level keys this version does not know about are kept
 * and written back untouched.
 */
export class CacheFile {
  private readonly filePath: string;
  private readonly logger: Logger;
  private extras: Record<string, unknown> = {};

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Returns the raw snapshot, or null when the file is missing or unreadable.
   */
  async load(): Promise<RawSnapshot | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') {
        return null;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      this.logger.warn(`Ignoring corrupt cache file ${this.filePath}: ${describeError(err)}`);
      return null;
    }

    const result = RawSnapshotSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`Ignoring malformed cache file ${this.filePath}`);
      return null;
    }

    this.extras = Object.fromEntries(
      Object.entries(result.data).filter(([key]) => !SNAPSHOT_KEYS.has(key)),
    );
    return result.data;
  }

  async save(snapshot: StoreSnapshot): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const payload = { ...this.extras, ...snapshot };
    await writeFile(this.filePath, JSON.stringify(payload, null, 2), 'utf-8');
  }

  async remove(): Promise<void> {
    this.extras = {};
    await rm(this.filePath, { force: true });
  }
}
