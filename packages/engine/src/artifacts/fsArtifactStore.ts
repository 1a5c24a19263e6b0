import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { globIterate } from 'glob';

import type { ArtifactStat, ArtifactStore } from './types';

function isMissing(err: unknown): boolean {
  const error = err as NodeJS.ErrnoException;
  return error.code === 'ENOENT';
}

/**
 * Files below the sync directory.
 */
export class FsArtifactStore implements ArtifactStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  async read(name: string): Promise<string | null> {
    try {
      return await readFile(name, 'utf-8');
    } catch (err) {
      if (isMissing(err)) {
        return null;
      }
      throw err;
    }
  }

  async write(name: string, text: string): Promise<number> {
    await mkdir(path.dirname(name), { recursive: true });
    await writeFile(name, text, 'utf-8');
    const stats = await stat(name);
    return stats.mtimeMs;
  }

  async stat(name: string): Promise<ArtifactStat | null> {
    try {
      const stats = await stat(name);
      return { mtimeMs: stats.mtimeMs };
    } catch (err) {
      if (isMissing(err)) {
        return null;
      }
      throw err;
    }
  }

  async rename(from: string, to: string): Promise<void> {
    await mkdir(path.dirname(to), { recursive: true });
    await rename(from, to);
  }

  async remove(name: string): Promise<void> {
    await rm(name, { force: true });
  }

  async list(extension: string): Promise<string[]> {
    const files: string[] = [];
    try {
      for await (const match of globIterate(`**/*${extension}`, {
        cwd: this.baseDir,
        absolute: true,
        nodir: true,
      })) {
        files.push(match);
      }
    } catch (err) {
      if (isMissing(err)) {
        return [];
      }
      throw err;
    }
    return files.sort();
  }
}
