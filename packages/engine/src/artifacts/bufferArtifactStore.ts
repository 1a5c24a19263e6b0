import type { ArtifactStat, ArtifactStore } from './types';

interface BufferEntry {
  text: string;
  mtimeMs: number;
}

/**
 * Ephemeral buffers held in memory. Modification times come from a counter, so every
 * write is distinguishable from the previous one.
 */
export class BufferArtifactStore implements ArtifactStore {
  private readonly buffers = new Map<string, BufferEntry>();
  private clock = 0;

  async read(name: string): Promise<string | null> {
    return this.buffers.get(name)?.text ?? null;
  }

  async write(name: string, text: string): Promise<number> {
    this.clock += 1;
    this.buffers.set(name, { text, mtimeMs: this.clock });
    return this.clock;
  }

  async stat(name: string): Promise<ArtifactStat | null> {
    const buffer = this.buffers.get(name);
    return buffer ? { mtimeMs: buffer.mtimeMs } : null;
  }

  async rename(from: string, to: string): Promise<void> {
    const buffer = this.buffers.get(from);
    if (!buffer) {
      return;
    }
    this.buffers.delete(from);
    this.buffers.set(to, buffer);
  }

  async remove(name: string): Promise<void> {
    this.buffers.delete(name);
  }

  async list(extension: string): Promise<string[]> {
    return [...this.buffers.keys()].filter((name) => name.endsWith(extension)).sort();
  }

  clear(): void {
    this.buffers.clear();
  }
}
