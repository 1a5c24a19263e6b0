export interface ArtifactStat {
  mtimeMs: number;
}

/**
 * Storage for textual artifacts addressed by name (an absolute path for files, a
 * `notesync://` name for buffers). Reads of missing artifacts resolve to null.
 */
export interface ArtifactStore {
  read(name: string): Promise<string | null>;
  /** Resolves to the modification time of the written artifact. */
  write(name: string, text: string): Promise<number>;
  stat(name: string): Promise<ArtifactStat | null>;
  rename(from: string, to: string): Promise<void>;
  remove(name: string): Promise<void>;
  /** Artifact names whose name ends with `extension`. */
  list(extension: string): Promise<string[]>;
}
