import path from 'node:path';

import type { Note } from '@notesync/shared';

import type { NoteFormat } from '../config';
import type { LocalArtifact } from '../store/snapshot';

export const BUFFER_SCHEME = 'notesync';
export const LOCAL_VARIANT_SUFFIX = '.local';
export const ARCHIVE_DIR = 'archived';

const FORMAT_EXTENSIONS: Record<NoteFormat, string> = {
  keep: '.keep',
  frontmatter: '.md',
};

export interface ArtifactPathsOptions {
  /** Without a sync directory every note lives in a buffer. */
  syncDir?: string;
  syncArchived: boolean;
  format: NoteFormat;
}

export function extensionFor(format: NoteFormat): string {
  return FORMAT_EXTENSIONS[format];
}

export function formatForPath(filePath: string): NoteFormat | undefined {
  if (filePath.endsWith(FORMAT_EXTENSIONS.keep)) {
    return 'keep';
  }
  if (filePath.endsWith(FORMAT_EXTENSIONS.frontmatter)) {
    return 'frontmatter';
  }
  return undefined;
}

const LOCAL_VARIANT_PATTERN = /\.local(\.\d+)?$/;

/** `Trip.keep.local`, then `Trip.keep.local.1`, `Trip.keep.local.2` for later attempts. */
export function localVariantName(artifact: string, attempt = 0): string {
  const suffix = attempt > 0 ? `${LOCAL_VARIANT_SUFFIX}.${attempt}` : LOCAL_VARIANT_SUFFIX;
  return `${artifact}${suffix}`;
}

export function isLocalVariant(artifact: string): boolean {
  return LOCAL_VARIANT_PATTERN.test(artifact);
}

export class ArtifactPaths {
  private readonly options: ArtifactPathsOptions;

  constructor(options: ArtifactPathsOptions) {
    this.options = options;
  }

  get syncDir(): string | undefined {
    return this.options.syncDir;
  }

  get format(): NoteFormat {
    return this.options.format;
  }

  escapeTitle(title: string): string {
    const escaped = title
      .normalize('NFKC')
      .replace(/\s/g, ' ')
      .replace(/[^\p{L}\p{N}_\s.-]/gu, '')
      .trim();
    // Dot-only names would resolve to the directory itself or its parent.
    if (!escaped || /^\.+$/.test(escaped)) {
      return 'Untitled';
    }
    return escaped;
  }

  /**
   * Whether a note gets a file. Trashed notes never do; archived ones only when
   * archived notes are synced.
   */
  wantsFile(note: Note): boolean {
    if (!this.options.syncDir || note.trashed) {
      return false;
    }
    return !note.archived || this.options.syncArchived;
  }

  /**
   * The artifact a note should live in. `notes` is the whole collection, used to
   * disambiguate notes that share a title within one directory.
   */
  targetFor(note: Note, notes: Iterable<Note>): LocalArtifact {
    const format = this.options.format;
    const extension = extensionFor(format);
    const title = this.escapeTitle(note.title);

    if (!this.wantsFile(note)) {
      const name = `${BUFFER_SCHEME}://${note.id}/${title}${extension}`;
      return { kind: 'buffer', name, format };
    }

    let duplicates = 0;
    for (const other of notes) {
      if (
        other.id !== note.id &&
        other.archived === note.archived &&
        this.wantsFile(other) &&
        this.escapeTitle(other.title) === title
      ) {
        duplicates += 1;
      }
    }

    const fileName = duplicates > 0 ? `${title}:${note.id}${extension}` : `${title}${extension}`;
    const relative = note.archived ? path.join(ARCHIVE_DIR, fileName) : fileName;
    return { kind: 'file', path: this.resolve(relative), format };
  }

  resolve(relativePath: string): string {
    const base = this.options.syncDir;
    if (!base) {
      throw new Error('No sync directory configured');
    }
    const resolvedBase = path.resolve(base);
    const resolved = path.resolve(resolvedBase, relativePath);
    const expectedPrefix = resolvedBase.endsWith(path.sep) ? resolvedBase : resolvedBase + path.sep;
    if (!resolved.startsWith(expectedPrefix)) {
      throw new Error('Path traversal detected');
    }
    return resolved;
  }
}
