import type { Label } from '@notesync/shared';
import { RemoteError } from '@notesync/shared';

import type {
  CreatedNote,
  NoteChange,
  RemoteClient,
  RemoteDelta,
  RemoteNote,
  RemoteRevision,
} from './remoteClient';

export type RemoteOperation = 'fetchDelta' | 'push' | 'create' | 'trash' | 'createBackupCopy';

type StoredNote = RemoteNote & { serverRevision: string };

interface LogEntry {
  seq: number;
  change: NoteChange;
}

interface LabelLogEntry {
  seq: number;
  label: Label | null;
  id: string;
}

/**
 * In-process note service with a change log. Used offline and as the test double for
 * the sync engine. `put*` and `delete*` methods act as edits from another client.
 */
export class MemoryRemoteClient implements RemoteClient {
  private readonly notes = new Map<string, RemoteNote>();
  private readonly labels = new Map<string, Label>();
  private readonly log: LogEntry[] = [];
  private readonly labelLog: LabelLogEntry[] = [];
  private readonly failures: Array<{ operation: RemoteOperation; error: Error }> = [];
  private readonly hangs = new Set<RemoteOperation>();
  private seq = 0;
  private nextId = 1;

  readonly calls: Array<{ operation: RemoteOperation; noteId?: string }> = [];

  // Service side

  putNote(note: RemoteNote): StoredNote {
    const stored: StoredNote = { ...note, serverRevision: this.nextRevision() };
    this.notes.set(stored.id, stored);
    this.log.push({ seq: this.seq, change: { type: 'upsert', note: stored } });
    return stored;
  }

  deleteNote(id: string): void {
    this.notes.delete(id);
    this.seq += 1;
    this.log.push({ seq: this.seq, change: { type: 'delete', id } });
  }

  putLabel(label: Label): void {
    this.labels.set(label.id, label);
    this.seq += 1;
    this.labelLog.push({ seq: this.seq, label, id: label.id });
  }

  deleteLabel(id: string): void {
    this.labels.delete(id);
    this.seq += 1;
    this.labelLog.push({ seq: this.seq, label: null, id });
  }

  getNote(id: string): RemoteNote | undefined {
    return this.notes.get(id);
  }

  listNotes(): RemoteNote[] {
    return [...this.notes.values()];
  }

  /** The next call to `operation` rejects with `error`. */
  failNext(operation: RemoteOperation, error: Error = new RemoteError('network', 'offline')): void {
    this.failures.push({ operation, error });
  }

  /** Calls to `operation` made before `release` never settle. */
  hang(operation: RemoteOperation): void {
    this.hangs.add(operation);
  }

  release(operation: RemoteOperation): void {
    this.hangs.delete(operation);
  }

  // RemoteClient

  async fetchDelta(sinceCursor: string | null): Promise<RemoteDelta> {
    await this.enter('fetchDelta');
    const since = sinceCursor === null ? 0 : Number(sinceCursor);

    const latest = new Map<string, NoteChange>();
    for (const entry of this.log) {
      if (entry.seq > since) {
        const id = entry.change.type === 'upsert' ? entry.change.note.id : entry.change.id;
        latest.delete(id);
        latest.set(id, entry.change);
      }
    }

    const labels = new Map<string, Label>();
    const deletedLabelIds = new Set<string>();
    for (const entry of this.labelLog) {
      if (entry.seq <= since) {
        continue;
      }
      if (entry.label) {
        labels.set(entry.id, entry.label);
        deletedLabelIds.delete(entry.id);
      } else {
        labels.delete(entry.id);
        deletedLabelIds.add(entry.id);
      }
    }

    return {
      changes: [...latest.values()].map((change) =>
        change.type === 'upsert' ? { type: 'upsert', note: { ...change.note } } : change,
      ),
      labels: [...labels.values()],
      deletedLabelIds: [...deletedLabelIds],
      cursor: String(this.seq),
    };
  }

  async push(note: RemoteNote): Promise<RemoteRevision> {
    await this.enter('push', note.id);
    if (!this.notes.has(note.id)) {
      throw new RemoteError('service', `Unknown note ${note.id}`);
    }
    return { serverRevision: this.putNote(note).serverRevision };
  }

  async create(note: RemoteNote): Promise<CreatedNote> {
    await this.enter('create', note.id);
    const stored = this.putNote({ ...note, id: this.allocateId() });
    return { id: stored.id, serverRevision: stored.serverRevision };
  }

  async trash(note: RemoteNote): Promise<RemoteRevision> {
    await this.enter('trash', note.id);
    const existing = this.notes.get(note.id);
    if (!existing) {
      throw new RemoteError('service', `Unknown note ${note.id}`);
    }
    return { serverRevision: this.putNote({ ...existing, trashed: true }).serverRevision };
  }

  async createBackupCopy(note: RemoteNote): Promise<CreatedNote> {
    await this.enter('createBackupCopy', note.id);
    const stored = this.putNote({ ...note, id: this.allocateId() });
    return { id: stored.id, serverRevision: stored.serverRevision };
  }

  private async enter(operation: RemoteOperation, noteId?: string): Promise<void> {
    this.calls.push({ operation, ...(noteId ? { noteId } : {}) });
    if (this.hangs.has(operation)) {
      await new Promise<never>(() => undefined);
    }
    const index = this.failures.findIndex((failure) => failure.operation === operation);
    if (index >= 0) {
      const [failure] = this.failures.splice(index, 1);
      if (failure) {
        throw failure.error;
      }
    }
  }

  private nextRevision(): string {
    this.seq += 1;
    return `r${this.seq}`;
  }

  private allocateId(): string {
    while (this.notes.has(String(this.nextId))) {
      this.nextId += 1;
    }
    const id = String(this.nextId);
    this.nextId += 1;
    return id;
  }
}
