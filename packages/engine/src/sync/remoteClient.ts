import type { Label, NoteInput } from '@notesync/shared';
import { RemoteError, describeError } from '@notesync/shared';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A note as the remote service sees it: no local sync flags, no fingerprint.
 */
export type RemoteNote = DistributiveOmit<
  NoteInput,
  'contentFingerprint' | 'hasConflict' | 'stale'
>;

export type NoteChange = { type: 'upsert'; note: RemoteNote } | { type: 'delete'; id: string };

export interface RemoteDelta {
  changes: NoteChange[];
  /** Labels created or renamed since the cursor. */
  labels: Label[];
  deletedLabelIds: string[];
  cursor: string;
}

export interface RemoteRevision {
  serverRevision: string;
}

export interface CreatedNote extends RemoteRevision {
  id: string;
}

/**
 * The remote note-keeping service. Implementations reject with `RemoteError`; anything
 * else they throw is treated as a service failure.
 */
export interface RemoteClient {
  fetchDelta(sinceCursor: string | null): Promise<RemoteDelta>;
  push(note: RemoteNote): Promise<RemoteRevision>;
  create(note: RemoteNote): Promise<CreatedNote>;
  trash(note: RemoteNote): Promise<RemoteRevision>;
  /** Stores `note` as a new note and returns its id. */
  createBackupCopy(note: RemoteNote): Promise<CreatedNote>;
}

export function toRemoteNote(note: NoteInput): RemoteNote {
  const {
    contentFingerprint: _fingerprint,
    hasConflict: _hasConflict,
    stale: _stale,
    ...remote
  } = note;
  return remote;
}

export function asRemoteError(err: unknown): RemoteError {
  if (err instanceof RemoteError) {
    return err;
  }
  return new RemoteError('service', describeError(err));
}
