export class NoteSyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoteSyncError';
  }
}

/**
 * A malformed entity. Fatal to the single operation that produced it.
 */
export class ValidationError extends NoteSyncError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * A textual artifact that cannot be mapped back onto a note. The artifact is left
 * untouched when this is raised.
 */
export class ParseError extends NoteSyncError {
  readonly artifact: string | undefined;
  readonly line: number | undefined;

  constructor(message: string, options?: { artifact?: string; line?: number }) {
    super(message);
    this.name = 'ParseError';
    this.artifact = options?.artifact;
    this.line = options?.line;
  }

  withArtifact(artifact: string): ParseError {
    return new ParseError(this.message, {
      artifact,
      ...(this.line !== undefined ? { line: this.line } : {}),
    });
  }
}

export type RemoteErrorCode = 'timeout' | 'network' | 'auth' | 'service';

export class RemoteError extends NoteSyncError {
  readonly code: RemoteErrorCode;

  constructor(code: RemoteErrorCode, message: string) {
    super(message);
    this.name = 'RemoteError';
    this.code = code;
  }
}

export interface SyncConflictRecord {
  noteId: string;
  localFingerprint: string;
  remoteFingerprint: string;
  primaryArtifact: string;
  localVariantArtifact: string;
  patch: string;
}

/**
 * Not a failure: marks the both-sides-changed transition so callers can surface it.
 */
export class ConflictError extends NoteSyncError {
  readonly record: SyncConflictRecord;

  constructor(record: SyncConflictRecord) {
    super(`Conflicting local and remote edits for note ${record.noteId}`);
    this.name = 'ConflictError';
    this.record = record;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
