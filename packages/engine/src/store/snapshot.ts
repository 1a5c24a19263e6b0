import { z } from 'zod';

import { NoteFormatSchema } from '../config';

const NonEmptyStringSchema = z.string().min(1);

export const LocalArtifactSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('file'), path: NonEmptyStringSchema, format: NoteFormatSchema }),
  z.object({ kind: z.literal('buffer'), name: NonEmptyStringSchema, format: NoteFormatSchema }),
]);
export type LocalArtifact = z.infer<typeof LocalArtifactSchema>;

export const LocalMappingSchema = z.object({
  noteId: NonEmptyStringSchema,
  artifact: LocalArtifactSchema,
  lastKnownFingerprint: z.string().nullable(),
  lastKnownServerRevision: z.string().nullable(),
  /** mtime the engine produced or acknowledged; anything else is an outside edit. */
  lastWrittenMtimeMs: z.number().nullable(),
  /** Local variants kept by open conflicts; the conflict stays open while any exists. */
  conflictArtifacts: z.array(LocalArtifactSchema),
  /** Server revision already copied to a trashed backup before an outside edit was pushed. */
  backedUpRevision: z.string().nullable(),
  failureCount: z.number().int().min(0),
  nextAttemptAt: z.number().nullable(),
  lastError: z.string().nullable(),
});
export type LocalMapping = z.infer<typeof LocalMappingSchema>;

export const SNAPSHOT_VERSION = 1;

/**
 * Records stay unvalidated here so a single bad entry does not discard the file.
 */
export const RawSnapshotSchema = z
  .object({
    version: z.number().int().optional(),
    cursor: z.string().nullable().optional(),
    labels: z.array(z.unknown()).optional(),
    notes: z.array(z.unknown()).optional(),
    mappings: z.array(z.unknown()).optional(),
  })
  .passthrough();
export type RawSnapshot = z.infer<typeof RawSnapshotSchema>;

export const SNAPSHOT_KEYS = new Set(['version', 'cursor', 'labels', 'notes', 'mappings']);

export function artifactName(artifact: LocalArtifact): string {
  return artifact.kind === 'file' ? artifact.path : artifact.name;
}

/** The same kind of artifact under another name. */
export function withArtifactName(artifact: LocalArtifact, name: string): LocalArtifact {
  return artifact.kind === 'file'
    ? { kind: 'file', path: name, format: artifact.format }
    : { kind: 'buffer', name, format: artifact.format };
}

export function createMapping(noteId: string, artifact: LocalArtifact): LocalMapping {
  return {
    noteId,
    artifact,
    lastKnownFingerprint: null,
    lastKnownServerRevision: null,
    lastWrittenMtimeMs: null,
    conflictArtifacts: [],
    backedUpRevision: null,
    failureCount: 0,
    nextAttemptAt: null,
    lastError: null,
  };
}
