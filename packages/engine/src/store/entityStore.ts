import { isDeepStrictEqual } from 'node:util';

import type { Label, Note, NoteInput, StatusFilter } from '@notesync/shared';
import {
  DEFAULT_STATUS_FILTER,
  LabelSchema,
  NoteInputSchema,
  StoredNoteSchema,
  ValidationError,
  matchesStatus,
  normalizeLabelNames,
  normalizeTitle,
} from '@notesync/shared';
import type { z } from 'zod';

import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { toText } from '../mapper/fileMapper';
import { fingerprintText } from './fingerprint';
import type { LocalMapping } from './snapshot';
import { LocalMappingSchema, RawSnapshotSchema, SNAPSHOT_VERSION, artifactName } from './snapshot';
import { sortItemsBySortIndex } from './sortIndex';

export interface StoreSnapshot {
  version: number;
  cursor: string | null;
  labels: Label[];
  notes: Note[];
  mappings: LocalMapping[];
}

export interface EntityStoreOptions {
  logger?: Logger;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * In-memory notes, labels and local mappings. Every mutation that changes what a search
 * could see advances `generation`; mapping bookkeeping does not.
 */
export class EntityStore {
  private readonly logger: Logger;
  private readonly notes = new Map<string, Note>();
  private readonly labels = new Map<string, Label>();
  private readonly mappings = new Map<string, LocalMapping>();
  private cursorValue: string | null = null;
  private generationValue = 0;

  constructor(options: EntityStoreOptions = {}) {
    this.logger = options.logger ?? createLogger('store');
  }

  get generation(): number {
    return this.generationValue;
  }

  get cursor(): string | null {
    return this.cursorValue;
  }

  setCursor(cursor: string | null): void {
    this.cursorValue = cursor;
  }

  // Notes

  get(id: string): Note | undefined {
    return this.notes.get(id);
  }

  list(): Note[] {
    return [...this.notes.values()];
  }

  visible(filter: StatusFilter = DEFAULT_STATUS_FILTER): Note[] {
    return this.list().filter((note) => matchesStatus(filter, note));
  }

  upsert(input: NoteInput): Note {
    const result = NoteInputSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError(
        `Invalid note ${String(input.id)}: ${describeIssues(result.error)}`,
      );
    }
    for (const labelId of result.data.labels) {
      if (!this.labels.has(labelId)) {
        throw new ValidationError(`Note ${result.data.id} references unknown label ${labelId}`);
      }
    }

    const note = this.prepare(result.data);
    const existing = this.notes.get(note.id);
    if (existing && isDeepStrictEqual(existing, note)) {
      return existing;
    }
    this.notes.set(note.id, note);
    this.generationValue += 1;
    return note;
  }

  /**
   * Deletes a note and its mapping. Returns false when the id is unknown.
   */
  remove(id: string): boolean {
    this.mappings.delete(id);
    if (!this.notes.delete(id)) {
      return false;
    }
    this.generationValue += 1;
    return true;
  }

  /**
   * Replaces a temporary local id with the permanent id assigned by the remote side.
   * The mapping follows the note.
   */
  rekey(tempId: string, permanentId: string, serverRevision: string): Note {
    const note = this.notes.get(tempId);
    if (!note) {
      throw new ValidationError(`Unknown note ${tempId}`);
    }
    if (tempId !== permanentId && this.notes.has(permanentId)) {
      throw new ValidationError(`Note ${permanentId} already exists`);
    }

    const rekeyed = this.prepare({ ...note, id: permanentId, serverRevision });
    this.notes.delete(tempId);
    this.notes.set(permanentId, rekeyed);

    const mapping = this.mappings.get(tempId);
    if (mapping) {
      this.mappings.delete(tempId);
      this.mappings.set(permanentId, { ...mapping, noteId: permanentId });
    }
    this.generationValue += 1;
    return rekeyed;
  }

  // Labels

  getLabel(id: string): Label | undefined {
    return this.labels.get(id);
  }

  listLabels(): Label[] {
    return [...this.labels.values()];
  }

  findLabelByName(name: string): Label | undefined {
    for (const label of this.labels.values()) {
      if (label.name === name) {
        return label;
      }
    }
    return undefined;
  }

  labelNames(note: Pick<NoteInput, 'labels'>): string[] {
    const names: string[] = [];
    for (const id of note.labels) {
      const label = this.labels.get(id);
      if (label) {
        names.push(label.name);
      }
    }
    return names;
  }

  upsertLabel(input: Label): Label {
    const result = LabelSchema.safeParse(input);
    if (!result.success) {
      throw new ValidationError(`Invalid label: ${describeIssues(result.error)}`);
    }
    const label = { id: result.data.id, name: result.data.name.trim() };
    if (!label.name) {
      throw new ValidationError('Label name must not be empty');
    }
    const clash = this.findLabelByName(label.name);
    if (clash && clash.id !== label.id) {
      throw new ValidationError(`Label name "${label.name}" is already used by ${clash.id}`);
    }

    const existing = this.labels.get(label.id);
    if (existing && existing.name === label.name) {
      return existing;
    }
    this.labels.set(label.id, label);
    if (existing) {
      // Fingerprints include label names.
      this.refreshNotes((note) => note.labels.includes(label.id));
    }
    this.generationValue += 1;
    return label;
  }

  /**
   * Deletes a label and drops it from every note that referenced it.
   */
  removeLabel(id: string): boolean {
    if (!this.labels.delete(id)) {
      return false;
    }
    for (const note of this.notes.values()) {
      if (note.labels.includes(id)) {
        this.notes.set(
          note.id,
          this.prepare({ ...note, labels: note.labels.filter((labelId) => labelId !== id) }),
        );
      }
    }
    this.generationValue += 1;
    return true;
  }

  // Mappings

  getMapping(noteId: string): LocalMapping | undefined {
    return this.mappings.get(noteId);
  }

  listMappings(): LocalMapping[] {
    return [...this.mappings.values()];
  }

  setMapping(mapping: LocalMapping): void {
    if (!this.notes.has(mapping.noteId)) {
      throw new ValidationError(`Cannot map unknown note ${mapping.noteId}`);
    }
    this.mappings.set(mapping.noteId, mapping);
  }

  updateMapping(noteId: string, patch: Partial<Omit<LocalMapping, 'noteId'>>): LocalMapping {
    const existing = this.mappings.get(noteId);
    if (!existing) {
      throw new ValidationError(`No mapping for note ${noteId}`);
    }
    const updated = { ...existing, ...patch };
    this.mappings.set(noteId, updated);
    return updated;
  }

  removeMapping(noteId: string): void {
    this.mappings.delete(noteId);
  }

  findMappingByArtifact(name: string): LocalMapping | undefined {
    for (const mapping of this.mappings.values()) {
      if (artifactName(mapping.artifact) === name) {
        return mapping;
      }
    }
    return undefined;
  }

  // Persistence

  snapshot(): StoreSnapshot {
    return structuredClone({
      version: SNAPSHOT_VERSION,
      cursor: this.cursorValue,
      labels: this.listLabels(),
      notes: this.list(),
      mappings: this.listMappings(),
    });
  }

  /**
   * Replaces the store contents with a persisted snapshot. Invalid records are skipped
   * with a warning and label references to missing labels are pruned.
   */
  restore(raw: unknown): void {
    const parsed = RawSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid snapshot: ${describeIssues(parsed.error)}`);
    }
    const data = parsed.data;
    if (data.version !== undefined && data.version > SNAPSHOT_VERSION) {
      this.logger.warn(`Snapshot version ${data.version} is newer than ${SNAPSHOT_VERSION}`);
    }

    this.notes.clear();
    this.labels.clear();
    this.mappings.clear();
    this.cursorValue = data.cursor ?? null;

    for (const entry of data.labels ?? []) {
      const label = LabelSchema.safeParse(entry);
      if (!label.success) {
        this.logger.warn(`Skipping invalid label: ${describeIssues(label.error)}`);
        continue;
      }
      if (this.findLabelByName(label.data.name)) {
        this.logger.warn(`Skipping label ${label.data.id}: duplicate name "${label.data.name}"`);
        continue;
      }
      this.labels.set(label.data.id, label.data);
    }

    for (const entry of data.notes ?? []) {
      const note = StoredNoteSchema.safeParse(entry);
      if (!note.success) {
        this.logger.warn(`Skipping invalid note: ${describeIssues(note.error)}`);
        continue;
      }
      const orphans = note.data.labels.filter((id) => !this.labels.has(id));
      if (orphans.length > 0) {
        this.logger.warn(`Pruning unknown labels from note ${note.data.id}: ${orphans.join(', ')}`);
      }
      const labels = note.data.labels.filter((id) => this.labels.has(id));
      this.notes.set(note.data.id, this.prepare({ ...note.data, labels }));
    }

    for (const entry of data.mappings ?? []) {
      const mapping = LocalMappingSchema.safeParse(entry);
      if (!mapping.success) {
        this.logger.warn(`Skipping invalid mapping: ${describeIssues(mapping.error)}`);
        continue;
      }
      if (!this.notes.has(mapping.data.noteId)) {
        continue;
      }
      this.mappings.set(mapping.data.noteId, mapping.data);
    }

    this.generationValue += 1;
  }

  clear(): void {
    this.notes.clear();
    this.labels.clear();
    this.mappings.clear();
    this.cursorValue = null;
    this.generationValue += 1;
  }

  /**
   * Canonical keep-form text of a note, the input of its content fingerprint.
   */
  canonicalText(note: NoteInput): string {
    return toText(note, this.labelNames(note), 'keep');
  }

  private refreshNotes(predicate: (note: Note) => boolean): void {
    for (const note of this.notes.values()) {
      if (predicate(note)) {
        this.notes.set(note.id, this.prepare(note));
      }
    }
  }

  private prepare(input: NoteInput): Note {
    const existing = this.notes.get(input.id);
    const base = {
      ...input,
      title: normalizeTitle(input.title),
      labels: normalizeLabelNames(input.labels),
    };
    const normalized: NoteInput =
      base.kind === 'list' ? { ...base, items: sortItemsBySortIndex(base.items) } : base;

    return {
      ...normalized,
      contentFingerprint: fingerprintText(this.canonicalText(normalized)),
      hasConflict: input.hasConflict ?? existing?.hasConflict ?? false,
      stale: input.stale ?? existing?.stale ?? false,
    };
  }
}
