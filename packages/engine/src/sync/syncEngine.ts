import { randomUUID } from 'node:crypto';
import path from 'node:path';

import { createTwoFilesPatch } from 'diff';

import type { Label, Note, NoteInput, NoteKind, SyncConflictRecord } from '@notesync/shared';
import {
  ConflictError,
  DEFAULT_NOTE_COLOR,
  ParseError,
  RemoteError,
  ValidationError,
  describeError,
  isTemporaryNoteId,
  normalizeLabelNames,
} from '@notesync/shared';

import type { ArtifactStore } from '../artifacts/types';
import type { Logger } from '../logger';
import type { ArtifactPaths } from '../mapper/artifactPaths';
import {
  ARCHIVE_DIR,
  extensionFor,
  formatForPath,
  isLocalVariant,
  localVariantName,
} from '../mapper/artifactPaths';
import type { PartialNote } from '../mapper/fileMapper';
import {
  applyParsed,
  fromText,
  readArtifactHeader,
  toText,
  writeArtifactHeader,
} from '../mapper/fileMapper';
import type { SyncStatus } from '../status';
import type { EntityStore, StoreSnapshot } from '../store/entityStore';
import { fingerprintText } from '../store/fingerprint';
import type { LocalArtifact, LocalMapping } from '../store/snapshot';
import { artifactName, createMapping, withArtifactName } from '../store/snapshot';
import { SORT_INDEX_STEP } from '../store/sortIndex';
import type { RetryPolicy } from './backoff';
import { backoffDelayMs } from './backoff';
import type { ReconcileState } from './classify';
import { classifyChange } from './classify';
import { KeyedQueue } from './keyedQueue';
import type { RemoteClient, RemoteDelta, RemoteNote } from './remoteClient';
import { asRemoteError, toRemoteNote } from './remoteClient';
import { callRemote } from './timeout';

export interface SyncFailure {
  noteId: string;
  error: string;
  code: string;
}

export interface SyncReport {
  /** Set when the delta could not be fetched; nothing that needs remote state ran. */
  error: RemoteError | null;
  cursor: string | null;
  created: string[];
  updated: string[];
  pushed: string[];
  deleted: string[];
  adopted: string[];
  deferred: string[];
  conflicts: SyncConflictRecord[];
  failures: SyncFailure[];
}

export interface NewNoteInput {
  title: string;
  kind?: NoteKind;
  body?: string;
  items?: Array<{ text: string; checked?: boolean }>;
  labels?: string[];
  color?: string;
  pinned?: boolean;
}

export interface SyncEngineOptions {
  store: EntityStore;
  remote: RemoteClient;
  paths: ArtifactPaths;
  files: ArtifactStore;
  buffers: ArtifactStore;
  status: SyncStatus;
  logger: Logger;
  retry: RetryPolicy;
  remoteTimeoutMs: number;
  persist?: (snapshot: StoreSnapshot) => Promise<void>;
  now?: () => number;
}

function emptyReport(cursor: string | null): SyncReport {
  return {
    error: null,
    cursor,
    created: [],
    updated: [],
    pushed: [],
    deleted: [],
    adopted: [],
    deferred: [],
    conflicts: [],
    failures: [],
  };
}

function errorCode(err: unknown): string {
  if (err instanceof RemoteError) {
    return `remote:${err.code}`;
  }
  if (err instanceof ParseError) {
    return 'parse';
  }
  if (err instanceof ValidationError) {
    return 'validation';
  }
  return 'internal';
}

/**
 * Reconciles the entity store, its local artifacts and the remote service. Work on one
 * note is serialised through a keyed queue; a failure on one note never stops the
 * others.
 */
export class SyncEngine {
  private readonly store: EntityStore;
  private readonly remote: RemoteClient;
  private readonly paths: ArtifactPaths;
  private readonly files: ArtifactStore;
  private readonly buffers: ArtifactStore;
  private readonly status: SyncStatus;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly remoteTimeoutMs: number;
  private readonly persist: ((snapshot: StoreSnapshot) => Promise<void>) | undefined;
  private readonly now: () => number;
  private readonly queue = new KeyedQueue();
  private running: Promise<SyncReport> | null = null;

  constructor(options: SyncEngineOptions) {
    this.store = options.store;
    this.remote = options.remote;
    this.paths = options.paths;
    this.files = options.files;
    this.buffers = options.buffers;
    this.status = options.status;
    this.logger = options.logger;
    this.retry = options.retry;
    this.remoteTimeoutMs = options.remoteTimeoutMs;
    this.persist = options.persist;
    this.now = options.now ?? Date.now;
  }

  /**
   * Runs one reconciliation cycle. A call made while a cycle is running joins it.
   */
  async runCycle(): Promise<SyncReport> {
    if (this.running) {
      return this.running;
    }
    const cycle = this.cycle();
    this.running = cycle;
    try {
      return await cycle;
    } finally {
      this.running = null;
    }
  }

  /**
   * Resolves once the running cycle and every queued note operation have finished.
   */
  async idle(): Promise<void> {
    if (this.running) {
      await this.running;
    }
    await this.queue.idle();
  }

  /**
   * Accepts text from the host editor for a note's artifact. The write goes through the
   * engine so it is not mistaken for an outside edit; the next cycle pushes it.
   */
  async submitLocalEdit(noteId: string, text: string): Promise<void> {
    await this.queue.run(noteId, async () => {
      const mapping = this.store.getMapping(noteId);
      if (!mapping) {
        throw new ValidationError(`Note ${noteId} has no local artifact`);
      }
      const mtimeMs = await this.storeFor(mapping.artifact).write(
        artifactName(mapping.artifact),
        text,
      );
      this.store.updateMapping(noteId, { lastWrittenMtimeMs: mtimeMs });
    });
    await this.save();
  }

  /**
   * Creates a note under a temporary id and writes its artifact. The remote side learns
   * about it on the next cycle.
   */
  async createNote(input: NewNoteInput): Promise<Note> {
    const id = `local-${randomUUID()}`;
    const timestamp = new Date(this.now()).toISOString();
    const labels = this.resolveLabels(normalizeLabelNames(input.labels), id);
    const header = {
      id,
      title: input.title,
      color: input.color ?? DEFAULT_NOTE_COLOR,
      labels,
      pinned: input.pinned ?? false,
      archived: false,
      trashed: false,
      serverRevision: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    const kind = input.kind ?? (input.items ? 'list' : 'text');
    const note: NoteInput =
      kind === 'list'
        ? {
            ...header,
            kind: 'list',
            items: (input.items ?? []).map((item, index) => ({
              text: item.text,
              checked: item.checked ?? false,
              sortIndex: index * SORT_INDEX_STEP,
            })),
          }
        : { ...header, kind: 'text', body: input.body ?? '' };

    const stored = await this.queue.run(id, async () => {
      const created = this.store.upsert(note);
      await this.writeNoteArtifact(created, undefined);
      return created;
    });
    await this.save();
    return stored;
  }

  /**
   * Moves a note to the remote trash. Refused while the artifact holds unsynced edits.
   */
  async trashNote(noteId: string): Promise<Note> {
    const trashed = await this.queue.run(noteId, async () => {
      const note = this.requireNote(noteId);
      const mapping = this.store.getMapping(noteId);
      if (mapping) {
        const text = await this.storeFor(mapping.artifact).read(artifactName(mapping.artifact));
        if (text !== null && fingerprintText(text) !== mapping.lastKnownFingerprint) {
          throw new ValidationError(`Note ${noteId} has unsynced local edits`);
        }
      }
      const { serverRevision } = await callRemote(
        'trash',
        () => this.remote.trash(toRemoteNote(note)),
        this.remoteTimeoutMs,
      );
      const updated = this.store.upsert({ ...note, trashed: true, serverRevision });
      await this.writeNoteArtifact(updated, mapping);
      return updated;
    });
    await this.save();
    return trashed;
  }

  private async cycle(): Promise<SyncReport> {
    const report = emptyReport(this.store.cursor);

    let delta: RemoteDelta;
    try {
      delta = await callRemote(
        'fetchDelta',
        () => this.remote.fetchDelta(this.store.cursor),
        this.remoteTimeoutMs,
      );
    } catch (err) {
      const error = asRemoteError(err);
      report.error = error;
      this.logger.error(`fetchDelta failed: ${error.message}`);
      this.status.report('error', `Sync failed: ${error.message}`);
      return report;
    }

    // Labels first so that notes in the same delta can reference them.
    for (const label of delta.labels) {
      this.applyRemoteLabel(label, report);
    }
    for (const id of delta.deletedLabelIds) {
      this.store.removeLabel(id);
    }

    const remoteNotes = new Map<string, RemoteNote>();
    for (const change of delta.changes) {
      if (change.type === 'delete') {
        const id = change.id;
        await this.guard(id, report, () => this.applyDeletion(id, report));
      } else {
        remoteNotes.set(change.note.id, change.note);
      }
    }

    for (const note of this.store.list()) {
      if (note.serverRevision === null) {
        await this.guard(note.id, report, () => this.pushCreation(note.id, report));
      }
    }

    let remoteFailed = false;
    const ids = new Set([...this.store.list().map((note) => note.id), ...remoteNotes.keys()]);
    for (const id of ids) {
      const remote = remoteNotes.get(id);
      const ok = await this.guard(id, report, () => this.reconcile(id, remote, report));
      if (!ok && remote) {
        remoteFailed = true;
      }
    }

    await this.adoptNewFiles(report);

    // Re-fetch the same changes next time when one of them could not be applied.
    if (!remoteFailed) {
      this.store.setCursor(delta.cursor);
    }
    report.cursor = this.store.cursor;
    await this.save();

    this.logger.info(
      `cycle done: ${report.updated.length} updated, ${report.pushed.length} pushed, ` +
        `${report.deleted.length} deleted, ${report.conflicts.length} conflicts, ` +
        `${report.failures.length} failures`,
    );
    if (report.failures.length === 0) {
      this.status.report('info', 'Sync complete');
    }
    return report;
  }

  private async guard(
    noteId: string,
    report: SyncReport,
    task: () => Promise<void>,
  ): Promise<boolean> {
    try {
      await this.queue.run(noteId, task);
      return true;
    } catch (err) {
      if (err instanceof RemoteError) {
        this.recordRemoteFailure(noteId, err);
      }
      const message = describeError(err);
      const level = err instanceof ParseError ? 'warn' : 'error';
      this.logger[level](`note ${noteId}: ${message}`);
      this.status.report(level, message, noteId);
      report.failures.push({ noteId, error: message, code: errorCode(err) });
      return false;
    }
  }

  private applyRemoteLabel(label: Label, report: SyncReport): void {
    try {
      const clash = this.store.findLabelByName(label.name);
      if (clash && clash.id !== label.id) {
        // The remote side renamed labels in an order we cannot replay; its state wins.
        this.store.removeLabel(clash.id);
      }
      this.store.upsertLabel(label);
    } catch (err) {
      const message = describeError(err);
      this.logger.warn(`label ${label.id}: ${message}`);
      report.failures.push({ noteId: label.id, error: message, code: errorCode(err) });
    }
  }

  private async applyDeletion(noteId: string, report: SyncReport): Promise<void> {
    const note = this.store.get(noteId);
    if (!note) {
      return;
    }
    const mapping = this.store.getMapping(noteId);
    if (mapping) {
      const artifacts = this.storeFor(mapping.artifact);
      const name = artifactName(mapping.artifact);
      const text = await artifacts.read(name);
      if (text !== null && fingerprintText(text) !== mapping.lastKnownFingerprint) {
        const variant = await this.freeVariantName(artifacts, name);
        await artifacts.rename(name, variant);
        this.logger.warn(`note ${noteId} was deleted remotely; local edits kept in ${variant}`);
        this.status.report('warn', `Deleted remotely, local edits kept in ${variant}`, noteId);
      } else {
        await artifacts.remove(name);
      }
    }
    this.store.remove(noteId);
    report.deleted.push(noteId);
  }

  private async pushCreation(tempId: string, report: SyncReport): Promise<void> {
    const note = this.store.get(tempId);
    if (!note || note.serverRevision !== null) {
      return;
    }
    const mapping = this.store.getMapping(tempId);
    if (mapping && this.isDeferred(mapping, report)) {
      return;
    }

    let current: NoteInput = note;
    let text: string | null = null;
    if (mapping) {
      text = await this.storeFor(mapping.artifact).read(artifactName(mapping.artifact));
      if (text !== null) {
        current = this.applyArtifactText(note, text, mapping) ?? note;
      }
    }

    const created = await callRemote(
      'create',
      () => this.remote.create(toRemoteNote(current)),
      this.remoteTimeoutMs,
    );
    if (current !== note) {
      this.store.upsert(current);
    }
    const rekeyed = this.store.rekey(tempId, created.id, created.serverRevision);
    report.created.push(rekeyed.id);

    const rekeyedMapping = this.store.getMapping(rekeyed.id);
    if (rekeyedMapping && text !== null) {
      const updatedText = writeArtifactHeader(
        text,
        rekeyed.id,
        rekeyed.title,
        rekeyedMapping.artifact.format,
      );
      const mtimeMs = await this.storeFor(rekeyedMapping.artifact).write(
        artifactName(rekeyedMapping.artifact),
        updatedText,
      );
      this.store.updateMapping(rekeyed.id, {
        lastKnownFingerprint: fingerprintText(updatedText),
        lastKnownServerRevision: created.serverRevision,
        lastWrittenMtimeMs: mtimeMs,
        ...this.clearedFailures(),
      });
    } else {
      await this.writeNoteArtifact(rekeyed, rekeyedMapping);
    }
  }

  private async reconcile(
    noteId: string,
    remote: RemoteNote | undefined,
    report: SyncReport,
  ): Promise<void> {
    let note = this.store.get(noteId);
    if (!note) {
      if (remote) {
        const created = this.acceptRemote(remote);
        await this.writeNoteArtifact(created, undefined);
        report.updated.push(noteId);
      }
      return;
    }
    // Pending creations are handled before reconciliation.
    if (note.serverRevision === null || isTemporaryNoteId(noteId)) {
      return;
    }

    let mapping = this.store.getMapping(noteId);
    if (!mapping) {
      const current =
        remote && remote.serverRevision !== note.serverRevision ? this.acceptRemote(remote) : note;
      await this.writeNoteArtifact(current, undefined);
      if (current !== note) {
        report.updated.push(noteId);
      }
      return;
    }

    mapping = await this.clearResolvedConflict(note, mapping);
    note = this.requireNote(noteId);
    const artifacts = this.storeFor(mapping.artifact);
    const name = artifactName(mapping.artifact);
    const text = await artifacts.read(name);
    const remoteChanged =
      remote !== undefined && remote.serverRevision !== mapping.lastKnownServerRevision;
    if (text === null) {
      const current = remote && remoteChanged ? this.acceptRemote(remote) : note;
      this.logger.info(`note ${noteId}: artifact ${name} is missing, rewriting it`);
      await this.writeNoteArtifact(current, mapping);
      if (remoteChanged) {
        report.updated.push(noteId);
      }
      return;
    }

    const localFingerprint = fingerprintText(text);
    const stat = await artifacts.stat(name);
    const state = classifyChange({
      localChanged: localFingerprint !== mapping.lastKnownFingerprint,
      remoteChanged,
      externalEdit: stat !== null && stat.mtimeMs !== mapping.lastWrittenMtimeMs,
    });
    this.logger.debug?.(`note ${noteId}: ${state}`);

    const mtimeMs = stat?.mtimeMs ?? null;
    await this.handleState(state, { note, mapping, text, remote, mtimeMs }, report);
  }

  private async handleState(
    state: ReconcileState,
    context: {
      note: Note;
      mapping: LocalMapping;
      text: string;
      remote: RemoteNote | undefined;
      mtimeMs: number | null;
    },
    report: SyncReport,
  ): Promise<void> {
    const { note, mapping, text, remote, mtimeMs } = context;

    switch (state) {
      case 'CLEAN':
        await this.relocate(note, mapping);
        return;

      case 'REMOTE_ONLY_CHANGED': {
        if (!remote) {
          return;
        }
        const updated = this.acceptRemote(remote);
        await this.writeNoteArtifact(updated, mapping);
        report.updated.push(note.id);
        return;
      }

      case 'BOTH_CHANGED': {
        if (!remote) {
          return;
        }
        report.conflicts.push(await this.recordConflict(note, mapping, text, remote));
        report.updated.push(note.id);
        return;
      }

      case 'EXTERNAL_EDIT_DETECTED':
      case 'LOCAL_ONLY_CHANGED':
        if (this.isDeferred(mapping, report)) {
          return;
        }
        await this.pushLocal(
          { note, mapping, text, mtimeMs, backup: state === 'EXTERNAL_EDIT_DETECTED' },
          report,
        );
        return;
    }
  }

  private async pushLocal(
    context: {
      note: Note;
      mapping: LocalMapping;
      text: string;
      mtimeMs: number | null;
      /** Store the previous remote state as a trashed copy before pushing. */
      backup: boolean;
    },
    report: SyncReport,
  ): Promise<void> {
    const { note, mapping, text, mtimeMs } = context;
    const merged = this.applyArtifactText(note, text, mapping);
    const acknowledged = {
      lastKnownFingerprint: fingerprintText(text),
      lastWrittenMtimeMs: mtimeMs,
    };

    if (!merged) {
      // Formatting-only edit: nothing the remote side could store.
      this.store.updateMapping(note.id, acknowledged);
      return;
    }
    // A retry after a failed push must not store a second copy of the same revision.
    if (context.backup && mapping.backedUpRevision !== note.serverRevision) {
      await this.backupRemoteState(note);
      this.store.updateMapping(note.id, { backedUpRevision: note.serverRevision });
    }

    const { serverRevision } = await callRemote(
      'push',
      () => this.remote.push(toRemoteNote(merged)),
      this.remoteTimeoutMs,
    );
    this.store.upsert({ ...merged, serverRevision, stale: false });
    this.store.updateMapping(note.id, {
      ...acknowledged,
      lastKnownServerRevision: serverRevision,
      backedUpRevision: null,
      ...this.clearedFailures(),
    });
    report.pushed.push(note.id);
    await this.relocate(this.requireNote(note.id), this.requireMapping(note.id));
  }

  /**
   * Parses the artifact and returns the note it describes, or null when the artifact
   * adds nothing. The store is not touched.
   */
  private applyArtifactText(note: Note, text: string, mapping: LocalMapping): NoteInput | null {
    const name = artifactName(mapping.artifact);
    let partial: PartialNote;
    try {
      partial = fromText(text, {
        kind: note.kind,
        format: mapping.artifact.format,
        artifact: name,
      });
    } catch (err) {
      throw err instanceof ParseError ? err.withArtifact(name) : err;
    }

    const now = () => new Date(this.now());
    const result = applyParsed(note, partial, this.store.listLabels(), now);
    if (result.unknownLabels.length > 0) {
      const names = result.unknownLabels.join(', ');
      this.logger.warn(`note ${note.id}: ignoring unknown labels ${names}`);
      this.status.report('warn', `Unknown labels ignored: ${names}`, note.id);
    }
    return result.changed ? result.note : null;
  }

  private async backupRemoteState(note: Note): Promise<void> {
    const stamp = new Date(this.now()).toISOString();
    const backup = toRemoteNote({
      ...note,
      title: `${note.title} (backup ${stamp})`,
      trashed: true,
    });
    const created = await callRemote(
      'createBackupCopy',
      () => this.remote.createBackupCopy(backup),
      this.remoteTimeoutMs,
    );
    this.logger.info(`note ${note.id}: edited outside the engine, backup stored as ${created.id}`);
    this.status.report('info', 'Outside edit detected; previous version backed up', note.id);
  }

  private async recordConflict(
    note: Note,
    mapping: LocalMapping,
    localText: string,
    remote: RemoteNote,
  ): Promise<SyncConflictRecord> {
    const artifacts = this.storeFor(mapping.artifact);
    const primaryName = artifactName(mapping.artifact);
    const variantName = await this.freeVariantName(artifacts, primaryName);
    await artifacts.write(variantName, localText);

    const updated = this.store.upsert({ ...this.remoteInput(remote), hasConflict: true });
    const written = await this.writeNoteArtifact(updated, {
      ...mapping,
      conflictArtifacts: [
        ...mapping.conflictArtifacts,
        withArtifactName(mapping.artifact, variantName),
      ],
    });
    const remoteText = toText(updated, this.store.labelNames(updated), written.artifact.format);

    const record: SyncConflictRecord = {
      noteId: note.id,
      localFingerprint: fingerprintText(localText),
      remoteFingerprint: fingerprintText(remoteText),
      primaryArtifact: artifactName(written.artifact),
      localVariantArtifact: variantName,
      patch: createTwoFilesPatch(
        variantName,
        artifactName(written.artifact),
        localText,
        remoteText,
        'local',
        'remote',
      ),
    };
    const conflict = new ConflictError(record);
    this.logger.warn(`${conflict.message}; local version kept in ${variantName}`);
    this.status.report('warn', `Conflict: local version kept in ${variantName}`, note.id);
    return record;
  }

  /**
   * Clears the conflict flag once every local variant is gone. Variants are looked up in
   * their own store, which differs from the primary's after a move to a buffer.
   */
  private async clearResolvedConflict(note: Note, mapping: LocalMapping): Promise<LocalMapping> {
    if (mapping.conflictArtifacts.length === 0) {
      if (note.hasConflict) {
        this.store.upsert({ ...note, hasConflict: false });
      }
      return mapping;
    }
    const open: LocalArtifact[] = [];
    for (const variant of mapping.conflictArtifacts) {
      if ((await this.storeFor(variant).stat(artifactName(variant))) !== null) {
        open.push(variant);
      }
    }
    if (open.length === mapping.conflictArtifacts.length) {
      return mapping;
    }
    if (open.length === 0) {
      this.store.upsert({ ...note, hasConflict: false });
      this.logger.info(`note ${note.id}: conflict resolved`);
    }
    return this.store.updateMapping(note.id, { conflictArtifacts: open });
  }

  private async adoptNewFiles(report: SyncReport): Promise<void> {
    const syncDir = this.paths.syncDir;
    if (!syncDir) {
      return;
    }
    const candidates = await this.files.list(extensionFor(this.paths.format));
    const firstAdopted = report.adopted.length;
    for (const filePath of candidates) {
      if (isLocalVariant(filePath) || this.store.findMappingByArtifact(filePath)) {
        continue;
      }
      await this.guard(`file:${filePath}`, report, () =>
        this.adoptFile(filePath, syncDir, report),
      );
    }

    for (const id of report.adopted.slice(firstAdopted)) {
      await this.guard(id, report, () => this.pushCreation(id, report));
    }
  }

  private async adoptFile(filePath: string, syncDir: string, report: SyncReport): Promise<void> {
    const text = await this.files.read(filePath);
    if (text === null) {
      return;
    }
    const format = formatForPath(filePath) ?? this.paths.format;
    const header = readArtifactHeader(text);
    if (header.id !== undefined) {
      const variant = await this.freeVariantName(this.files, filePath);
      await this.files.rename(filePath, variant);
      this.logger.warn(`${filePath} names unknown note ${header.id}; moved to ${variant}`);
      this.status.report('warn', `Unknown note id ${header.id}; file moved to ${variant}`);
      return;
    }

    const id = `local-${randomUUID()}`;
    const title = header.title ?? path.basename(filePath, path.extname(filePath));
    const withHeader = writeArtifactHeader(text, id, title, format);
    const partial = fromText(withHeader, { format, artifact: filePath });
    const timestamp = new Date(this.now()).toISOString();
    const relative = path.relative(syncDir, filePath);
    const base = {
      id,
      title,
      color: DEFAULT_NOTE_COLOR,
      labels: this.resolveLabels(partial.labelNames, id),
      pinned: false,
      archived: relative.split(path.sep)[0] === ARCHIVE_DIR,
      trashed: false,
      serverRevision: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    const note: NoteInput =
      partial.content.kind === 'list'
        ? {
            ...base,
            kind: 'list',
            items: partial.content.items.map((item, index) => ({
              ...item,
              sortIndex: index * SORT_INDEX_STEP,
            })),
          }
        : { ...base, kind: 'text', body: partial.content.body };

    this.store.upsert(note);
    const mtimeMs = await this.files.write(filePath, withHeader);
    const mapping = createMapping(id, { kind: 'file', path: filePath, format });
    this.store.setMapping({
      ...mapping,
      lastKnownFingerprint: fingerprintText(withHeader),
      lastWrittenMtimeMs: mtimeMs,
    });
    report.adopted.push(id);
    this.logger.info(`adopted ${filePath} as ${id}`);
  }

  private resolveLabels(names: string[], noteId: string): string[] {
    const ids: string[] = [];
    for (const name of names) {
      const label = this.store.findLabelByName(name);
      if (label) {
        ids.push(label.id);
      } else {
        this.logger.warn(`note ${noteId}: ignoring unknown label ${name}`);
      }
    }
    return ids;
  }

  /**
   * Stores a remote note, keeping local sync flags and dropping labels we do not know.
   */
  private acceptRemote(remote: RemoteNote): Note {
    return this.store.upsert(this.remoteInput(remote));
  }

  private remoteInput(remote: RemoteNote): NoteInput {
    const unknown = remote.labels.filter((id) => !this.store.getLabel(id));
    if (unknown.length === 0) {
      return remote;
    }
    this.logger.warn(`note ${remote.id}: dropping unknown label ids ${unknown.join(', ')}`);
    return { ...remote, labels: remote.labels.filter((id) => this.store.getLabel(id)) };
  }

  /**
   * Renders `note` into the artifact it should live in, replacing the previous artifact
   * when the location changed.
   */
  private async writeNoteArtifact(
    note: Note,
    previous: LocalMapping | undefined,
  ): Promise<LocalMapping> {
    const target = this.paths.targetFor(note, this.store.list());
    const name = artifactName(target);
    const previousName = previous ? artifactName(previous.artifact) : undefined;
    if (previousName !== name) {
      await this.clearTarget(target);
    }

    const text = toText(note, this.store.labelNames(note), target.format);
    const mtimeMs = await this.storeFor(target).write(name, text);
    if (previous && previousName !== undefined && previousName !== name) {
      await this.storeFor(previous.artifact).remove(previousName);
    }

    const mapping: LocalMapping = {
      ...(previous ?? createMapping(note.id, target)),
      artifact: target,
      lastKnownFingerprint: fingerprintText(text),
      lastKnownServerRevision: note.serverRevision,
      lastWrittenMtimeMs: mtimeMs,
    };
    this.store.setMapping(mapping);
    return mapping;
  }

  /**
   * Moves an unchanged artifact when its target changed (title, archive state, format).
   */
  private async relocate(note: Note, mapping: LocalMapping): Promise<void> {
    const target = this.paths.targetFor(note, this.store.list());
    const from = artifactName(mapping.artifact);
    const to = artifactName(target);
    if (from === to) {
      return;
    }
    if (target.format !== mapping.artifact.format) {
      await this.writeNoteArtifact(note, mapping);
      return;
    }

    await this.clearTarget(target);
    let mtimeMs: number | null;
    if (target.kind === mapping.artifact.kind) {
      const artifacts = this.storeFor(target);
      await artifacts.rename(from, to);
      mtimeMs = (await artifacts.stat(to))?.mtimeMs ?? null;
    } else {
      const text = await this.storeFor(mapping.artifact).read(from);
      if (text === null) {
        return;
      }
      mtimeMs = await this.storeFor(target).write(to, text);
      await this.storeFor(mapping.artifact).remove(from);
    }
    this.store.updateMapping(note.id, { artifact: target, lastWrittenMtimeMs: mtimeMs });
    this.logger.debug?.(`note ${note.id}: moved ${from} to ${to}`);
  }

  /**
   * Moves an unmapped file out of the way before a note takes its name.
   */
  private async clearTarget(target: LocalArtifact): Promise<void> {
    const name = artifactName(target);
    if (this.store.findMappingByArtifact(name)) {
      return;
    }
    const artifacts = this.storeFor(target);
    if ((await artifacts.read(name)) === null) {
      return;
    }
    const variant = await this.freeVariantName(artifacts, name);
    await artifacts.rename(name, variant);
    this.logger.warn(`moved unrelated ${name} to ${variant}`);
  }

  /** First local variant name next to `name` that nothing occupies. */
  private async freeVariantName(artifacts: ArtifactStore, name: string): Promise<string> {
    for (let attempt = 0; ; attempt += 1) {
      const candidate = localVariantName(name, attempt);
      if ((await artifacts.stat(candidate)) === null) {
        return candidate;
      }
    }
  }

  private isDeferred(mapping: LocalMapping, report: SyncReport): boolean {
    if (mapping.nextAttemptAt !== null && this.now() < mapping.nextAttemptAt) {
      report.deferred.push(mapping.noteId);
      return true;
    }
    return false;
  }

  private recordRemoteFailure(noteId: string, err: RemoteError): void {
    const mapping = this.store.getMapping(noteId);
    if (!mapping) {
      return;
    }
    const failureCount = mapping.failureCount + 1;
    this.store.updateMapping(noteId, {
      failureCount,
      nextAttemptAt: this.now() + backoffDelayMs(failureCount, this.retry),
      lastError: err.message,
    });
    const note = this.store.get(noteId);
    if (note && !note.stale && failureCount >= this.retry.staleAfterFailures) {
      this.store.upsert({ ...note, stale: true });
      this.status.report('warn', `Note has failed to sync ${failureCount} times`, noteId);
    }
  }

  private clearedFailures(): Pick<LocalMapping, 'failureCount' | 'nextAttemptAt' | 'lastError'> {
    return { failureCount: 0, nextAttemptAt: null, lastError: null };
  }

  private storeFor(artifact: LocalArtifact): ArtifactStore {
    return artifact.kind === 'file' ? this.files : this.buffers;
  }

  private requireNote(noteId: string): Note {
    const note = this.store.get(noteId);
    if (!note) {
      throw new ValidationError(`Unknown note ${noteId}`);
    }
    return note;
  }

  private requireMapping(noteId: string): LocalMapping {
    const mapping = this.store.getMapping(noteId);
    if (!mapping) {
      throw new ValidationError(`No mapping for note ${noteId}`);
    }
    return mapping;
  }

  private async save(): Promise<void> {
    if (this.persist) {
      await this.persist(this.store.snapshot());
    }
  }
}
