import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { RemoteError } from '@notesync/shared';

import { BufferArtifactStore } from '../artifacts/bufferArtifactStore';
import { FsArtifactStore } from '../artifacts/fsArtifactStore';
import { ArtifactPaths } from '../mapper/artifactPaths';
import { SyncStatus } from '../status';
import { EntityStore } from '../store/entityStore';
import { fingerprintText } from '../store/fingerprint';
import { createSilentLogger, createTempDir } from '../testing/fixtures';
import { MemoryRemoteClient } from './memoryRemoteClient';
import type { RemoteNote } from './remoteClient';
import { SyncEngine } from './syncEngine';

type RemoteTextNote = Extract<RemoteNote, { kind: 'text' }>;

const TRIP: RemoteTextNote = {
  id: '42',
  title: 'Trip',
  kind: 'text',
  body: 'Pack bags',
  color: 'default',
  labels: ['l1'],
  pinned: false,
  archived: false,
  trashed: false,
  serverRevision: null,
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

const TRIP_TEXT = '# Trip\nid: 42\nlabels: travel\n\nPack bags\n';
const START = Date.parse('2024-03-01T00:00:00.000Z');

async function createHarness() {
  const dir = await createTempDir('notesync-sync');
  const logger = createSilentLogger();
  const store = new EntityStore({ logger });
  const remote = new MemoryRemoteClient();
  const buffers = new BufferArtifactStore();
  const status = new SyncStatus();
  const clock = { now: START };
  const engine = new SyncEngine({
    store,
    remote,
    paths: new ArtifactPaths({ syncDir: dir, syncArchived: false, format: 'keep' }),
    files: new FsArtifactStore(dir),
    buffers,
    status,
    logger,
    retry: { baseDelayMs: 1_000, maxDelayMs: 8_000, staleAfterFailures: 2 },
    remoteTimeoutMs: 50,
    now: () => clock.now,
  });
  remote.putLabel({ id: 'l1', name: 'travel' });

  return {
    dir,
    logger,
    store,
    remote,
    buffers,
    status,
    clock,
    engine,
    tripPath: path.join(dir, 'Trip.keep'),
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = () => done();
  });
  return { promise, resolve: () => resolve() };
}

async function editOutsideEngine(filePath: string, text: string): Promise<void> {
  await fs.writeFile(filePath, text, 'utf-8');
  const later = new Date('2030-01-01T00:00:00.000Z');
  await fs.utimes(filePath, later, later);
}

describe('SyncEngine remote changes', () => {
  it('writes an artifact for a new remote note', async () => {
    const { engine, remote, store, tripPath } = await createHarness();
    remote.putNote(TRIP);

    const report = await engine.runCycle();

    expect(report.error).toBeNull();
    expect(report.updated).toEqual(['42']);
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(TRIP_TEXT);
    expect(store.get('42')).toMatchObject({ serverRevision: 'r2', labels: ['l1'] });
    expect(store.getMapping('42')?.lastKnownServerRevision).toBe('r2');
    expect(store.cursor).toBe('2');
  });

  it('applies the same delta twice without changes', async () => {
    const { engine, remote, store, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();
    const generation = store.generation;
    const mapping = store.getMapping('42');

    store.setCursor(null);
    const report = await engine.runCycle();

    expect(report.updated).toEqual([]);
    expect(report.pushed).toEqual([]);
    expect(store.generation).toBe(generation);
    expect(store.getMapping('42')).toEqual(mapping);
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(TRIP_TEXT);
  });

  it('moves an archived note into a buffer when archives are not synced', async () => {
    const { engine, remote, buffers, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    remote.putNote({ ...TRIP, archived: true });
    await engine.runCycle();

    await expect(fs.readFile(tripPath, 'utf-8')).rejects.toThrow();
    await expect(buffers.read('notesync://42/Trip.keep')).resolves.toBe(TRIP_TEXT);
  });

  it('deletes clean artifacts and keeps modified ones as local variants', async () => {
    const { engine, remote, store, dir, tripPath } = await createHarness();
    remote.putNote(TRIP);
    remote.putNote({ ...TRIP, id: '43', title: 'Packing' });
    await engine.runCycle();
    const packingPath = path.join(dir, 'Packing.keep');
    await editOutsideEngine(packingPath, '# Packing\nid: 43\n\nunsaved\n');

    remote.deleteNote('42');
    remote.deleteNote('43');
    const report = await engine.runCycle();

    expect(report.deleted).toEqual(['42', '43']);
    expect(store.list()).toEqual([]);
    await expect(fs.readFile(tripPath, 'utf-8')).rejects.toThrow();
    await expect(fs.readFile(`${packingPath}.local`, 'utf-8')).resolves.toBe(
      '# Packing\nid: 43\n\nunsaved\n',
    );
  });

  it('reports a fetch timeout and leaves the store alone', async () => {
    const { engine, remote, store } = await createHarness();
    remote.hang('fetchDelta');

    const report = await engine.runCycle();

    expect(report.error).toBeInstanceOf(RemoteError);
    expect(report.error?.code).toBe('timeout');
    expect(store.list()).toEqual([]);
    expect(store.cursor).toBeNull();
  });
});

describe('SyncEngine local changes', () => {
  it('pushes edits submitted through the engine without a backup', async () => {
    const { engine, remote, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    await engine.submitLocalEdit('42', '# Trip\nid: 42\nlabels: travel\n\nPack bags\nBook hotel\n');
    const report = await engine.runCycle();

    expect(report.pushed).toEqual(['42']);
    expect(remote.getNote('42')).toMatchObject({ body: 'Pack bags\nBook hotel' });
    expect(remote.calls.filter((call) => call.operation === 'createBackupCopy')).toEqual([]);
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nPack bags\nBook hotel\n',
    );
  });

  it('backs up the remote state before pushing an outside edit', async () => {
    const { engine, remote, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    await editOutsideEngine(tripPath, '# Trip\nid: 42\nlabels: travel\n\nPack light\n');
    const report = await engine.runCycle();

    expect(report.pushed).toEqual(['42']);
    expect(remote.getNote('1')).toMatchObject({
      title: 'Trip (backup 2024-03-01T00:00:00.000Z)',
      body: 'Pack bags',
      trashed: true,
    });
    expect(remote.getNote('42')).toMatchObject({ body: 'Pack light', trashed: false });
  });

  it('stores one backup when the push after an outside edit is retried', async () => {
    const { engine, remote, store, clock, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    await editOutsideEngine(tripPath, '# Trip\nid: 42\nlabels: travel\n\nPack light\n');
    remote.failNext('push');
    const failed = await engine.runCycle();
    expect(failed.failures).toEqual([{ noteId: '42', error: 'offline', code: 'remote:network' }]);
    expect(store.getMapping('42')?.backedUpRevision).toBe('r2');

    clock.now += 1_000;
    const retried = await engine.runCycle();

    expect(retried.pushed).toEqual(['42']);
    expect(remote.calls.filter((call) => call.operation === 'createBackupCopy')).toHaveLength(1);
    expect(remote.getNote('42')).toMatchObject({ body: 'Pack light' });
    expect(store.getMapping('42')?.backedUpRevision).toBeNull();
  });

  it('records a conflict when both sides changed and clears it once resolved', async () => {
    const { engine, remote, store, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    remote.putNote({ ...TRIP, body: 'Remote body' });
    await editOutsideEngine(tripPath, '# Trip\nid: 42\nlabels: travel\n\nLocal body\n');
    const report = await engine.runCycle();

    expect(report.conflicts).toHaveLength(1);
    expect(report.conflicts[0]).toMatchObject({
      noteId: '42',
      primaryArtifact: tripPath,
      localVariantArtifact: `${tripPath}.local`,
    });
    expect(report.pushed).toEqual([]);
    expect(store.get('42')?.hasConflict).toBe(true);
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nRemote body\n',
    );
    await expect(fs.readFile(`${tripPath}.local`, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nLocal body\n',
    );
    expect(remote.calls.filter((call) => call.operation === 'push')).toEqual([]);

    await fs.rm(`${tripPath}.local`);
    await engine.runCycle();

    expect(store.get('42')?.hasConflict).toBe(false);
    expect(store.getMapping('42')?.conflictArtifacts).toEqual([]);
  });

  it('keeps every local variant when conflicts repeat before one is resolved', async () => {
    const { engine, remote, store, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    remote.putNote({ ...TRIP, body: 'Remote one' });
    await editOutsideEngine(tripPath, '# Trip\nid: 42\nlabels: travel\n\nLocal ONE\n');
    await engine.runCycle();
    remote.putNote({ ...TRIP, body: 'Remote two' });
    await editOutsideEngine(tripPath, '# Trip\nid: 42\nlabels: travel\n\nLocal TWO\n');
    const report = await engine.runCycle();

    expect(report.conflicts).toHaveLength(1);
    expect(report.conflicts[0]?.localVariantArtifact).toBe(`${tripPath}.local.1`);
    await expect(fs.readFile(`${tripPath}.local`, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nLocal ONE\n',
    );
    await expect(fs.readFile(`${tripPath}.local.1`, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nLocal TWO\n',
    );
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nRemote two\n',
    );
    expect(store.getMapping('42')?.conflictArtifacts).toEqual([
      { kind: 'file', path: `${tripPath}.local`, format: 'keep' },
      { kind: 'file', path: `${tripPath}.local.1`, format: 'keep' },
    ]);

    await fs.rm(`${tripPath}.local`);
    await engine.runCycle();
    expect(store.get('42')?.hasConflict).toBe(true);
    expect(store.getMapping('42')?.conflictArtifacts).toEqual([
      { kind: 'file', path: `${tripPath}.local.1`, format: 'keep' },
    ]);

    await fs.rm(`${tripPath}.local.1`);
    await engine.runCycle();
    expect(store.get('42')?.hasConflict).toBe(false);
  });

  it('keeps the conflict open after the note moves into a buffer', async () => {
    const { engine, remote, store, buffers, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    remote.putNote({ ...TRIP, trashed: true });
    await editOutsideEngine(tripPath, '# Trip\nid: 42\nlabels: travel\n\nLocal body\n');
    const report = await engine.runCycle();

    expect(report.conflicts).toHaveLength(1);
    await expect(fs.readFile(tripPath, 'utf-8')).rejects.toThrow();
    await expect(buffers.read('notesync://42/Trip.keep')).resolves.toBe(TRIP_TEXT);

    await engine.runCycle();

    expect(store.get('42')?.hasConflict).toBe(true);
    expect(store.getMapping('42')?.conflictArtifacts).toEqual([
      { kind: 'file', path: `${tripPath}.local`, format: 'keep' },
    ]);
    await expect(fs.readFile(`${tripPath}.local`, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nLocal body\n',
    );

    await fs.rm(`${tripPath}.local`);
    await engine.runCycle();
    expect(store.get('42')?.hasConflict).toBe(false);
  });

  it('moves edits of a deleted note past an existing local variant', async () => {
    const { engine, remote, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();
    await fs.writeFile(`${tripPath}.local`, 'older local text\n', 'utf-8');
    await editOutsideEngine(tripPath, '# Trip\nid: 42\n\nunsaved\n');

    remote.deleteNote('42');
    await engine.runCycle();

    await expect(fs.readFile(`${tripPath}.local`, 'utf-8')).resolves.toBe('older local text\n');
    await expect(fs.readFile(`${tripPath}.local.1`, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\n\nunsaved\n',
    );
  });

  it('backs off a failing note without holding up the others', async () => {
    const { engine, remote, store, clock, dir } = await createHarness();
    remote.putNote(TRIP);
    remote.putNote({ ...TRIP, id: '43', title: 'Packing' });
    await engine.runCycle();
    const packingPath = path.join(dir, 'Packing.keep');

    await engine.submitLocalEdit('42', '# Trip\nid: 42\nlabels: travel\n\nPack snacks\n');
    await engine.submitLocalEdit('43', '# Packing\nid: 43\nlabels: travel\n\nSocks\n');
    remote.failNext('push');
    const first = await engine.runCycle();

    expect(first.pushed).toEqual(['43']);
    expect(first.failures).toEqual([
      { noteId: '42', error: 'offline', code: 'remote:network' },
    ]);
    expect(store.getMapping('42')).toMatchObject({
      failureCount: 1,
      nextAttemptAt: START + 1_000,
      lastError: 'offline',
    });
    expect(store.get('42')?.stale).toBe(false);
    await expect(fs.readFile(packingPath, 'utf-8')).resolves.toBe(
      '# Packing\nid: 43\nlabels: travel\n\nSocks\n',
    );

    const waiting = await engine.runCycle();
    expect(waiting.deferred).toEqual(['42']);
    expect(waiting.pushed).toEqual([]);

    clock.now += 1_000;
    remote.failNext('push');
    const second = await engine.runCycle();
    expect(second.failures).toHaveLength(1);
    expect(store.getMapping('42')).toMatchObject({
      failureCount: 2,
      nextAttemptAt: START + 3_000,
    });
    expect(store.get('42')?.stale).toBe(true);

    clock.now += 2_000;
    const third = await engine.runCycle();
    expect(third.pushed).toEqual(['42']);
    expect(store.get('42')?.stale).toBe(false);
    expect(store.getMapping('42')).toMatchObject({
      failureCount: 0,
      nextAttemptAt: null,
      lastError: null,
    });
    expect(remote.getNote('42')).toMatchObject({ body: 'Pack snacks' });
  });

  it('reports a malformed artifact and leaves it untouched', async () => {
    const { engine, remote, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();
    const broken = '# Trip\nid: 4 2\n\nPack bags\n';

    await editOutsideEngine(tripPath, broken);
    const report = await engine.runCycle();

    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ noteId: '42', code: 'parse' });
    expect(report.pushed).toEqual([]);
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(broken);
  });

  it('refuses to trash a note with unsynced edits', async () => {
    const { engine, remote } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    await engine.submitLocalEdit('42', '# Trip\nid: 42\nlabels: travel\n\nUnsaved\n');

    await expect(engine.trashNote('42')).rejects.toThrow('Note 42 has unsynced local edits');
    expect(remote.getNote('42')?.trashed).toBe(false);
  });

  it('trashes a clean note and moves it into a buffer', async () => {
    const { engine, remote, buffers, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();

    const trashed = await engine.trashNote('42');

    expect(trashed).toMatchObject({ trashed: true, serverRevision: 'r3' });
    expect(remote.getNote('42')?.trashed).toBe(true);
    await expect(fs.readFile(tripPath, 'utf-8')).rejects.toThrow();
    await expect(buffers.read('notesync://42/Trip.keep')).resolves.toBe(TRIP_TEXT);
  });
});

describe('SyncEngine per-note ordering', () => {
  const SNACKS = '# Trip\nid: 42\nlabels: travel\n\nPack snacks\n';

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  async function holdPush(remote: MemoryRemoteClient) {
    const entered = deferred();
    const gate = deferred();
    vi.spyOn(remote, 'push').mockImplementation(async (note) => {
      entered.resolve();
      await gate.promise;
      return { serverRevision: remote.putNote(note).serverRevision };
    });
    return { entered: entered.promise, release: gate.resolve };
  }

  it('holds a local edit until the cycle has pushed the same note', async () => {
    const { engine, remote, store, tripPath } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();
    await engine.submitLocalEdit('42', SNACKS);
    const push = await holdPush(remote);

    const cycle = engine.runCycle();
    await push.entered;
    let editDone = false;
    const edit = engine
      .submitLocalEdit('42', '# Trip\nid: 42\nlabels: travel\n\nPack socks\n')
      .then(() => {
        editDone = true;
      });
    await new Promise((resolve) => setImmediate(resolve));

    expect(editDone).toBe(false);
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(SNACKS);

    push.release();
    const report = await cycle;
    await edit;

    expect(report.pushed).toEqual(['42']);
    expect(remote.getNote('42')).toMatchObject({ body: 'Pack snacks' });
    await expect(fs.readFile(tripPath, 'utf-8')).resolves.toBe(
      '# Trip\nid: 42\nlabels: travel\n\nPack socks\n',
    );
    expect(store.getMapping('42')?.lastKnownFingerprint).toBe(fingerprintText(SNACKS));
  });

  it('runs a trash request after the cycle has committed the pending edit', async () => {
    const { engine, remote, buffers } = await createHarness();
    remote.putNote(TRIP);
    await engine.runCycle();
    await engine.submitLocalEdit('42', SNACKS);
    const push = await holdPush(remote);

    const cycle = engine.runCycle();
    await push.entered;
    const trashed = engine.trashNote('42');
    push.release();

    await cycle;
    await expect(trashed).resolves.toMatchObject({ trashed: true });
    expect(remote.getNote('42')).toMatchObject({ body: 'Pack snacks', trashed: true });
    await expect(buffers.read('notesync://42/Trip.keep')).resolves.toBe(SNACKS);
  });
});

describe('SyncEngine new notes', () => {
  it('creates a local note remotely and rewrites its id', async () => {
    const { engine, remote, store, dir } = await createHarness();

    const created = await engine.createNote({ title: 'Groceries', items: [{ text: 'milk' }] });
    expect(created.id.startsWith('local-')).toBe(true);
    expect(created.serverRevision).toBeNull();

    const report = await engine.runCycle();

    expect(report.created).toEqual(['1']);
    expect(store.get(created.id)).toBeUndefined();
    expect(store.get('1')).toMatchObject({ kind: 'list', serverRevision: 'r2' });
    expect(remote.getNote('1')).toMatchObject({
      title: 'Groceries',
      items: [{ text: 'milk', checked: false, sortIndex: 0 }],
    });
    await expect(fs.readFile(path.join(dir, 'Groceries.keep'), 'utf-8')).resolves.toBe(
      '# Groceries\nid: 1\n\n[ ] milk\n',
    );
  });

  it('adopts files without an id and sets aside files naming unknown notes', async () => {
    const { engine, remote, store, dir } = await createHarness();
    const ideasPath = path.join(dir, 'Ideas.keep');
    const strayPath = path.join(dir, 'Stray.keep');
    await fs.writeFile(ideasPath, 'first idea\nsecond idea\n', 'utf-8');
    await fs.writeFile(strayPath, '# Stray\nid: 999\n\nhello\n', 'utf-8');

    const report = await engine.runCycle();

    expect(report.adopted).toHaveLength(1);
    expect(report.created).toEqual(['1']);
    expect(store.get('1')).toMatchObject({ title: 'Ideas', kind: 'text' });
    expect(remote.getNote('1')).toMatchObject({ body: 'first idea\nsecond idea' });
    await expect(fs.readFile(ideasPath, 'utf-8')).resolves.toBe(
      '# Ideas\nid: 1\n\nfirst idea\nsecond idea\n',
    );
    await expect(fs.readFile(strayPath, 'utf-8')).rejects.toThrow();
    await expect(fs.readFile(`${strayPath}.local`, 'utf-8')).resolves.toBe(
      '# Stray\nid: 999\n\nhello\n',
    );
  });
});
