import path from 'node:path';

import type { Note } from '@notesync/shared';
import { RemoteError } from '@notesync/shared';

import { BufferArtifactStore } from './artifacts/bufferArtifactStore';
import { FsArtifactStore } from './artifacts/fsArtifactStore';
import type { ArtifactStore } from './artifacts/types';
import type { NoteSyncConfig } from './config';
import { cacheFilePath } from './config';
import type { CredentialVault } from './credentials/credentialVault';
import { FileCredentialVault } from './credentials/credentialVault';
import type { Logger } from './logger';
import { childLogger, createLogger } from './logger';
import { ArtifactPaths } from './mapper/artifactPaths';
import { LiveSearchSession } from './search/liveSearch';
import type { SearchOutcome, SearchResult } from './search/searchService';
import { SearchService } from './search/searchService';
import type { StatusMessage } from './status';
import { SyncStatus } from './status';
import { CacheFile } from './store/cacheFile';
import { EntityStore } from './store/entityStore';
import { artifactName } from './store/snapshot';
import type { RemoteClient } from './sync/remoteClient';
import type { NewNoteInput, SyncReport } from './sync/syncEngine';
import { SyncEngine } from './sync/syncEngine';

export type RemoteClientFactory = (token: string) => RemoteClient;

export interface NoteSyncEngineOptions {
  config: NoteSyncConfig;
  createRemoteClient: RemoteClientFactory;
  /** Defaults to a token file in the cache directory. */
  vault?: CredentialVault;
  logger?: Logger;
  now?: () => number;
}

export interface NoteArtifact {
  name: string;
  text: string;
}

/**
 * Entry point for hosts: owns the store and its cache file, signs in through the vault
 * and runs sync cycles and searches against one account.
 */
export class NoteSyncEngine {
  readonly store: EntityStore;
  private readonly config: NoteSyncConfig;
  private readonly createRemoteClient: RemoteClientFactory;
  private readonly vault: CredentialVault;
  private readonly logger: Logger;
  private readonly now: (() => number) | undefined;
  private readonly status = new SyncStatus();
  private readonly cache: CacheFile;
  private readonly paths: ArtifactPaths;
  private readonly buffers = new BufferArtifactStore();
  private readonly files: ArtifactStore;
  private readonly searchService: SearchService;
  private syncEngine: SyncEngine | null = null;
  private started = false;

  constructor(options: NoteSyncEngineOptions) {
    const { config } = options;
    this.config = config;
    this.createRemoteClient = options.createRemoteClient;
    this.logger = options.logger ?? createLogger('notesync', config.logLevel);
    this.now = options.now;
    this.vault =
      options.vault ??
      new FileCredentialVault(path.join(config.cacheDir, 'credentials.json'), config.account);
    this.store = new EntityStore({ logger: childLogger(this.logger, 'store') });
    this.cache = new CacheFile(cacheFilePath(config), childLogger(this.logger, 'cache'));
    this.paths = new ArtifactPaths({
      ...(config.syncDir ? { syncDir: config.syncDir } : {}),
      syncArchived: config.syncArchived,
      format: config.noteFormat,
    });
    // Without a sync directory every artifact is a buffer, so files are never touched.
    this.files = config.syncDir ? new FsArtifactStore(config.syncDir) : this.buffers;
    this.searchService = new SearchService(this.store, {
      logger: childLogger(this.logger, 'search'),
    });
  }

  get loggedIn(): boolean {
    return this.syncEngine !== null;
  }

  /**
   * Restores the cached store and signs in with a stored token, if there is one.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    const snapshot = await this.cache.load();
    if (snapshot) {
      this.store.restore(snapshot);
      this.logger.info(`restored ${this.store.list().length} notes from ${this.cache.path}`);
    }
    const token = await this.vault.loadToken();
    if (token) {
      this.connect(token);
    }
    this.started = true;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    await this.syncEngine?.idle();
    await this.cache.save(this.store.snapshot());
    this.syncEngine = null;
    this.started = false;
  }

  async login(token: string): Promise<void> {
    await this.vault.storeToken(token);
    this.connect(token);
    this.status.report('info', 'Logged in');
  }

  /**
   * Forgets the token and every local copy of the account's notes. Files in the sync
   * directory are left in place.
   */
  async logout(): Promise<void> {
    const engine = this.syncEngine;
    this.syncEngine = null;
    // A cycle still running would put the account's notes back into the store and cache.
    await engine?.idle();
    await this.vault.clearToken();
    this.store.clear();
    this.buffers.clear();
    await this.cache.remove();
    this.status.report('info', 'Logged out');
  }

  async sync(): Promise<SyncReport> {
    return this.requireSyncEngine().runCycle();
  }

  async createNote(input: NewNoteInput): Promise<Note> {
    return this.requireSyncEngine().createNote(input);
  }

  async submitLocalEdit(noteId: string, text: string): Promise<void> {
    await this.requireSyncEngine().submitLocalEdit(noteId, text);
  }

  async trashNote(noteId: string): Promise<Note> {
    return this.requireSyncEngine().trashNote(noteId);
  }

  /**
   * The artifact currently holding a note, for hosts that open buffers.
   */
  async readArtifact(noteId: string): Promise<NoteArtifact | null> {
    const mapping = this.store.getMapping(noteId);
    if (!mapping) {
      return null;
    }
    const name = artifactName(mapping.artifact);
    const store = mapping.artifact.kind === 'file' ? this.files : this.buffers;
    const text = await store.read(name);
    return text === null ? null : { name, text };
  }

  search(query: string, includeBodyText = true): SearchResult[] {
    return this.searchService.search(query, includeBodyText);
  }

  async searchAsync(query: string, includeBodyText = true): Promise<SearchOutcome> {
    return this.searchService.searchAsync(query, includeBodyText);
  }

  createLiveSearch(): LiveSearchSession {
    return new LiveSearchSession(this.searchService, {
      debounceMs: this.config.liveSearchDebounceMs,
      logger: childLogger(this.logger, 'live-search'),
    });
  }

  onStatus(listener: (status: StatusMessage) => void): () => void {
    return this.status.subscribe(listener);
  }

  private connect(token: string): void {
    const remote = this.createRemoteClient(token);
    this.syncEngine = new SyncEngine({
      store: this.store,
      remote,
      paths: this.paths,
      files: this.files,
      buffers: this.buffers,
      status: this.status,
      logger: childLogger(this.logger, 'sync'),
      retry: this.config.retry,
      remoteTimeoutMs: this.config.remoteTimeoutMs,
      persist: (snapshot) => this.cache.save(snapshot),
      ...(this.now ? { now: this.now } : {}),
    });
  }

  private requireSyncEngine(): SyncEngine {
    if (!this.syncEngine) {
      throw new RemoteError('auth', 'Not logged in');
    }
    return this.syncEngine;
  }
}
