import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import type { CompiledQuery, MatchedIn, Note } from '@notesync/shared';
import { compileQuery, matchCompiledQuery, noteBodyText, parseQuery } from '@notesync/shared';

import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { EntityStore } from '../store/entityStore';

export interface SearchResult {
  id: string;
  title: string;
  matchedIn: MatchedIn;
}

export interface SearchOutcome {
  results: SearchResult[];
  /** Unknown labels and empty filters, for the host to show next to the query. */
  errors: string[];
  /** Store generation the results were computed against. */
  generation: number;
}

export interface SearchServiceOptions {
  logger?: Logger;
  /** Notes evaluated between yields in `searchAsync`. */
  chunkSize?: number;
  /** Scans attempted by `searchAsync` before it settles for a result from a moving store. */
  maxScans?: number;
}

const DEFAULT_CHUNK_SIZE = 200;
const DEFAULT_MAX_SCANS = 3;

type Match = { note: Note; matchedIn: MatchedIn };

function compareMatches(a: Match, b: Match): number {
  const byUpdated = Date.parse(b.note.updatedAt) - Date.parse(a.note.updatedAt);
  if (byUpdated !== 0 && !Number.isNaN(byUpdated)) {
    return byUpdated;
  }
  if (a.note.id === b.note.id) {
    return 0;
  }
  return a.note.id < b.note.id ? -1 : 1;
}

function toResults(matches: Match[]): SearchResult[] {
  return matches
    .sort(compareMatches)
    .map(({ note, matchedIn }) => ({ id: note.id, title: note.title, matchedIn }));
}

/**
 * Read-only query evaluation over the entity store. Newest notes first, ties by id.
 */
export class SearchService {
  private readonly store: EntityStore;
  private readonly logger: Logger;
  private readonly chunkSize: number;
  private readonly maxScans: number;

  constructor(store: EntityStore, options: SearchServiceOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? createLogger('search');
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.maxScans = Math.max(1, options.maxScans ?? DEFAULT_MAX_SCANS);
  }

  search(query: string, includeBodyText = true): SearchResult[] {
    return this.evaluate(query, includeBodyText).results;
  }

  evaluate(query: string, includeBodyText = true): SearchOutcome {
    const generation = this.store.generation;
    const compiled = this.compile(query);
    const matches: Match[] = [];
    for (const note of this.store.list()) {
      const match = this.matchNote(compiled, note, includeBodyText);
      if (match) {
        matches.push(match);
      }
    }
    return { results: toResults(matches), errors: compiled.errors, generation };
  }

  /**
   * Evaluates in chunks, yielding to the event loop between them. When the store changed
   * during the scan the query is run again so the result reflects a single generation.
   */
  async searchAsync(query: string, includeBodyText = true): Promise<SearchOutcome> {
    let outcome = await this.scan(query, includeBodyText);
    for (let scans = 1; outcome.generation !== this.store.generation; scans += 1) {
      if (scans >= this.maxScans) {
        this.logger.warn(`store kept changing; gave up rescanning "${query}"`);
        break;
      }
      outcome = await this.scan(query, includeBodyText);
    }
    return outcome;
  }

  private async scan(query: string, includeBodyText: boolean): Promise<SearchOutcome> {
    const generation = this.store.generation;
    const compiled = this.compile(query);
    const notes = this.store.list();
    const matches: Match[] = [];
    for (let start = 0; start < notes.length; start += this.chunkSize) {
      if (start > 0) {
        await yieldToEventLoop();
      }
      for (const note of notes.slice(start, start + this.chunkSize)) {
        const match = this.matchNote(compiled, note, includeBodyText);
        if (match) {
          matches.push(match);
        }
      }
    }
    return { results: toResults(matches), errors: compiled.errors, generation };
  }

  private compile(query: string): CompiledQuery {
    return compileQuery(parseQuery(query), this.store.listLabels());
  }

  private matchNote(compiled: CompiledQuery, note: Note, includeBodyText: boolean): Match | null {
    const matchedIn = matchCompiledQuery(
      compiled,
      {
        title: note.title,
        body: noteBodyText(note),
        labels: note.labels,
        color: note.color,
        pinned: note.pinned,
        archived: note.archived,
        trashed: note.trashed,
      },
      { includeBodyText },
    );
    return matchedIn ? { note, matchedIn } : null;
  }
}
