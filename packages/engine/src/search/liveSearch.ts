import { describeError } from '@notesync/shared';

import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { SearchOutcome, SearchService } from './searchService';

export interface LiveSearchOptions {
  debounceMs: number;
  logger?: Logger;
}

export interface LiveSearchResults extends SearchOutcome {
  query: string;
  token: number;
}

type ResultsListener = (results: LiveSearchResults) => void;

interface PendingRequest {
  token: number;
  timer: ReturnType<typeof setTimeout> | null;
  resolve: (results: LiveSearchResults | null) => void;
}

/**
 * One search box. Each `submit` supersedes the previous request: its evaluation may still
 * finish, but its results are never delivered.
 */
export class LiveSearchSession {
  private readonly search: SearchService;
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private readonly listeners = new Set<ResultsListener>();
  private latestToken = 0;
  private pending: PendingRequest | null = null;
  private disposed = false;

  constructor(search: SearchService, options: LiveSearchOptions) {
    this.search = search;
    this.debounceMs = options.debounceMs;
    this.logger = options.logger ?? createLogger('live-search');
  }

  get token(): number {
    return this.latestToken;
  }

  /**
   * Resolves with the results once they are delivered, or with null when a later
   * request, `cancel` or `dispose` superseded this one.
   */
  submit(query: string, includeBodyText = true): Promise<LiveSearchResults | null> {
    if (this.disposed) {
      return Promise.resolve(null);
    }
    this.supersedePending();
    this.latestToken += 1;
    const token = this.latestToken;

    return new Promise<LiveSearchResults | null>((resolve) => {
      const request: PendingRequest = { token, timer: null, resolve };
      request.timer = setTimeout(() => {
        request.timer = null;
        void this.run(request, query, includeBodyText);
      }, this.debounceMs);
      this.pending = request;
    });
  }

  onResults(listener: ResultsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  cancel(): void {
    this.supersedePending();
    this.latestToken += 1;
  }

  dispose(): void {
    this.cancel();
    this.disposed = true;
    this.listeners.clear();
  }

  private async run(
    request: PendingRequest,
    query: string,
    includeBodyText: boolean,
  ): Promise<void> {
    let outcome: SearchOutcome;
    try {
      outcome = await this.search.searchAsync(query, includeBodyText);
    } catch (err) {
      this.logger.error(`search for "${query}" failed: ${describeError(err)}`);
      this.settle(request, null);
      return;
    }

    if (request.token !== this.latestToken || this.disposed) {
      this.settle(request, null);
      return;
    }
    const results: LiveSearchResults = { ...outcome, query, token: request.token };
    for (const listener of this.listeners) {
      try {
        listener(results);
      } catch (err) {
        this.logger.error(`results listener failed for "${query}": ${describeError(err)}`);
      }
    }
    this.settle(request, results);
  }

  private supersedePending(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    if (pending.timer) {
      clearTimeout(pending.timer);
      pending.timer = null;
    }
    this.settle(pending, null);
  }

  private settle(request: PendingRequest, results: LiveSearchResults | null): void {
    if (this.pending === request) {
      this.pending = null;
    }
    request.resolve(results);
  }
}
