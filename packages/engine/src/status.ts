import { EventEmitter } from 'node:events';

export type StatusLevel = 'info' | 'warn' | 'error';

export interface StatusMessage {
  level: StatusLevel;
  message: string;
  noteId?: string;
  at: string; // ISO 8601
}

/**
 * User-visible status channel. Hosts subscribe and decide how to show messages.
 */
export class SyncStatus {
  private readonly emitter = new EventEmitter();
  private last: StatusMessage | null = null;

  report(level: StatusLevel, message: string, noteId?: string): StatusMessage {
    const status: StatusMessage = {
      level,
      message,
      ...(noteId ? { noteId } : {}),
      at: new Date().toISOString(),
    };
    this.last = status;
    this.emitter.emit('status', status);
    return status;
  }

  current(): StatusMessage | null {
    return this.last;
  }

  subscribe(callback: (status: StatusMessage) => void): () => void {
    this.emitter.on('status', callback);
    return () => {
      this.emitter.off('status', callback);
    };
  }
}
