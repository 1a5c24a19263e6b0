import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { StatusMessage } from './status';
import { SyncStatus } from './status';

describe('SyncStatus', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes messages to subscribers and remembers the last one', () => {
    const status = new SyncStatus();
    const received: StatusMessage[] = [];
    const unsubscribe = status.subscribe((message) => received.push(message));

    status.report('warn', 'Unknown labels ignored: x', '42');
    unsubscribe();
    status.report('info', 'Sync complete');

    expect(received).toEqual([
      {
        level: 'warn',
        message: 'Unknown labels ignored: x',
        noteId: '42',
        at: '2024-05-01T12:00:00.000Z',
      },
    ]);
    expect(status.current()).toEqual({
      level: 'info',
      message: 'Sync complete',
      at: '2024-05-01T12:00:00.000Z',
    });
  });
});
