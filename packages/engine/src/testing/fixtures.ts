import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { ListNote, TextNote } from '@notesync/shared';

import type { Logger } from '../logger';

const BASE_HEADER = {
  color: 'default',
  labels: [],
  pinned: false,
  archived: false,
  trashed: false,
  serverRevision: 'r1',
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
  contentFingerprint: '',
  hasConflict: false,
  stale: false,
};

export function makeTextNote(overrides: Partial<TextNote> = {}): TextNote {
  return { ...BASE_HEADER, id: 'n1', title: 'Note', kind: 'text', body: '', ...overrides };
}

export function makeListNote(overrides: Partial<ListNote> = {}): ListNote {
  return { ...BASE_HEADER, id: 'n1', title: 'List', kind: 'list', items: [], ...overrides };
}

export function createSilentLogger(): Logger & { messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    info: (message) => messages.push(`info ${message}`),
    warn: (message) => messages.push(`warn ${message}`),
    error: (message) => messages.push(`error ${message}`),
    debug: (message) => messages.push(`debug ${message}`),
  };
}

export async function createTempDir(prefix: string): Promise<string> {
  const dir = path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(16)}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}
