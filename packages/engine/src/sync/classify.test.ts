import { describe, expect, it } from 'vitest';

import { backoffDelayMs } from './backoff';
import { classifyChange } from './classify';

describe('classifyChange', () => {
  it('maps change signals to reconcile states', () => {
    const none = { localChanged: false, remoteChanged: false, externalEdit: false };

    expect(classifyChange(none)).toBe('CLEAN');
    expect(classifyChange({ ...none, externalEdit: true })).toBe('CLEAN');
    expect(classifyChange({ ...none, remoteChanged: true })).toBe('REMOTE_ONLY_CHANGED');
    expect(classifyChange({ ...none, localChanged: true })).toBe('LOCAL_ONLY_CHANGED');
    expect(classifyChange({ ...none, localChanged: true, externalEdit: true })).toBe(
      'EXTERNAL_EDIT_DETECTED',
    );
    expect(
      classifyChange({ localChanged: true, remoteChanged: true, externalEdit: true }),
    ).toBe('BOTH_CHANGED');
  });
});

describe('backoffDelayMs', () => {
  const policy = { baseDelayMs: 1_000, maxDelayMs: 5_000, staleAfterFailures: 3 };

  it('doubles per failure up to the cap', () => {
    expect([0, 1, 2, 3, 4].map((count) => backoffDelayMs(count, policy))).toEqual([
      0, 1_000, 2_000, 4_000, 5_000,
    ]);
  });
});
