export type ReconcileState =
  | 'CLEAN'
  | 'LOCAL_ONLY_CHANGED'
  | 'REMOTE_ONLY_CHANGED'
  | 'BOTH_CHANGED'
  | 'EXTERNAL_EDIT_DETECTED';

export interface ChangeSignals {
  /** The artifact no longer matches the last confirmed fingerprint. */
  localChanged: boolean;
  /** The remote revision differs from the last known one. */
  remoteChanged: boolean;
  /** The artifact was modified by something other than the engine. */
  externalEdit: boolean;
}

/**
 * Only the presence of changes decides the state. Timestamps never pick a winner.
 */
export function classifyChange(signals: ChangeSignals): ReconcileState {
  const { localChanged, remoteChanged, externalEdit } = signals;
  if (localChanged && remoteChanged) {
    return 'BOTH_CHANGED';
  }
  if (localChanged) {
    return externalEdit ? 'EXTERNAL_EDIT_DETECTED' : 'LOCAL_ONLY_CHANGED';
  }
  if (remoteChanged) {
    return 'REMOTE_ONLY_CHANGED';
  }
  return 'CLEAN';
}
