import { RemoteError } from '@notesync/shared';

import { asRemoteError } from './remoteClient';

/**
 * Runs a remote call, failing with `RemoteError('timeout')` after `timeoutMs`. Any other
 * failure is normalised to a `RemoteError`.
 */
export async function callRemote<T>(
  operation: string,
  call: () => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new RemoteError('timeout', `${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(), timeoutPromise]);
  } catch (err) {
    throw asRemoteError(err);
  } finally {
    clearTimeout(timer);
  }
}
