/**
 * Promise timeout helper for external provider calls
 */

import { TimeoutError } from '@/shared/errors';

/**
 * Race a promise against a timer. The underlying operation is not cancelled;
 * its late result is ignored. A timeout of 0 disables the limit.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  if (timeoutMs <= 0) {
    return operation;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
