// ============================================================================
// TENANT GATEWAY — Bounded Downstream Calls
// ============================================================================

import { TimeoutError } from './errors';

/**
 * Run `operation` with a deadline. The signal handed to the operation is
 * aborted when the deadline passes, so SDK calls stop as well.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
