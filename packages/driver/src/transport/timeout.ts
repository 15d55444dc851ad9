import { EndpointTimeoutError } from '../errors.js';

/**
 * Runs `operation` and rejects with an EndpointTimeoutError if it has not
 * settled after `timeoutMs`. The signal passed to `operation` aborts on timeout.
 * A negative timeout waits forever.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  description: string,
  operation: (signal?: AbortSignal) => Promise<T>,
): Promise<T> {
  if (timeoutMs < 0) {
    return operation();
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new EndpointTimeoutError(description, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
