/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

export class DeadlineExceededError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} exceeded its ${formatDuration(ms)} deadline`);
    this.name = 'DeadlineExceededError';
  }
}

export class OperationAbortedError extends Error {
  constructor(label: string) {
    super(`${label} was aborted`);
    this.name = 'OperationAbortedError';
  }
}

/**
 * Race an operation against a deadline. On expiry `onExpire` runs (to
 * release whatever the operation holds) and the promise rejects with
 * DeadlineExceededError. An abort through `signal` releases the same way
 * and rejects with OperationAbortedError.
 */
export async function withDeadline<T>(
  operation: Promise<T>,
  ms: number,
  label: string,
  onExpire?: () => void,
  signal?: AbortSignal
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onExpire?.();
      reject(new DeadlineExceededError(label, ms));
    }, ms);

    onAbort = () => {
      onExpire?.();
      reject(new OperationAbortedError(label));
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    if (timer) clearTimeout(timer);
    if (onAbort) signal?.removeEventListener('abort', onAbort);
  }
}
