/**
 * Async utility functions
 */

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class DeadlineExceeded extends Error {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `fn` against a deadline. On expiry the returned promise rejects with
 * `onTimeout()` (or a DeadlineExceeded); the underlying call is not cancelled.
 * @param timeoutMs values <= 0 or non-finite disable the deadline
 */
export async function withDeadline<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  label: string,
  onTimeout?: (error: DeadlineExceeded) => Error
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return fn();

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const expired = new DeadlineExceeded(label, timeoutMs);
      reject(onTimeout ? onTimeout(expired) : expired);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
