/**
 * Raised by {@link withTimeout} when the wrapped work does not settle in time.
 */
export class TimeoutError extends Error {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Races a promise against a timer. The timer is always cleared so nothing is left pending.
 *
 * @param work - The promise to wait for.
 * @param timeoutMs - Milliseconds to wait; a non-positive value disables the timeout.
 * @param label - Name of the operation, used in the error message.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) return await work;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}

/**
 * Resolves after the given number of milliseconds; resolves immediately for 0 or less.
 */
export async function delay(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}
