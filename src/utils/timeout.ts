export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Races `promise` against a timer. The timer is always cleared so nothing
 * keeps the event loop alive after the race settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "operation"
): Promise<T> {
  let handle: NodeJS.Timeout | undefined;
  const timer = new Promise<never>((_, reject) => {
    handle = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timer]);
  } finally {
    if (handle) clearTimeout(handle);
  }
}
