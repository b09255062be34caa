// ── Timeout ──────────────────────────────────────────────

export class TimeoutError extends Error {
  override name = "TimeoutError";
}

/**
 * Race `promise` against a timer. The timer is always cleared, so a settled
 * call leaves nothing pending on the event loop.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(`${label} timed out after ${ms / 1000}s`)),
      ms,
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
