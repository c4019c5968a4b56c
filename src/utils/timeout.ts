// src/utils/timeout.ts

/**
 * Race a task against a timer. The timer is always cleared, and a missing or
 * non-positive `timeoutMs` disables the limit.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error
): Promise<T> {
  if (!timeoutMs || timeoutMs <= 0) {
    return task;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
