/**
 * Settles with the operation, or rejects with the error built by onTimeout once
 * timeoutMs elapses. The operation itself keeps running; onTimeout is where a
 * caller abandons it. A non-positive or non-finite timeout waits indefinitely.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return await operation;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
