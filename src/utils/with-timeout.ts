import { DomainError } from './errors/domain-error';

/**
 * Races `operation` against a timer. On expiry the returned promise rejects
 * with StorageUnavailable; the underlying call is not cancelled, its late
 * result is discarded.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  description: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        DomainError.storageUnavailable(
          `${description} timed out after ${timeoutMs}ms`,
        ),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
