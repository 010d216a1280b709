import { UpstreamError } from '../errors/chat.errors';

/**
 * Race a collaborator call against a deadline.
 * Rejects with an UpstreamError carrying `timeoutCode` when the deadline passes first.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  timeoutCode: string,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new UpstreamError(timeoutCode));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
