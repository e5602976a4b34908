import { errorMessage, SpriteServiceError } from '../errors/sprite-errors';

export type FetchLike = typeof fetch;

export type CollaboratorErrorFactory = (message: string, transient: boolean) => SpriteServiceError;

/**
 * Upstream statuses worth retrying
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Call an external collaborator with a timeout, turning every failure into
 * the collaborator's error type. Timeouts and network failures are transient.
 */
export async function callCollaborator(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  toError: CollaboratorErrorFactory
): Promise<Response> {
  let response: Response;
  try {
    response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const name = error instanceof Error ? error.name : '';
    if (name === 'TimeoutError' || name === 'AbortError') {
      throw toError(`Request to ${new URL(url).host} timed out after ${timeoutMs}ms`, true);
    }
    throw toError(`Request to ${new URL(url).host} failed: ${errorMessage(error)}`, true);
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => '');
    throw toError(
      `Upstream responded ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
      isTransientStatus(response.status)
    );
  }

  return response;
}
