import { DEFAULT_HTTP_TIMEOUT } from './constants.js';
import { TransportError } from './errors.js';
import type { FetchFunction } from './types.js';

export interface HttpPostOptions {
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Defaults to the global `fetch`, looked up per request */
  fetch?: FetchFunction;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * POST a body and return the full response text.
 *
 * Anything but a 200 is a `TransportError` carrying the status. The body of
 * such a response is cancelled unread so the connection can be reused.
 */
export async function httpPost(
  url: string,
  contentType: string,
  body: string,
  options: HttpPostOptions = {}
): Promise<string> {
  const fetchFn = options.fetch ?? fetch;
  const timeout = options.timeout ?? DEFAULT_HTTP_TIMEOUT;

  let res: Response;
  try {
    res = await fetchFn(url, {
      method: 'POST',
      headers: { 'Content-Type': contentType },
      body,
      signal: AbortSignal.timeout(timeout),
    });
  } catch (error) {
    throw new TransportError(
      `HTTP POST failed: ${errorMessage(error)}`,
      undefined,
      { cause: error }
    );
  }

  if (res.status !== 200) {
    // The status error is what the caller sees; a failed cancel adds nothing.
    await res.body?.cancel().catch(() => undefined);
    throw new TransportError(
      `HTTP POST failed with status ${res.status}`,
      res.status
    );
  }

  try {
    return await res.text();
  } catch (error) {
    throw new TransportError(
      `reading response body failed: ${errorMessage(error)}`,
      res.status,
      { cause: error }
    );
  }
}
