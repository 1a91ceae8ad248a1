/**
 * Fetch a remote resource (script list or script body) with retry logic
 */

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchOptions {
  timeout?: number;
  retries?: number;
  retryDelay?: number; // Base delay for exponential backoff, in milliseconds
  fetch?: FetchFn;
}

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRIES = 3;
const DEFAULT_RETRY_DELAY = 1000;

async function fetchWithRetry<T>(
  url: string,
  options: FetchOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const retries = options.retries ?? DEFAULT_RETRIES;
  const retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;
  const doFetch = options.fetch ?? fetch;

  let lastError: unknown = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await doFetch(url, { signal: controller.signal });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      return await read(response);
    } catch (error) {
      lastError = error;
      if (attempt < retries) {
        // Exponential backoff: 1s, 2s, 4s, 8s...
        await new Promise((r) => setTimeout(r, Math.pow(2, attempt) * retryDelay));
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  if (lastError instanceof Error) {
    throw lastError;
  }
  throw new Error(`Failed to fetch ${url}`);
}

/**
 * Fetch text content from a URL with retry logic and exponential backoff
 */
export async function fetchText(
  url: string,
  options: FetchOptions = {},
): Promise<string> {
  return fetchWithRetry(url, options, (response) => response.text());
}

/**
 * Fetch a body as raw bytes, for files that are saved as-is
 */
export async function fetchBuffer(
  url: string,
  options: FetchOptions = {},
): Promise<Buffer> {
  return fetchWithRetry(url, options, async (response) =>
    Buffer.from(await response.arrayBuffer()),
  );
}
