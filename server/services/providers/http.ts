/**
 * Shared fetch helper for provider adapters: JSON in, JSON out, with an
 * AbortController timeout.
 */

export type FetchFn = typeof fetch;

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    url: string,
  ) {
    super(`HTTP ${status} from ${new URL(url).host}: ${body.slice(0, 200)}`);
    this.name = 'HttpError';
  }
}

export interface FetchJsonOptions extends Omit<RequestInit, 'signal'> {
  timeoutMs: number;
  fetchImpl?: FetchFn;
}

export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  const { timeoutMs, fetchImpl = fetch, ...init } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    if (!response.ok) {
      throw new HttpError(response.status, await response.text(), url);
    }
    return await response.json();
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(`Request timed out after ${timeoutMs / 1000}s`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
