/**
 * HTTP helpers shared by the collaborator clients
 */

/**
 * Non-2xx response from a collaborator
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(url: string, status: number, body: string) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
  }

  isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

/**
 * fetch bounded by a timeout. Rejects with HttpStatusError on a non-2xx status.
 */
export async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });

    if (!response.ok) {
      const body = await response.text();
      throw new HttpStatusError(url, response.status, body);
    }

    return response;
  } finally {
    clearTimeout(timeoutId);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.name === 'AbortError') {
    return 'Timeout';
  }
  if (error instanceof HttpStatusError && error.body) {
    return `${error.message}: ${error.body.slice(0, 200)}`;
  }
  return error instanceof Error ? error.message : String(error);
}
