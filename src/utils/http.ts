import { logger } from './logger';
import { ServiceError, toError } from './errors';

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string | FormData;
  maxRetries?: number;
  retryDelayMs?: number;
}

class HttpStatusError extends Error {
  constructor(public status: number, body: string) {
    super(`returned ${status}: ${body}`);
    Object.setPrototypeOf(this, HttpStatusError.prototype);
  }
}

export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * fetch with exponential backoff on 429 and transient failures. Client errors
 * other than 429 fail immediately.
 */
export async function request(service: string, url: string, options: RequestOptions = {}): Promise<Response> {
  const method = options.method ?? 'GET';
  const maxRetries = options.maxRetries ?? 3;
  const baseDelay = options.retryDelayMs ?? 500;
  let lastError: Error = new Error('no attempts made');

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const res = await fetch(url, { method, headers: options.headers, body: options.body });

      if (res.status === 429) {
        lastError = new HttpStatusError(429, 'rate limited');
        const delay = Math.pow(2, attempt) * baseDelay;
        logger.warn(`${service} rate limited, backing off`, { attempt, delay });
        await wait(delay);
        continue;
      }

      if (!res.ok) {
        throw new HttpStatusError(res.status, await res.text());
      }

      return res;
    } catch (error) {
      lastError = toError(error);
      const status = statusOf(error);
      if (status !== undefined && status >= 400 && status < 500) {
        break;
      }
      if (attempt < maxRetries) {
        const delay = Math.pow(2, attempt) * baseDelay;
        logger.warn(`${service} request failed, retrying`, { attempt, error: lastError.message });
        await wait(delay);
      }
    }
  }

  const finalStatus = statusOf(lastError);
  const retryable = finalStatus === undefined || finalStatus === 429 || finalStatus >= 500;
  throw new ServiceError(service, `${method} ${new URL(url).pathname}`, lastError, retryable);
}

export async function requestJson(service: string, url: string, options: RequestOptions = {}): Promise<unknown> {
  const res = await request(service, url, options);
  const body: unknown = await res.json();
  return body;
}
