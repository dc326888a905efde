import type { HandleResponse, HandleService } from '../types/handle';
import { HANDLE_CREATED, HANDLE_DELETED, HANDLE_RESOLVER } from '../types/handle';
import { HandleServiceError, parseHandleError } from '../utils/errors';

/**
 * Client for a Handle administration REST service
 *
 * Handles live at <serviceUrl>/<prefix>/<pid>:
 *   GET    → 200 when the Handle exists, 404 when it doesn't
 *   POST   → 201 when created (form field `target` = URL the Handle resolves to)
 *   DELETE → 204 when deleted
 */

export interface HandleServerOptions {
  serviceUrl: string;
  prefix: string;
  username: string;
  password: string;
  /** Site root the Handle resolves to, e.g. https://repository.example.org */
  targetBaseUrl: string;
  /** Per-request timeout (default: 10000) */
  timeoutMs?: number;
  /** Retries after a network failure, for GET and DELETE (default: 3) */
  maxRetries?: number;
  /** Base backoff delay in ms (default: 100) */
  baseDelay?: number;
  fetch?: typeof fetch;
}

type HandleOperation = 'exists' | 'create' | 'delete';

interface HandleRequest {
  method: 'GET' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  body?: string;
}

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff
 *
 * @param fn - Function to retry
 * @param maxRetries - Maximum number of retries
 * @param baseDelay - Base delay in ms
 * @returns Result of the function
 */
async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  baseDelay: number
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt < maxRetries) {
        // Exponential backoff: 100ms, 200ms, 400ms
        const delay = baseDelay * Math.pow(2, attempt);
        console.log(`[RETRY] Attempt ${attempt + 1}/${maxRetries + 1} failed, retrying in ${delay}ms...`);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}

export class HttpHandleService implements HandleService {
  private readonly serviceUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelay: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private options: HandleServerOptions) {
    // Remove trailing slash if present
    this.serviceUrl = options.serviceUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelay = options.baseDelay ?? 100;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get prefix(): string {
    return this.options.prefix;
  }

  /**
   * Service endpoint for a pid's Handle
   */
  endpoint(pid: string): string {
    return `${this.serviceUrl}/${this.options.prefix}/${encodeURIComponent(pid)}`;
  }

  /**
   * URL the Handle resolves to: the object's page on the site
   */
  targetUrl(pid: string): string {
    const base = this.options.targetBaseUrl.replace(/\/$/, '');
    return `${base}/islandora/object/${encodeURIComponent(pid)}`;
  }

  canonicalUrl(pid: string): string {
    return `${HANDLE_RESOLVER}/${this.options.prefix}/${pid}`;
  }

  async exists(pid: string): Promise<boolean> {
    const response = await this.call('exists', pid, { method: 'GET' });

    if (response.status === 200) {
      return true;
    }
    if (response.status === 404) {
      return false;
    }
    throw new HandleServiceError(
      'exists',
      pid,
      await this.errorText(response),
      response.status
    );
  }

  async create(pid: string): Promise<HandleResponse> {
    const response = await this.call('create', pid, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ target: this.targetUrl(pid) }).toString(),
    });

    if (response.status === HANDLE_CREATED) {
      return { code: response.status };
    }
    return { code: response.status, error: await this.errorText(response) };
  }

  async delete(pid: string): Promise<HandleResponse> {
    const response = await this.call('delete', pid, { method: 'DELETE' });

    if (response.status === HANDLE_DELETED) {
      return { code: response.status };
    }
    return { code: response.status, error: await this.errorText(response) };
  }

  private authorization(): string {
    const credentials = `${this.options.username}:${this.options.password}`;
    return `Basic ${Buffer.from(credentials).toString('base64')}`;
  }

  /**
   * Make a request, retrying network failures and timeouts.
   * Any HTTP status is returned to the caller; only a request that never
   * gets an answer throws.
   *
   * POST is sent once: a create that timed out may still have minted the
   * Handle, and a second POST would then fail.
   */
  private async call(
    operation: HandleOperation,
    pid: string,
    request: HandleRequest
  ): Promise<Response> {
    const url = this.endpoint(pid);
    const path = new URL(url).pathname;
    const method = request.method;

    try {
      return await retryWithBackoff(
        async () => {
          const startTime = Date.now();
          const controller = new AbortController();
          const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

          try {
            console.log(`[HANDLE] → ${method} ${path}`);

            const response = await this.fetchImpl(url, {
              method,
              headers: {
                Authorization: this.authorization(),
                ...request.headers,
              },
              body: request.body,
              signal: controller.signal,
            });

            const duration = Date.now() - startTime;
            console.log(`[HANDLE] ← ${method} ${path} (${duration}ms, status: ${response.status})`);
            return response;
          } catch (error) {
            const duration = Date.now() - startTime;
            console.log(`[HANDLE] ✘ ${method} ${path} (${duration}ms, error: ${parseHandleError(error)})`);

            if (error instanceof Error && error.name === 'AbortError') {
              throw new Error(`Request timeout after ${this.timeoutMs}ms`);
            }
            throw error;
          } finally {
            clearTimeout(timeoutId);
          }
        },
        method === 'POST' ? 0 : this.maxRetries,
        this.baseDelay
      );
    } catch (error) {
      throw new HandleServiceError(
        operation,
        pid,
        `Failed to reach the Handle service: ${parseHandleError(error)}`
      );
    }
  }

  /**
   * Readable error from a non-success response
   */
  private async errorText(response: Response): Promise<string> {
    const text = await response.text().then(
      (body) => body.trim(),
      () => ''
    );

    if (text) {
      try {
        const body: unknown = JSON.parse(text);
        return parseHandleError(body);
      } catch {
        return text;
      }
    }
    return `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;
  }
}
