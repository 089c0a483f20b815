import { HttpError, NetworkError, ParseError } from './errors';
import { DEFAULT_CONFIG } from './config';

const USER_AGENT =
  'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:109.0) Gecko/20100101 Firefox/117.0';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SplClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Total tries per request, 1 means no retry */
  attempts?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Thin client for the two JSON endpoints behind maps.splonline.com.sa.
 * The site only answers requests that look like its own XHR calls, hence
 * the browser headers.
 */
export class SplClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly attempts: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: SplClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_CONFIG.baseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.fetchTimeoutMs;
    this.attempts = Math.max(1, options.attempts ?? DEFAULT_CONFIG.fetchAttempts);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** All cities of the kingdom; cityId 0 means "no filter" */
  getCities(): Promise<unknown> {
    return this.postJson('/Home/GetCities', { cityId: 0 });
  }

  getDistricts(cityId: string): Promise<unknown> {
    return this.postJson('/Home/GetDistricts', { cityId });
  }

  private headers(): Record<string, string> {
    return {
      Referer: `${this.baseUrl}/`,
      Origin: this.baseUrl,
      'User-Agent': USER_AGENT,
      'Content-Type': 'application/json; charset=utf-8',
      Accept: 'application/json, text/javascript, */*; q=0.01',
      'X-Requested-With': 'XMLHttpRequest',
    };
  }

  async postJson(resource: string, body: Record<string, unknown>): Promise<unknown> {
    const url = `${this.baseUrl}${resource}`;
    const text = await this.postWithRetry(url, JSON.stringify(body));
    if (!text.trim()) return [];
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Response from ${url} is not valid JSON`, { cause: error });
    }
  }

  private async postWithRetry(url: string, body: string): Promise<string> {
    let attempt = 0;
    let lastError: unknown = null;
    while (attempt < this.attempts) {
      try {
        return await this.post(url, body);
      } catch (error) {
        // Client errors will not change on retry
        if (error instanceof HttpError && error.status < 500) throw error;
        lastError = error;
        attempt += 1;
        if (attempt < this.attempts) {
          const delay = Math.min(1000 * 2 ** (attempt - 1), 8000);
          console.warn(`Request to ${url} failed (attempt ${attempt}/${this.attempts}), retrying in ${delay}ms`);
          await this.sleep(delay);
        }
      }
    }
    throw lastError ?? new NetworkError(`Failed to fetch ${url}`, url);
  }

  /**
   * One request, headers and body both under the timeout. A hand-built or
   * stalled body stream ignores the abort signal, so reads race it too.
   */
  private async post(url: string, body: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () =>
        reject(new NetworkError(`Request to ${url} failed: timed out after ${this.timeoutMs}ms`, url))
      );
    });

    try {
      let response: Response;
      try {
        response = await Promise.race([
          this.fetchImpl(url, {
            method: 'POST',
            headers: this.headers(),
            body,
            signal: controller.signal,
          }),
          timedOut,
        ]);
      } catch (error) {
        if (error instanceof NetworkError) throw error;
        const reason = error instanceof Error ? error.message : String(error);
        throw new NetworkError(`Request to ${url} failed: ${reason}`, url, { cause: error });
      }

      if (!response.ok) {
        throw new HttpError(response.status, url, response.statusText);
      }
      try {
        return await Promise.race([response.text(), timedOut]);
      } catch (error) {
        if (error instanceof NetworkError) throw error;
        throw new NetworkError(`Reading response from ${url} failed`, url, { cause: error });
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
