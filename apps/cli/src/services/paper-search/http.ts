/**
 * HTTP plumbing shared by the provider clients: user-agent, per-client rate
 * limiting and concurrency gate, retry with exponential backoff, and mapping
 * of HTTP failures onto the error taxonomy.
 *
 * Only transport failures (connection errors, timeouts) are retried. Any
 * non-2xx status is surfaced immediately as ApiError.
 */

import { ApiError, NetworkError, ParseError } from '@paperhub/shared';
import { createLogger, type Logger } from '../logger';

export type FetchFn = typeof fetch;
export type SleepFn = (ms: number) => Promise<void>;

export const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ============ User-Agent ============

export interface UserAgentParts {
  appName: string;
  version: string;
  homepage?: string;
  contact?: string;
  /** Used verbatim when set */
  override?: string;
}

/** "PaperHub/0.1.0 (+https://example.invalid; mailto:me@example.invalid)" */
export function buildUserAgent(parts: UserAgentParts): string {
  if (parts.override) {
    return parts.override;
  }
  const contact = [parts.homepage ? `+${parts.homepage}` : '', parts.contact ? `mailto:${parts.contact}` : '']
    .filter(Boolean)
    .join('; ');
  return contact ? `${parts.appName}/${parts.version} (${contact})` : `${parts.appName}/${parts.version}`;
}

// ============ Retry ============

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * True for failures below HTTP: fetch rejects with TypeError on network
 * errors, and with TimeoutError/AbortError when the signal fires.
 */
export function isTransportError(error: unknown): boolean {
  if (error instanceof TypeError) return true;
  const name = errorName(error);
  if (name === 'TimeoutError' || name === 'AbortError') return true;
  const code = errorCode(error) ?? errorCode(error instanceof Error ? error.cause : undefined);
  return code !== undefined && TRANSPORT_ERROR_CODES.has(code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: SleepFn;
  logger: Logger;
  /** Used in log lines and the final error, e.g. "Search request" */
  label: string;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, sleep, logger, label } = options;
  let delay = policy.baseDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransportError(error)) {
        throw error;
      }
      lastError = error;
      if (attempt === policy.maxAttempts) {
        break;
      }
      logger.warn(
        `${label} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${delay}ms: ${describeError(error)}`
      );
      await sleep(delay);
      delay = Math.min(delay * 2, policy.maxDelayMs);
    }
  }

  throw new NetworkError(
    `${label} failed after ${policy.maxAttempts} attempts: ${describeError(lastError)}`,
    policy.maxAttempts,
    lastError
  );
}

// ============ Rate limit + concurrency gate ============

export interface RequestGateOptions {
  /** Minimum time between the starts of two requests */
  minIntervalMs: number;
  /** Requests allowed in flight at once */
  maxConcurrent: number;
  sleep?: SleepFn;
  now?: () => number;
}

/**
 * Counting gate plus a fixed minimum delay since the previous request on the
 * same instance. Not a token bucket.
 */
export class RequestGate {
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private nextSlotAt = Number.NEGATIVE_INFINITY;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(private readonly options: RequestGateOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get inFlight(): number {
    return this.active;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      await this.waitForSlot();
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.options.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) next();
  }

  private async waitForSlot(): Promise<void> {
    const now = this.now();
    const startAt = Math.max(now, this.nextSlotAt);
    // Reserve the slot before sleeping so concurrent callers queue behind it.
    this.nextSlotAt = startAt + this.options.minIntervalMs;
    if (startAt > now) {
      await this.sleep(startAt - now);
    }
  }
}

// ============ Transport ============

export interface HttpTransportOptions {
  userAgent: string;
  /** Extra headers on every request (e.g. x-api-key) */
  headers?: Record<string, string>;
  minIntervalMs: number;
  maxConcurrent?: number;
  retry?: Partial<RetryPolicy>;
  fetch?: FetchFn;
  sleep?: SleepFn;
  now?: () => number;
  logger?: Logger;
}

export interface TransportRequest {
  method?: 'GET' | 'POST';
  query?: Record<string, string | number | undefined>;
  /** JSON body for POST */
  json?: unknown;
  timeoutMs: number;
  /** Label for log lines, e.g. "Search request" */
  label: string;
}

export function buildUrl(base: string, query?: TransportRequest['query']): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export class HttpTransport {
  readonly userAgent: string;
  private readonly gate: RequestGate;
  private readonly fetchImpl: FetchFn;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;
  private readonly headers: Record<string, string>;

  constructor(options: HttpTransportOptions) {
    this.userAgent = options.userAgent;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.logger = options.logger ?? createLogger('HttpTransport');
    this.gate = new RequestGate({
      minIntervalMs: options.minIntervalMs,
      maxConcurrent: options.maxConcurrent ?? 1,
      sleep: this.sleep,
      now: options.now,
    });
  }

  /**
   * Issue a request through the gate and retry loop and hand the 2xx response
   * to consume. The body is read inside the retry loop, since the request
   * timeout also covers it. Rejects with ApiError, NetworkError, or whatever
   * consume throws.
   */
  async read<T>(
    url: string,
    request: TransportRequest,
    consume: (response: Response) => Promise<T>
  ): Promise<T> {
    const target = buildUrl(url, request.query);
    const headers: Record<string, string> = { 'User-Agent': this.userAgent, ...this.headers };
    let body: string | undefined;
    if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    }

    this.logger.debug(`${request.method ?? 'GET'} ${target}`);
    return withRetry(
      async () => {
        const response = await this.gate.run(() =>
          this.fetchImpl(target, {
            method: request.method ?? 'GET',
            headers,
            body,
            signal: AbortSignal.timeout(request.timeoutMs),
          })
        );
        if (!response.ok) {
          const text = await response
            .text()
            .catch((error: unknown) => `<unreadable body: ${describeError(error)}>`);
          throw new ApiError(response.status, text);
        }
        return consume(response);
      },
      { policy: this.retryPolicy, sleep: this.sleep, logger: this.logger, label: request.label }
    );
  }

  async getText(url: string, request: TransportRequest): Promise<string> {
    return this.read(url, request, (response) => response.text());
  }

  async getJson(url: string, request: TransportRequest): Promise<unknown> {
    const text = await this.getText(url, request);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new ParseError(`Response is not valid JSON: ${describeError(error)}`);
    }
  }
}
