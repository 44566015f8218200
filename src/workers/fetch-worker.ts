import { RateLimitGate } from '../compliance/rate-limiter.js';
import { RobotsChecker } from '../compliance/robots-checker.js';
import { FetchError, statusError } from '../errors.js';
import type { FetchPolicy, FetchTarget, RawPage } from '../types/fetch.js';
import { logger } from '../utils/logger.js';
import { BrowserSession } from './browser-pool.js';
import { fetchHttp, type HttpFetch } from './http-client.js';

export interface PageFetcher {
  /** No further attempts start once `signal` is aborted; the last failure is thrown instead. */
  fetch(target: FetchTarget, policy: FetchPolicy, signal?: AbortSignal): Promise<RawPage>;
  close(): Promise<void>;
}

export interface FetcherDeps {
  /** Origin every target must share, e.g. 'https://www.vlr.gg' */
  baseUrl: string;
  gate?: RateLimitGate;
  http?: HttpFetch;
  browser?: BrowserSession;
  robots?: RobotsChecker;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'ETIMEDOUT',
]);

function errorCode(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

function errorName(err: unknown): string | null {
  return err instanceof Error ? err.name : null;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Maps anything thrown by undici or Playwright onto the fetch error taxonomy. */
export function classifyError(err: unknown, url: string, renderMode: FetchTarget['renderMode']): FetchError {
  if (err instanceof FetchError) return err;

  const code = errorCode(err);
  const name = errorName(err);
  if ((code && TIMEOUT_CODES.has(code)) || name === 'TimeoutError') {
    return new FetchError({ kind: 'timeout', url, message: describe(err), transient: true, cause: err });
  }

  if (renderMode === 'browser') {
    return new FetchError({ kind: 'render_failure', url, message: describe(err), transient: true, cause: err });
  }

  return new FetchError({ kind: 'network', url, message: describe(err), transient: true, cause: err });
}

/** Delay before the attempt following `attempt` (1-based), with jitter. */
export function backoffDelay(policy: FetchPolicy, attempt: number, random: () => number): number {
  const base =
    policy.backoff.type === 'exponential'
      ? policy.backoff.delay * 2 ** (attempt - 1)
      : policy.backoff.delay;
  const capped = Math.min(base, policy.maxBackoffMs);
  // Jitter keeps between half and all of the computed delay
  return Math.round(capped / 2 + (capped / 2) * random());
}

/**
 * Retrieves raw HTML for fetch targets in HTTP or browser mode.
 *
 * Every attempt passes through the per-host rate gate. Transient failures
 * are retried with backoff until the policy's attempt limit; anything else
 * fails on the spot. Empty bodies are treated as failed attempts.
 */
export class Fetcher implements PageFetcher {
  private readonly origin: string;
  private readonly gate: RateLimitGate;
  private readonly http: HttpFetch;
  private readonly browser: BrowserSession;
  private readonly robots: RobotsChecker;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(deps: FetcherDeps) {
    this.origin = new URL(deps.baseUrl).origin;
    this.gate = deps.gate ?? new RateLimitGate();
    this.http = deps.http ?? fetchHttp;
    this.browser = deps.browser ?? new BrowserSession();
    this.robots = deps.robots ?? new RobotsChecker((url) => this.http(url, { timeoutMs: 5000 }));
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = deps.random ?? Math.random;
  }

  async fetch(target: FetchTarget, policy: FetchPolicy, signal?: AbortSignal): Promise<RawPage> {
    const url = this.validate(target.url);
    const log = logger.child({ url: url.href, pageType: target.pageType, renderMode: target.renderMode });

    const paced = () => this.gate.acquire(url.host, policy.minRequestIntervalMs);
    if (policy.respectRobotsTxt && !(await this.robots.isAllowed(this.origin, url.pathname, paced))) {
      throw new FetchError({
        kind: 'robots_disallowed',
        url: target.url,
        message: `robots.txt disallows ${url.pathname}`,
        transient: false,
      });
    }

    for (let attempt = 1; ; attempt++) {
      await paced();

      try {
        const page = await this.attempt(target, policy, attempt);
        log.debug({ attempt, sizeBytes: Buffer.byteLength(page.html, 'utf-8') }, 'Fetch completed');
        return page;
      } catch (err) {
        const fe = classifyError(err, target.url, target.renderMode).withAttempts(attempt);

        if (!fe.transient || attempt >= policy.retryLimit || signal?.aborted) {
          log.warn({ attempt, kind: fe.kind, status: fe.status, err: fe.message }, 'Fetch failed');
          throw fe;
        }

        const delay = backoffDelay(policy, attempt, this.random);
        log.info({ attempt, kind: fe.kind, delay }, 'Transient fetch failure, retrying');
        await this.sleep(delay);

        if (signal?.aborted) {
          log.warn({ attempt, kind: fe.kind }, 'Run cancelled during backoff, not retrying');
          throw fe;
        }
      }
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  private validate(raw: string): URL {
    let url: URL;
    try {
      url = new URL(raw);
    } catch (err) {
      throw new FetchError({ kind: 'invalid_target', url: raw, message: 'Malformed URL', transient: false, cause: err });
    }
    if (url.origin !== this.origin) {
      throw new FetchError({
        kind: 'invalid_target',
        url: raw,
        message: `Target is not on ${this.origin}`,
        transient: false,
      });
    }
    return url;
  }

  private async attempt(target: FetchTarget, policy: FetchPolicy, attempt: number): Promise<RawPage> {
    const startMs = Date.now();

    if (target.renderMode === 'browser') {
      const html = await this.browser.render(target.url, {
        timeoutMs: policy.timeoutMs,
        readiness: policy.readiness(target),
      });
      this.assertBody(html, target.url);
      return {
        url: target.url,
        pageType: target.pageType,
        html,
        fetchedAt: new Date(startMs),
        httpStatus: null,
        renderStatus: 'rendered',
        attempts: attempt,
      };
    }

    const result = await this.http(target.url, { timeoutMs: policy.timeoutMs });
    if (result.status >= 400) {
      throw statusError(result.status, target.url);
    }
    this.assertBody(result.body, target.url);

    return {
      url: target.url,
      pageType: target.pageType,
      html: result.body,
      fetchedAt: new Date(startMs),
      httpStatus: result.status,
      renderStatus: null,
      attempts: attempt,
    };
  }

  private assertBody(html: string, url: string): void {
    if (!html.trim()) {
      throw new FetchError({ kind: 'network', url, message: 'Empty response body', transient: true });
    }
  }
}
