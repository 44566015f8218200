import type { PageType } from './types/fetch.js';

export type FetchErrorKind =
  | 'timeout'
  | 'http_status'
  | 'render_failure'
  | 'network'
  | 'invalid_target'
  | 'robots_disallowed';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly attempts: number;
  readonly status: number | null;
  /** Whether another attempt could succeed */
  readonly transient: boolean;

  constructor(opts: {
    kind: FetchErrorKind;
    url: string;
    message: string;
    attempts?: number;
    status?: number | null;
    transient: boolean;
    cause?: unknown;
  }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'FetchError';
    this.kind = opts.kind;
    this.url = opts.url;
    this.attempts = opts.attempts ?? 0;
    this.status = opts.status ?? null;
    this.transient = opts.transient;
  }

  withAttempts(attempts: number): FetchError {
    return new FetchError({
      kind: this.kind,
      url: this.url,
      message: this.message,
      attempts,
      status: this.status,
      transient: this.transient,
      cause: this.cause,
    });
  }
}

/** 5xx and 429 are worth another attempt; any other status is final. */
export function statusError(status: number, url: string): FetchError {
  return new FetchError({
    kind: 'http_status',
    url,
    status,
    message: `Upstream responded with HTTP ${status}`,
    transient: status >= 500 || status === 429,
  });
}

export class ParseError extends Error {
  readonly kind = 'structure_mismatch' as const;
  readonly url: string;
  readonly pageType: PageType;

  constructor(url: string, pageType: PageType, message: string) {
    super(message);
    this.name = 'ParseError';
    this.url = url;
    this.pageType = pageType;
  }
}
