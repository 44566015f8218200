export type PageType = 'listing' | 'detail';
export type RenderMode = 'http' | 'browser';

/** A page the orchestrator has decided to retrieve. Frozen once issued. */
export interface FetchTarget {
  /** Issue order within the run; the "first-seen" ordinal for merge tie-breaks. */
  readonly seq: number;
  readonly url: string;
  readonly pageType: PageType;
  readonly renderMode: RenderMode;
}

export interface RawPage {
  url: string;
  pageType: PageType;
  html: string;
  fetchedAt: Date;
  /** Null for browser-rendered pages */
  httpStatus: number | null;
  /** Null for HTTP pages */
  renderStatus: 'rendered' | null;
  attempts: number;
}

/**
 * Condition a rendered page must meet before its HTML is captured.
 * Both parts are optional; with neither set the page is captured after load.
 */
export interface ReadinessCondition {
  selector?: string;
  settleMs?: number;
}

export interface BackoffPolicy {
  type: 'exponential' | 'fixed';
  delay: number;
}

export interface FetchPolicy {
  /** Total attempts per fetch, first try included */
  retryLimit: number;
  minRequestIntervalMs: number;
  timeoutMs: number;
  backoff: BackoffPolicy;
  maxBackoffMs: number;
  /** Readiness of the ruleset that will parse the target's page */
  readiness: (target: FetchTarget) => ReadinessCondition;
  respectRobotsTxt: boolean;
}
