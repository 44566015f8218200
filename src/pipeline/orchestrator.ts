import pLimit from 'p-limit';
import { z } from 'zod';
import { getParser } from '../adapters/index.js';
import { EVENT_SECTIONS, eventSectionOf, eventSectionUrl, isEventUrl, isMatchUrl, type EventSection } from '../adapters/vlr/urls.js';
import { config } from '../config.js';
import { FetchError, ParseError } from '../errors.js';
import { toTable } from '../output/table.js';
import type { FetchPolicy, FetchTarget, PageType, RawPage, RenderMode } from '../types/fetch.js';
import type { CanonicalRecord, PartialRecord } from '../types/record.js';
import type { RunError, RunReport, RunResult } from '../types/run.js';
import { logger } from '../utils/logger.js';
import { Fetcher, type PageFetcher } from '../workers/fetch-worker.js';
import { parsePage } from '../workers/parse-worker.js';
import { MergeState } from './merger.js';
import { normalize } from './normalizer.js';
import { TargetTracker } from './target-state.js';
import { createTeamResolver } from './team-resolver.js';

const renderMode = z.enum(['http', 'browser']);

/** Run configuration; anything left out falls back to the environment. */
export const runConfigSchema = z.object({
  baseUrl: z.string().url().default(config.VLR_BASE_URL),
  /** Listing paths or URLs. Event pages are swapped for their section listings. */
  entryPoints: z.array(z.string().min(1)).min(1),
  /** Listings issued for each event entry point */
  eventSections: z.array(z.enum(EVENT_SECTIONS)).min(1).default(config.EVENT_SECTIONS),
  maxConcurrency: z.number().int().positive().default(config.MAX_CONCURRENCY),
  browserConcurrency: z.number().int().positive().default(config.BROWSER_CONCURRENCY),
  renderModeDefault: renderMode.default(config.RENDER_MODE_DEFAULT),
  renderModes: z
    .object({ listing: renderMode.optional(), detail: renderMode.optional() })
    .default(config.DETAIL_RENDER_MODE ? { detail: config.DETAIL_RENDER_MODE } : {}),
  retryLimit: z.number().int().positive().default(config.RETRY_LIMIT),
  minRequestIntervalMs: z.number().int().nonnegative().default(config.MIN_REQUEST_INTERVAL_MS),
  requestTimeoutMs: z.number().int().positive().default(config.REQUEST_TIMEOUT_MS),
  backoff: z
    .object({ type: z.enum(['exponential', 'fixed']), delay: z.number().int().nonnegative() })
    .default({ type: 'exponential', delay: config.BACKOFF_DELAY_MS }),
  maxBackoffMs: z.number().int().nonnegative().default(60_000),
  outputFormat: z.enum(['table', 'sequence']).default(config.OUTPUT_FORMAT),
  fetchDetails: z.boolean().default(true),
  tieBreak: z.enum(['first-seen', 'latest']).default('first-seen'),
  teamAliases: z.record(z.string(), z.array(z.string())).default({}),
  upstreamUtcOffsetMinutes: z.number().int().default(config.UPSTREAM_UTC_OFFSET_MINUTES),
  respectRobotsTxt: z.boolean().default(config.RESPECT_ROBOTS_TXT),
});

export type RunConfigInput = z.input<typeof runConfigSchema>;
export type RunConfig = z.output<typeof runConfigSchema>;

export interface RunDeps {
  /** Defaults to a Fetcher over the run's base URL, closed when the run ends */
  fetcher?: PageFetcher;
  signal?: AbortSignal;
}

/**
 * Entry point → listing URLs. An event page becomes one listing per section;
 * a stats or agents listing given directly is kept as is. Unresolvable input
 * is passed on for the fetcher to reject.
 */
export function resolveEntryPoint(
  entry: string,
  baseUrl: string,
  sections: readonly EventSection[] = ['matches'],
): string[] {
  let url: string;
  try {
    url = new URL(entry, baseUrl).href;
  } catch (err) {
    logger.debug({ entry, err }, 'Entry point does not resolve to a URL');
    return [entry];
  }
  if (!isEventUrl(url)) return [url];

  const section = eventSectionOf(url);
  if (section === 'stats' || section === 'agents') return [url];

  const urls = sections.map((s) => eventSectionUrl(url, s, baseUrl)).filter((u): u is string => u !== null);
  return urls.length ? urls : [url];
}

function toRunError(err: unknown, target: FetchTarget): RunError {
  if (err instanceof FetchError) {
    return { url: target.url, kind: err.kind, pageType: target.pageType, message: err.message };
  }
  if (err instanceof ParseError) {
    return { url: target.url, kind: err.kind, pageType: target.pageType, message: err.message };
  }
  return {
    url: target.url,
    kind: 'network',
    pageType: target.pageType,
    message: err instanceof Error ? err.message : String(err),
  };
}

/** Anything thrown while reading a fetched page counts against that page only. */
function toParseFailure(err: unknown, target: FetchTarget): RunError {
  if (err instanceof ParseError) return toRunError(err, target);
  return {
    url: target.url,
    kind: 'structure_mismatch',
    pageType: target.pageType,
    message: err instanceof Error ? err.message : String(err),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * One extraction run: listing discovery → detail fetch → parse → normalize →
 * merge.
 *
 * Page-level failures become report entries and never abort the run. After
 * `signal` aborts no new fetch starts; fetches already in flight finish and
 * everything merged so far is returned.
 */
export async function runExtraction(input: RunConfigInput, deps: RunDeps = {}): Promise<RunResult> {
  const cfg = runConfigSchema.parse(input);
  const signal = deps.signal;
  const fetcher = deps.fetcher ?? new Fetcher({ baseUrl: cfg.baseUrl });
  const log = logger.child({ component: 'orchestrator' });
  const startedAt = new Date().toISOString();

  const policy: FetchPolicy = {
    retryLimit: cfg.retryLimit,
    minRequestIntervalMs: cfg.minRequestIntervalMs,
    timeoutMs: cfg.requestTimeoutMs,
    backoff: cfg.backoff,
    maxBackoffMs: cfg.maxBackoffMs,
    readiness: (target) => getParser(target.pageType, target.url).readiness,
    respectRobotsTxt: cfg.respectRobotsTxt,
  };

  const modeFor = (pageType: PageType): RenderMode => cfg.renderModes[pageType] ?? cfg.renderModeDefault;

  const teams = createTeamResolver(cfg.teamAliases);
  const state = new MergeState({ tieBreak: cfg.tieBreak });
  const tracker = new TargetTracker();
  const overallLimit = pLimit(cfg.maxConcurrency);
  const browserLimit = pLimit(cfg.browserConcurrency);

  const errors: RunError[] = [];
  const issued = new Set<string>();
  // detail URL -> ids of the listing records it is expected to complete
  const detailOwners = new Map<string, Set<string>>();
  const inFlight: Promise<void>[] = [];
  let nextSeq = 0;
  let totalFetched = 0;
  let totalParsed = 0;

  const fail = (target: FetchTarget, error: RunError): void => {
    errors.push(error);
    if (target.pageType !== 'detail') return;
    for (const id of detailOwners.get(target.url) ?? []) {
      state.markDegraded(id, target.url, `${error.kind}: ${error.message}`);
    }
  };

  const absorb = (partials: PartialRecord[], page: RawPage, target: FetchTarget): void => {
    for (const partial of partials) {
      const normalized = normalize(partial, {
        fetchedAt: page.fetchedAt,
        utcOffsetMinutes: cfg.upstreamUtcOffsetMinutes,
        sourceSeq: target.seq,
        teams,
      });
      const merged = state.add(normalized);

      if (cfg.fetchDetails && partial.kind === 'match' && partial.pageType === 'listing' && partial.detailUrl) {
        if (!isMatchUrl(partial.detailUrl)) continue;
        const owners = detailOwners.get(partial.detailUrl) ?? new Set<string>();
        owners.add(merged.id);
        detailOwners.set(partial.detailUrl, owners);
        issue(partial.detailUrl, 'detail');
      }
    }
  };

  const handle = async (target: FetchTarget): Promise<void> => {
    if (signal?.aborted) {
      tracker.transition(target, 'failed');
      fail(target, { url: target.url, kind: 'cancelled', pageType: target.pageType, message: 'Run cancelled' });
      return;
    }

    tracker.transition(target, 'fetching');
    let page: RawPage;
    try {
      page = await fetcher.fetch(target, policy, signal);
    } catch (err) {
      tracker.transition(target, 'failed');
      const error = toRunError(err, target);
      log.warn({ url: target.url, kind: error.kind, err: error.message }, 'Target fetch failed');
      fail(target, error);
      return;
    }

    tracker.transition(target, 'fetched');
    totalFetched++;
    tracker.transition(target, 'parsing');

    let partials: PartialRecord[];
    try {
      partials = parsePage(page);
      absorb(partials, page, target);
    } catch (err) {
      tracker.transition(target, 'parse_failed');
      const error = toParseFailure(err, target);
      log.warn({ url: target.url, err: error.message }, 'Target parse failed');
      fail(target, error);
      return;
    }

    tracker.transition(target, 'parsed');
    totalParsed += partials.length;
  };

  function issue(url: string, pageType: PageType): void {
    if (issued.has(url)) return;
    issued.add(url);

    const target: FetchTarget = Object.freeze({ seq: nextSeq++, url, pageType, renderMode: modeFor(pageType) });
    tracker.register(target);
    log.debug({ seq: target.seq, url, pageType, renderMode: target.renderMode }, 'Target issued');

    const task = () => overallLimit(() => handle(target));
    inFlight.push(target.renderMode === 'browser' ? browserLimit(task) : task());
  }

  try {
    for (const entry of cfg.entryPoints) {
      for (const url of resolveEntryPoint(entry, cfg.baseUrl, cfg.eventSections)) issue(url, 'listing');
    }

    // Parsing a page may issue more targets; drain until nothing new appears
    while (inFlight.length > 0) {
      await Promise.all(inFlight.splice(0));
    }
  } finally {
    if (!deps.fetcher) await fetcher.close();
  }

  const records: CanonicalRecord[] = state.records().map(deepFreeze);
  const cancelled = signal?.aborted ?? false;

  const report: RunReport = {
    totalFetched,
    totalParsed,
    incompleteCount: records.filter((r) => r.incomplete).length,
    errors: errors.sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : a.kind.localeCompare(b.kind))),
    targets: tracker.counts(),
    cancelled,
    fatal:
      totalFetched === 0
        ? { kind: 'no_data_extracted', message: `None of ${issued.size} targets could be fetched` }
        : null,
    startedAt,
    finishedAt: new Date().toISOString(),
  };

  log.info(
    {
      records: records.length,
      totalFetched,
      totalParsed,
      incomplete: report.incompleteCount,
      errors: errors.length,
      cancelled,
    },
    'Extraction run finished',
  );
  if (report.fatal) log.error({ entryPoints: cfg.entryPoints }, report.fatal.message);

  return {
    records: Object.freeze(records),
    table: cfg.outputFormat === 'table' ? toTable(records) : null,
    report,
  };
}
