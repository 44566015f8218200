export { runExtraction, runConfigSchema, resolveEntryPoint } from './pipeline/orchestrator.js';
export type { RunConfig, RunConfigInput, RunDeps } from './pipeline/orchestrator.js';
export { normalize, normalizeStatus, normalizeFormat, parseScore } from './pipeline/normalizer.js';
export type { NormalizeContext } from './pipeline/normalizer.js';
export { merge, MergeState, isIncomplete } from './pipeline/merger.js';
export type { MergeOptions, TieBreak } from './pipeline/merger.js';
export { computeContentKey, contentRecordId } from './pipeline/dedup.js';
export { TeamResolver, createTeamResolver, cleanTeamName } from './pipeline/team-resolver.js';
export type { TeamAliases } from './pipeline/team-resolver.js';
export { TargetTracker, InvalidTransitionError, TARGET_STATES } from './pipeline/target-state.js';
export type { TargetState } from './pipeline/target-state.js';
export { Fetcher, classifyError, backoffDelay } from './workers/fetch-worker.js';
export type { PageFetcher, FetcherDeps } from './workers/fetch-worker.js';
export { BrowserSession } from './workers/browser-pool.js';
export { fetchHttp } from './workers/http-client.js';
export { parsePage } from './workers/parse-worker.js';
export { getParser, getAllParsers } from './adapters/index.js';
export {
  EVENT_SECTIONS,
  eventMatchesUrl,
  eventSectionOf,
  eventSectionUrl,
  extractEventId,
  extractMatchId,
  isEventUrl,
  isMatchUrl,
} from './adapters/vlr/urls.js';
export type { EventSection } from './adapters/vlr/urls.js';
export { RateLimitGate } from './compliance/rate-limiter.js';
export { RobotsChecker } from './compliance/robots-checker.js';
export { FetchError, ParseError, statusError } from './errors.js';
export type { FetchErrorKind } from './errors.js';
export { toTable, TABLE_COLUMNS } from './output/table.js';
export { summarizeRecords } from './output/summary.js';
export type { RecordSummary } from './output/summary.js';
export * from './types/index.js';
