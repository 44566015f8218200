export type {
  PageType,
  RenderMode,
  FetchTarget,
  RawPage,
  ReadinessCondition,
  BackoffPolicy,
  FetchPolicy,
} from './fetch.js';
export type {
  RecordKind,
  RecordStatus,
  RawMapResult,
  RawPlayerLine,
  RawMatchFields,
  RawEventFields,
  RawEventMapStat,
  RawAgentUsage,
  PartialMatchRecord,
  PartialEventRecord,
  PartialRecord,
  WarningKind,
  NormalizationWarning,
  MapResult,
  PlayerLine,
  EventPlayerLine,
  EventMapStat,
  AgentUsage,
  MatchValues,
  EventValues,
  NormalizedMatch,
  NormalizedEvent,
  NormalizedFields,
  FieldSource,
  Discrepancy,
  MatchDetails,
  EventDetails,
  MatchRecord,
  EventRecord,
  CanonicalRecord,
} from './record.js';
export { UNKNOWN_DATE } from './record.js';
export type { PageParser } from './adapter.js';
export type {
  RunErrorKind,
  RunError,
  RunReport,
  TableColumn,
  TableCell,
  RecordTable,
  RunResult,
} from './run.js';
