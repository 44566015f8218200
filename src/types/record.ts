import type { PageType } from './fetch.js';

export type RecordKind = 'match' | 'event';
export type RecordStatus = 'upcoming' | 'live' | 'completed' | 'unknown';

export const UNKNOWN_DATE = 'unknown';

// --- Parser output: raw strings as found on the page ---

export interface RawMapResult {
  name: string | null;
  score1: string | null;
  score2: string | null;
}

export interface RawPlayerLine {
  player: string | null;
  team: string | null;
  agents: string[];
  /** Stat column label (e.g. 'ACS', 'K') → cell text */
  stats: Record<string, string>;
}

export interface RawMatchFields {
  team1: string | null;
  team2: string | null;
  score1: string | null;
  score2: string | null;
  date: string | null;
  time: string | null;
  status: string | null;
  eventName: string | null;
  stage: string | null;
  format: string | null;
  patch: string | null;
  maps: RawMapResult[] | null;
  players: RawPlayerLine[] | null;
}

/** One map row of the event agents page */
export interface RawEventMapStat {
  name: string | null;
  played: string | null;
  attackWin: string | null;
  defenseWin: string | null;
}

/** One agent column of the event agents page */
export interface RawAgentUsage {
  agent: string | null;
  /** Cell of the "All Maps" row */
  total: string | null;
  byMap: Array<{ map: string; value: string | null }>;
}

export interface RawEventFields {
  title: string | null;
  subtitle: string | null;
  dates: string | null;
  location: string | null;
  prizePool: string | null;
  /** Event stats page only */
  players: RawPlayerLine[] | null;
  /** Event agents page only */
  mapStats: RawEventMapStat[] | null;
  agentUsage: RawAgentUsage[] | null;
}

interface PartialRecordBase {
  /** Derived from the site-native id when the page exposes one */
  recordId: string | null;
  pageType: PageType;
  sourceUrl: string;
}

export interface PartialMatchRecord extends PartialRecordBase {
  kind: 'match';
  /** Absolute URL of the match page, when the entry links to one */
  detailUrl: string | null;
  fields: RawMatchFields;
}

export interface PartialEventRecord extends PartialRecordBase {
  kind: 'event';
  detailUrl: null;
  fields: RawEventFields;
}

export type PartialRecord = PartialMatchRecord | PartialEventRecord;

// --- Normalizer output ---

export type WarningKind =
  | 'unparseable_date'
  | 'invalid_score'
  | 'unrecognized_status'
  | 'missing_required'
  | 'detail_unavailable';

export interface NormalizationWarning {
  /** Field name, or '*' for record-level warnings */
  field: string;
  kind: WarningKind;
  raw: string | null;
  sourceUrl: string;
}

export interface MapResult {
  order: number;
  name: string;
  scores: [number | null, number | null];
}

export interface PlayerLine {
  player: string;
  team: string | null;
  agents: string[];
  rating: number | null;
  acs: number | null;
  kills: number | null;
  deaths: number | null;
  assists: number | null;
  kast: number | null;
  adr: number | null;
  hsPercent: number | null;
  firstKills: number | null;
  firstDeaths: number | null;
}

/** Event-wide player line; adds the per-round columns of the event stats table. */
export interface EventPlayerLine extends PlayerLine {
  rounds: number | null;
  kdRatio: number | null;
  kpr: number | null;
  apr: number | null;
  fkpr: number | null;
  fdpr: number | null;
  clutchPercent: number | null;
  kMax: number | null;
}

export interface EventMapStat {
  name: string;
  timesPlayed: number | null;
  attackWinPercent: number | null;
  defenseWinPercent: number | null;
}

export interface AgentUsage {
  agent: string;
  /** Pick rate across every map of the event */
  totalPercent: number | null;
  maps: Array<{ map: string; percent: number | null }>;
}

export interface MatchValues {
  name: string | null;
  date: string | null;
  participants: string[] | null;
  status: RecordStatus | null;
  scores: number[] | null;
  eventName: string | null;
  stage: string | null;
  format: string | null;
  patch: string | null;
  maps: MapResult[] | null;
  players: PlayerLine[] | null;
}

export interface EventValues {
  name: string | null;
  date: string | null;
  endDate: string | null;
  participants: string[] | null;
  status: RecordStatus | null;
  scores: number[] | null;
  subtitle: string | null;
  location: string | null;
  prizePool: string | null;
  players: EventPlayerLine[] | null;
  mapStats: EventMapStat[] | null;
  agentUsage: AgentUsage[] | null;
}

interface NormalizedBase {
  recordId: string | null;
  contentKey: string;
  pageType: PageType;
  sourceUrl: string;
  sourceSeq: number;
  fetchedAt: Date;
  warnings: NormalizationWarning[];
}

export interface NormalizedMatch extends NormalizedBase {
  kind: 'match';
  values: MatchValues;
}

export interface NormalizedEvent extends NormalizedBase {
  kind: 'event';
  values: EventValues;
}

export type NormalizedFields = NormalizedMatch | NormalizedEvent;

// --- Merged output ---

export interface FieldSource {
  url: string;
  pageType: PageType;
  seq: number;
}

export interface Discrepancy {
  field: string;
  kept: string;
  rejected: string;
  rejectedFrom: string;
}

export interface MatchDetails {
  eventName: string | null;
  stage: string | null;
  format: string | null;
  patch: string | null;
  maps: MapResult[];
  players: PlayerLine[];
}

export interface EventDetails {
  subtitle: string | null;
  endDate: string | null;
  location: string | null;
  prizePool: string | null;
  players: EventPlayerLine[];
  mapStats: EventMapStat[];
  agentUsage: AgentUsage[];
}

interface CanonicalRecordBase {
  id: string;
  name: string;
  /** ISO-8601 UTC, or 'unknown' */
  date: string;
  participants: string[];
  status: RecordStatus;
  scores: number[] | null;
  lastUpdated: string;
  incomplete: boolean;
  warnings: NormalizationWarning[];
  /** Source URLs that contributed to the current field values */
  provenance: string[];
  fieldSources: Record<string, FieldSource>;
  discrepancies: Discrepancy[];
}

export interface MatchRecord extends CanonicalRecordBase {
  type: 'match';
  details: MatchDetails;
}

export interface EventRecord extends CanonicalRecordBase {
  type: 'event';
  details: EventDetails;
}

export type CanonicalRecord = MatchRecord | EventRecord;
