import type {
  AgentUsage,
  EventMapStat,
  EventPlayerLine,
  EventValues,
  MapResult,
  MatchValues,
  NormalizationWarning,
  NormalizedEvent,
  NormalizedFields,
  NormalizedMatch,
  PartialEventRecord,
  PartialMatchRecord,
  PartialRecord,
  PlayerLine,
  RawAgentUsage,
  RawEventMapStat,
  RawMapResult,
  RawPlayerLine,
  RecordStatus,
} from '../types/record.js';
import { parseUpstreamDate, type DateContext } from '../utils/date.js';
import { computeContentKey } from './dedup.js';
import type { TeamResolver } from './team-resolver.js';

export interface NormalizeContext extends DateContext {
  /** Issue order of the target the partial came from */
  sourceSeq: number;
  teams: TeamResolver;
}

type StatKey = Exclude<keyof PlayerLine, 'player' | 'team' | 'agents'>;

/** Player table headers → PlayerLine keys. VLR labels rating as R, R2.0 or Rating. */
const STAT_COLUMNS: Array<[RegExp, StatKey]> = [
  [/^(r(2\.0)?|rating)$/i, 'rating'],
  [/^acs$/i, 'acs'],
  [/^k$/i, 'kills'],
  [/^d$/i, 'deaths'],
  [/^a$/i, 'assists'],
  [/^kast%?$/i, 'kast'],
  [/^adr$/i, 'adr'],
  [/^hs%?$/i, 'hsPercent'],
  [/^fk$/i, 'firstKills'],
  [/^fd$/i, 'firstDeaths'],
];

type EventStatKey = Exclude<keyof EventPlayerLine, keyof PlayerLine>;

/** Columns only the event stats table carries. CL ("3/25") is a count pair and is not kept. */
const EVENT_STAT_COLUMNS: Array<[RegExp, EventStatKey]> = [
  [/^rnd$/i, 'rounds'],
  [/^k:d$/i, 'kdRatio'],
  [/^kpr$/i, 'kpr'],
  [/^apr$/i, 'apr'],
  [/^fkpr$/i, 'fkpr'],
  [/^fdpr$/i, 'fdpr'],
  [/^cl%$/i, 'clutchPercent'],
  [/^kmax$/i, 'kMax'],
];

const STATUS_WORDS: Record<string, RecordStatus> = {
  final: 'completed',
  completed: 'completed',
  complete: 'completed',
  done: 'completed',
  live: 'live',
  upcoming: 'upcoming',
  tbd: 'upcoming',
  scheduled: 'upcoming',
};

/** "–", "-" and "" mean the score has not been posted yet. */
const SCORE_PLACEHOLDERS = new Set(['', '-', '–', '—']);

function clean(text: string | null): string | null {
  if (!text) return null;
  const cleaned = text.replace(/\s+/g, ' ').trim();
  return cleaned || null;
}

type Warn = (field: string, kind: NormalizationWarning['kind'], raw: string | null) => void;

export function parseScore(raw: string | null): { value: number | null; invalid: boolean } {
  const text = (raw ?? '').trim();
  if (SCORE_PLACEHOLDERS.has(text)) return { value: null, invalid: false };
  if (!/^\d+$/.test(text)) return { value: null, invalid: true };
  return { value: parseInt(text, 10), invalid: false };
}

/**
 * Maps upstream status text onto the status enum. Countdown text such as
 * "2h 30m" or "45m" means the match has not started. Returns null for text
 * it does not recognize.
 */
export function normalizeStatus(raw: string | null): RecordStatus | null {
  const text = clean(raw)?.toLowerCase();
  if (!text) return null;
  const direct = STATUS_WORDS[text];
  if (direct) return direct;
  if (/^(\d+\s*[dhm]\s*)+$/.test(text)) return 'upcoming';
  return null;
}

/** "bo3", "Bo 5" → "Bo3", "Bo5". */
export function normalizeFormat(raw: string | null): string | null {
  const m = clean(raw)?.match(/^bo\s*(\d+)$/i);
  return m ? `Bo${m[1]!}` : null;
}

function parseStat(raw: string | null | undefined): number | null {
  if (raw === undefined || raw === null) return null;
  const text = raw.replace(/%$/, '').trim();
  if (!/^-?\d+(\.\d+)?$/.test(text)) return null;
  return Number(text);
}

function columnKey<K>(columns: Array<[RegExp, K]>, label: string): K | null {
  const trimmed = label.trim();
  for (const [pattern, key] of columns) {
    if (pattern.test(trimmed)) return key;
  }
  return null;
}

function normalizePlayer(raw: RawPlayerLine, teams: TeamResolver): PlayerLine | null {
  const player = clean(raw.player);
  if (!player) return null;

  const line: PlayerLine = {
    player,
    team: clean(raw.team),
    agents: raw.agents.map((a) => clean(a)).filter((a): a is string => a !== null),
    rating: null,
    acs: null,
    kills: null,
    deaths: null,
    assists: null,
    kast: null,
    adr: null,
    hsPercent: null,
    firstKills: null,
    firstDeaths: null,
  };
  // Team column holds the tag ("FNC"), which the alias table resolves
  if (line.team) line.team = teams.resolve(line.team);

  for (const [label, value] of Object.entries(raw.stats)) {
    const key = columnKey(STAT_COLUMNS, label);
    if (key) line[key] = parseStat(value);
  }
  return line;
}

function normalizeEventPlayer(raw: RawPlayerLine, teams: TeamResolver): EventPlayerLine | null {
  const base = normalizePlayer(raw, teams);
  if (!base) return null;

  const line: EventPlayerLine = {
    ...base,
    rounds: null,
    kdRatio: null,
    kpr: null,
    apr: null,
    fkpr: null,
    fdpr: null,
    clutchPercent: null,
    kMax: null,
  };
  for (const [label, value] of Object.entries(raw.stats)) {
    const key = columnKey(EVENT_STAT_COLUMNS, label);
    if (key) line[key] = parseStat(value);
  }
  return line;
}

function normalizeMapStats(raw: RawEventMapStat[]): EventMapStat[] {
  const stats: EventMapStat[] = [];
  for (const row of raw) {
    const name = clean(row.name);
    if (!name) continue;
    stats.push({
      name,
      timesPlayed: parseStat(row.played),
      attackWinPercent: parseStat(row.attackWin),
      defenseWinPercent: parseStat(row.defenseWin),
    });
  }
  return stats;
}

function normalizeAgentUsage(raw: RawAgentUsage[]): AgentUsage[] {
  const usage: AgentUsage[] = [];
  for (const entry of raw) {
    const agent = clean(entry.agent);
    if (!agent) continue;
    usage.push({
      agent,
      totalPercent: parseStat(entry.total),
      maps: entry.byMap.flatMap(({ map, value }) => {
        const name = clean(map);
        return name ? [{ map: name, percent: parseStat(value) }] : [];
      }),
    });
  }
  return usage;
}

function normalizeMaps(raw: RawMapResult[], warn: Warn): MapResult[] {
  const maps: MapResult[] = [];
  raw.forEach((map, idx) => {
    const name = clean(map.name);
    if (!name) return;

    const s1 = parseScore(map.score1);
    const s2 = parseScore(map.score2);
    if (s1.invalid || s2.invalid) warn(`maps.${idx + 1}`, 'invalid_score', `${map.score1 ?? ''}:${map.score2 ?? ''}`);

    maps.push({ order: idx + 1, name, scores: [s1.value, s2.value] });
  });
  return maps;
}

function normalizeMatch(partial: PartialMatchRecord, ctx: NormalizeContext): NormalizedMatch {
  const warnings: NormalizationWarning[] = [];
  const warn: Warn = (field, kind, raw) => warnings.push({ field, kind, raw, sourceUrl: partial.sourceUrl });
  const f = partial.fields;

  const team1 = ctx.teams.resolve(f.team1);
  const team2 = ctx.teams.resolve(f.team2);
  const participants = [team1, team2].filter((t): t is string => t !== null);
  const name = team1 && team2 ? `${team1} vs ${team2}` : null;

  const rawDate = clean(f.date);
  const parsedDate = parseUpstreamDate(rawDate, f.time, ctx);
  if (rawDate && !parsedDate) warn('date', 'unparseable_date', f.time ? `${rawDate} ${f.time}` : rawDate);
  const date = parsedDate?.iso ?? null;

  const s1 = parseScore(f.score1);
  const s2 = parseScore(f.score2);
  if (s1.invalid) warn('scores', 'invalid_score', f.score1);
  if (s2.invalid) warn('scores', 'invalid_score', f.score2);
  const scores = s1.value !== null && s2.value !== null ? [s1.value, s2.value] : null;

  const status = normalizeStatus(f.status);
  if (!status && clean(f.status)) warn('status', 'unrecognized_status', f.status);

  const maps = f.maps ? normalizeMaps(f.maps, warn) : null;
  const players = f.players
    ? f.players.map((p) => normalizePlayer(p, ctx.teams)).filter((p): p is PlayerLine => p !== null)
    : null;

  const values: MatchValues = {
    name,
    date,
    participants: participants.length ? participants : null,
    status,
    scores,
    eventName: clean(f.eventName),
    stage: clean(f.stage),
    format: normalizeFormat(f.format),
    patch: clean(f.patch),
    maps: maps?.length ? maps : null,
    players: players?.length ? players : null,
  };

  if (!values.name) warn('name', 'missing_required', null);
  if (!values.date) warn('date', 'missing_required', rawDate);
  if (participants.length < 2) warn('participants', 'missing_required', null);

  return {
    kind: 'match',
    values,
    recordId: partial.recordId,
    contentKey: computeContentKey({ kind: 'match', name, date }),
    pageType: partial.pageType,
    sourceUrl: partial.sourceUrl,
    sourceSeq: ctx.sourceSeq,
    fetchedAt: ctx.fetchedAt,
    warnings,
  };
}

function nonEmpty<T>(items: T[] | undefined): T[] | null {
  return items?.length ? items : null;
}

/** "Jul 31, 2024 - Aug 25, 2024" → [start, end]. A single date has no end. */
function splitDateRange(raw: string): [string, string | null] {
  const parts = raw.split(/\s+[-–—]\s+/);
  return [parts[0] ?? raw, parts[1] ?? null];
}

function normalizeEvent(partial: PartialEventRecord, ctx: NormalizeContext): NormalizedEvent {
  const warnings: NormalizationWarning[] = [];
  const warn: Warn = (field, kind, raw) => warnings.push({ field, kind, raw, sourceUrl: partial.sourceUrl });
  const f = partial.fields;

  const name = clean(f.title);
  const rawDates = clean(f.dates);
  let date: string | null = null;
  let endDate: string | null = null;

  if (rawDates) {
    const [start, end] = splitDateRange(rawDates);
    date = parseUpstreamDate(start, null, ctx)?.iso ?? null;
    endDate = end ? (parseUpstreamDate(end, null, ctx)?.iso ?? null) : null;
    if (!date || (end && !endDate)) warn('date', 'unparseable_date', rawDates);
  }

  const values: EventValues = {
    name,
    date,
    endDate,
    participants: null,
    status: null,
    scores: null,
    subtitle: clean(f.subtitle),
    location: clean(f.location),
    prizePool: clean(f.prizePool),
    players: nonEmpty(
      f.players?.map((p) => normalizeEventPlayer(p, ctx.teams)).filter((p): p is EventPlayerLine => p !== null),
    ),
    mapStats: nonEmpty(f.mapStats ? normalizeMapStats(f.mapStats) : undefined),
    agentUsage: nonEmpty(f.agentUsage ? normalizeAgentUsage(f.agentUsage) : undefined),
  };

  if (!name) warn('name', 'missing_required', null);
  if (!date) warn('date', 'missing_required', rawDates);

  return {
    kind: 'event',
    values,
    recordId: partial.recordId,
    contentKey: computeContentKey({ kind: 'event', name, date }),
    pageType: partial.pageType,
    sourceUrl: partial.sourceUrl,
    sourceSeq: ctx.sourceSeq,
    fetchedAt: ctx.fetchedAt,
    warnings,
  };
}

/**
 * Converts raw strings into canonical values. Never drops a record: a field
 * that cannot be read becomes null and the record carries a warning instead.
 */
export function normalize(partial: PartialRecord, ctx: NormalizeContext): NormalizedFields {
  return partial.kind === 'match' ? normalizeMatch(partial, ctx) : normalizeEvent(partial, ctx);
}
