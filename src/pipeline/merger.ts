import { isDeepStrictEqual } from 'node:util';
import type { PageType } from '../types/fetch.js';
import {
  UNKNOWN_DATE,
  type CanonicalRecord,
  type Discrepancy,
  type EventRecord,
  type EventValues,
  type FieldSource,
  type MatchRecord,
  type MatchValues,
  type NormalizationWarning,
  type NormalizedFields,
} from '../types/record.js';
import { logger } from '../utils/logger.js';
import { computeContentKey, contentRecordId } from './dedup.js';

export type TieBreak = 'first-seen' | 'latest';

export interface MergeOptions {
  /** Which of two equal-precedence conflicting values survives */
  tieBreak: TieBreak;
}

const PAGE_PRECEDENCE: Record<PageType, number> = {
  listing: 1,
  detail: 2,
};

const MATCH_FIELDS = [
  'name',
  'date',
  'participants',
  'status',
  'scores',
  'eventName',
  'stage',
  'format',
  'patch',
  'maps',
  'players',
] as const satisfies readonly (keyof MatchValues)[];

const EVENT_FIELDS = [
  'name',
  'date',
  'endDate',
  'participants',
  'status',
  'scores',
  'subtitle',
  'location',
  'prizePool',
  'players',
  'mapStats',
  'agentUsage',
] as const satisfies readonly (keyof EventValues)[];

function display(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function sourceOf(incoming: NormalizedFields): FieldSource {
  return { url: incoming.sourceUrl, pageType: incoming.pageType, seq: incoming.sourceSeq };
}

/**
 * Resolves one incoming value per field against the current one.
 * Null never overwrites; detail beats listing; equal precedence goes to the
 * tie-break and the losing value is recorded as a discrepancy.
 */
class FieldMerger {
  readonly sources: Record<string, FieldSource>;
  discrepancies: Discrepancy[];

  constructor(
    private readonly incoming: FieldSource,
    private readonly tieBreak: TieBreak,
    existing: CanonicalRecord | null,
  ) {
    this.sources = { ...(existing?.fieldSources ?? {}) };
    this.discrepancies = [...(existing?.discrepancies ?? [])];
  }

  apply<V, K extends keyof V & string>(target: V, next: V, field: K): void {
    const value = next[field];
    if (value === null) return;

    const current = target[field];
    const currentSource = this.sources[field];

    if (current === null || !currentSource) {
      target[field] = value;
      this.sources[field] = this.incoming;
      return;
    }

    if (isDeepStrictEqual(current, value)) {
      // Same value: credit it to the more authoritative (then earlier) source
      if (this.outranks(this.incoming, currentSource, 'first-seen')) this.sources[field] = this.incoming;
      return;
    }

    const incomingRank = PAGE_PRECEDENCE[this.incoming.pageType];
    const currentRank = PAGE_PRECEDENCE[currentSource.pageType];

    if (incomingRank > currentRank) {
      target[field] = value;
      this.sources[field] = this.incoming;
      this.discrepancies = this.discrepancies.filter((d) => d.field !== field);
      return;
    }
    if (incomingRank < currentRank) return;

    if (this.outranks(this.incoming, currentSource, this.tieBreak)) {
      this.record(field, value, current, currentSource.url);
      target[field] = value;
      this.sources[field] = this.incoming;
    } else {
      this.record(field, current, value, this.incoming.url);
    }
  }

  private outranks(a: FieldSource, b: FieldSource, tieBreak: TieBreak): boolean {
    const rankA = PAGE_PRECEDENCE[a.pageType];
    const rankB = PAGE_PRECEDENCE[b.pageType];
    if (rankA !== rankB) return rankA > rankB;
    if (a.seq === b.seq) return a.url < b.url;
    return tieBreak === 'first-seen' ? a.seq < b.seq : a.seq > b.seq;
  }

  private record(field: string, kept: unknown, rejected: unknown, rejectedFrom: string): void {
    const entry: Discrepancy = { field, kept: display(kept), rejected: display(rejected), rejectedFrom };
    if (!this.discrepancies.some((d) => isDeepStrictEqual(d, entry))) this.discrepancies.push(entry);
  }
}

// --- CanonicalRecord <-> values; empty output placeholders read back as null ---

function nullIfEmpty<T>(list: T[]): T[] | null {
  return list.length ? list : null;
}

function matchValuesOf(record: MatchRecord | null): MatchValues {
  return {
    name: record?.name || null,
    date: record && record.date !== UNKNOWN_DATE ? record.date : null,
    participants: record ? nullIfEmpty(record.participants) : null,
    status: record && record.status !== 'unknown' ? record.status : null,
    scores: record?.scores ?? null,
    eventName: record?.details.eventName ?? null,
    stage: record?.details.stage ?? null,
    format: record?.details.format ?? null,
    patch: record?.details.patch ?? null,
    maps: record ? nullIfEmpty(record.details.maps) : null,
    players: record ? nullIfEmpty(record.details.players) : null,
  };
}

function eventValuesOf(record: EventRecord | null): EventValues {
  return {
    name: record?.name || null,
    date: record && record.date !== UNKNOWN_DATE ? record.date : null,
    endDate: record?.details.endDate ?? null,
    participants: record ? nullIfEmpty(record.participants) : null,
    status: record && record.status !== 'unknown' ? record.status : null,
    scores: record?.scores ?? null,
    subtitle: record?.details.subtitle ?? null,
    location: record?.details.location ?? null,
    prizePool: record?.details.prizePool ?? null,
    players: record ? nullIfEmpty(record.details.players) : null,
    mapStats: record ? nullIfEmpty(record.details.mapStats) : null,
    agentUsage: record ? nullIfEmpty(record.details.agentUsage) : null,
  };
}

function warningKey(w: NormalizationWarning): string {
  return [w.field, w.kind, w.sourceUrl, w.raw ?? ''].join('\u0000');
}

function compareWarnings(a: NormalizationWarning, b: NormalizationWarning): number {
  const ka = warningKey(a);
  const kb = warningKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

function compareDiscrepancies(a: Discrepancy, b: Discrepancy): number {
  const ka = [a.field, a.kept, a.rejected, a.rejectedFrom].join('\u0000');
  const kb = [b.field, b.kept, b.rejected, b.rejectedFrom].join('\u0000');
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Keeps record-level warnings and those whose field is still unresolved;
 * a warning about a field another source has since filled no longer applies.
 */
function liveWarnings<V extends object>(warnings: NormalizationWarning[], values: V): NormalizationWarning[] {
  const seen = new Map<string, NormalizationWarning>();
  for (const w of warnings) {
    const root = w.field.split('.')[0] ?? w.field;
    const value: unknown = Object.entries(values).find(([key]) => key === root)?.[1];
    if (w.field !== '*' && value !== null && value !== undefined) continue;
    seen.set(warningKey(w), w);
  }
  return [...seen.values()].sort(compareWarnings);
}

export function isIncomplete(record: CanonicalRecord): boolean {
  if (record.warnings.some((w) => w.kind === 'detail_unavailable')) return true;
  if (!record.name || record.date === UNKNOWN_DATE) return true;
  return record.type === 'match' && record.participants.length < 2;
}

function laterOf(a: string | undefined, b: Date): string {
  const iso = b.toISOString();
  return a && a > iso ? a : iso;
}

/**
 * Folds one normalized partial into the canonical record for its identity.
 * Idempotent, and independent of arrival order for non-conflicting inputs.
 */
export function merge(
  existing: CanonicalRecord | null,
  incoming: NormalizedFields,
  options: MergeOptions,
): CanonicalRecord {
  if (existing && existing.type !== incoming.kind) {
    throw new Error(`Cannot merge ${incoming.kind} into ${existing.type} record ${existing.id}`);
  }

  const id = existing?.id ?? incoming.recordId ?? contentRecordId(incoming.kind, incoming.contentKey);
  const merger = new FieldMerger(sourceOf(incoming), options.tieBreak, existing);
  const provenance = [...new Set([...(existing?.provenance ?? []), incoming.sourceUrl])].sort();
  const allWarnings = [...(existing?.warnings ?? []), ...incoming.warnings];
  const lastUpdated = laterOf(existing?.lastUpdated, incoming.fetchedAt);

  let record: CanonicalRecord;

  if (incoming.kind === 'match') {
    const values = matchValuesOf(existing?.type === 'match' ? existing : null);
    for (const field of MATCH_FIELDS) merger.apply(values, incoming.values, field);

    record = {
      type: 'match',
      id,
      name: values.name ?? '',
      date: values.date ?? UNKNOWN_DATE,
      participants: values.participants ?? [],
      status: values.status ?? 'unknown',
      scores: values.scores,
      lastUpdated,
      incomplete: false,
      warnings: liveWarnings(allWarnings, values),
      provenance,
      fieldSources: merger.sources,
      discrepancies: [...merger.discrepancies].sort(compareDiscrepancies),
      details: {
        eventName: values.eventName,
        stage: values.stage,
        format: values.format,
        patch: values.patch,
        maps: values.maps ?? [],
        players: values.players ?? [],
      },
    };
  } else {
    const values = eventValuesOf(existing?.type === 'event' ? existing : null);
    for (const field of EVENT_FIELDS) merger.apply(values, incoming.values, field);

    record = {
      type: 'event',
      id,
      name: values.name ?? '',
      date: values.date ?? UNKNOWN_DATE,
      participants: values.participants ?? [],
      status: values.status ?? 'unknown',
      scores: values.scores,
      lastUpdated,
      incomplete: false,
      warnings: liveWarnings(allWarnings, values),
      provenance,
      fieldSources: merger.sources,
      discrepancies: [...merger.discrepancies].sort(compareDiscrepancies),
      details: {
        subtitle: values.subtitle,
        endDate: values.endDate,
        location: values.location,
        prizePool: values.prizePool,
        players: values.players ?? [],
        mapStats: values.mapStats ?? [],
        agentUsage: values.agentUsage ?? [],
      },
    };
  }

  record.incomplete = isIncomplete(record);
  return record;
}

/**
 * Run-scoped collection of canonical records.
 *
 * Records are keyed by native id where the site exposes one, otherwise by
 * content key. A content-keyed record is adopted under its native id when a
 * later page reveals it.
 */
export class MergeState {
  private readonly byId = new Map<string, CanonicalRecord>();
  // content key -> record id
  private readonly byContentKey = new Map<string, string>();
  // ids derived from content keys, eligible for adoption
  private readonly provisional = new Set<string>();

  constructor(private readonly options: MergeOptions) {}

  get size(): number {
    return this.byId.size;
  }

  get(id: string): CanonicalRecord | undefined {
    return this.byId.get(id);
  }

  add(incoming: NormalizedFields): CanonicalRecord {
    const named = incoming.values.name !== null;
    const known = named ? this.byContentKey.get(incoming.contentKey) : undefined;

    let id: string;
    if (incoming.recordId) {
      id = incoming.recordId;
      if (known && this.provisional.has(known) && !this.byId.has(id)) this.adopt(known, id);
    } else {
      id = known ?? contentRecordId(incoming.kind, incoming.contentKey);
    }

    const existing = this.byId.get(id) ?? null;
    const merged = merge(existing, incoming, this.options);
    this.byId.set(merged.id, merged);
    if (!existing && !incoming.recordId) this.provisional.add(merged.id);

    if (named) this.byContentKey.set(incoming.contentKey, merged.id);
    if (merged.name) {
      const key = computeContentKey({
        kind: merged.type,
        name: merged.name,
        date: merged.date === UNKNOWN_DATE ? null : merged.date,
      });
      if (!this.byContentKey.has(key)) this.byContentKey.set(key, merged.id);
    }
    return merged;
  }

  /** Flags a record whose detail page could not be retrieved or read. */
  markDegraded(id: string, sourceUrl: string, reason: string): void {
    const record = this.byId.get(id);
    if (!record) {
      logger.warn({ id, sourceUrl }, 'Cannot degrade unknown record');
      return;
    }

    const warning: NormalizationWarning = { field: '*', kind: 'detail_unavailable', raw: reason, sourceUrl };
    if (record.warnings.some((w) => warningKey(w) === warningKey(warning))) return;

    this.byId.set(id, {
      ...record,
      warnings: [...record.warnings, warning].sort(compareWarnings),
      incomplete: true,
    });
  }

  /** All records, sorted by id. */
  records(): CanonicalRecord[] {
    return [...this.byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  private adopt(fromId: string, toId: string): void {
    const record = this.byId.get(fromId);
    if (!record) return;

    logger.debug({ fromId, toId }, 'Adopting content-keyed record under native id');
    this.byId.delete(fromId);
    this.provisional.delete(fromId);
    this.byId.set(toId, { ...record, id: toId });
    for (const [key, id] of this.byContentKey) {
      if (id === fromId) this.byContentKey.set(key, toId);
    }
  }
}
