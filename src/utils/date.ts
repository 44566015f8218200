const MONTHS: Record<string, number> = {
  jan: 0, january: 0,
  feb: 1, february: 1,
  mar: 2, march: 2,
  apr: 3, april: 3,
  may: 4,
  jun: 5, june: 5,
  jul: 6, july: 6,
  aug: 7, august: 7,
  sep: 8, sept: 8, september: 8,
  oct: 9, october: 9,
  nov: 10, november: 10,
  dec: 11, december: 11,
};

export interface DateContext {
  /** When the page was fetched; anchors relative labels and year-less dates */
  fetchedAt: Date;
  /** Offset of naive upstream times from UTC, in minutes (EDT = -240) */
  utcOffsetMinutes: number;
}

export interface ParsedDate {
  /** ISO-8601, UTC */
  iso: string;
  hasTime: boolean;
}

interface TimeOfDay {
  hours: number;
  minutes: number;
}

/** Parses "7:30 PM", "19:30" or "7:30 PM EDT". Returns null for "TBD" and the like. */
export function parseTimeOfDay(raw: string | null): TimeOfDay | null {
  if (!raw) return null;
  const match = raw.trim().match(/^(\d{1,2}):(\d{2})(?::\d{2})?\s*(AM|PM)?/i);
  if (!match) return null;

  let hours = parseInt(match[1]!, 10);
  const minutes = parseInt(match[2]!, 10);
  const period = match[3]?.toUpperCase();

  if (period === 'PM' && hours < 12) hours += 12;
  if (period === 'AM' && hours === 12) hours = 0;
  if (hours > 23 || minutes > 59) return null;

  return { hours, minutes };
}

function build(
  year: number,
  month: number,
  day: number,
  time: TimeOfDay | null,
  offsetMinutes: number,
): ParsedDate | null {
  const candidate = new Date(Date.UTC(year, month, day));
  // Rejects Feb 30 and friends, which Date.UTC would roll over
  if (candidate.getUTCFullYear() !== year || candidate.getUTCMonth() !== month || candidate.getUTCDate() !== day) {
    return null;
  }

  if (!time) {
    return { iso: candidate.toISOString(), hasTime: false };
  }

  const ms = Date.UTC(year, month, day, time.hours, time.minutes) - offsetMinutes * 60_000;
  return { iso: new Date(ms).toISOString(), hasTime: true };
}

type DateFormat = (text: string, time: TimeOfDay | null, ctx: DateContext) => ParsedDate | null;

/** "2024-08-04 13:00:00" (VLR's data-utc-ts) or a full ISO timestamp. */
const isoTimestamp: DateFormat = (text, time) => {
  const m = text.match(
    /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i,
  );
  if (!m) return null;

  const year = parseInt(m[1]!, 10);
  const month = parseInt(m[2]!, 10) - 1;
  const day = parseInt(m[3]!, 10);
  const ownTime = m[4] ? { hours: parseInt(m[4], 10), minutes: parseInt(m[5]!, 10) } : time;

  let offset = 0;
  if (m[7] && m[7].toUpperCase() !== 'Z') {
    const sign = m[7].startsWith('-') ? -1 : 1;
    const digits = m[7].slice(1).replace(':', '');
    offset = sign * (parseInt(digits.slice(0, 2), 10) * 60 + parseInt(digits.slice(2), 10));
  }
  return build(year, month, day, ownTime, offset);
};

/** "Thu, August 1, 2024", "Aug 1, 2024", "August 1st, 2024 5:00 PM", "Jul 31, 2024 - Aug 25, 2024". */
const monthDayYear: DateFormat = (text, time, ctx) => {
  const m = text.match(
    /^(?:[a-z]+,?\s+)?([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})(?:\s+(\d{1,2}:\d{2}(?:\s*[ap]m)?))?/i,
  );
  if (!m) return null;

  const month = MONTHS[m[1]!.toLowerCase()];
  if (month === undefined) return null;

  const ownTime = m[4] ? parseTimeOfDay(m[4]) : time;
  return build(parseInt(m[3]!, 10), month, parseInt(m[2]!, 10), ownTime, ctx.utcOffsetMinutes);
};

/** The fetch instant as wall-clock time at the upstream offset. */
function upstreamNow(ctx: DateContext): Date {
  return new Date(ctx.fetchedAt.getTime() + ctx.utcOffsetMinutes * 60_000);
}

const RELATIVE_DAYS: Record<string, number> = { today: 0, yesterday: -1, tomorrow: 1 };

/** "Today", "Yesterday 5:00 PM", "Tomorrow". */
const relativeDay: DateFormat = (text, time, ctx) => {
  const m = text.match(/^(today|yesterday|tomorrow)\b(?:\s+(\d{1,2}:\d{2}(?:\s*[ap]m)?))?/i);
  if (!m) return null;

  const shift = RELATIVE_DAYS[m[1]!.toLowerCase()] ?? 0;
  const base = new Date(upstreamNow(ctx).getTime() + shift * 86_400_000);
  const ownTime = m[2] ? parseTimeOfDay(m[2]) : time;
  return build(base.getUTCFullYear(), base.getUTCMonth(), base.getUTCDate(), ownTime, ctx.utcOffsetMinutes);
};

/** "Sunday, August 4th": no year, taken from the fetch date. */
const monthDay: DateFormat = (text, time, ctx) => {
  const m = text.match(/^(?:[a-z]+,?\s+)?([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?(?:\s+(\d{1,2}:\d{2}(?:\s*[ap]m)?))?/i);
  if (!m) return null;

  const month = MONTHS[m[1]!.toLowerCase()];
  if (month === undefined) return null;

  const ownTime = m[3] ? parseTimeOfDay(m[3]) : time;
  return build(upstreamNow(ctx).getUTCFullYear(), month, parseInt(m[2]!, 10), ownTime, ctx.utcOffsetMinutes);
};

/** Tried in order; the first format that recognizes the text wins. */
const DATE_FORMATS: readonly DateFormat[] = [isoTimestamp, monthDayYear, relativeDay, monthDay];

/**
 * Parses an upstream date (with an optional separate time string) into a
 * UTC ISO timestamp. Returns null when no known format matches.
 */
export function parseUpstreamDate(
  rawDate: string | null,
  rawTime: string | null,
  ctx: DateContext,
): ParsedDate | null {
  if (!rawDate) return null;
  const text = rawDate.replace(/\s+/g, ' ').trim();
  const time = parseTimeOfDay(rawTime);

  for (const format of DATE_FORMATS) {
    const parsed = format(text, time, ctx);
    if (parsed) return parsed;
  }
  return null;
}
