/**
 * VLR.gg URL shapes:
 *   match:          /378660/fnatic-vs-kr-esports-valorant-champions-2024-decider-a
 *   event:          /event/2097/valorant-champions-2024
 *   event listing:  /event/matches/2097/valorant-champions-2024/?series_id=all
 *   player stats:   /event/stats/2097/valorant-champions-2024
 *   maps & agents:  /event/agents/2097/valorant-champions-2024
 */
const MATCH_PATH = /^\/(\d+)\/[^/]+/;
const EVENT_PATH = /^\/event\/(?:(matches|stats|agents)\/)?(\d+)(?:\/([^/?#]+))?/;

/** Event sub-pages an extraction can read. */
export const EVENT_SECTIONS = ['matches', 'stats', 'agents'] as const;
export type EventSection = (typeof EVENT_SECTIONS)[number];

function pathOf(url: string): string | null {
  try {
    return new URL(url, 'https://www.vlr.gg').pathname;
  } catch {
    return null;
  }
}

function isEventSection(value: string | undefined): value is EventSection {
  return EVENT_SECTIONS.some((s) => s === value);
}

export function extractMatchId(url: string): string | null {
  const path = pathOf(url);
  return path?.match(MATCH_PATH)?.[1] ?? null;
}

export function extractEventId(url: string): string | null {
  const path = pathOf(url);
  return path?.match(EVENT_PATH)?.[2] ?? null;
}

export function isMatchUrl(url: string): boolean {
  return extractMatchId(url) !== null;
}

export function isEventUrl(url: string): boolean {
  return extractEventId(url) !== null;
}

/** Sub-page an event URL points at; null for the event overview and for non-event URLs. */
export function eventSectionOf(url: string): EventSection | null {
  const section = pathOf(url)?.match(EVENT_PATH)?.[1];
  return isEventSection(section) ? section : null;
}

/**
 * URL of one sub-page of the event `eventUrl` belongs to. Returns null when
 * `eventUrl` is not an event URL.
 */
export function eventSectionUrl(eventUrl: string, section: EventSection, baseUrl: string): string | null {
  const m = pathOf(eventUrl)?.match(EVENT_PATH);
  if (!m) return null;

  const id = m[2] ?? '';
  const slug = m[3];
  if (section === 'matches') {
    return new URL(`/event/matches/${id}/${slug ? `${slug}/` : ''}?series_id=all`, baseUrl).href;
  }
  return new URL(`/event/${section}/${id}${slug ? `/${slug}` : ''}`, baseUrl).href;
}

/** Listing URL holding every match of an event. */
export function eventMatchesUrl(eventUrl: string, baseUrl: string): string | null {
  return eventSectionUrl(eventUrl, 'matches', baseUrl);
}
