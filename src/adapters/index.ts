import type { PageParser } from '../types/adapter.js';
import type { PageType } from '../types/fetch.js';
import { EventAgentsParser } from './vlr/event-agents.js';
import { EventMatchesParser } from './vlr/event-matches.js';
import { EventStatsParser } from './vlr/event-stats.js';
import { MatchDetailParser } from './vlr/match-detail.js';

const parsers: PageParser[] = [];

function register(parser: PageParser): void {
  parsers.push(parser);
}

// Specific listings before the catch-all matches listing
register(new EventStatsParser());
register(new EventAgentsParser());
register(new EventMatchesParser());
register(new MatchDetailParser());

export function getParser(pageType: PageType, url: string): PageParser {
  const parser = parsers.find((p) => p.pageType === pageType && p.handles(url));
  if (!parser) throw new Error(`No parser registered for ${pageType} page: ${url}`);
  return parser;
}

export function getAllParsers(): PageParser[] {
  return [...parsers];
}
