import { describe, it, expect } from 'vitest';
import { EventAgentsParser } from '../../src/adapters/vlr/event-agents.js';
import { EventMatchesParser } from '../../src/adapters/vlr/event-matches.js';
import { EventStatsParser } from '../../src/adapters/vlr/event-stats.js';
import { MatchDetailParser } from '../../src/adapters/vlr/match-detail.js';
import { computeContentKey } from '../../src/pipeline/dedup.js';
import {
  normalize,
  normalizeFormat,
  normalizeStatus,
  parseScore,
  type NormalizeContext,
} from '../../src/pipeline/normalizer.js';
import { createTeamResolver } from '../../src/pipeline/team-resolver.js';
import type { PartialMatchRecord, RawMatchFields } from '../../src/types/record.js';
import { loadFixture } from '../helpers/fixture-loader.js';

const LISTING_URL = 'https://www.vlr.gg/matches';
const MATCH_URL = 'https://www.vlr.gg/378660/fnatic-vs-kr-esports-valorant-champions-2024-opening-a';

const ctx: NormalizeContext = {
  fetchedAt: new Date('2024-08-02T12:00:00Z'),
  utcOffsetMinutes: 0,
  sourceSeq: 3,
  teams: createTeamResolver(),
};

function listingEntry(fields: Partial<RawMatchFields>): PartialMatchRecord {
  return {
    kind: 'match',
    recordId: 'match:378660',
    pageType: 'listing',
    sourceUrl: LISTING_URL,
    detailUrl: MATCH_URL,
    fields: {
      team1: 'KRU Esports',
      team2: 'fnatic',
      score1: '2',
      score2: '0',
      date: 'Thu, August 1, 2024',
      time: '5:00 PM',
      status: 'Completed',
      eventName: 'Valorant Champions 2024',
      stage: 'Group Stage–Opening (A)',
      format: null,
      patch: null,
      maps: null,
      players: null,
      ...fields,
    },
  };
}

describe('parseScore', () => {
  it('should accept non-negative integers', () => {
    expect(parseScore('13')).toEqual({ value: 13, invalid: false });
    expect(parseScore(' 0 ')).toEqual({ value: 0, invalid: false });
  });

  it('should treat placeholders as absent without flagging them', () => {
    for (const raw of ['–', '-', '', null]) {
      expect(parseScore(raw)).toEqual({ value: null, invalid: false });
    }
  });

  it('should flag anything else', () => {
    expect(parseScore('-1')).toEqual({ value: null, invalid: true });
    expect(parseScore('W')).toEqual({ value: null, invalid: true });
    expect(parseScore('1.5')).toEqual({ value: null, invalid: true });
  });
});

describe('normalizeStatus', () => {
  it('should map known status words', () => {
    expect(normalizeStatus('Completed')).toBe('completed');
    expect(normalizeStatus('final')).toBe('completed');
    expect(normalizeStatus('LIVE')).toBe('live');
    expect(normalizeStatus('Upcoming')).toBe('upcoming');
    expect(normalizeStatus('TBD')).toBe('upcoming');
  });

  it('should read countdowns as upcoming', () => {
    expect(normalizeStatus('2h 30m')).toBe('upcoming');
    expect(normalizeStatus('45m')).toBe('upcoming');
    expect(normalizeStatus('1d 4h')).toBe('upcoming');
  });

  it('should return null for unknown text', () => {
    expect(normalizeStatus('Postponed')).toBeNull();
    expect(normalizeStatus(null)).toBeNull();
  });
});

describe('normalizeFormat', () => {
  it('should canonicalize best-of notes', () => {
    expect(normalizeFormat('bo3')).toBe('Bo3');
    expect(normalizeFormat('Bo 5')).toBe('Bo5');
    expect(normalizeFormat('Best of three')).toBeNull();
  });
});

describe('normalize (listing match)', () => {
  it('should produce canonical values without warnings', () => {
    const result = normalize(listingEntry({}), ctx);

    expect(result.kind).toBe('match');
    expect(result.recordId).toBe('match:378660');
    expect(result.sourceSeq).toBe(3);
    expect(result.fetchedAt).toBe(ctx.fetchedAt);
    expect(result.values).toEqual({
      name: 'KRÜ Esports vs FNATIC',
      date: '2024-08-01T17:00:00.000Z',
      participants: ['KRÜ Esports', 'FNATIC'],
      status: 'completed',
      scores: [2, 0],
      eventName: 'Valorant Champions 2024',
      stage: 'Group Stage–Opening (A)',
      format: null,
      patch: null,
      maps: null,
      players: null,
    });
    expect(result.warnings).toEqual([]);
    expect(result.contentKey).toBe(
      computeContentKey({ kind: 'match', name: 'KRÜ Esports vs FNATIC', date: '2024-08-01T17:00:00.000Z' }),
    );
  });

  it('should read naive times in the upstream offset', () => {
    const result = normalize(listingEntry({}), { ...ctx, utcOffsetMinutes: -240 });
    expect(result.values.date).toBe('2024-08-01T21:00:00.000Z');
  });

  it('should leave placeholder scores absent without a warning', () => {
    const result = normalize(listingEntry({ score1: '–', score2: '–', status: 'Upcoming' }), ctx);
    expect(result.values.scores).toBeNull();
    expect(result.warnings).toEqual([]);
  });

  it('should flag invalid scores', () => {
    const result = normalize(listingEntry({ score1: 'W' }), ctx);
    expect(result.values.scores).toBeNull();
    expect(result.warnings).toEqual([
      { field: 'scores', kind: 'invalid_score', raw: 'W', sourceUrl: LISTING_URL },
    ]);
  });

  it('should flag unrecognized status text', () => {
    const result = normalize(listingEntry({ status: 'Postponed' }), ctx);
    expect(result.values.status).toBeNull();
    expect(result.warnings).toEqual([
      { field: 'status', kind: 'unrecognized_status', raw: 'Postponed', sourceUrl: LISTING_URL },
    ]);
  });

  it('should keep the record when the date cannot be read', () => {
    const result = normalize(listingEntry({ date: 'TBD', time: 'TBD' }), ctx);

    expect(result.values.date).toBeNull();
    expect(result.values.name).toBe('KRÜ Esports vs FNATIC');
    expect(result.warnings).toEqual([
      { field: 'date', kind: 'unparseable_date', raw: 'TBD TBD', sourceUrl: LISTING_URL },
      { field: 'date', kind: 'missing_required', raw: 'TBD', sourceUrl: LISTING_URL },
    ]);
  });

  it('should flag missing participants', () => {
    const result = normalize(listingEntry({ team2: null }), ctx);

    expect(result.values.name).toBeNull();
    expect(result.values.participants).toEqual(['KRÜ Esports']);
    expect(result.warnings.map((w) => `${w.field}:${w.kind}`)).toEqual([
      'name:missing_required',
      'participants:missing_required',
    ]);
  });
});

describe('normalize (match page)', () => {
  const [partial] = new MatchDetailParser().parse(loadFixture('vlr', 'match-detail.html'), MATCH_URL);
  if (!partial) throw new Error('fixture produced no record');
  const result = normalize(partial, ctx);

  it('should read the header values', () => {
    expect(result.pageType).toBe('detail');
    expect(result.values).toMatchObject({
      name: 'FNATIC vs KRÜ Esports',
      date: '2024-08-01T17:00:00.000Z',
      participants: ['FNATIC', 'KRÜ Esports'],
      status: 'completed',
      scores: [2, 0],
      eventName: 'Valorant Champions 2024',
      stage: 'Group Stage: Opening (A)',
      format: 'Bo3',
      patch: '9.02',
    });
    expect(result.warnings).toEqual([]);
  });

  it('should number the maps in play order', () => {
    expect(result.kind === 'match' && result.values.maps).toEqual([
      { order: 1, name: 'Lotus', scores: [13, 8] },
      { order: 2, name: 'Split', scores: [13, 10] },
    ]);
  });

  it('should convert player stats to numbers and resolve team tags', () => {
    const players = result.kind === 'match' ? result.values.players : null;
    expect(players).toHaveLength(4);
    expect(players?.[0]).toEqual({
      player: 'Boaster',
      team: 'FNATIC',
      agents: ['Astra'],
      rating: 1.05,
      acs: 198,
      kills: 32,
      deaths: 30,
      assists: 18,
      kast: 75,
      adr: 130,
      hsPercent: 24,
      firstKills: 3,
      firstDeaths: 5,
    });
    expect(players?.[3]?.team).toBe('KRÜ Esports');
  });
});

describe('normalize (event header)', () => {
  const records = new EventMatchesParser().parse(
    loadFixture('vlr', 'event-matches.html'),
    'https://www.vlr.gg/event/matches/2097/valorant-champions-2024/?series_id=all',
  );
  const partial = records.find((r) => r.kind === 'event');
  if (!partial) throw new Error('fixture produced no event record');

  it('should split the date range', () => {
    const result = normalize(partial, ctx);

    expect(result.kind).toBe('event');
    expect(result.recordId).toBe('event:2097');
    expect(result.values).toEqual({
      name: 'Valorant Champions 2024',
      date: '2024-08-01T00:00:00.000Z',
      endDate: '2024-08-25T00:00:00.000Z',
      participants: null,
      status: null,
      scores: null,
      subtitle: 'Champions Tour 2024',
      location: 'Seoul, South Korea',
      prizePool: '$2,250,000 USD',
      players: null,
      mapStats: null,
      agentUsage: null,
    });
    expect(result.warnings).toEqual([]);
  });
});

describe('normalize (event stats page)', () => {
  const [partial] = new EventStatsParser().parse(
    loadFixture('vlr', 'event-stats.html'),
    'https://www.vlr.gg/event/stats/2097/valorant-champions-2024',
  );
  if (!partial) throw new Error('fixture produced no event record');
  const result = normalize(partial, ctx);
  const players = result.kind === 'event' ? result.values.players : null;

  it('should read every stat column into numbers and resolve the team tag', () => {
    expect(players?.[0]).toEqual({
      player: 'Boaster',
      team: 'FNATIC',
      agents: ['astra', 'omen'],
      rating: 0.91,
      acs: 171.2,
      kills: 134,
      deaths: 163,
      assists: 99,
      kast: 72,
      adr: 112.4,
      hsPercent: 24,
      firstKills: 18,
      firstDeaths: 22,
      rounds: 220,
      kdRatio: 0.82,
      kpr: 0.61,
      apr: 0.45,
      fkpr: 0.08,
      fdpr: 0.1,
      clutchPercent: 12,
      kMax: 4,
    });
  });

  it('should leave a missing stat null', () => {
    expect(players?.[1]?.team).toBe('Paper Rex');
    expect(players?.[1]?.clutchPercent).toBeNull();
    expect(players?.[1]?.kMax).toBe(5);
  });

  it('should keep the event header values beside the section', () => {
    expect(result.recordId).toBe('event:2097');
    expect(result.values.name).toBe('Valorant Champions 2024');
    expect(result.kind === 'event' ? result.values.mapStats : undefined).toBeNull();
  });
});

describe('normalize (event agents page)', () => {
  const [partial] = new EventAgentsParser().parse(
    loadFixture('vlr', 'event-agents.html'),
    'https://www.vlr.gg/event/agents/2097/valorant-champions-2024',
  );
  if (!partial) throw new Error('fixture produced no event record');
  const result = normalize(partial, ctx);
  const values = result.kind === 'event' ? result.values : null;

  it('should read map rows as counts and percentages', () => {
    expect(values?.mapStats).toEqual([
      { name: 'Lotus', timesPlayed: 12, attackWinPercent: 51, defenseWinPercent: 49 },
      { name: 'Haven', timesPlayed: 18, attackWinPercent: 46, defenseWinPercent: 54 },
    ]);
  });

  it('should read agent pick rates', () => {
    expect(values?.agentUsage).toEqual([
      {
        agent: 'jett',
        totalPercent: 38,
        maps: [
          { map: 'Lotus', percent: 21 },
          { map: 'Haven', percent: 50 },
        ],
      },
      {
        agent: 'omen',
        totalPercent: 71,
        maps: [
          { map: 'Lotus', percent: 83 },
          { map: 'Haven', percent: null },
        ],
      },
    ]);
  });

  it('should warn about the missing header without dropping the record', () => {
    expect(result.warnings.map((w) => [w.field, w.kind])).toEqual([
      ['name', 'missing_required'],
      ['date', 'missing_required'],
    ]);
  });
});
