import { describe, it, expect } from 'vitest';
import { TABLE_COLUMNS, toTable } from '../../src/output/table.js';
import type { EventRecord, MatchRecord } from '../../src/types/record.js';

const match: MatchRecord = {
  type: 'match',
  id: 'match:378660',
  name: 'FNATIC vs KRÜ Esports',
  date: '2024-08-01T17:00:00.000Z',
  participants: ['FNATIC', 'KRÜ Esports'],
  status: 'completed',
  scores: [2, 0],
  lastUpdated: '2024-08-02T12:00:00.000Z',
  incomplete: false,
  warnings: [],
  provenance: ['https://www.vlr.gg/matches'],
  fieldSources: {},
  discrepancies: [],
  details: {
    eventName: 'Valorant Champions 2024',
    stage: 'Group Stage: Opening (A)',
    format: 'Bo3',
    patch: '9.02',
    maps: [
      { order: 1, name: 'Lotus', scores: [13, 8] },
      { order: 2, name: 'Split', scores: [13, 10] },
    ],
    players: [],
  },
};

const event: EventRecord = {
  type: 'event',
  id: 'event:2097',
  name: 'Valorant Champions 2024',
  date: '2024-08-01T00:00:00.000Z',
  participants: [],
  status: 'unknown',
  scores: null,
  lastUpdated: '2024-08-02T12:00:00.000Z',
  incomplete: false,
  warnings: [],
  provenance: ['https://www.vlr.gg/event/matches/2097/x/?series_id=all'],
  fieldSources: {},
  discrepancies: [],
  details: { subtitle: null, endDate: '2024-08-25T00:00:00.000Z', location: 'Seoul', prizePool: null, players: [], mapStats: [], agentUsage: [] },
};

describe('toTable', () => {
  const table = toTable([event, match]);

  it('should use the fixed column set', () => {
    expect(table.columns.map((c) => c.key)).toEqual(TABLE_COLUMNS.map((c) => c.key));
  });

  it('should flatten a match', () => {
    expect(table.rows[1]).toEqual({
      id: 'match:378660',
      type: 'match',
      name: 'FNATIC vs KRÜ Esports',
      date: '2024-08-01T17:00:00.000Z',
      status: 'completed',
      team1: 'FNATIC',
      team2: 'KRÜ Esports',
      score: '2:0',
      event: 'Valorant Champions 2024',
      stage: 'Group Stage: Opening (A)',
      format: 'Bo3',
      maps: 2,
      incomplete: false,
      warnings: 0,
      lastUpdated: '2024-08-02T12:00:00.000Z',
    });
  });

  it('should fill every column of an event row', () => {
    const row = table.rows[0];
    expect(Object.keys(row ?? {})).toEqual(TABLE_COLUMNS.map((c) => c.key));
    expect(row).toMatchObject({ type: 'event', event: 'Valorant Champions 2024', team1: null, score: null, maps: null });
  });
});
