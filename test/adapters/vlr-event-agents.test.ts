import { describe, it, expect } from 'vitest';
import { EventAgentsParser } from '../../src/adapters/vlr/event-agents.js';
import { ParseError } from '../../src/errors.js';
import { loadFixture } from '../helpers/fixture-loader.js';

const AGENTS_URL = 'https://www.vlr.gg/event/agents/2097/valorant-champions-2024';

describe('EventAgentsParser', () => {
  const parser = new EventAgentsParser();

  it('should handle only event agents listings', () => {
    expect(parser.pageType).toBe('listing');
    expect(parser.handles(AGENTS_URL)).toBe(true);
    expect(parser.handles('https://www.vlr.gg/event/stats/2097/valorant-champions-2024')).toBe(false);
    expect(parser.handles('https://www.vlr.gg/event/2097/valorant-champions-2024')).toBe(false);
  });

  describe('parse', () => {
    const [record] = parser.parse(loadFixture('vlr', 'event-agents.html'), AGENTS_URL);
    const fields = record?.kind === 'event' ? record.fields : null;

    it('should key a headerless page by the event id in its URL', () => {
      expect(record?.recordId).toBe('event:2097');
      expect(fields?.title).toBeNull();
      expect(fields?.players).toBeNull();
    });

    it('should read one map row per map, skipping the all-maps row', () => {
      expect(fields?.mapStats).toEqual([
        { name: 'Lotus', played: '12', attackWin: '51%', defenseWin: '49%' },
        { name: 'Haven', played: '18', attackWin: '46%', defenseWin: '54%' },
      ]);
    });

    it('should read each agent column with its all-maps total and per-map rates', () => {
      expect(fields?.agentUsage).toEqual([
        {
          agent: 'jett',
          total: '38%',
          byMap: [
            { map: 'Lotus', value: '21%' },
            { map: 'Haven', value: '50%' },
          ],
        },
        {
          agent: 'omen',
          total: '71%',
          byMap: [
            { map: 'Lotus', value: '83%' },
            { map: 'Haven', value: null },
          ],
        },
      ]);
    });
  });

  it('should throw a ParseError when the agents table is missing', () => {
    expect(() => parser.parse(loadFixture('vlr', 'event-stats.html'), AGENTS_URL)).toThrow(ParseError);
    expect(() => parser.parse(loadFixture('vlr', 'event-stats.html'), AGENTS_URL)).toThrow(
      'No agent utilization table found on event agents page',
    );
  });
});
