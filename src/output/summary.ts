import type { CanonicalRecord } from '../types/record.js';

export interface RecordSummary {
  matches: number;
  events: number;
  completedMatches: number;
  incomplete: number;
  /** Distinct participants across all matches, sorted */
  teams: string[];
  /** Player lines across event stats pages */
  eventPlayers: number;
  /** Distinct agents and maps across event agents pages */
  agents: number;
  maps: number;
}

export function summarizeRecords(records: readonly CanonicalRecord[]): RecordSummary {
  const teams = new Set<string>();
  let matches = 0;
  let events = 0;
  let completedMatches = 0;
  let incomplete = 0;
  let eventPlayers = 0;
  const agents = new Set<string>();
  const maps = new Set<string>();

  for (const record of records) {
    if (record.incomplete) incomplete++;
    if (record.type === 'event') {
      events++;
      eventPlayers += record.details.players.length;
      for (const usage of record.details.agentUsage) agents.add(usage.agent);
      for (const map of record.details.mapStats) maps.add(map.name);
      continue;
    }
    matches++;
    if (record.status === 'completed') completedMatches++;
    for (const team of record.participants) teams.add(team);
  }

  return {
    matches,
    events,
    completedMatches,
    incomplete,
    teams: [...teams].sort(),
    eventPlayers,
    agents: agents.size,
    maps: maps.size,
  };
}
