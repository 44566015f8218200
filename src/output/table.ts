import type { CanonicalRecord } from '../types/record.js';
import type { RecordTable, TableCell, TableColumn } from '../types/run.js';

/** Fixed column set handed to the dashboard; every row carries every key. */
export const TABLE_COLUMNS: readonly TableColumn[] = [
  { key: 'id', label: 'ID' },
  { key: 'type', label: 'Type' },
  { key: 'name', label: 'Name' },
  { key: 'date', label: 'Date (UTC)' },
  { key: 'status', label: 'Status' },
  { key: 'team1', label: 'Team 1' },
  { key: 'team2', label: 'Team 2' },
  { key: 'score', label: 'Score' },
  { key: 'event', label: 'Event' },
  { key: 'stage', label: 'Stage' },
  { key: 'format', label: 'Format' },
  { key: 'maps', label: 'Maps' },
  { key: 'incomplete', label: 'Incomplete' },
  { key: 'warnings', label: 'Warnings' },
  { key: 'lastUpdated', label: 'Last updated' },
];

function toRow(record: CanonicalRecord): Record<string, TableCell> {
  const isMatch = record.type === 'match';
  return {
    id: record.id,
    type: record.type,
    name: record.name || null,
    date: record.date,
    status: record.status,
    team1: record.participants[0] ?? null,
    team2: record.participants[1] ?? null,
    score: record.scores ? record.scores.join(':') : null,
    event: isMatch ? record.details.eventName : record.name || null,
    stage: isMatch ? record.details.stage : null,
    format: isMatch ? record.details.format : null,
    maps: isMatch ? record.details.maps.length : null,
    incomplete: record.incomplete,
    warnings: record.warnings.length,
    lastUpdated: record.lastUpdated,
  };
}

export function toTable(records: readonly CanonicalRecord[]): RecordTable {
  return {
    columns: [...TABLE_COLUMNS],
    rows: records.map(toRow),
  };
}
