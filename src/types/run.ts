import type { PageType } from './fetch.js';
import type { CanonicalRecord } from './record.js';
import type { TargetState } from '../pipeline/target-state.js';

export type RunErrorKind =
  | 'timeout'
  | 'http_status'
  | 'render_failure'
  | 'network'
  | 'invalid_target'
  | 'robots_disallowed'
  | 'structure_mismatch'
  | 'cancelled';

export interface RunError {
  url: string;
  kind: RunErrorKind;
  pageType: PageType;
  message: string;
}

export interface RunReport {
  totalFetched: number;
  totalParsed: number;
  incompleteCount: number;
  errors: RunError[];
  targets: Record<TargetState, number>;
  cancelled: boolean;
  fatal: { kind: 'no_data_extracted'; message: string } | null;
  startedAt: string;
  finishedAt: string;
}

export interface TableColumn {
  key: string;
  label: string;
}

export type TableCell = string | number | boolean | null;

export interface RecordTable {
  columns: TableColumn[];
  rows: Record<string, TableCell>[];
}

export interface RunResult {
  records: readonly CanonicalRecord[];
  table: RecordTable | null;
  report: RunReport;
}
