import type { FetchTarget } from '../types/fetch.js';

export type TargetState = 'pending' | 'fetching' | 'fetched' | 'failed' | 'parsing' | 'parsed' | 'parse_failed';

export const TARGET_STATES: readonly TargetState[] = [
  'pending',
  'fetching',
  'fetched',
  'failed',
  'parsing',
  'parsed',
  'parse_failed',
];

const TRANSITIONS: Record<TargetState, readonly TargetState[]> = {
  pending: ['fetching', 'failed'],
  fetching: ['fetched', 'failed'],
  fetched: ['parsing'],
  parsing: ['parsed', 'parse_failed'],
  failed: [],
  parsed: [],
  parse_failed: [],
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly url: string,
    readonly from: TargetState,
    readonly to: TargetState,
  ) {
    super(`Invalid target transition ${from} -> ${to} for ${url}`);
    this.name = 'InvalidTransitionError';
  }
}

export function canTransition(from: TargetState, to: TargetState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Lifecycle of every target issued during a run. `pending -> failed` covers
 * targets dropped by cancellation before their fetch started.
 */
export class TargetTracker {
  private readonly states = new Map<number, { target: FetchTarget; state: TargetState }>();

  register(target: FetchTarget): void {
    if (this.states.has(target.seq)) {
      throw new Error(`Target ${target.seq} (${target.url}) registered twice`);
    }
    this.states.set(target.seq, { target, state: 'pending' });
  }

  stateOf(target: FetchTarget): TargetState {
    const entry = this.states.get(target.seq);
    if (!entry) throw new Error(`Unknown target ${target.seq} (${target.url})`);
    return entry.state;
  }

  transition(target: FetchTarget, to: TargetState): void {
    const entry = this.states.get(target.seq);
    if (!entry) throw new Error(`Unknown target ${target.seq} (${target.url})`);
    if (!canTransition(entry.state, to)) {
      throw new InvalidTransitionError(target.url, entry.state, to);
    }
    entry.state = to;
  }

  counts(): Record<TargetState, number> {
    const counts: Record<TargetState, number> = {
      pending: 0,
      fetching: 0,
      fetched: 0,
      failed: 0,
      parsing: 0,
      parsed: 0,
      parse_failed: 0,
    };
    for (const { state } of this.states.values()) counts[state]++;
    return counts;
  }
}
