/**
 * Pipeline run state
 *
 * started -> checked_out -> formatted -> committed | skipped -> finished
 * Any non-final phase may move to aborted.
 */

import { PipelineStateError } from '../shared/errors.js';

export type Phase =
  | 'started'
  | 'checked_out'
  | 'formatted'
  | 'committed'
  | 'skipped'
  | 'finished'
  | 'aborted';

export type Outcome = 'committed' | 'skipped' | 'aborted';

export type SkipReason =
  | 'unchanged'          // Formatter left every file as it was
  | 'no-staged-changes'  // Rewritten files fall outside file_pattern
  | 'not-a-branch'       // Tag push, nowhere to push to
  | 'fork';              // Pull request head lives in a fork

export interface PhaseEntry {
  phase: Phase;
  at: string;
}

export interface RunRecord {
  phase: Phase;
  outcome?: Outcome;
  skipReason?: SkipReason;
  error?: string;
  history: PhaseEntry[];
}

const TRANSITIONS: Record<Phase, readonly Phase[]> = {
  started: ['checked_out', 'aborted'],
  checked_out: ['formatted', 'aborted'],
  formatted: ['committed', 'skipped', 'aborted'],
  committed: ['finished'],
  skipped: ['finished'],
  finished: [],
  aborted: []
};

export function createRunRecord(): RunRecord {
  return {
    phase: 'started',
    history: [{ phase: 'started', at: new Date().toISOString() }]
  };
}

export function canTransition(from: Phase, to: Phase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(phase: Phase): boolean {
  return TRANSITIONS[phase].length === 0;
}

/**
 * Move a run to the next phase
 * @throws PipelineStateError on a move the table does not allow
 */
export function transition(
  record: RunRecord,
  to: Phase,
  extra: { skipReason?: SkipReason; error?: string } = {}
): RunRecord {
  if (!canTransition(record.phase, to)) {
    throw new PipelineStateError(`Illegal transition: ${record.phase} -> ${to}`);
  }

  let outcome = record.outcome;
  if (to === 'committed' || to === 'skipped' || to === 'aborted') {
    outcome = to;
  }

  return {
    ...record,
    ...extra,
    phase: to,
    outcome,
    history: [...record.history, { phase: to, at: new Date().toISOString() }]
  };
}
