/**
 * Job summary and step outputs for a finished run
 */

import * as core from '@actions/core';
import { errorMessage } from '../shared/errors.js';
import type { LogSummary, RunLogger } from '../shared/logger.js';
import type { PipelineOutcome } from './index.js';
import { isTerminal } from './state.js';

export interface ActionOutputs {
  is_formatted: string;
  changes_detected: string;
  commit_hash: string;
  outcome: string;
}

export function getOutputs(outcome: PipelineOutcome): ActionOutputs {
  return {
    is_formatted: String(outcome.formatResult?.isFormatted ?? false),
    changes_detected: String(outcome.commitResult?.changesDetected ?? false),
    commit_hash: outcome.commitResult?.commitHash ?? '',
    outcome: outcome.record.outcome ?? outcome.record.phase
  };
}

export function setOutputs(outcome: PipelineOutcome): void {
  for (const [name, value] of Object.entries(getOutputs(outcome))) {
    core.setOutput(name, value);
  }
}

/**
 * Write the run to the job summary page
 */
export async function writeSummary(outcome: PipelineOutcome, ref: string, log?: LogSummary): Promise<void> {
  const { record, formatResult, commitResult } = outcome;

  const summary = core.summary
    .addHeading(`Black formatting on ${ref}: ${record.outcome ?? record.phase}`, 2)
    .addTable([
      [
        { data: 'Phase', header: true },
        { data: 'At', header: true }
      ],
      ...record.history.map(entry => [entry.phase, entry.at])
    ]);

  if (record.skipReason) {
    summary.addRaw(`Commit skipped: ${record.skipReason}`, true);
  }
  if (formatResult && formatResult.reformattedFiles.length > 0) {
    summary.addHeading('Reformatted files', 3).addList(formatResult.reformattedFiles);
  }
  if (commitResult?.commitHash) {
    summary.addRaw('Commit: ', false).addCodeBlock(commitResult.commitHash);
  }
  if (record.error) {
    summary.addRaw(`Error: ${record.error}`, true);
  }
  if (log) {
    summary.addRaw(
      `Log: ${log.warnings} warning(s), ${log.errors} error(s) in ${(log.duration / 1000).toFixed(1)}s`,
      true
    );
  }

  await summary.write();
}

/**
 * Publish a finished run: outputs and failure status first, then the job summary
 * A summary that cannot be written only warns
 */
export async function reportOutcome(outcome: PipelineOutcome, ref: string, logger: RunLogger): Promise<void> {
  setOutputs(outcome);

  if (outcome.error) {
    core.setFailed(outcome.error.message);
  } else if (!isTerminal(outcome.record.phase)) {
    core.setFailed(`Run stopped in phase ${outcome.record.phase}`);
  }

  try {
    await writeSummary(outcome, ref, logger.getSummary());
  } catch (error) {
    logger.warn('Could not write the job summary', { error: errorMessage(error) });
  }
}
