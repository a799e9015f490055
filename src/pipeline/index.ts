/**
 * Format pipeline
 *
 * One run per triggering event:
 * 1. Check out the event's ref
 * 2. Run the formatter
 * 3. Commit and push only if the formatter reported rewritten files
 */

import type { RunContext } from '../shared/context.js';
import type { CheckoutOptions, GitOperations } from '../shared/git.js';
import type { Formatter, FormatResult } from '../formatter/types.js';
import type { CommitResult } from '../committer/index.js';
import type { RunLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { createRunRecord, transition, type Phase, type RunRecord, type SkipReason } from './state.js';

export interface Committer {
  commitIfChanged(context: Pick<RunContext, 'ref'>): Promise<CommitResult>;
}

export interface PipelineDeps {
  git: Pick<GitOperations, 'checkout'>;
  formatter: Formatter;
  committer: Committer;
  logger: RunLogger;
}

export interface PipelineOptions {
  checkout: CheckoutOptions;
  pushToFork: boolean;
}

export interface PipelineOutcome {
  record: RunRecord;
  formatResult?: FormatResult;
  commitResult?: CommitResult;
  error?: Error;
}

export class FormatPipeline {
  private context: RunContext;
  private deps: PipelineDeps;
  private options: PipelineOptions;
  private record: RunRecord;

  constructor(context: RunContext, deps: PipelineDeps, options: PipelineOptions) {
    this.context = context;
    this.deps = deps;
    this.options = options;
    this.record = createRunRecord();
  }

  private move(to: Phase, extra?: { skipReason?: SkipReason }): void {
    this.record = transition(this.record, to, extra);
    this.deps.logger.debug('Phase changed', { phase: this.record.phase });
  }

  /**
   * Why a formatted tree must not be pushed, if it must not
   */
  private getPushBlocker(): SkipReason | undefined {
    if (this.context.refType === 'tag') return 'not-a-branch';
    if (this.context.isFork && !this.options.pushToFork) return 'fork';
    return undefined;
  }

  /**
   * Run the pipeline to a terminal phase
   * Step failures end in 'aborted' and are returned, not thrown
   */
  async run(): Promise<PipelineOutcome> {
    const { git, formatter, committer, logger } = this.deps;
    const { ref, cloneRepo } = this.context;
    let formatResult: FormatResult | undefined;
    let commitResult: CommitResult | undefined;

    try {
      await logger.step(`Check out ${ref}`, async () => {
        await git.checkout(this.context, this.options.checkout);
        logger.log('Checked out', { ref, repo: `${cloneRepo.owner}/${cloneRepo.repo}` }, 'checkout');
      });
      this.move('checked_out');

      const result = await logger.step(`Run ${formatter.name}`, async () => {
        const res = await formatter.format();
        logger.log(
          'Formatter finished',
          { exitCode: res.exitCode, reformatted: res.reformattedFiles.length, unchanged: res.unchangedCount },
          'format'
        );
        for (const file of res.reformattedFiles) {
          logger.log(`reformatted ${file}`, undefined, 'format');
        }
        return res;
      });
      formatResult = result;
      this.move('formatted');

      if (!result.isFormatted) {
        logger.log('Tree already formatted, skipping commit', undefined, 'commit');
        this.move('skipped', { skipReason: 'unchanged' });
      } else {
        const blocker = this.getPushBlocker();
        if (blocker === 'not-a-branch') {
          logger.warn(`Files were reformatted but ${ref} is a tag, not pushing`, undefined, 'commit');
          this.move('skipped', { skipReason: blocker });
        } else if (blocker === 'fork') {
          logger.warn(
            `Files were reformatted but the pull request comes from fork ${cloneRepo.owner}/${cloneRepo.repo}, not pushing`,
            undefined,
            'commit'
          );
          this.move('skipped', { skipReason: blocker });
        } else {
          commitResult = await logger.step(`Commit to ${ref}`, () => committer.commitIfChanged(this.context));
          if (commitResult.changesDetected) {
            this.move('committed');
          } else {
            this.move('skipped', { skipReason: 'no-staged-changes' });
          }
        }
      }

      this.move('finished');
      return { record: this.record, formatResult, commitResult };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(errorMessage(error));
      logger.logError('Run aborted', err, this.record.phase);
      this.record = transition(this.record, 'aborted', { error: err.message });
      return { record: this.record, formatResult, commitResult, error: err };
    }
  }
}
