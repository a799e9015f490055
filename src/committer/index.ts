/**
 * Auto-commit of formatter output
 *
 * Stages the working-tree changes under the configured pathspecs, creates a
 * single commit and pushes it to the branch the run checked out.
 */

import type { GitOperations } from '../shared/git.js';
import type { RunContext } from '../shared/context.js';
import type { RunLogger } from '../shared/logger.js';

export interface CommitterOptions {
  commitMessage: string;
  filePattern: string[];
  commitUserName: string;
  commitUserEmail: string;
  commitAuthor: string;
  addOptions: string[];
  commitOptions: string[];
  pushOptions: string[];
}

export interface CommitResult {
  changesDetected: boolean;
  commitHash?: string;
  files: string[];
}

export class AutoCommitter {
  private git: GitOperations;
  private options: CommitterOptions;
  private logger: RunLogger;

  constructor(git: GitOperations, options: CommitterOptions, logger: RunLogger) {
    this.git = git;
    this.options = options;
    this.logger = logger;
  }

  /**
   * Commit and push the working-tree changes, if there are any
   * @returns changesDetected false when nothing was committed
   */
  async commitIfChanged(context: Pick<RunContext, 'ref'>): Promise<CommitResult> {
    const { options } = this;

    const dirty = await this.git.status(options.filePattern);
    if (dirty.length === 0) {
      this.logger.log('Working tree clean, nothing to commit', { pattern: options.filePattern.join(' ') });
      return { changesDetected: false, files: [] };
    }

    await this.git.configureIdentity(options.commitUserName, options.commitUserEmail);
    await this.git.add(options.filePattern, options.addOptions);

    const files = await this.git.getStagedFiles();
    if (files.length === 0) {
      this.logger.log('No files staged after add, nothing to commit');
      return { changesDetected: false, files: [] };
    }

    await this.git.commit(options.commitMessage, {
      author: options.commitAuthor,
      extraArgs: options.commitOptions
    });
    const commitHash = await this.git.getCurrentSha();
    this.logger.log('Created commit', { sha: commitHash, files: files.length });

    await this.git.push(context.ref, options.pushOptions);
    this.logger.log('Pushed commit', { branch: context.ref });

    return { changesDetected: true, commitHash, files };
  }
}
