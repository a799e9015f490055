/**
 * Git operations for checkout and auto-commit
 */

import * as core from '@actions/core';
import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { getCloneUrl, type RunContext } from './context.js';
import { CheckoutError, CommitError, errorMessage } from './errors.js';

export interface CheckoutOptions {
  token: string;
  fetchDepth: number;
}

export interface CommitOptions {
  author?: string;
  extraArgs?: string[];
}

/**
 * Git operations bound to one working directory
 */
export interface GitOperations {
  readonly workdir: string;
  checkout(context: RunContext, options: CheckoutOptions): Promise<void>;
  configureIdentity(name: string, email: string): Promise<void>;
  status(pattern: string[]): Promise<string[]>;
  add(pattern: string[], extraArgs?: string[]): Promise<void>;
  getStagedFiles(): Promise<string[]>;
  commit(message: string, options?: CommitOptions): Promise<void>;
  getCurrentSha(): Promise<string>;
  push(branch: string, extraArgs?: string[]): Promise<void>;
}

function splitLines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map(line => line.trimEnd())
    .filter(line => line.trim().length > 0);
}

/**
 * Refspec fetched for a branch or tag
 * Branch pushes pin the pushed commit, pull requests take the head branch tip
 */
export function getRefspec(context: Pick<RunContext, 'eventName' | 'ref' | 'refType' | 'sha'>): string {
  if (context.refType === 'tag') {
    return `+refs/tags/${context.ref}:refs/tags/${context.ref}`;
  }
  if (context.eventName === 'push' && context.sha) {
    return `+${context.sha}:refs/remotes/origin/${context.ref}`;
  }
  return `+refs/heads/${context.ref}:refs/remotes/origin/${context.ref}`;
}

/**
 * Extra header git sends on every request to the server
 */
export function getAuthHeader(token: string): string {
  const basic = Buffer.from(`x-access-token:${token}`, 'utf8').toString('base64');
  core.setSecret(basic);
  return `AUTHORIZATION: basic ${basic}`;
}

/**
 * Create git operations for a working directory
 * @param workdir - Directory the repository is checked out into
 */
export function createGitOperations(workdir: string): GitOperations {
  const git = (args: string[]) => execa('git', args, { cwd: workdir });

  return {
    workdir,

    /**
     * Fetch the event's ref from the clone repo and check it out
     */
    async checkout(context: RunContext, options: CheckoutOptions): Promise<void> {
      const url = getCloneUrl(context);
      try {
        await fs.ensureDir(workdir);

        if (!(await fs.pathExists(path.join(workdir, '.git')))) {
          await git(['init']);
        }

        // Re-point origin when reusing an existing checkout
        const { stdout: remotes } = await git(['remote']);
        if (splitLines(remotes).includes('origin')) {
          await git(['remote', 'set-url', 'origin', url]);
        } else {
          await git(['remote', 'add', 'origin', url]);
        }

        if (options.token) {
          await git([
            'config',
            '--local',
            `http.${context.serverUrl}/.extraheader`,
            getAuthHeader(options.token)
          ]);
        }

        const fetchArgs = ['fetch', '--no-tags', '--prune'];
        if (options.fetchDepth > 0) {
          fetchArgs.push(`--depth=${options.fetchDepth}`);
        }
        await git([...fetchArgs, 'origin', getRefspec(context)]);

        if (context.refType === 'tag') {
          await git(['checkout', '--force', `refs/tags/${context.ref}`]);
        } else {
          await git(['checkout', '--force', '-B', context.ref, `refs/remotes/origin/${context.ref}`]);
        }
      } catch (error) {
        throw new CheckoutError(
          `Failed to check out ${context.ref} from ${context.cloneRepo.owner}/${context.cloneRepo.repo}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    },

    /**
     * Configure git identity (required for commits)
     */
    async configureIdentity(name: string, email: string): Promise<void> {
      try {
        await git(['config', 'user.name', name]);
        await git(['config', 'user.email', email]);
      } catch (error) {
        throw new CommitError(`Failed to configure git identity: ${errorMessage(error)}`, { cause: error });
      }
    },

    /**
     * Porcelain status lines for the given pathspecs
     */
    async status(pattern: string[]): Promise<string[]> {
      try {
        const { stdout } = await git(['status', '-s', '--', ...pattern]);
        return splitLines(stdout);
      } catch (error) {
        throw new CommitError(`Failed to read working tree status: ${errorMessage(error)}`, { cause: error });
      }
    },

    async add(pattern: string[], extraArgs: string[] = []): Promise<void> {
      try {
        await git(['add', ...extraArgs, '--', ...pattern]);
      } catch (error) {
        throw new CommitError(`Failed to stage files: ${errorMessage(error)}`, { cause: error });
      }
    },

    async getStagedFiles(): Promise<string[]> {
      try {
        const { stdout } = await git(['diff', '--cached', '--name-only']);
        return splitLines(stdout).map(f => f.trim());
      } catch (error) {
        throw new CommitError(`Failed to list staged files: ${errorMessage(error)}`, { cause: error });
      }
    },

    async commit(message: string, options: CommitOptions = {}): Promise<void> {
      const args = ['commit', '-m', message];
      if (options.author) {
        args.push(`--author=${options.author}`);
      }
      args.push(...(options.extraArgs ?? []));
      try {
        await git(args);
      } catch (error) {
        throw new CommitError(`Failed to commit: ${errorMessage(error)}`, { cause: error });
      }
    },

    /**
     * Get the current HEAD commit SHA
     */
    async getCurrentSha(): Promise<string> {
      try {
        const { stdout } = await git(['rev-parse', 'HEAD']);
        return stdout.trim();
      } catch (error) {
        throw new CommitError(`Failed to get current SHA: ${errorMessage(error)}`, { cause: error });
      }
    },

    /**
     * Push HEAD to a branch on origin
     * No force and no retry: a rejected push fails the run
     */
    async push(branch: string, extraArgs: string[] = []): Promise<void> {
      try {
        await git(['push', '--set-upstream', 'origin', `HEAD:refs/heads/${branch}`, '--atomic', ...extraArgs]);
      } catch (error) {
        throw new CommitError(`Failed to push to ${branch}: ${errorMessage(error)}`, { cause: error });
      }
    }
  };
}
