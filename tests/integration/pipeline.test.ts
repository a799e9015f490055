/**
 * Integration Tests for the format pipeline
 *
 * Runs the pipeline end to end against an in-memory remote, git and black:
 * checkout -> format -> commit only when black rewrote files
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createMockState,
  createMockGitOperations,
  createMockFormatter,
  createMockLogSink,
  makeContext,
  type MockState
} from './mocks.js';
import { FormatPipeline, type PipelineOptions } from '../../src/pipeline/index.js';
import { getOutputs } from '../../src/pipeline/report.js';
import { AutoCommitter, type CommitterOptions } from '../../src/committer/index.js';
import { RunLogger } from '../../src/shared/logger.js';
import { CheckoutError, CommitError, FormatterError } from '../../src/shared/errors.js';
import type { RunContext } from '../../src/shared/context.js';

const COMMITTER_OPTIONS: CommitterOptions = {
  commitMessage: 'Apply black formatting',
  filePattern: ['.'],
  commitUserName: 'github-actions[bot]',
  commitUserEmail: '41898282+github-actions[bot]@users.noreply.github.com',
  commitAuthor: 'octo-dev <1001+octo-dev@users.noreply.github.com>',
  addOptions: [],
  commitOptions: [],
  pushOptions: []
};

function buildPipeline(
  state: MockState,
  context: RunContext = makeContext(),
  overrides: { options?: Partial<PipelineOptions>; committer?: Partial<CommitterOptions> } = {}
) {
  const git = createMockGitOperations(state);
  const sink = createMockLogSink();
  const logger = new RunLogger(sink);
  const committer = new AutoCommitter(git, { ...COMMITTER_OPTIONS, ...overrides.committer }, logger);
  const commitSpy = vi.spyOn(committer, 'commitIfChanged');
  const pipeline = new FormatPipeline(
    context,
    { git, formatter: createMockFormatter(state), committer, logger },
    { checkout: { token: 'test-token', fetchDepth: 1 }, pushToFork: false, ...overrides.options }
  );
  return { pipeline, git, sink, commitSpy };
}

function phases(outcome: { record: { history: { phase: string }[] } }): string[] {
  return outcome.record.history.map(entry => entry.phase);
}

describe('FormatPipeline', () => {
  describe('push to main with an unformatted file', () => {
    it('should commit the formatted file to main', async () => {
      const state = createMockState({
        main: { 'axo.py': "x = 'a'\n", 'README.md': "# It's data\n" }
      });
      const { pipeline } = buildPipeline(state);

      const outcome = await pipeline.run();

      expect(outcome.error).toBeUndefined();
      expect(outcome.record.outcome).toBe('committed');
      expect(phases(outcome)).toEqual(['started', 'checked_out', 'formatted', 'committed', 'finished']);
      expect(outcome.commitResult).toEqual({ changesDetected: true, commitHash: 'sha-1', files: ['axo.py'] });
      expect(state.pushed.get('main')).toEqual([
        {
          sha: 'sha-1',
          message: 'Apply black formatting',
          author: 'octo-dev <1001+octo-dev@users.noreply.github.com>',
          files: ['axo.py']
        }
      ]);
      expect(state.remote.get('main')?.get('axo.py')).toBe('x = "a"\n');
      expect(state.remote.get('main')?.get('README.md')).toBe("# It's data\n");
    });

    it('should report the run through the step outputs', async () => {
      const state = createMockState({ main: { 'axo.py': "x = 'a'\n" } });
      const { pipeline } = buildPipeline(state);

      const outcome = await pipeline.run();

      expect(getOutputs(outcome)).toEqual({
        is_formatted: 'true',
        changes_detected: 'true',
        commit_hash: 'sha-1',
        outcome: 'committed'
      });
    });

    it('should commit exactly the files the formatter changed', async () => {
      const state = createMockState({
        main: {
          'axo.py': "x = 'a'\n",
          'utils/hist.py': 'import numpy\n',
          'processors/utils.py': 'y = 1   \n'
        }
      });
      const { pipeline } = buildPipeline(state);

      const outcome = await pipeline.run();

      expect(outcome.formatResult?.reformattedFiles).toEqual(['axo.py', 'processors/utils.py']);
      expect(state.pushed.get('main')?.map(c => c.files)).toEqual([['axo.py', 'processors/utils.py']]);
    });
  });

  describe('push to main with everything formatted', () => {
    it('should not create a commit', async () => {
      const state = createMockState({ main: { 'axo.py': 'x = "a"\n' } });
      const { pipeline, commitSpy, git } = buildPipeline(state);

      const outcome = await pipeline.run();

      expect(outcome.record.outcome).toBe('skipped');
      expect(outcome.record.skipReason).toBe('unchanged');
      expect(phases(outcome)).toEqual(['started', 'checked_out', 'formatted', 'skipped', 'finished']);
      expect(commitSpy).not.toHaveBeenCalled();
      expect(git.commit).not.toHaveBeenCalled();
      expect(state.pushed.size).toBe(0);
      expect(state.worktree).toEqual(state.baseline);
      expect(getOutputs(outcome)).toEqual({
        is_formatted: 'false',
        changes_detected: 'false',
        commit_hash: '',
        outcome: 'skipped'
      });
    });
  });

  describe('idempotence', () => {
    it('should not commit again on a second run over the same content', async () => {
      const state = createMockState({ main: { 'axo.py': "x = 'a'\n" } });

      const first = await buildPipeline(state).pipeline.run();
      const second = await buildPipeline(state).pipeline.run();

      expect(first.record.outcome).toBe('committed');
      expect(second.record.outcome).toBe('skipped');
      expect(second.formatResult?.isFormatted).toBe(false);
      expect(state.pushed.get('main')).toHaveLength(1);
    });
  });

  describe('pull request from feature-x', () => {
    it('should push to the head branch, not the target branch', async () => {
      const state = createMockState({
        main: { 'axo.py': "x = 'a'\n" },
        'feature-x': { 'axo.py': "x = 'a'\n", 'new.py': "y = 'b'\n" }
      });
      const context = makeContext({ eventName: 'pull_request', ref: 'feature-x', pullRequestNumber: 7 });
      const { pipeline } = buildPipeline(state, context);

      const outcome = await pipeline.run();

      expect(outcome.record.outcome).toBe('committed');
      expect(state.pushed.get('feature-x')).toHaveLength(1);
      expect(state.pushed.has('main')).toBe(false);
      expect(state.remote.get('main')?.get('axo.py')).toBe("x = 'a'\n");
      expect(state.remote.get('feature-x')?.get('new.py')).toBe('y = "b"\n');
    });

    it('should skip the push for pull requests from forks', async () => {
      const state = createMockState({ 'feature-x': { 'axo.py': "x = 'a'\n" } });
      const context = makeContext({
        eventName: 'pull_request',
        ref: 'feature-x',
        isFork: true,
        cloneRepo: { owner: 'contributor', repo: 'analysis' }
      });
      const { pipeline, commitSpy, sink } = buildPipeline(state, context);

      const outcome = await pipeline.run();

      expect(outcome.record.outcome).toBe('skipped');
      expect(outcome.record.skipReason).toBe('fork');
      expect(outcome.formatResult?.isFormatted).toBe(true);
      expect(commitSpy).not.toHaveBeenCalled();
      expect(sink.warning).toHaveBeenCalledWith(
        '[commit] Files were reformatted but the pull request comes from fork contributor/analysis, not pushing'
      );
    });

    it('should push to a fork when push_to_fork is set', async () => {
      const state = createMockState({ 'feature-x': { 'axo.py': "x = 'a'\n" } });
      const context = makeContext({ eventName: 'pull_request', ref: 'feature-x', isFork: true });
      const { pipeline } = buildPipeline(state, context, { options: { pushToFork: true } });

      const outcome = await pipeline.run();

      expect(outcome.record.outcome).toBe('committed');
      expect(state.pushed.get('feature-x')).toHaveLength(1);
    });
  });

  describe('formatter cannot parse a file', () => {
    it('should abort before the commit step', async () => {
      const state = createMockState({
        main: { 'axo.py': "x = 'a'\n", 'broken.py': 'def (\n' }
      });
      const { pipeline, commitSpy, sink } = buildPipeline(state);

      const outcome = await pipeline.run();

      expect(outcome.record.outcome).toBe('aborted');
      expect(phases(outcome)).toEqual(['started', 'checked_out', 'aborted']);
      expect(outcome.error).toBeInstanceOf(FormatterError);
      expect(outcome.record.error).toBe('Black could not format broken.py (error code: 123)');
      expect(outcome.formatResult).toBeUndefined();
      expect(commitSpy).not.toHaveBeenCalled();
      expect(state.pushed.size).toBe(0);
      expect(sink.error).toHaveBeenCalledWith(
        '[checked_out] Run aborted: Black could not format broken.py (error code: 123)'
      );
      expect(getOutputs(outcome).outcome).toBe('aborted');
    });
  });

  describe('other terminal paths', () => {
    it('should abort when the ref cannot be checked out', async () => {
      const state = createMockState({ main: {} });
      const { pipeline } = buildPipeline(state, makeContext({ ref: 'gone' }));

      const outcome = await pipeline.run();

      expect(phases(outcome)).toEqual(['started', 'aborted']);
      expect(outcome.error).toBeInstanceOf(CheckoutError);
    });

    it('should abort when the push is rejected', async () => {
      const state = createMockState({ main: { 'axo.py': "x = 'a'\n" } });
      state.rejectPush = true;
      const { pipeline } = buildPipeline(state);

      const outcome = await pipeline.run();

      expect(phases(outcome)).toEqual(['started', 'checked_out', 'formatted', 'aborted']);
      expect(outcome.error).toBeInstanceOf(CommitError);
      expect(state.pushed.size).toBe(0);
      expect(state.remote.get('main')?.get('axo.py')).toBe("x = 'a'\n");
    });

    it('should not push formatting of a tag', async () => {
      const state = createMockState({ v1: { 'axo.py': "x = 'a'\n" } });
      const { pipeline, commitSpy } = buildPipeline(state, makeContext({ ref: 'v1', refType: 'tag' }));

      const outcome = await pipeline.run();

      expect(outcome.record.skipReason).toBe('not-a-branch');
      expect(commitSpy).not.toHaveBeenCalled();
    });

    it('should skip when the rewritten files fall outside file_pattern', async () => {
      const state = createMockState({ main: { 'axo.py': "x = 'a'\n", 'src/ok.py': 'z = 1\n' } });
      const { pipeline, commitSpy } = buildPipeline(state, makeContext(), { committer: { filePattern: ['src'] } });

      const outcome = await pipeline.run();

      expect(commitSpy).toHaveBeenCalledTimes(1);
      expect(outcome.record.outcome).toBe('skipped');
      expect(outcome.record.skipReason).toBe('no-staged-changes');
      expect(outcome.commitResult).toEqual({ changesDetected: false, files: [] });
      expect(state.pushed.size).toBe(0);
    });
  });
});
