import * as core from '@actions/core';
import * as github from '@actions/github';
import { resolveRunContext } from './shared/context.js';
import { readConfig } from './shared/config.js';
import { createGitOperations } from './shared/git.js';
import { RunLogger } from './shared/logger.js';
import { BlackFormatter } from './formatter/black.js';
import { AutoCommitter } from './committer/index.js';
import { FormatPipeline } from './pipeline/index.js';
import { reportOutcome } from './pipeline/report.js';

async function run(): Promise<void> {
  const logger = new RunLogger();

  try {
    const context = resolveRunContext(github.context);
    const config = readConfig(core, context);

    logger.log('Black format action starting', {
      event: context.eventName,
      repo: `${context.repo.owner}/${context.repo.repo}`,
      ref: context.ref,
      pr: context.pullRequestNumber
    });

    const git = createGitOperations(config.workdir);
    const pipeline = new FormatPipeline(
      context,
      {
        git,
        formatter: new BlackFormatter({
          args: config.blackArgs,
          workdir: config.workdir,
          failOnError: config.failOnError
        }),
        committer: new AutoCommitter(git, config, logger),
        logger
      },
      {
        checkout: { token: config.token, fetchDepth: config.fetchDepth },
        pushToFork: config.pushToFork
      }
    );

    const outcome = await pipeline.run();
    await reportOutcome(outcome, context.ref, logger);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.logError('Run failed', err);
    core.setFailed(err.message);
  }
}

run().catch(error => {
  core.setFailed(`Black format action failed: ${error instanceof Error ? error.message : String(error)}`);
});
