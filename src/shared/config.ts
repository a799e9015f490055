/**
 * Action input handling
 * Reads, parses and validates the inputs declared in action.yml
 */

import path from 'path';
import { ConfigError } from './errors.js';
import type { RunContext } from './context.js';

/**
 * Anything that can read an action input (@actions/core, or a map in tests)
 */
export interface InputReader {
  getInput(name: string, options?: { required?: boolean; trimWhitespace?: boolean }): string;
}

export interface ActionConfig {
  token: string;
  workdir: string;
  fetchDepth: number;
  blackArgs: string[];
  failOnError: boolean;
  commitMessage: string;
  filePattern: string[];
  commitUserName: string;
  commitUserEmail: string;
  commitAuthor: string;
  addOptions: string[];
  commitOptions: string[];
  pushOptions: string[];
  pushToFork: boolean;
}

export const DEFAULT_COMMIT_MESSAGE = 'Apply black formatting';
export const DEFAULT_USER_NAME = 'github-actions[bot]';
export const DEFAULT_USER_EMAIL = '41898282+github-actions[bot]@users.noreply.github.com';

const TRUE_VALUES = ['true', 'True', 'TRUE'];
const FALSE_VALUES = ['false', 'False', 'FALSE'];

/**
 * Parse a YAML 1.2 core-schema boolean, same rules as core.getBooleanInput
 * @param name - Input name, for the error message
 * @param raw - Raw input value
 * @param fallback - Value used when the input is empty
 */
export function parseBooleanInput(name: string, raw: string, fallback: boolean): boolean {
  const value = raw.trim();
  if (value === '') return fallback;
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  throw new ConfigError(
    `Input ${name} does not meet YAML 1.2 "Core Schema" specification: ${value}\n` +
      'Support boolean input list: `true | True | TRUE | false | False | FALSE`'
  );
}

/**
 * Parse a non-negative integer input
 */
export function parseIntegerInput(name: string, raw: string, fallback: number): number {
  const value = raw.trim();
  if (value === '') return fallback;
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`Input ${name} must be a non-negative integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * Split a command line into words like a POSIX shell does
 * Handles single quotes, double quotes and backslash escapes
 */
export function splitArgs(input: string): string[] {
  const args: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && i + 1 < input.length && '"\\$`'.includes(input[i + 1])) {
        current += input[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < input.length) {
      current += input[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        args.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new ConfigError(`Unterminated ${quote} quote in arguments: ${input}`);
  }
  if (inWord) {
    args.push(current);
  }
  return args;
}

/**
 * Default commit author, derived from the triggering actor
 */
export function defaultCommitAuthor(context: Pick<RunContext, 'actor' | 'actorId'>): string {
  const { actor, actorId } = context;
  const email = actorId
    ? `${actorId}+${actor}@users.noreply.github.com`
    : `${actor}@users.noreply.github.com`;
  return `${actor} <${email}>`;
}

/**
 * Read all inputs into an ActionConfig
 * @param reader - Input source
 * @param context - Run context, used for the default author
 * @param workspace - Directory the checkout path is relative to
 */
export function readConfig(
  reader: InputReader,
  context: Pick<RunContext, 'actor' | 'actorId'>,
  workspace = process.env.GITHUB_WORKSPACE || process.cwd()
): ActionConfig {
  const input = (name: string) => reader.getInput(name).trim();

  const config: ActionConfig = {
    token: input('token'),
    workdir: path.resolve(workspace, input('path') || '.'),
    fetchDepth: parseIntegerInput('fetch_depth', input('fetch_depth'), 1),
    blackArgs: splitArgs(input('black_args') || '.'),
    failOnError: parseBooleanInput('fail_on_error', input('fail_on_error'), true),
    commitMessage: input('commit_message') || DEFAULT_COMMIT_MESSAGE,
    filePattern: splitArgs(input('file_pattern') || '.'),
    commitUserName: input('commit_user_name') || DEFAULT_USER_NAME,
    commitUserEmail: input('commit_user_email') || DEFAULT_USER_EMAIL,
    commitAuthor: input('commit_author') || defaultCommitAuthor(context),
    addOptions: splitArgs(input('add_options')),
    commitOptions: splitArgs(input('commit_options')),
    pushOptions: splitArgs(input('push_options')),
    pushToFork: parseBooleanInput('push_to_fork', input('push_to_fork'), false)
  };

  validateConfig(config);
  return config;
}

/**
 * Validate a config object
 * @returns true if valid
 * @throws ConfigError if invalid
 */
export function validateConfig(config: ActionConfig): true {
  if (config.blackArgs.length === 0) {
    throw new ConfigError('black_args must name at least one argument');
  }
  if (config.filePattern.length === 0) {
    throw new ConfigError('file_pattern must name at least one pathspec');
  }
  if (config.commitMessage.trim().length === 0) {
    throw new ConfigError('commit_message must not be empty');
  }
  return true;
}
