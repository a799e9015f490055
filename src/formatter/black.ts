/**
 * Black formatter runner
 *
 * Runs black over the checked-out tree and reports whether it rewrote
 * anything. Exit codes:
 *   0   - success (files may have been reformatted)
 *   1   - --check/--diff found files that would be reformatted
 *   123 - internal error, usually a file black cannot parse
 */

import { execa } from 'execa';
import { FormatterError, errorMessage } from '../shared/errors.js';
import type { Formatter, FormatResult, FailedFile } from './types.js';

export const EXIT_OK = 0;
export const EXIT_WOULD_REFORMAT = 1;
export const EXIT_INTERNAL_ERROR = 123;

export interface BlackOptions {
  args: string[];
  workdir: string;
  failOnError: boolean;
  command?: string;
}

export interface ParsedBlackOutput {
  reformattedFiles: string[];
  failedFiles: FailedFile[];
  unchangedCount: number;
}

const REFORMATTED = /^(?:reformatted|would reformat) (.+)$/;
const CANNOT_FORMAT = /^error: cannot format (.+?): (.*)$/;
const UNCHANGED = /(\d+) files? (?:would be )?left unchanged/;

/**
 * Extract per-file results and the unchanged count from black's output
 */
export function parseBlackOutput(output: string): ParsedBlackOutput {
  const reformattedFiles: string[] = [];
  const failedFiles: FailedFile[] = [];
  let unchangedCount = 0;

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();

    const reformatted = line.match(REFORMATTED);
    if (reformatted) {
      reformattedFiles.push(reformatted[1]);
      continue;
    }

    const failed = line.match(CANNOT_FORMAT);
    if (failed) {
      failedFiles.push({ path: failed[1], message: failed[2] });
      continue;
    }

    const unchanged = line.match(UNCHANGED);
    if (unchanged) {
      unchangedCount = parseInt(unchanged[1], 10);
    }
  }

  return { reformattedFiles, failedFiles, unchangedCount };
}

function isSpawnError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export class BlackFormatter implements Formatter {
  readonly name = 'black';
  private options: BlackOptions;

  constructor(options: BlackOptions) {
    this.options = options;
  }

  async format(): Promise<FormatResult> {
    const command = this.options.command ?? 'black';
    let exitCode: number;
    let output: string;

    try {
      const result = await execa(command, this.options.args, {
        cwd: this.options.workdir,
        reject: false,
        all: true
      });
      // Spawn failures come back without an exit code when reject is false
      if (result.failed && typeof result.exitCode !== 'number') {
        throw result;
      }
      exitCode = result.exitCode;
      output = result.all ?? '';
    } catch (error) {
      if (isSpawnError(error) && error.code === 'ENOENT') {
        throw new FormatterError(`Failed to run ${command}: it is not installed or not on PATH`, undefined, {
          cause: error
        });
      }
      throw new FormatterError(`Failed to run ${command}: ${errorMessage(error)}`, undefined, { cause: error });
    }

    const parsed = parseBlackOutput(output);
    const result: FormatResult = {
      isFormatted: parsed.reformattedFiles.length > 0,
      ...parsed,
      exitCode,
      output
    };

    switch (exitCode) {
      case EXIT_OK:
        return result;
      case EXIT_WOULD_REFORMAT:
        if (this.options.failOnError) {
          throw new FormatterError(
            `Black found ${parsed.reformattedFiles.length} file(s) that need formatting`,
            exitCode
          );
        }
        return result;
      case EXIT_INTERNAL_ERROR: {
        const files = parsed.failedFiles.map(f => f.path).join(', ');
        throw new FormatterError(
          `Black could not format ${files || 'the input'} (error code: ${exitCode})`,
          exitCode
        );
      }
      default:
        throw new FormatterError(
          `Something went wrong while running black (error code: ${exitCode})`,
          exitCode
        );
    }
  }
}
