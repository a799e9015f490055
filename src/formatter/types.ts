// A file the formatter could not process
export interface FailedFile {
  path: string;
  message: string;
}

/**
 * Result of one formatter run
 * isFormatted is the only field the commit decision reads
 */
export interface FormatResult {
  isFormatted: boolean;
  reformattedFiles: string[];
  failedFiles: FailedFile[];
  unchangedCount: number;
  exitCode: number;
  output: string;
}

export interface Formatter {
  readonly name: string;
  format(): Promise<FormatResult>;
}
