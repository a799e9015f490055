/**
 * Run logging
 *
 * Writes structured events to the Actions log through @actions/core and
 * keeps counters for the job summary.
 */

import * as core from '@actions/core';
import { errorMessage } from './errors.js';

export type LogDetails = Record<string, string | number | boolean | undefined>;

export interface LogSummary {
  events: number;
  warnings: number;
  errors: number;
  duration: number;
}

/**
 * Subset of @actions/core the logger writes through
 */
export interface LogSink {
  info(message: string): void;
  debug(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  group<T>(name: string, fn: () => Promise<T>): Promise<T>;
}

export class RunLogger {
  private sink: LogSink;
  private events = 0;
  private errors = 0;
  private warnings = 0;
  private startTime: number;

  constructor(sink: LogSink = core) {
    this.sink = sink;
    this.startTime = Date.now();
  }

  private format(event: string, details?: LogDetails, phase?: string): string {
    const prefix = phase ? `[${phase}] ` : '';
    const pairs = Object.entries(details ?? {})
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${String(value)}`);
    return pairs.length > 0 ? `${prefix}${event} (${pairs.join(', ')})` : `${prefix}${event}`;
  }

  /**
   * Log an event
   */
  log(event: string, details?: LogDetails, phase?: string): void {
    this.events++;
    this.sink.info(this.format(event, details, phase));
  }

  debug(event: string, details?: LogDetails): void {
    this.sink.debug(this.format(event, details));
  }

  warn(event: string, details?: LogDetails, phase?: string): void {
    this.events++;
    this.warnings++;
    this.sink.warning(this.format(event, details, phase));
  }

  /**
   * Log an error as an annotation
   */
  logError(event: string, error: unknown, phase?: string): void {
    this.events++;
    this.errors++;
    this.sink.error(this.format(`${event}: ${errorMessage(error)}`, undefined, phase));
  }

  /**
   * Run a step inside a collapsible log group
   */
  async step<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return this.sink.group(name, fn);
  }

  getSummary(): LogSummary {
    return {
      events: this.events,
      warnings: this.warnings,
      errors: this.errors,
      duration: Date.now() - this.startTime
    };
  }
}
