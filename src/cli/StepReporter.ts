/**
 * StepReporter.ts - Per-stage progress and outcome reporting
 *
 * Each pipeline stage opens a Step, feeds it fractions from its own stream
 * reader, and closes it with complete() or fail(). The two branches run at
 * the same time, so the console reporter prints whole lines only and never
 * rewrites a line in place.
 */

import type { ProgressCallback } from '../shared/types.js';
import { SYMBOLS } from './terminal.js';

// ============================================================================
// Types
// ============================================================================

export interface Step {
  update: ProgressCallback;
  complete(message?: string): void;
  fail(message?: string): void;
}

export interface StepReporter {
  start(name: string): Step;
}

export interface ConsoleStepReporterOptions {
  /** Print progress lines every `progressInterval` percent */
  verbose?: boolean;
  progressInterval?: number;
  write?: (line: string) => void;
}

// ============================================================================
// ConsoleStepReporter
// ============================================================================

export class ConsoleStepReporter implements StepReporter {
  private readonly verbose: boolean;
  private readonly progressInterval: number;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleStepReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.progressInterval = options.progressInterval ?? 10;
    this.write = options.write ?? ((line) => console.log(line));
  }

  start(name: string): Step {
    const startedAt = Date.now();
    let finished = false;
    let lastReported = -1;

    this.write(`  ${SYMBOLS.arrow} ${name}${SYMBOLS.ellipsis}`);

    const elapsed = (): string => `${((Date.now() - startedAt) / 1000).toFixed(1)}s`;

    return {
      update: (fraction) => {
        if (finished || !this.verbose || !Number.isFinite(fraction)) return;
        const percent = Math.round(Math.min(1, Math.max(0, fraction)) * 100);
        const bucket = Math.floor(percent / this.progressInterval) * this.progressInterval;
        if (bucket <= lastReported) return;
        lastReported = bucket;
        this.write(`    ${name}: ${bucket}%`);
      },
      complete: (message) => {
        if (finished) return;
        finished = true;
        this.write(`  ${SYMBOLS.check} ${message ?? name} (${elapsed()})`);
      },
      fail: (message) => {
        if (finished) return;
        finished = true;
        this.write(`  ${SYMBOLS.cross} ${message ?? `${name} failed`}`);
      },
    };
  }
}

/**
 * Reporter that prints nothing. Used by library callers and tests.
 */
export const silentStepReporter: StepReporter = {
  start: () => ({
    update: () => {},
    complete: () => {},
    fail: () => {},
  }),
};
