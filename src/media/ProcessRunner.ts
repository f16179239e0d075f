/**
 * ProcessRunner.ts - Child process execution with line-buffered streams
 *
 * Every external tool (ffmpeg, ffprobe, whisper) is launched through
 * runProcess(). Output is split into lines and pushed to the caller's
 * callbacks as it arrives, so progress parsing never touches shared state.
 */

import { spawn } from 'child_process';

import { errnoCode } from '../shared/errors.js';

// ============================================================================
// Types
// ============================================================================

export type ProcessFailureReason = 'spawn' | 'exit' | 'aborted';

export interface RunProcessOptions {
  command: string;
  args: string[];
  /** Human-readable name used in error messages (defaults to the command) */
  label?: string;
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
  /** Keep the full stdout text in the result */
  captureStdout?: boolean;
  signal?: AbortSignal;
}

export interface ProcessOutput {
  stdout: string;
  /** Last STDERR_TAIL_LIMIT characters of stderr */
  stderr: string;
}

// ============================================================================
// Constants
// ============================================================================

const STDERR_TAIL_LIMIT = 8192;

/**
 * Environment handed to child processes. Only what the tools need to find
 * their binaries, locale and temp directories.
 */
export const SAFE_CHILD_ENV: NodeJS.ProcessEnv = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
};

// ============================================================================
// ProcessError
// ============================================================================

export class ProcessError extends Error {
  public readonly reason: ProcessFailureReason;
  public readonly command: string;
  public readonly exitCode: number | null;
  /** errno code for spawn failures (ENOENT, EACCES) */
  public readonly code?: string;
  public readonly stderr: string;

  constructor(
    reason: ProcessFailureReason,
    command: string,
    message: string,
    details: { exitCode?: number | null; code?: string; stderr?: string; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ProcessError';
    this.reason = reason;
    this.command = command;
    this.exitCode = details.exitCode ?? null;
    if (details.code !== undefined) {
      this.code = details.code;
    }
    this.stderr = details.stderr ?? '';
  }

  /** The executable could not be found at all. */
  get isNotFound(): boolean {
    return this.reason === 'spawn' && this.code === 'ENOENT';
  }
}

// ============================================================================
// Line buffering
// ============================================================================

interface LineBuffer {
  push(chunk: string): void;
  flush(): void;
}

function createLineBuffer(onLine: (line: string) => void): LineBuffer {
  let pending = '';
  return {
    push(chunk) {
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? '';
      for (const line of lines) {
        if (line) onLine(line);
      }
    },
    flush() {
      const rest = pending.trim();
      pending = '';
      if (rest) onLine(rest);
    },
  };
}

// ============================================================================
// runProcess
// ============================================================================

/**
 * Run a command to completion. Resolves on exit code 0; rejects with a
 * ProcessError otherwise. Aborting the signal sends SIGTERM to the child.
 */
export function runProcess(options: RunProcessOptions): Promise<ProcessOutput> {
  const { command, args, signal } = options;
  const label = options.label ?? command;

  return new Promise<ProcessOutput>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ProcessError('aborted', command, `${label} was cancelled before it started`));
      return;
    }

    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: SAFE_CHILD_ENV,
    });

    let settled = false;
    let aborted = false;
    let stdout = '';
    let stderrTail = '';

    const stdoutLines = createLineBuffer((line) => {
      options.onStdoutLine?.(line);
    });
    const stderrLines = createLineBuffer((line) => {
      stderrTail = `${stderrTail}${line}\n`.slice(-STDERR_TAIL_LIMIT);
      options.onStderrLine?.(line);
    });

    const onAbort = (): void => {
      aborted = true;
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (error: ProcessError | null): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else {
        resolve({ stdout, stderr: stderrTail });
      }
    };

    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      if (options.captureStdout) stdout += chunk;
      stdoutLines.push(chunk);
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderrLines.push(chunk);
    });

    child.on('error', (error) => {
      finish(
        new ProcessError('spawn', command, `Failed to start ${label}: ${error.message}`, {
          code: errnoCode(error),
          cause: error,
        })
      );
    });

    child.on('close', (code, killSignal) => {
      stdoutLines.flush();
      stderrLines.flush();
      const stderr = stderrTail.trim();

      if (aborted) {
        finish(new ProcessError('aborted', command, `${label} was cancelled`, { exitCode: code, stderr }));
        return;
      }
      if (code === 0) {
        finish(null);
        return;
      }

      const status = code === null ? `was killed by ${killSignal ?? 'a signal'}` : `exited with code ${code}`;
      const suffix = stderr ? `: ${stderr}` : '';
      finish(new ProcessError('exit', command, `${label} ${status}${suffix}`, { exitCode: code, stderr }));
    });
  });
}
