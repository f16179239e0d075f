/**
 * Error taxonomy for the analysis pipeline.
 *
 * Every stage fails fast with a PipelineError. The severity decides the CLI
 * exit code: 'user' problems (bad input, missing tools, missing model) exit
 * with 1, everything else with 2.
 */

export type PipelineErrorKind =
  | 'InputNotFound'
  | 'InvalidOptions'
  | 'ToolNotFound'
  | 'ExtractionFailed'
  | 'ModelMissing'
  | 'DownloadFailed'
  | 'TranscriptionFailed'
  | 'EncodingFailed'
  | 'WriteFailed'
  | 'Cancelled';

export type ErrorSeverity = 'user' | 'system';

export interface PipelineErrorOptions {
  severity?: ErrorSeverity;
  /** Frame ordinal the failure belongs to, when there is one. */
  ordinal?: number;
  cause?: unknown;
}

const USER_ERROR_KINDS: ReadonlySet<PipelineErrorKind> = new Set([
  'InputNotFound',
  'InvalidOptions',
  'ToolNotFound',
  'ModelMissing',
]);

export class PipelineError extends Error {
  public readonly kind: PipelineErrorKind;
  public readonly severity: ErrorSeverity;
  public readonly ordinal?: number;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.kind = kind;
    this.severity = options.severity ?? (USER_ERROR_KINDS.has(kind) ? 'user' : 'system');
    if (options.ordinal !== undefined) {
      this.ordinal = options.ordinal;
    }
  }
}

export function isPipelineError(error: unknown, kind?: PipelineErrorKind): error is PipelineError {
  return error instanceof PipelineError && (kind === undefined || error.kind === kind);
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * errno-style code (`ENOENT`, `EACCES`, ...) of a thrown value, if it has one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
