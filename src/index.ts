/**
 * keyscribe - library entry point
 *
 * The CLI lives in ./cli/index.ts; everything it is built from is exported
 * here for programmatic use.
 */

export { AnalyzePipeline, exitCodeFor } from './cli/AnalyzePipeline.js';
export type { AnalyzePipelineDependencies, AnalyzeResult } from './cli/AnalyzePipeline.js';
export { ConsoleStepReporter, silentStepReporter } from './cli/StepReporter.js';
export type { Step, StepReporter } from './cli/StepReporter.js';
export { runDoctorChecks } from './cli/doctor.js';
export type { DoctorCheck, DoctorResult } from './cli/doctor.js';

export {
  DEFAULT_SETTINGS,
  analyzeSettingsSchema,
  defaultOutputPath,
  framesDirFor,
  resolveAnalyzeSettings,
} from './config/settings.js';
export type { AnalyzeCliOptions, AnalyzeSettings } from './config/settings.js';

export { FfmpegDecoder } from './media/FfmpegDecoder.js';
export { ProcessError, runProcess } from './media/ProcessRunner.js';
export { ScratchDirectory } from './media/ScratchDirectory.js';
export type { AudioExtractionRequest, FrameSamplingRequest, MediaDecoder } from './media/types.js';

export * from './pipeline/index.js';
export * from './transcription/index.js';
export * from './output/index.js';

export { PipelineError, isPipelineError } from './shared/errors.js';
export type { ErrorSeverity, PipelineErrorKind } from './shared/errors.js';
export type { Keyframe, ProgressCallback, SampledFrame, SourceMedia, TranscriptSegment } from './shared/types.js';

export { createLogger, setLogLevel } from './utils/Logger.js';
export type { LogLevel, Logger } from './utils/Logger.js';
