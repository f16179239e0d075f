/**
 * AnalyzePipeline.ts - One media file in, one markdown report out
 *
 * Runs two independent branches over the same input:
 *   visual: sample frames -> select keyframes -> write JPEGs
 *   audio:  ensure model -> extract PCM -> recognize speech
 * The first branch to fail cancels the other. Both are still awaited to
 * completion, so every temp resource is released before the original
 * failure surfaces or the report is written.
 */

import type { Stats } from 'fs';
import { mkdir, stat } from 'fs/promises';
import { dirname } from 'path';

import type { AnalyzeSettings } from '../config/settings.js';
import { FfmpegDecoder } from '../media/FfmpegDecoder.js';
import { ScratchDirectory } from '../media/ScratchDirectory.js';
import type { MediaDecoder } from '../media/types.js';
import { assembleReport } from '../output/ReportAssembler.js';
import { MarkdownGenerator } from '../output/MarkdownGenerator.js';
import { FrameMaterializer, prepareFramesDirectory } from '../pipeline/FrameMaterializer.js';
import { FrameSampler } from '../pipeline/FrameSampler.js';
import { KeyframeSelector } from '../pipeline/KeyframeSelector.js';
import { PipelineError, errorMessage, isPipelineError } from '../shared/errors.js';
import type { Keyframe, TranscriptSegment } from '../shared/types.js';
import { AudioExtractor } from '../transcription/AudioExtractor.js';
import { ModelDownloadManager } from '../transcription/ModelDownloadManager.js';
import { Transcriber } from '../transcription/Transcriber.js';
import type { SpeechRecognizer } from '../transcription/types.js';
import { WhisperCliRecognizer } from '../transcription/WhisperCliRecognizer.js';
import { createLogger } from '../utils/Logger.js';
import { silentStepReporter } from './StepReporter.js';
import type { Step, StepReporter } from './StepReporter.js';

// ============================================================================
// Types
// ============================================================================

export interface AnalyzePipelineDependencies {
  decoder?: MediaDecoder;
  recognizer?: SpeechRecognizer;
  models?: Pick<ModelDownloadManager, 'isModelAvailable' | 'download'>;
  selector?: KeyframeSelector;
  reporter?: StepReporter;
  /** Parent directory for the frame scratch area (defaults to the OS temp dir) */
  scratchParent?: string;
}

export interface AnalyzeResult {
  outputPath: string;
  /** null when frame extraction was disabled */
  framesDir: string | null;
  mediaDurationSeconds: number;
  sampledFrameCount: number;
  keyframeCount: number;
  segmentCount: number;
  tokenEstimate: number;
  /** Wall-clock time of the run */
  elapsedSeconds: number;
}

interface VisualBranchResult {
  sampledFrameCount: number;
  keyframes: Keyframe[];
}

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

const log = createLogger('AnalyzePipeline');

// ============================================================================
// AnalyzePipeline Class
// ============================================================================

export class AnalyzePipeline {
  private readonly settings: AnalyzeSettings;
  private readonly decoder: MediaDecoder;
  private readonly recognizer: SpeechRecognizer;
  private readonly models: Pick<ModelDownloadManager, 'isModelAvailable' | 'download'>;
  private readonly selector: KeyframeSelector;
  private readonly reporter: StepReporter;
  private readonly scratchParent?: string;
  private readonly controller = new AbortController();
  private interrupted = false;

  constructor(settings: AnalyzeSettings, dependencies: AnalyzePipelineDependencies = {}) {
    this.settings = settings;
    this.decoder = dependencies.decoder ?? new FfmpegDecoder();
    this.recognizer = dependencies.recognizer ?? new WhisperCliRecognizer();
    this.models = dependencies.models ?? new ModelDownloadManager();
    this.selector = dependencies.selector ?? new KeyframeSelector();
    this.reporter = dependencies.reporter ?? silentStepReporter;
    this.scratchParent = dependencies.scratchParent;
  }

  /** True once abort() was called. A branch cancelled by its sibling's failure does not count. */
  get aborted(): boolean {
    return this.interrupted;
  }

  /**
   * Cancel the run. Running subprocesses receive SIGTERM and their stages
   * fail; cleanup still happens before run() settles.
   */
  abort(): void {
    if (!this.interrupted) {
      log.info('Abort requested');
      this.interrupted = true;
      this.controller.abort();
    }
  }

  async run(): Promise<AnalyzeResult> {
    const startTime = Date.now();
    const { settings } = this;

    await this.validateInput();
    const durationSeconds = await this.probeDuration();

    const failures: unknown[] = [];
    const cancelSiblingOnFailure = async <T>(branch: () => Promise<T>): Promise<T> => {
      try {
        return await branch();
      } catch (error) {
        failures.push(error);
        this.controller.abort();
        throw error;
      }
    };

    const [visual, audio] = await Promise.allSettled([
      cancelSiblingOnFailure(() => this.runVisualBranch(durationSeconds)),
      cancelSiblingOnFailure(() => this.runAudioBranch(durationSeconds)),
    ]);

    // The first failure caused any cancellation that followed it
    if (failures.length > 0) throw failures[0];
    if (visual.status === 'rejected') throw visual.reason;
    if (audio.status === 'rejected') throw audio.reason;

    const report = assembleReport({
      inputPath: settings.inputPath,
      durationSeconds,
      sampledFrameCount: visual.value.sampledFrameCount,
      keyframes: visual.value.keyframes,
      segments: audio.value,
    });

    await this.runStep(
      'Writing report',
      async () => {
        try {
          await mkdir(dirname(settings.outputPath), { recursive: true });
        } catch (error) {
          throw new PipelineError('WriteFailed', `Cannot create output directory: ${errorMessage(error)}`, {
            cause: error,
          });
        }
        await new MarkdownGenerator().write(report, settings.outputPath);
      },
      () => 'Report written'
    );

    return {
      outputPath: settings.outputPath,
      framesDir: settings.frames ? settings.framesDir : null,
      mediaDurationSeconds: durationSeconds,
      sampledFrameCount: report.sampledFrameCount,
      keyframeCount: report.keyframes.length,
      segmentCount: report.segments.length,
      tokenEstimate: report.tokenEstimate,
      elapsedSeconds: (Date.now() - startTime) / 1000,
    };
  }

  // ==========================================================================
  // Branches
  // ==========================================================================

  private async runVisualBranch(durationSeconds: number): Promise<VisualBranchResult> {
    if (!this.settings.frames) {
      log.debug('Frame extraction disabled');
      return { sampledFrameCount: 0, keyframes: [] };
    }

    const { settings } = this;
    const signal = this.controller.signal;
    const scratch = await this.createScratch();

    try {
      const frames = await this.runStep(
        'Extracting frames',
        (step) =>
          new FrameSampler(this.decoder).sample({
            inputPath: settings.inputPath,
            scratch,
            durationSeconds,
            onProgress: step.update,
            signal,
          }),
        (result) => `Extracted ${result.length} frames`
      );

      const selected = await this.runStep(
        'Detecting keyframes',
        (step) => this.selector.select(frames, settings.threshold, step.update, signal),
        (result) => `Found ${result.length} keyframes`
      );

      const keyframes = await this.runStep(
        'Saving keyframes',
        async (step) => {
          await prepareFramesDirectory(settings.framesDir);
          return new FrameMaterializer().materialize(selected, {
            outputDir: settings.framesDir,
            quality: settings.quality,
            scale: settings.scale,
            onProgress: step.update,
            signal,
          });
        },
        () => 'Keyframes saved'
      );

      return { sampledFrameCount: frames.length, keyframes };
    } finally {
      await scratch.release().catch((error: unknown) => {
        log.warn(`Could not remove scratch directory ${scratch.path}: ${errorMessage(error)}`);
      });
    }
  }

  private async runAudioBranch(durationSeconds: number): Promise<TranscriptSegment[]> {
    if (!this.settings.transcript) {
      log.debug('Transcription disabled');
      return [];
    }

    const { settings } = this;
    const signal = this.controller.signal;

    if (!(await this.models.isModelAvailable(settings.modelPath))) {
      if (!settings.download) {
        throw new PipelineError(
          'ModelMissing',
          `Whisper model not found at ${settings.modelPath}. Pass --model <path> or drop --no-download.`
        );
      }
      await this.runStep(
        'Downloading whisper model',
        (step) =>
          this.models.download(settings.modelPath, {
            onProgress: (progress) => step.update(progress.fraction),
            signal,
          }),
        () => 'Model downloaded'
      );
    }

    const transcriber = new Transcriber(new AudioExtractor(this.decoder), this.recognizer, this.models);
    return this.runStep(
      'Transcribing audio',
      (step) =>
        transcriber.transcribe({
          inputPath: settings.inputPath,
          modelPath: settings.modelPath,
          durationSeconds,
          onProgress: step.update,
          signal,
        }),
      (segments) => `Transcribed ${segments.length} segments`
    );
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Run one stage under a reporter step; the step ends with exactly one of
   * complete() or fail(). Stages are not started once the run is cancelled.
   */
  private async runStep<T>(
    name: string,
    work: (step: Step) => Promise<T>,
    summarize: (result: T) => string
  ): Promise<T> {
    if (this.controller.signal.aborted) {
      throw new PipelineError('Cancelled', `${name} cancelled`);
    }
    const step = this.reporter.start(name);
    try {
      const result = await work(step);
      step.complete(summarize(result));
      return result;
    } catch (error) {
      step.fail(`${name} failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * The input must be an existing, non-empty regular file.
   */
  private async validateInput(): Promise<void> {
    const { inputPath } = this.settings;

    let stats: Stats;
    try {
      stats = await stat(inputPath);
    } catch (error) {
      throw new PipelineError('InputNotFound', `Input file not found: ${inputPath}`, { cause: error });
    }

    if (!stats.isFile()) {
      throw new PipelineError('InputNotFound', `Not a regular file: ${inputPath}`);
    }
    if (stats.size === 0) {
      throw new PipelineError('InputNotFound', `Input file is empty (0 bytes): ${inputPath}`);
    }
  }

  /**
   * Source duration, or 0 when it cannot be determined. A zero duration only
   * disables progress reporting; extraction still runs.
   */
  private async probeDuration(): Promise<number> {
    try {
      return await this.decoder.probeDuration(this.settings.inputPath, this.controller.signal);
    } catch (error) {
      if (this.aborted) throw error;
      log.warn(`Could not determine duration, progress disabled: ${errorMessage(error)}`);
      return 0;
    }
  }

  private async createScratch(): Promise<ScratchDirectory> {
    try {
      return await ScratchDirectory.create('keyscribe-frames-', this.scratchParent);
    } catch (error) {
      throw new PipelineError('ExtractionFailed', `Cannot create scratch directory: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

/**
 * Exit code for a failed run.
 */
export function exitCodeFor(error: unknown): number {
  return isPipelineError(error) && error.severity === 'user' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
}
