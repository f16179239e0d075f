/**
 * FfmpegDecoder.ts - MediaDecoder backed by the system ffmpeg/ffprobe
 *
 * Progress comes from `-progress pipe:1`, which makes ffmpeg print
 * key=value lines on stdout while diagnostics stay on stderr.
 */

import { join } from 'path';

import { PipelineError } from '../shared/errors.js';
import { createLogger } from '../utils/Logger.js';
import { createProgressLineHandler } from './ffmpegProgress.js';
import { ProcessError, runProcess } from './ProcessRunner.js';
import type { AudioExtractionRequest, FrameSamplingRequest, MediaDecoder } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface FfmpegDecoderOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Scratch filename pattern; ffmpeg numbers frames from 1 */
export const SAMPLED_FRAME_PATTERN = '%04d.png';

const PROGRESS_ARGS = ['-loglevel', 'error', '-progress', 'pipe:1', '-nostats'];

const log = createLogger('FfmpegDecoder');

// ============================================================================
// FfmpegDecoder Class
// ============================================================================

export class FfmpegDecoder implements MediaDecoder {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;

  constructor(options: FfmpegDecoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath || process.env.FFMPEG_PATH || 'ffmpeg';
    this.ffprobePath = options.ffprobePath || process.env.FFPROBE_PATH || 'ffprobe';
  }

  async probeDuration(inputPath: string, signal?: AbortSignal): Promise<number> {
    let stdout: string;
    try {
      ({ stdout } = await runProcess({
        command: this.ffprobePath,
        args: [
          '-v', 'error',
          '-show_entries', 'format=duration',
          '-of', 'default=noprint_wrappers=1:nokey=1',
          inputPath,
        ],
        label: 'ffprobe',
        captureStdout: true,
        signal,
      }));
    } catch (error) {
      throw this.toPipelineError(error, 'ffprobe', 'Duration probe failed');
    }

    const seconds = Number.parseFloat(stdout.trim());
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new PipelineError('ExtractionFailed', `Could not parse duration from ffprobe output: "${stdout.trim()}"`);
    }
    log.debug(`Probed duration ${seconds.toFixed(3)}s for ${inputPath}`);
    return seconds;
  }

  async extractFrames(request: FrameSamplingRequest): Promise<void> {
    const args = [
      '-i', request.inputPath,
      '-vf', 'fps=1',
      '-q:v', '2',
      ...PROGRESS_ARGS,
      join(request.outputDir, SAMPLED_FRAME_PATTERN),
    ];

    log.debug(`Sampling frames into ${request.outputDir}`);
    try {
      await runProcess({
        command: this.ffmpegPath,
        args,
        label: 'ffmpeg frame extraction',
        onStdoutLine: createProgressLineHandler(request.durationSeconds, request.onProgress),
        signal: request.signal,
      });
    } catch (error) {
      throw this.toPipelineError(error, 'ffmpeg', 'Frame extraction failed');
    }
  }

  async extractAudio(request: AudioExtractionRequest): Promise<void> {
    const args = [
      '-i', request.inputPath,
      '-vn',
      '-ar', '16000',
      '-ac', '1',
      '-c:a', 'pcm_s16le',
      '-y',
      ...PROGRESS_ARGS,
      request.outputPath,
    ];

    log.debug(`Extracting audio to ${request.outputPath}`);
    try {
      await runProcess({
        command: this.ffmpegPath,
        args,
        label: 'ffmpeg audio extraction',
        onStdoutLine: createProgressLineHandler(request.durationSeconds, request.onProgress),
        signal: request.signal,
      });
    } catch (error) {
      throw this.toPipelineError(error, 'ffmpeg', 'Audio extraction failed');
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private toPipelineError(error: unknown, tool: string, context: string): PipelineError {
    if (error instanceof ProcessError && error.isNotFound) {
      return new PipelineError('ToolNotFound', `${tool} is required but was not found (${error.command})`, {
        cause: error,
      });
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new PipelineError('ExtractionFailed', `${context}: ${detail}`, { cause: error });
  }
}
