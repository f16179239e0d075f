/**
 * Transcriber.ts - Audio branch of the pipeline
 *
 * Checks the model, extracts the PCM track, then runs the recognizer.
 * Progress is reported on one 0..1 scale: extraction covers the first
 * half, recognition the second.
 */

import { PipelineError, errorMessage } from '../shared/errors.js';
import type { ProgressCallback, TranscriptSegment } from '../shared/types.js';
import { createLogger } from '../utils/Logger.js';
import type { AudioExtractor } from './AudioExtractor.js';
import type { ModelDownloadManager } from './ModelDownloadManager.js';
import type { SpeechRecognizer } from './types.js';

export interface TranscribeOptions {
  inputPath: string;
  modelPath: string;
  durationSeconds: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

const EXTRACTION_SHARE = 0.5;

const log = createLogger('Transcriber');

export class Transcriber {
  constructor(
    private readonly audioExtractor: AudioExtractor,
    private readonly recognizer: SpeechRecognizer,
    private readonly models: Pick<ModelDownloadManager, 'isModelAvailable'>
  ) {}

  async transcribe(options: TranscribeOptions): Promise<TranscriptSegment[]> {
    // Before any subprocess, so a missing model never costs an extraction
    if (!(await this.models.isModelAvailable(options.modelPath))) {
      throw new PipelineError('ModelMissing', `Whisper model not found at ${options.modelPath}`);
    }

    const { onProgress } = options;

    const audio = await this.audioExtractor.extract({
      inputPath: options.inputPath,
      durationSeconds: options.durationSeconds,
      onProgress: onProgress ? (fraction) => onProgress(fraction * EXTRACTION_SHARE) : undefined,
      signal: options.signal,
    });

    try {
      const segments = await this.recognizer.recognize({
        audioPath: audio.path,
        modelPath: options.modelPath,
        onProgress: onProgress
          ? (fraction) => onProgress(EXTRACTION_SHARE + fraction * (1 - EXTRACTION_SHARE))
          : undefined,
        signal: options.signal,
      });
      log.debug(`Recognized ${segments.length} segment(s)`);
      return segments;
    } finally {
      await audio.release().catch((error: unknown) => {
        log.warn(`Could not remove temp audio ${audio.path}: ${errorMessage(error)}`);
      });
    }
  }
}
