/**
 * AudioExtractor.ts - Transcription-ready PCM track
 *
 * Hands back the temp WAV path together with its release function, so the
 * caller decides when the file goes away.
 */

import { randomUUID } from 'crypto';
import { rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import type { MediaDecoder } from '../media/types.js';
import { errorMessage } from '../shared/errors.js';
import type { ProgressCallback } from '../shared/types.js';
import { createLogger } from '../utils/Logger.js';

export interface AudioExtractionOptions {
  inputPath: string;
  durationSeconds: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export interface ExtractedAudio {
  path: string;
  release(): Promise<void>;
}

const log = createLogger('AudioExtractor');

export class AudioExtractor {
  constructor(
    private readonly decoder: MediaDecoder,
    private readonly tempDir: string = tmpdir()
  ) {}

  async extract(options: AudioExtractionOptions): Promise<ExtractedAudio> {
    const path = join(this.tempDir, `keyscribe-audio-${randomUUID()}.wav`);
    const release = async (): Promise<void> => {
      await rm(path, { force: true });
    };

    try {
      await this.decoder.extractAudio({
        inputPath: options.inputPath,
        outputPath: path,
        durationSeconds: options.durationSeconds,
        onProgress: options.onProgress,
        signal: options.signal,
      });
    } catch (error) {
      await release().catch((releaseError: unknown) => {
        log.warn(`Could not remove partial audio ${path}: ${errorMessage(releaseError)}`);
      });
      throw error;
    }

    log.debug(`Audio extracted to ${path}`);
    return { path, release };
  }
}
