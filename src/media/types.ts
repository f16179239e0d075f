/**
 * Decoder capability. The pipeline talks to this interface only, so the
 * ffmpeg subprocess adapter can be swapped for an in-process implementation
 * (or a test fake) without touching pipeline code.
 */

import type { ProgressCallback } from '../shared/types.js';

export interface FrameSamplingRequest {
  inputPath: string;
  /** Existing directory that receives `0001.png`, `0002.png`, ... */
  outputDir: string;
  /** Known source duration; 0 suppresses progress */
  durationSeconds: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export interface AudioExtractionRequest {
  inputPath: string;
  /** Destination WAV file (16 kHz, mono, 16-bit PCM) */
  outputPath: string;
  durationSeconds: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export interface MediaDecoder {
  /** Total duration in seconds. */
  probeDuration(inputPath: string, signal?: AbortSignal): Promise<number>;
  /** Decode one still per second of source into `request.outputDir`. */
  extractFrames(request: FrameSamplingRequest): Promise<void>;
  /** Transcode the source to a transcription-ready PCM track. */
  extractAudio(request: AudioExtractionRequest): Promise<void>;
}
