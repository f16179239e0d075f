/**
 * Shared Types for Transcription
 *
 * The audio branch is: acquire model -> extract PCM audio -> recognize.
 */

import type { ProgressCallback, TranscriptSegment } from '../shared/types.js';

// ============================================================================
// Recognizer Capability
// ============================================================================

export interface RecognitionRequest {
  /** 16 kHz mono 16-bit PCM WAV */
  audioPath: string;
  modelPath: string;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

/**
 * Speech recognizer. The whisper.cpp CLI adapter is one implementation; the
 * pipeline only sees this interface.
 */
export interface SpeechRecognizer {
  recognize(request: RecognitionRequest): Promise<TranscriptSegment[]>;
}

// ============================================================================
// Model Download Types
// ============================================================================

export interface DownloadProgress {
  downloadedBytes: number;
  totalBytes: number;
  /** downloadedBytes / totalBytes, clamped to 1 */
  fraction: number;
}

export interface ModelDownloadOptions {
  url?: string;
  onProgress?: (progress: DownloadProgress) => void;
  signal?: AbortSignal;
}
