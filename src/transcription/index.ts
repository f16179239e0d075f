/**
 * Transcription Module - Audio Branch
 *
 * ModelDownloadManager makes sure the whisper model is on disk,
 * AudioExtractor produces a 16 kHz mono WAV, and a SpeechRecognizer (the
 * whisper.cpp CLI by default) turns it into timestamped segments.
 */

// ============================================================================
// Classes & Singletons
// ============================================================================

export { Transcriber } from './Transcriber.js';
export { AudioExtractor } from './AudioExtractor.js';
export {
  WhisperCliRecognizer,
  WHISPER_INSTALL_HINT,
  resolveWhisperExecutable,
} from './WhisperCliRecognizer.js';
export {
  ModelDownloadManager,
  modelDownloadManager,
  DEFAULT_MODEL_URL,
  FALLBACK_MODEL_SIZE_BYTES,
  defaultModelPath,
} from './ModelDownloadManager.js';
export { parseWhisperOutput, parseWhisperProgress, parseWhisperTimestamp } from './whisperOutput.js';

// ============================================================================
// Types
// ============================================================================

export type { TranscribeOptions } from './Transcriber.js';
export type { AudioExtractionOptions, ExtractedAudio } from './AudioExtractor.js';
export type { WhisperCliRecognizerOptions } from './WhisperCliRecognizer.js';
export type {
  DownloadProgress,
  ModelDownloadOptions,
  RecognitionRequest,
  SpeechRecognizer,
} from './types.js';
