/**
 * Transcriber and AudioExtractor Unit Tests
 *
 * Tests:
 * - Model check happens before any extraction
 * - Progress split between extraction and recognition
 * - Temp audio is released on success and failure
 * - A failed release never replaces the recognition result or error
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import type { AudioExtractionRequest, MediaDecoder } from '../../../src/media/types.js';
import { PipelineError } from '../../../src/shared/errors.js';
import type { TranscriptSegment } from '../../../src/shared/types.js';
import { AudioExtractor } from '../../../src/transcription/AudioExtractor.js';
import { Transcriber } from '../../../src/transcription/Transcriber.js';
import type { RecognitionRequest, SpeechRecognizer } from '../../../src/transcription/types.js';

// ============================================================================
// Fakes
// ============================================================================

function fakeDecoder() {
  const extractAudio = vi.fn(async (request: AudioExtractionRequest) => {
    await writeFile(request.outputPath, 'RIFF');
    request.onProgress?.(0.5);
    request.onProgress?.(1);
  });
  const decoder: MediaDecoder = {
    probeDuration: vi.fn(async () => 4),
    extractFrames: vi.fn(async () => undefined),
    extractAudio,
  };
  return { decoder, extractAudio };
}

function fakeRecognizer(segments: TranscriptSegment[]) {
  const recognize = vi.fn(async (request: RecognitionRequest) => {
    expect(existsSync(request.audioPath)).toBe(true);
    request.onProgress?.(0.5);
    request.onProgress?.(1);
    return segments;
  });
  const recognizer: SpeechRecognizer = { recognize };
  return { recognizer, recognize };
}

const SEGMENTS: TranscriptSegment[] = [{ start: 0, end: 2, text: 'Testing one two.' }];

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'keyscribe-transcriber-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ============================================================================
// AudioExtractor
// ============================================================================

describe('AudioExtractor', () => {
  it('extracts into a unique WAV path in the temp directory', async () => {
    const { decoder, extractAudio } = fakeDecoder();

    const audio = await new AudioExtractor(decoder, dir).extract({ inputPath: '/videos/demo.mp4', durationSeconds: 4 });

    expect(audio.path.startsWith(join(dir, 'keyscribe-audio-'))).toBe(true);
    expect(audio.path.endsWith('.wav')).toBe(true);
    expect(extractAudio).toHaveBeenCalledWith(
      expect.objectContaining({ inputPath: '/videos/demo.mp4', outputPath: audio.path, durationSeconds: 4 })
    );
    expect(existsSync(audio.path)).toBe(true);

    await audio.release();
    expect(existsSync(audio.path)).toBe(false);
    await expect(audio.release()).resolves.toBeUndefined();
  });

  it('removes a partial file when extraction fails', async () => {
    const { decoder, extractAudio } = fakeDecoder();
    extractAudio.mockImplementationOnce(async (request: AudioExtractionRequest) => {
      await writeFile(request.outputPath, 'partial');
      throw new PipelineError('ExtractionFailed', 'Audio extraction failed: no audio stream');
    });

    await expect(
      new AudioExtractor(decoder, dir).extract({ inputPath: '/videos/silent.mp4', durationSeconds: 4 })
    ).rejects.toMatchObject({ kind: 'ExtractionFailed' });
    expect(await readdir(dir)).toEqual([]);
  });
});

// ============================================================================
// Transcriber
// ============================================================================

describe('Transcriber', () => {
  it('fails with ModelMissing before extracting audio', async () => {
    const { decoder, extractAudio } = fakeDecoder();
    const { recognizer, recognize } = fakeRecognizer(SEGMENTS);
    const transcriber = new Transcriber(new AudioExtractor(decoder, dir), recognizer, {
      isModelAvailable: async () => false,
    });

    await expect(
      transcriber.transcribe({ inputPath: '/videos/demo.mp4', modelPath: '/models/none.bin', durationSeconds: 4 })
    ).rejects.toMatchObject({ kind: 'ModelMissing', message: 'Whisper model not found at /models/none.bin' });
    expect(extractAudio).not.toHaveBeenCalled();
    expect(recognize).not.toHaveBeenCalled();
  });

  it('returns recognized segments and removes the temp audio', async () => {
    const { decoder } = fakeDecoder();
    const { recognizer, recognize } = fakeRecognizer(SEGMENTS);
    const transcriber = new Transcriber(new AudioExtractor(decoder, dir), recognizer, {
      isModelAvailable: async () => true,
    });

    const segments = await transcriber.transcribe({
      inputPath: '/videos/demo.mp4',
      modelPath: '/models/ggml-base.bin',
      durationSeconds: 4,
    });

    expect(segments).toEqual(SEGMENTS);
    expect(recognize).toHaveBeenCalledWith(expect.objectContaining({ modelPath: '/models/ggml-base.bin' }));
    expect(await readdir(dir)).toEqual([]);
  });

  it('maps extraction to the first half of progress and recognition to the second', async () => {
    const { decoder } = fakeDecoder();
    const { recognizer } = fakeRecognizer(SEGMENTS);
    const transcriber = new Transcriber(new AudioExtractor(decoder, dir), recognizer, {
      isModelAvailable: async () => true,
    });
    const progress: number[] = [];

    await transcriber.transcribe({
      inputPath: '/videos/demo.mp4',
      modelPath: '/models/ggml-base.bin',
      durationSeconds: 4,
      onProgress: (p) => progress.push(p),
    });

    expect(progress).toEqual([0.25, 0.5, 0.75, 1]);
  });

  it('removes the temp audio when recognition fails', async () => {
    const { decoder } = fakeDecoder();
    const { recognizer, recognize } = fakeRecognizer(SEGMENTS);
    recognize.mockRejectedValueOnce(new PipelineError('TranscriptionFailed', 'Transcription failed: boom'));
    const transcriber = new Transcriber(new AudioExtractor(decoder, dir), recognizer, {
      isModelAvailable: async () => true,
    });

    await expect(
      transcriber.transcribe({ inputPath: '/videos/demo.mp4', modelPath: '/models/ggml-base.bin', durationSeconds: 4 })
    ).rejects.toMatchObject({ kind: 'TranscriptionFailed' });
    expect(await readdir(dir)).toEqual([]);
  });

  it('keeps the recognition failure when the temp audio cannot be removed', async () => {
    const { decoder } = fakeDecoder();
    const extractor = new AudioExtractor(decoder, dir);
    const release = vi.fn(async () => {
      throw new Error('EBUSY: resource busy or locked');
    });
    const lockedPath = join(dir, 'locked.wav');
    await writeFile(lockedPath, 'RIFF');
    vi.spyOn(extractor, 'extract').mockResolvedValue({ path: lockedPath, release });
    const { recognizer, recognize } = fakeRecognizer(SEGMENTS);
    recognize.mockRejectedValueOnce(new PipelineError('TranscriptionFailed', 'Transcription failed: boom'));
    const transcriber = new Transcriber(extractor, recognizer, { isModelAvailable: async () => true });
    const request = { inputPath: '/videos/demo.mp4', modelPath: '/models/ggml-base.bin', durationSeconds: 4 };

    await expect(transcriber.transcribe(request)).rejects.toMatchObject({
      kind: 'TranscriptionFailed',
      message: 'Transcription failed: boom',
    });
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('returns the segments when the temp audio cannot be removed', async () => {
    const { decoder } = fakeDecoder();
    const extractor = new AudioExtractor(decoder, dir);
    const release = vi.fn(async () => {
      throw new Error('EBUSY: resource busy or locked');
    });
    const lockedPath = join(dir, 'locked.wav');
    await writeFile(lockedPath, 'RIFF');
    vi.spyOn(extractor, 'extract').mockResolvedValue({ path: lockedPath, release });
    const { recognizer } = fakeRecognizer([]);
    const transcriber = new Transcriber(extractor, recognizer, { isModelAvailable: async () => true });

    await expect(
      transcriber.transcribe({ inputPath: '/videos/demo.mp4', modelPath: '/models/ggml-base.bin', durationSeconds: 4 })
    ).resolves.toEqual([]);
    expect(release).toHaveBeenCalledTimes(1);
  });
});
