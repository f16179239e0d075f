/**
 * FrameSampler.ts - One still per second of source media
 *
 * Drives the decoder into a run-owned scratch directory, then reads back the
 * numbered images as an ordered, gapless frame sequence. The scratch handle
 * stays with the caller, who releases it on every path.
 */

import { readdir } from 'fs/promises';
import { join } from 'path';

import type { ScratchDirectory } from '../media/ScratchDirectory.js';
import type { MediaDecoder } from '../media/types.js';
import { PipelineError, errorMessage } from '../shared/errors.js';
import type { ProgressCallback, SampledFrame } from '../shared/types.js';
import { createLogger } from '../utils/Logger.js';

// ============================================================================
// Types
// ============================================================================

export interface FrameSamplingOptions {
  inputPath: string;
  scratch: ScratchDirectory;
  durationSeconds: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

// ============================================================================
// Constants
// ============================================================================

const SAMPLED_FRAME_NAME = /^(\d+)\.png$/;

const log = createLogger('FrameSampler');

// ============================================================================
// FrameSampler Class
// ============================================================================

export class FrameSampler {
  constructor(private readonly decoder: MediaDecoder) {}

  async sample(options: FrameSamplingOptions): Promise<SampledFrame[]> {
    await this.decoder.extractFrames({
      inputPath: options.inputPath,
      outputDir: options.scratch.path,
      durationSeconds: options.durationSeconds,
      onProgress: options.onProgress,
      signal: options.signal,
    });

    const frames = await collectSampledFrames(options.scratch.path);
    if (frames.length === 0) {
      throw new PipelineError('ExtractionFailed', `No frames were extracted from ${options.inputPath}`);
    }

    log.debug(`Sampled ${frames.length} frame(s) into ${options.scratch.path}`);
    return frames;
  }
}

/**
 * Read `NNNN.png` files from a directory into an index-ordered sequence.
 * Ordinals must run 1..n without gaps, since timestamps derive from them.
 */
export async function collectSampledFrames(dir: string): Promise<SampledFrame[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    throw new PipelineError('ExtractionFailed', `Cannot read frame directory ${dir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const frames: SampledFrame[] = [];
  for (const name of entries) {
    const match = SAMPLED_FRAME_NAME.exec(name);
    if (!match) continue;
    const index = Number.parseInt(match[1], 10);
    frames.push({ index, timestamp: index - 1, path: join(dir, name) });
  }
  frames.sort((a, b) => a.index - b.index);

  frames.forEach((frame, position) => {
    if (frame.index !== position + 1) {
      throw new PipelineError(
        'ExtractionFailed',
        `Frame sequence has a gap: expected ordinal ${position + 1}, found ${frame.index}`,
        { ordinal: frame.index }
      );
    }
  });

  return frames;
}
