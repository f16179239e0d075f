/**
 * KeyframeSelector.ts - Picks the visually distinct frames of a run
 *
 * Policy:
 * - the first frame is always a keyframe
 * - frame i is a keyframe when its similarity to frame i-1 (the previous
 *   sampled frame, not the previous keyframe) is strictly below the threshold
 * - the last frame is always a keyframe
 *
 * Comparing against the immediate predecessor means slow drift that never
 * crosses the threshold between two neighbours is not flagged.
 */

import { PipelineError, errorMessage } from '../shared/errors.js';
import type { Keyframe, ProgressCallback, SampledFrame } from '../shared/types.js';
import { createLogger } from '../utils/Logger.js';
import { loadIntensityVector, normalizedCrossCorrelation } from './SimilarityScorer.js';

// ============================================================================
// Types
// ============================================================================

export type IntensityLoader = (imagePath: string) => Promise<ArrayLike<number>>;

export interface KeyframeSelectorOptions {
  /** Replaces the sharp-backed loader (tests, alternative decoders) */
  loadVector?: IntensityLoader;
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

const log = createLogger('KeyframeSelector');

// ============================================================================
// KeyframeSelector Class
// ============================================================================

export class KeyframeSelector {
  private readonly loadVector: IntensityLoader;

  constructor(options: KeyframeSelectorOptions = {}) {
    this.loadVector = options.loadVector ?? loadIntensityVector;
  }

  /**
   * Select keyframes from an index-ordered frame sequence. Each frame is
   * decoded once; the previous frame's vector is reused for the next pair.
   */
  async select(
    frames: readonly SampledFrame[],
    threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
    onProgress?: ProgressCallback,
    signal?: AbortSignal
  ): Promise<Keyframe[]> {
    if (frames.length === 0) {
      return [];
    }

    const first = frames[0];
    const keyframes: Keyframe[] = [toKeyframe(first)];

    if (frames.length === 1) {
      onProgress?.(1);
      return keyframes;
    }

    let previous = await this.load(first);
    const comparisons = frames.length - 1;

    for (let i = 1; i < frames.length; i++) {
      signal?.throwIfAborted();

      const frame = frames[i];
      const current = await this.load(frame);
      const score = normalizedCrossCorrelation(previous, current);

      if (score < threshold) {
        keyframes.push(toKeyframe(frame));
        log.debug(`Frame ${frame.index} is a keyframe (similarity ${score.toFixed(4)})`);
      }

      previous = current;
      onProgress?.(i / comparisons);
    }

    const last = frames[frames.length - 1];
    if (keyframes[keyframes.length - 1].index !== last.index) {
      keyframes.push(toKeyframe(last));
    }

    return keyframes;
  }

  private async load(frame: SampledFrame): Promise<ArrayLike<number>> {
    try {
      return await this.loadVector(frame.path);
    } catch (error) {
      throw new PipelineError('EncodingFailed', `Failed to decode frame ${frame.index}: ${errorMessage(error)}`, {
        ordinal: frame.index,
        cause: error,
      });
    }
  }
}

function toKeyframe(frame: SampledFrame): Keyframe {
  return { index: frame.index, timestamp: frame.timestamp, path: frame.path };
}
