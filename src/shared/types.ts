/**
 * Shared types for keyscribe
 *
 * All timestamps are seconds from the start of the source media.
 */

/**
 * Fractional progress callback. Receives values in [0, 1].
 */
export type ProgressCallback = (fraction: number) => void;

/**
 * The input file handle once it has been probed.
 */
export interface SourceMedia {
  path: string;
  durationSeconds: number;
}

/**
 * One still decoded from the source at 1 fps.
 * `index` is 1-based and contiguous; `timestamp` is `index - 1`.
 */
export interface SampledFrame {
  index: number;
  timestamp: number;
  path: string;
}

/**
 * A sampled frame judged visually significant. After materialization,
 * `path` points at the permanent JPEG instead of the scratch original.
 */
export interface Keyframe {
  index: number;
  timestamp: number;
  path: string;
}

/**
 * One unit of recognized speech.
 */
export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}
