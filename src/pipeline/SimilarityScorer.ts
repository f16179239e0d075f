/**
 * SimilarityScorer.ts - Normalized cross-correlation over grayscale frames
 *
 * Each frame is reduced to a fixed COMPARISON_WIDTH x COMPARISON_HEIGHT
 * luminance grid (row-major, values in [0, 1]) and compared with
 * normalizedCrossCorrelation(). 1.0 means identical.
 */

import sharp from 'sharp';

// ============================================================================
// Constants
// ============================================================================

export const COMPARISON_WIDTH = 200;
export const COMPARISON_HEIGHT = 400;

/** Standard deviation below which a frame counts as flat */
const FLAT_EPSILON = 1e-10;

// Rec. 601 luma weights
const RED_WEIGHT = 0.299;
const GREEN_WEIGHT = 0.587;
const BLUE_WEIGHT = 0.114;

export type IntensityVector = Float64Array;

// ============================================================================
// Loading
// ============================================================================

/**
 * Decode an image and project it onto the comparison grid.
 */
export async function loadIntensityVector(imagePath: string): Promise<IntensityVector> {
  const { data, info } = await sharp(imagePath)
    .removeAlpha()
    .resize(COMPARISON_WIDTH, COMPARISON_HEIGHT, { fit: 'fill', kernel: 'linear' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const pixelCount = info.width * info.height;
  const channels = info.channels;
  const vector = new Float64Array(pixelCount);

  for (let i = 0; i < pixelCount; i++) {
    const offset = i * channels;
    if (channels < 3) {
      vector[i] = data[offset] / 255;
    } else {
      vector[i] =
        (RED_WEIGHT * data[offset] + GREEN_WEIGHT * data[offset + 1] + BLUE_WEIGHT * data[offset + 2]) / 255;
    }
  }

  return vector;
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * NCC of two equal-length vectors, in [-1, 1].
 *
 * Empty or mismatched vectors score 0. If either vector is flat (no
 * variance) the pair scores exactly 1, so frames without texture never
 * register as a change.
 */
export function normalizedCrossCorrelation(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const n = a.length;
  if (n === 0 || n !== b.length) {
    return 0;
  }

  let sumA = 0;
  let sumB = 0;
  for (let i = 0; i < n; i++) {
    sumA += a[i];
    sumB += b[i];
  }
  const meanA = sumA / n;
  const meanB = sumB / n;

  let sumProduct = 0;
  let sumSqA = 0;
  let sumSqB = 0;
  for (let i = 0; i < n; i++) {
    const diffA = a[i] - meanA;
    const diffB = b[i] - meanB;
    sumProduct += diffA * diffB;
    sumSqA += diffA * diffA;
    sumSqB += diffB * diffB;
  }

  const stdA = Math.sqrt(sumSqA / n);
  const stdB = Math.sqrt(sumSqB / n);
  if (stdA < FLAT_EPSILON || stdB < FLAT_EPSILON) {
    return 1.0;
  }

  return sumProduct / (n * stdA * stdB);
}
