/**
 * Pipeline Module - Visual Branch
 *
 * For each run:
 *   1. Samples one frame per second into a scratch directory (FrameSampler)
 *   2. Scores each frame against its predecessor (SimilarityScorer)
 *   3. Keeps the frames that change enough (KeyframeSelector)
 *   4. Writes the keepers as scaled JPEGs (FrameMaterializer)
 */

// ============================================================================
// Classes & Functions
// ============================================================================

export { FrameSampler, collectSampledFrames } from './FrameSampler.js';
export {
  COMPARISON_HEIGHT,
  COMPARISON_WIDTH,
  loadIntensityVector,
  normalizedCrossCorrelation,
} from './SimilarityScorer.js';
export { DEFAULT_SIMILARITY_THRESHOLD, KeyframeSelector } from './KeyframeSelector.js';
export { FrameMaterializer, keyframeFileName, prepareFramesDirectory } from './FrameMaterializer.js';

// ============================================================================
// Types
// ============================================================================

export type { FrameSamplingOptions } from './FrameSampler.js';
export type { IntensityVector } from './SimilarityScorer.js';
export type { IntensityLoader, KeyframeSelectorOptions } from './KeyframeSelector.js';
export type { MaterializeOptions } from './FrameMaterializer.js';
