/**
 * ReportAssembler.ts - Merges both branches into one report value
 *
 * assembleReport() is a pure function of its inputs. Keyframes come out
 * ordered by index, segments by start time; neither list is interleaved
 * with the other.
 */

import { basename } from 'path';

import type { Keyframe, TranscriptSegment } from '../shared/types.js';
import { countWords } from './helpers.js';

// ============================================================================
// Types
// ============================================================================

export interface ReportInput {
  inputPath: string;
  durationSeconds: number;
  sampledFrameCount: number;
  keyframes: readonly Keyframe[];
  segments: readonly TranscriptSegment[];
}

export interface AnalysisReport {
  sourceName: string;
  durationSeconds: number;
  sampledFrameCount: number;
  keyframes: Keyframe[];
  segments: TranscriptSegment[];
  tokenEstimate: number;
}

// ============================================================================
// Cost Estimate
// ============================================================================

/**
 * Advisory consumption cost. Constants are rough: ~1.3 tokens per word,
 * ~1000 per scaled JPEG, ~100 for headings and metadata.
 */
export const TOKEN_COSTS = {
  documentOverhead: 100,
  perWord: 1.3,
  perKeyframe: 1000,
} as const;

/**
 * Every term is non-negative, so adding a segment or a keyframe never lowers
 * the estimate.
 */
export function estimateTokens(
  segments: readonly TranscriptSegment[],
  keyframeCount: number
): number {
  let tokens = TOKEN_COSTS.documentOverhead;
  for (const segment of segments) {
    tokens += Math.floor(countWords(segment.text) * TOKEN_COSTS.perWord);
  }
  tokens += Math.max(0, keyframeCount) * TOKEN_COSTS.perKeyframe;
  return tokens;
}

// ============================================================================
// Assembly
// ============================================================================

export function assembleReport(input: ReportInput): AnalysisReport {
  const keyframes = [...input.keyframes].sort((a, b) => a.index - b.index);
  const segments = input.segments
    .map((segment, position) => ({ segment, position }))
    .sort((a, b) => a.segment.start - b.segment.start || a.position - b.position)
    .map(({ segment }) => segment);

  return {
    sourceName: basename(input.inputPath),
    durationSeconds: Math.max(0, input.durationSeconds),
    sampledFrameCount: input.sampledFrameCount,
    keyframes,
    segments,
    tokenEstimate: estimateTokens(segments, keyframes.length),
  };
}
