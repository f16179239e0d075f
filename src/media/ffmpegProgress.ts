/**
 * Parsing of ffmpeg's `-progress pipe:1` key=value stream.
 */

import type { ProgressCallback } from '../shared/types.js';

const OUT_TIME_PREFIX = 'out_time_us=';

/**
 * Elapsed output time in seconds for an `out_time_us=` line, or null for any
 * other line (other keys, `N/A`, garbage).
 */
export function parseOutTimeSeconds(line: string): number | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(OUT_TIME_PREFIX)) {
    return null;
  }
  const raw = trimmed.slice(OUT_TIME_PREFIX.length);
  if (!/^-?\d+$/.test(raw)) {
    return null;
  }
  return Number.parseInt(raw, 10) / 1_000_000;
}

/**
 * Build a stdout line handler that turns elapsed time into a completion
 * fraction. Returns undefined when the duration is unknown, so progress is
 * suppressed entirely.
 */
export function createProgressLineHandler(
  durationSeconds: number,
  onProgress: ProgressCallback | undefined
): ((line: string) => void) | undefined {
  if (!onProgress || !(durationSeconds > 0)) {
    return undefined;
  }
  return (line) => {
    const elapsed = parseOutTimeSeconds(line);
    if (elapsed === null) return;
    onProgress(Math.min(1, Math.max(0, elapsed / durationSeconds)));
  };
}
