/**
 * Shared helpers for report output.
 *
 * Pure utility functions, no side effects.
 */

import * as path from 'path';

/**
 * Format seconds as M:SS, or H:MM:SS from one hour up, rounded to the
 * nearest second (e.g. 125.4 -> "2:05", 3725 -> "1:02:05").
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.max(0, Math.round(seconds));
  const hours = Math.floor(totalSeconds / 3600);
  const mins = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}:${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  }
  return `${mins}:${secs.toString().padStart(2, '0')}`;
}

/**
 * Path of a frame image relative to the report's directory, with forward
 * slashes so the markdown link works on every platform.
 */
export function computeRelativeFramePath(framePath: string, reportDir: string): string {
  const relative = path.isAbsolute(framePath) ? path.relative(reportDir, framePath) : framePath;
  return relative.split(path.sep).join('/');
}

/**
 * Link destination for a markdown image. Targets with whitespace, parentheses
 * or angle brackets are wrapped in `<...>`, the form CommonMark accepts for them.
 */
export function markdownLinkTarget(target: string): string {
  return /[\s()<>]/.test(target) ? `<${target.replace(/[<>]/g, '\\$&')}>` : target;
}

/**
 * Whitespace-separated word count.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Collapse line breaks so a segment renders on a single line.
 */
export function singleLine(text: string): string {
  return text.trim().replace(/\s*[\r\n]+\s*/g, ' ');
}
