/**
 * Parsers for whisper.cpp CLI output.
 *
 * stdout carries one line per utterance:
 *   [00:00:01.240 --> 00:00:04.000]  Some words
 * stderr carries progress markers:
 *   whisper_print_progress_callback: progress =  40%
 */

import type { TranscriptSegment } from '../shared/types.js';

const SEGMENT_LINE = /\[(\d{2}:\d{2}:\d{2}\.\d{3})\s*-->\s*(\d{2}:\d{2}:\d{2}\.\d{3})\]\s*(.*)/;
const PROGRESS_LINE = /progress\s*=\s*(\d+)%/;

/**
 * `HH:MM:SS.mmm` to seconds. Returns null for anything else.
 */
export function parseWhisperTimestamp(value: string): number | null {
  const match = /^(\d{2}):(\d{2}):(\d{2})\.(\d{3})$/.exec(value);
  if (!match) return null;
  const [, hours, minutes, seconds, millis] = match;
  return (
    Number.parseInt(hours, 10) * 3600 +
    Number.parseInt(minutes, 10) * 60 +
    Number.parseInt(seconds, 10) +
    Number.parseInt(millis, 10) / 1000
  );
}

/**
 * Extract timestamped segments from recognizer output. Lines without the
 * bracketed prefix and segments with empty text are skipped. The result is
 * ordered by start time (stable for equal starts).
 */
export function parseWhisperOutput(output: string): TranscriptSegment[] {
  const segments: TranscriptSegment[] = [];

  for (const line of output.split(/\r?\n/)) {
    const match = SEGMENT_LINE.exec(line);
    if (!match) continue;

    const start = parseWhisperTimestamp(match[1]);
    const end = parseWhisperTimestamp(match[2]);
    const text = match[3].trim();
    if (start === null || end === null || !text) continue;

    segments.push({ start, end: Math.max(start, end), text });
  }

  return segments
    .map((segment, position) => ({ segment, position }))
    .sort((a, b) => a.segment.start - b.segment.start || a.position - b.position)
    .map(({ segment }) => segment);
}

/**
 * Progress fraction from a stderr line, or null if the line has none.
 */
export function parseWhisperProgress(line: string): number | null {
  const match = PROGRESS_LINE.exec(line);
  if (!match) return null;
  const percent = Number.parseInt(match[1], 10);
  return Math.min(1, Math.max(0, percent / 100));
}
