/**
 * MarkdownGenerator Unit Tests
 *
 * Tests:
 * - Exact document layout for frames-only, transcript-only and full reports
 * - Relative image links, bracketed when the path has spaces
 * - Write failures
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { MarkdownGenerator } from '../../../src/output/MarkdownGenerator.js';
import type { AnalysisReport } from '../../../src/output/ReportAssembler.js';

function reportWith(overrides: Partial<AnalysisReport>): AnalysisReport {
  return {
    sourceName: 'demo.mp4',
    durationSeconds: 65,
    sampledFrameCount: 66,
    keyframes: [],
    segments: [],
    tokenEstimate: 100,
    ...overrides,
  };
}

describe('MarkdownGenerator.generate', () => {
  const generator = new MarkdownGenerator();

  it('renders keyframes without a transcript section', () => {
    const markdown = generator.generate(
      reportWith({
        keyframes: [
          { index: 1, timestamp: 0, path: '/out/demo_frames/frame_0001.jpg' },
          { index: 40, timestamp: 39, path: '/out/demo_frames/frame_0040.jpg' },
        ],
        tokenEstimate: 2100,
      }),
      '/out'
    );

    expect(markdown).toBe(
      [
        '# Video Analysis: demo.mp4',
        '',
        '## Metadata',
        '- Duration: 1:05',
        '- Original frames: 66',
        '- Keyframes extracted: 2',
        '- Token estimate: ~2100',
        '',
        '## Keyframes',
        '',
        '### Frame 1 (0:00)',
        '![Frame at 0:00](demo_frames/frame_0001.jpg)',
        '',
        '### Frame 40 (0:39)',
        '![Frame at 0:39](demo_frames/frame_0040.jpg)',
        '',
      ].join('\n')
    );
  });

  it('renders a transcript without a keyframes section', () => {
    const markdown = generator.generate(
      reportWith({
        durationSeconds: 3725,
        sampledFrameCount: 0,
        segments: [
          { start: 0, end: 3, text: 'Hello, world.' },
          { start: 3661.2, end: 3665, text: 'Line one\nline two' },
        ],
        tokenEstimate: 106,
      }),
      '/out'
    );

    expect(markdown).toBe(
      [
        '# Video Analysis: demo.mp4',
        '',
        '## Metadata',
        '- Duration: 1:02:05',
        '- Original frames: 0',
        '- Keyframes extracted: 0',
        '- Token estimate: ~106',
        '',
        '## Transcript',
        '',
        '[0:00] Hello, world.',
        '[1:01:01] Line one line two',
        '',
      ].join('\n')
    );
  });

  it('places the transcript before the keyframes', () => {
    const markdown = generator.generate(
      reportWith({
        keyframes: [{ index: 3, timestamp: 2, path: '/out/frames/frame_0003.jpg' }],
        segments: [{ start: 1, end: 2, text: 'Narration.' }],
      }),
      '/out'
    );

    const lines = markdown.split('\n');
    expect(lines.indexOf('## Transcript')).toBeLessThan(lines.indexOf('## Keyframes'));
    expect(lines).toContain('[0:01] Narration.');
    expect(lines).toContain('![Frame at 0:02](frames/frame_0003.jpg)');
  });

  it('keeps only the header and metadata for an empty report', () => {
    const markdown = generator.generate(reportWith({ durationSeconds: 0, sampledFrameCount: 0 }), '/out');

    expect(markdown.split('\n').filter((line) => line.startsWith('## '))).toEqual(['## Metadata']);
  });
});

describe('MarkdownGenerator.write', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'keyscribe-markdown-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes links relative to the output file', async () => {
    const outputPath = join(dir, 'report.md');
    const report = reportWith({
      keyframes: [{ index: 2, timestamp: 1, path: join(dir, 'report_frames', 'frame_0002.jpg') }],
    });

    await new MarkdownGenerator().write(report, outputPath);

    const content = await readFile(outputPath, 'utf-8');
    expect(content.split('\n')).toContain('![Frame at 0:01](report_frames/frame_0002.jpg)');
  });

  it('brackets link targets derived from a file name with spaces', async () => {
    const outputPath = join(dir, 'My Video_keyscribe.md');
    const report = reportWith({
      keyframes: [{ index: 1, timestamp: 0, path: join(dir, 'My Video_keyscribe_frames', 'frame_0001.jpg') }],
    });

    await new MarkdownGenerator().write(report, outputPath);

    const content = await readFile(outputPath, 'utf-8');
    expect(content.split('\n')).toContain('![Frame at 0:00](<My Video_keyscribe_frames/frame_0001.jpg>)');
  });

  it('fails with WriteFailed when the directory does not exist', async () => {
    const outputPath = join(dir, 'missing', 'report.md');

    await expect(new MarkdownGenerator().write(reportWith({}), outputPath)).rejects.toMatchObject({
      kind: 'WriteFailed',
    });
  });
});
