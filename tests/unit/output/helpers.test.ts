/**
 * Output helper tests
 */

import { describe, it, expect } from 'vitest';

import {
  computeRelativeFramePath,
  countWords,
  formatTimestamp,
  markdownLinkTarget,
  singleLine,
} from '../../../src/output/helpers.js';

describe('formatTimestamp', () => {
  it('formats under an hour as M:SS', () => {
    expect(formatTimestamp(0)).toBe('0:00');
    expect(formatTimestamp(5)).toBe('0:05');
    expect(formatTimestamp(125)).toBe('2:05');
    expect(formatTimestamp(3599)).toBe('59:59');
  });

  it('formats an hour or more as H:MM:SS', () => {
    expect(formatTimestamp(3600)).toBe('1:00:00');
    expect(formatTimestamp(3725)).toBe('1:02:05');
  });

  it('rounds to the nearest second', () => {
    expect(formatTimestamp(59.4)).toBe('0:59');
    expect(formatTimestamp(59.6)).toBe('1:00');
    expect(formatTimestamp(3599.5)).toBe('1:00:00');
  });

  it('clamps negative values to zero', () => {
    expect(formatTimestamp(-3)).toBe('0:00');
  });
});

describe('computeRelativeFramePath', () => {
  it('resolves a frame path relative to the report directory', () => {
    expect(computeRelativeFramePath('/out/report_frames/frame_0001.jpg', '/out')).toBe(
      'report_frames/frame_0001.jpg'
    );
  });

  it('walks up when the frames live outside the report directory', () => {
    expect(computeRelativeFramePath('/data/frames/frame_0002.jpg', '/out/reports')).toBe(
      '../../data/frames/frame_0002.jpg'
    );
  });

  it('leaves relative paths as given', () => {
    expect(computeRelativeFramePath('frames/frame_0003.jpg', '/out')).toBe('frames/frame_0003.jpg');
  });
});

describe('markdownLinkTarget', () => {
  it('leaves plain paths bare', () => {
    expect(markdownLinkTarget('report_frames/frame_0001.jpg')).toBe('report_frames/frame_0001.jpg');
  });

  it('wraps paths with spaces in angle brackets', () => {
    expect(markdownLinkTarget('My Video_keyscribe_frames/frame_0001.jpg')).toBe(
      '<My Video_keyscribe_frames/frame_0001.jpg>'
    );
  });

  it('wraps parentheses and escapes angle brackets', () => {
    expect(markdownLinkTarget('take(2)_frames/frame_0001.jpg')).toBe('<take(2)_frames/frame_0001.jpg>');
    expect(markdownLinkTarget('a<b>/frame_0001.jpg')).toBe('<a\\<b\\>/frame_0001.jpg>');
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  one two\tthree\nfour ')).toBe(4);
  });

  it('counts nothing in blank text', () => {
    expect(countWords('   ')).toBe(0);
  });
});

describe('singleLine', () => {
  it('joins lines with single spaces', () => {
    expect(singleLine(' first line\r\n  second line\nthird ')).toBe('first line second line third');
  });
});
