import { describe, expect, it } from 'vitest';

import {
  detectLineEnding,
  replaceOccurrences,
  splitContentLines,
  splitLinesKeepEnds
} from '../src/core/textUtils.js';

describe('splitLinesKeepEnds', () => {
  it('keeps each terminator on its line', () => {
    expect(splitLinesKeepEnds('a\nb\r\nc\rd')).toEqual(['a\n', 'b\r\n', 'c\r', 'd']);
  });

  it('returns no lines for empty text and no trailing empty line after a final terminator', () => {
    expect(splitLinesKeepEnds('')).toEqual([]);
    expect(splitLinesKeepEnds('a\n')).toEqual(['a\n']);
  });

  it('treats consecutive terminators as empty lines', () => {
    expect(splitLinesKeepEnds('\n\r\n\r')).toEqual(['\n', '\r\n', '\r']);
  });

  it('joins back to the original text', () => {
    const text = 'first\r\nsecond\nthird\rfourth\r\n';
    expect(splitLinesKeepEnds(text).join('')).toBe(text);
  });
});

describe('detectLineEnding', () => {
  it('sniffs the ending of the first line only', () => {
    expect(detectLineEnding(['a\r\n', 'b\n'])).toBe('\r\n');
    expect(detectLineEnding(['a\r', 'b\r\n'])).toBe('\r');
    expect(detectLineEnding(['a\n', 'b\r\n'])).toBe('\n');
  });

  it('defaults to \\n when the first line has no terminator', () => {
    expect(detectLineEnding(['only line'])).toBe('\n');
    expect(detectLineEnding([])).toBe('\n');
  });
});

describe('splitContentLines', () => {
  it('splits on every recognised line break', () => {
    expect(splitContentLines('a\r\nb\rc\nd')).toEqual(['a', 'b', 'c', 'd']);
    expect(splitContentLines('a\u2028b\fc\vd')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('drops one trailing empty piece', () => {
    expect(splitContentLines('a\n')).toEqual(['a']);
    expect(splitContentLines('a\n\n')).toEqual(['a', '']);
    expect(splitContentLines('\n')).toEqual(['']);
    expect(splitContentLines('')).toEqual([]);
  });
});

describe('replaceOccurrences', () => {
  it('replaces all occurrences by default', () => {
    expect(replaceOccurrences('a-a-a', 'a', 'b')).toEqual({ text: 'b-b-b', count: 3 });
  });

  it('caps replacements left to right', () => {
    expect(replaceOccurrences('a-a-a', 'a', 'b', 2)).toEqual({ text: 'b-b-a', count: 2 });
    expect(replaceOccurrences('a-a-a', 'a', 'b', 0)).toEqual({ text: 'a-a-a', count: 0 });
  });

  it('does not overlap matches', () => {
    expect(replaceOccurrences('aaa', 'aa', 'x')).toEqual({ text: 'xa', count: 1 });
  });

  it('leaves text alone for an empty or absent search string', () => {
    expect(replaceOccurrences('abc', '', 'x')).toEqual({ text: 'abc', count: 0 });
    expect(replaceOccurrences('abc', 'z', 'x')).toEqual({ text: 'abc', count: 0 });
  });
});
