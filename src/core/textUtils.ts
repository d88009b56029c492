import type { LineEnding } from './types.js';

// Any negative cap means "replace every occurrence".
export const UNLIMITED_OCCURRENCES = -1;

// Line breaks recognised when splitting caller-supplied content.
const CONTENT_LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

/**
 * Splits file text into lines on `\n`, `\r\n` or `\r`, keeping each line's terminator.
 * `lines.join('')` always reproduces the input.
 */
export function splitLinesKeepEnds(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch !== '\n' && ch !== '\r') continue;

    const end = ch === '\r' && text[i + 1] === '\n' ? i + 2 : i + 1;
    lines.push(text.slice(start, end));
    start = end;
    i = end - 1;
  }
  if (start < text.length) lines.push(text.slice(start));
  return lines;
}

// Sniffed from the first line only; mixed endings further down are not considered.
export function detectLineEnding(lines: readonly string[]): LineEnding {
  const first = lines[0] ?? '';
  if (first.includes('\r\n')) return '\r\n';
  if (first.includes('\r')) return '\r';
  return '\n';
}

/**
 * Splits content on any line break and drops the terminators.
 * A trailing line break does not produce a trailing empty line, and '' yields no lines.
 */
export function splitContentLines(content: string): string[] {
  const parts = content.split(CONTENT_LINE_BREAK);
  if (parts[parts.length - 1] === '') parts.pop();
  return parts;
}

export function replaceOccurrences(
  text: string,
  search: string,
  replacement: string,
  maxOccurrences: number = UNLIMITED_OCCURRENCES
): { text: string; count: number } {
  if (search.length === 0) return { text, count: 0 };

  let out = '';
  let from = 0;
  let count = 0;
  while (maxOccurrences < 0 || count < maxOccurrences) {
    const index = text.indexOf(search, from);
    if (index === -1) break;
    out += text.slice(from, index) + replacement;
    from = index + search.length;
    count++;
  }
  return { text: out + text.slice(from), count };
}
