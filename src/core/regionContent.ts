import { detectLineEnding, splitContentLines } from './textUtils.js';
import type { Region } from './types.js';

// Lines strictly between the two marker lines, terminators included.
export function extractRegionContent(lines: readonly string[], region: Region): string {
  return lines.slice(region.startLine, region.endLine - 1).join('');
}

/**
 * Rebuilds the file text with the region body swapped for `content`.
 *
 * The marker lines and everything outside the region are kept as they are. Every line of
 * `content` is re-terminated with the file's detected line ending.
 */
export function spliceRegionContent(lines: readonly string[], region: Region, content: string): string {
  const lineEnding = detectLineEnding(lines);
  const body = splitContentLines(content).map(line => line + lineEnding);

  return [...lines.slice(0, region.startLine), ...body, ...lines.slice(region.endLine - 1)].join('');
}
