import { MismatchedMarkerError, NestedRegionError, UnterminatedRegionError } from './errors.js';
import { defaultMarkerPatterns, matchBeginMarker, matchEndMarker, type MarkerPatterns } from './markers.js';
import type { Region } from './types.js';

export type ScanObserver = {
  regionOpened?: (name: string, lineNumber: number) => void;
  regionClosed?: (name: string, lineNumber: number) => void;
};

/**
 * Walks the lines in order and pairs begin/end markers into regions.
 *
 * Regions come back in document order. A line carrying both markers counts as a begin,
 * because the begin pattern is tried first.
 *
 * @throws NestedRegionError when a begin marker appears while a region is open
 * @throws MismatchedMarkerError when an end marker appears with no open region
 * @throws UnterminatedRegionError when the input ends inside a region
 */
export function scanLines(
  lines: readonly string[],
  patterns: MarkerPatterns = defaultMarkerPatterns,
  observer?: ScanObserver
): Region[] {
  const regions: Region[] = [];
  let open: { name: string; startLine: number } | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const lineNumber = i + 1;

    const beginName = matchBeginMarker(line, patterns);
    if (beginName !== undefined) {
      if (open) throw new NestedRegionError(beginName, open.name, lineNumber);
      open = { name: beginName, startLine: lineNumber };
      observer?.regionOpened?.(beginName, lineNumber);
      continue;
    }

    if (matchEndMarker(line, patterns)) {
      if (!open) throw new MismatchedMarkerError(lineNumber);
      observer?.regionClosed?.(open.name, lineNumber);
      regions.push({ name: open.name, startLine: open.startLine, endLine: lineNumber });
      open = undefined;
    }
  }

  if (open) throw new UnterminatedRegionError(open.name, open.startLine);

  return regions;
}
