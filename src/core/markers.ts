// Marker grammar: each marker must sit entirely on one line.
//   <!--#BeginEditable "REGION_NAME"-->
//   <!--#EndEditable-->

export type MarkerPatterns = {
  // Must capture the region name in group 1.
  begin: RegExp;
  end: RegExp;
};

export const DEFAULT_BEGIN_MARKER = /<!--\s*#BeginEditable\s*"([^"]+)"\s*-->/;
export const DEFAULT_END_MARKER = /<!--\s*#EndEditable\s*-->/;

export const defaultMarkerPatterns: MarkerPatterns = {
  begin: DEFAULT_BEGIN_MARKER,
  end: DEFAULT_END_MARKER
};

function countCaptureGroups(regex: RegExp): number {
  // An alternation with the empty pattern always matches, exposing every group slot.
  const match = new RegExp(`${regex.source}|`, regex.flags).exec('');
  return match ? match.length - 1 : 0;
}

export function compileMarkerPattern(pattern: string): RegExp {
  const trimmed = pattern.trim();
  if (!trimmed) throw new Error('Marker pattern must not be empty');

  let body = trimmed;
  let flags = '';
  // Allow /.../flags form. Otherwise the pattern is case-sensitive.
  if (trimmed.startsWith('/') && trimmed.lastIndexOf('/') > 0) {
    const lastSlash = trimmed.lastIndexOf('/');
    body = trimmed.slice(1, lastSlash);
    flags = trimmed.slice(lastSlash + 1);
  }

  // Stateful flags would make line matching depend on the previous line.
  flags = flags.replace(/[gy]/g, '');

  try {
    return new RegExp(body, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Marker pattern is not a valid regular expression: ${reason}`);
  }
}

export function createMarkerPatterns(params: { begin?: string; end?: string }): MarkerPatterns {
  const begin = params.begin ? compileMarkerPattern(params.begin) : DEFAULT_BEGIN_MARKER;
  const end = params.end ? compileMarkerPattern(params.end) : DEFAULT_END_MARKER;

  if (countCaptureGroups(begin) < 1) {
    throw new Error('Begin marker pattern must capture the region name in group 1');
  }

  return { begin, end };
}

/** Returns the region name when the line carries a begin marker. */
export function matchBeginMarker(line: string, patterns: MarkerPatterns): string | undefined {
  const match = patterns.begin.exec(line);
  return match?.[1];
}

export function matchEndMarker(line: string, patterns: MarkerPatterns): boolean {
  return patterns.end.test(line);
}
