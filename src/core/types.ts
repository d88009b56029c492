import type { StructuralMarkerError } from './errors.js';

export type Region = {
  name: string;
  startLine: number; // 1-based, the begin marker line
  endLine: number; // 1-based, the end marker line
};

// Shape returned over the wire by the list_regions tool.
export type WireRegion = {
  name: string;
  start_line: number;
  end_line: number;
};

export type LineEnding = '\n' | '\r\n' | '\r';

export type InsertSide = 'before' | 'after';

export type RegionLookup =
  | { kind: 'found'; region: Region; lines: readonly string[] }
  | { kind: 'not-found' }
  | { kind: 'structural-error'; error: StructuralMarkerError };

export function toWireRegion(region: Region): WireRegion {
  return { name: region.name, start_line: region.startLine, end_line: region.endLine };
}
