export type StructuralErrorKind = 'nested-region' | 'mismatched-marker' | 'unterminated-region';

export abstract class StructuralMarkerError extends Error {
  abstract readonly kind: StructuralErrorKind;
  readonly lineNumber: number;

  protected constructor(message: string, lineNumber: number) {
    super(message);
    this.name = new.target.name;
    this.lineNumber = lineNumber;
  }
}

export class NestedRegionError extends StructuralMarkerError {
  readonly kind = 'nested-region';

  constructor(
    readonly regionName: string,
    readonly openRegionName: string,
    lineNumber: number
  ) {
    super(
      `Nested region detected: Found BeginEditable for '${regionName}' inside region '${openRegionName}' at line ${lineNumber}`,
      lineNumber
    );
  }
}

export class MismatchedMarkerError extends StructuralMarkerError {
  readonly kind = 'mismatched-marker';

  constructor(lineNumber: number) {
    super(`Mismatched marker: Found EndEditable without a matching BeginEditable at line ${lineNumber}`, lineNumber);
  }
}

export class UnterminatedRegionError extends StructuralMarkerError {
  readonly kind = 'unterminated-region';

  constructor(
    readonly regionName: string,
    readonly startLine: number
  ) {
    super(
      `Mismatched marker: Reached end of file while inside region '${regionName}' which started at line ${startLine}`,
      startLine
    );
  }
}

export class PathOutsideWorkspaceError extends Error {
  readonly kind = 'path-outside-workspace';

  constructor(
    readonly filePath: string,
    readonly workspaceRoot: string
  ) {
    super(`Access denied: "${filePath}" resolves outside the workspace root "${workspaceRoot}"`);
    this.name = 'PathOutsideWorkspaceError';
  }
}

export function toErrnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const code = (error as { code?: unknown }).code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
