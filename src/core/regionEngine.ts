import { isAbsolute, relative, resolve, sep } from 'node:path';

import { describeError, PathOutsideWorkspaceError, StructuralMarkerError, toErrnoCode } from './errors.js';
import { readTextFile, replaceTextFile, resolveFileIdentity } from './fileStore.js';
import { KeyedMutex } from './keyedMutex.js';
import { silentLogger, type RegionLogger } from './logger.js';
import { defaultMarkerPatterns, type MarkerPatterns } from './markers.js';
import { extractRegionContent, spliceRegionContent } from './regionContent.js';
import { scanLines } from './regionScanner.js';
import { replaceOccurrences, splitLinesKeepEnds, UNLIMITED_OCCURRENCES } from './textUtils.js';
import type { InsertSide, Region, RegionLookup } from './types.js';

export type RegionEngineOptions = {
  logger?: RegionLogger;
  markers?: MarkerPatterns;
  // Relative paths resolve against this directory (default: process.cwd()).
  workspaceRoot?: string;
  // Reject paths that resolve outside workspaceRoot.
  restrictToWorkspace?: boolean;
};

type ContentEdit = { kind: 'write'; content: string } | { kind: 'unchanged' } | { kind: 'failed' };

/**
 * Reads and edits named editable regions in text files.
 *
 * Holds configuration only: every call re-reads and re-scans the file, so a region table
 * is never trusted across calls. Read-modify-write operations on the same path are
 * serialized within this instance.
 */
export class RegionEngine {
  private readonly logger: RegionLogger;
  private readonly markers: MarkerPatterns;
  private readonly workspaceRoot: string;
  private readonly restrictToWorkspace: boolean;
  private readonly locks = new KeyedMutex();

  constructor(options: RegionEngineOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.markers = options.markers ?? defaultMarkerPatterns;
    this.workspaceRoot = resolve(options.workspaceRoot ?? process.cwd());
    this.restrictToWorkspace = options.restrictToWorkspace ?? false;
  }

  resolvePath(filePath: string): string {
    const absolutePath = resolve(this.workspaceRoot, filePath);
    if (this.restrictToWorkspace) {
      const rel = relative(this.workspaceRoot, absolutePath);
      if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
        throw new PathOutsideWorkspaceError(filePath, this.workspaceRoot);
      }
    }
    return absolutePath;
  }

  /**
   * Lists every region in document order. A missing file yields an empty list; structural
   * marker errors are thrown.
   */
  async listRegions(filePath: string): Promise<Region[]> {
    const lines = await this.readLines(filePath, this.resolvePath(filePath));
    if (!lines) return [];
    return this.scan(filePath, lines);
  }

  /** First region named `regionName`. Structural errors come back as a variant, not a throw. */
  async findRegion(filePath: string, regionName: string): Promise<RegionLookup> {
    return await this.locate(filePath, this.resolvePath(filePath), regionName);
  }

  async readRegion(filePath: string, regionName: string): Promise<string | undefined> {
    const lookup = await this.findRegion(filePath, regionName);
    if (lookup.kind !== 'found') return undefined;
    return extractRegionContent(lookup.lines, lookup.region);
  }

  async writeRegion(filePath: string, regionName: string, newContent: string): Promise<boolean> {
    return await this.editRegion(filePath, regionName, () => ({ kind: 'write', content: newContent }));
  }

  /**
   * Replaces up to `maxOccurrences` occurrences of `oldText` (negative: all of them).
   * Finding nothing to replace still counts as success, and the file is left untouched.
   */
  async replaceInRegion(
    filePath: string,
    regionName: string,
    oldText: string,
    newText: string,
    maxOccurrences: number = UNLIMITED_OCCURRENCES
  ): Promise<boolean> {
    if (oldText.length === 0) {
      this.logger.error(`Search text must not be empty (region '${regionName}' in file '${filePath}')`);
      return false;
    }

    return await this.editRegion(filePath, regionName, current => {
      const replaced = replaceOccurrences(current, oldText, newText, maxOccurrences);
      if (replaced.count === 0) {
        this.logger.info(`No occurrences of the search text in region '${regionName}' in file '${filePath}'`);
        return { kind: 'unchanged' };
      }
      this.logger.info(`Replaced ${replaced.count} occurrence(s) in region '${regionName}' in file '${filePath}'`);
      if (replaced.text === current) return { kind: 'unchanged' };
      return { kind: 'write', content: replaced.text };
    });
  }

  // Removes the first occurrence only.
  async deleteInRegion(filePath: string, regionName: string, textToDelete: string): Promise<boolean> {
    return await this.replaceInRegion(filePath, regionName, textToDelete, '', 1);
  }

  async insertBeforeInRegion(filePath: string, regionName: string, anchorText: string, textToInsert: string): Promise<boolean> {
    return await this.insertInRegion(filePath, regionName, anchorText, textToInsert, 'before');
  }

  async insertAfterInRegion(filePath: string, regionName: string, anchorText: string, textToInsert: string): Promise<boolean> {
    return await this.insertInRegion(filePath, regionName, anchorText, textToInsert, 'after');
  }

  /**
   * Inserts `textToInsert` next to the first occurrence of `anchorText`. An empty anchor
   * is treated as not found rather than matching at offset 0.
   */
  async insertInRegion(
    filePath: string,
    regionName: string,
    anchorText: string,
    textToInsert: string,
    side: InsertSide
  ): Promise<boolean> {
    return await this.editRegion(filePath, regionName, current => {
      const index = anchorText.length > 0 ? current.indexOf(anchorText) : -1;
      if (index === -1) {
        this.logger.error(`Anchor text not found in region '${regionName}' in file '${filePath}'`);
        return { kind: 'failed' };
      }

      const offset = side === 'before' ? index : index + anchorText.length;
      return { kind: 'write', content: current.slice(0, offset) + textToInsert + current.slice(offset) };
    });
  }

  private async editRegion(filePath: string, regionName: string, edit: (current: string) => ContentEdit): Promise<boolean> {
    const absolutePath = this.resolvePath(filePath);
    // Keyed by the real path so a symlink and its target share one lock.
    const lockKey = await resolveFileIdentity(absolutePath);

    return await this.locks.runExclusive(lockKey, async () => {
      const lookup = await this.locate(filePath, absolutePath, regionName);
      if (lookup.kind !== 'found') return false;

      const outcome = edit(extractRegionContent(lookup.lines, lookup.region));
      if (outcome.kind === 'failed') return false;
      if (outcome.kind === 'unchanged') return true;

      const updated = spliceRegionContent(lookup.lines, lookup.region, outcome.content);
      try {
        await replaceTextFile(absolutePath, updated);
      } catch (error) {
        this.logger.error(`Error writing region '${regionName}' to file ${filePath}: ${describeError(error)}`);
        throw error;
      }

      this.logger.info(`Successfully updated region '${regionName}' in file '${filePath}'`);
      return true;
    });
  }

  private async locate(filePath: string, absolutePath: string, regionName: string): Promise<RegionLookup> {
    const lines = await this.readLines(filePath, absolutePath);
    if (lines) {
      let regions: Region[];
      try {
        regions = this.scan(filePath, lines);
      } catch (error) {
        if (error instanceof StructuralMarkerError) return { kind: 'structural-error', error };
        throw error;
      }

      const region = regions.find(r => r.name === regionName);
      if (region) return { kind: 'found', region, lines };
    }

    this.logger.error(`Region '${regionName}' not found in file '${filePath}'`);
    return { kind: 'not-found' };
  }

  private async readLines(filePath: string, absolutePath: string): Promise<string[] | undefined> {
    let text: string;
    try {
      text = await readTextFile(absolutePath);
    } catch (error) {
      if (toErrnoCode(error) === 'ENOENT') {
        this.logger.error(`File not found: ${filePath}`);
        return undefined;
      }
      this.logger.error(`Error reading file ${filePath}: ${describeError(error)}`);
      throw error;
    }
    return splitLinesKeepEnds(text);
  }

  private scan(filePath: string, lines: readonly string[]): Region[] {
    let regions: Region[];
    try {
      regions = scanLines(lines, this.markers, {
        regionOpened: (name, lineNumber) => this.logger.info(`Found start of region '${name}' at line ${lineNumber}`),
        regionClosed: (name, lineNumber) => this.logger.info(`Found end of region '${name}' at line ${lineNumber}`)
      });
    } catch (error) {
      this.logger.error(`Error processing file ${filePath}: ${describeError(error)}`);
      throw error;
    }

    this.logger.info(`Found ${regions.length} regions in ${filePath}`);
    return regions;
  }
}
