import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { RegionLogger } from '../src/core/logger.js';

export type RecordingLogger = RegionLogger & {
  infos: string[];
  errors: string[];
};

export function createRecordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    errors,
    info: message => {
      infos.push(message);
    },
    error: message => {
      errors.push(message);
    }
  };
}

export type TempWorkspace = {
  dir: string;
  writeText: (name: string, text: string) => Promise<string>;
  cleanup: () => Promise<void>;
};

export async function createTempWorkspace(): Promise<TempWorkspace> {
  const dir = await mkdtemp(join(tmpdir(), 'editable-regions-test-'));
  return {
    dir,
    writeText: async (name, text) => {
      const p = join(dir, name);
      await writeFile(p, text, 'utf8');
      return p;
    },
    cleanup: async () => {
      await rm(dir, { recursive: true, force: true });
    }
  };
}

export const SAMPLE_PAGE = [
  '<html>',
  '<head>',
  '<!-- #BeginEditable "doctitle" -->',
  '<title>Status</title>',
  '<!-- #EndEditable -->',
  '</head>',
  '<body>',
  '<p>Owner: TBD</p>',
  '<!-- #BeginEditable "body" -->',
  '<p>Status: TBD</p>',
  '<p>Next review: TBD</p>',
  '<!-- #EndEditable -->',
  '</body>',
  '</html>',
  ''
].join('\n');
