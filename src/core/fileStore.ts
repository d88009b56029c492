import { randomUUID } from 'node:crypto';
import { chmod, chown, readFile, realpath, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { toErrnoCode } from './errors.js';

// Invalid UTF-8 sequences decode to U+FFFD instead of failing.
export async function readTextFile(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

/** Real path of `path` with symlinks resolved; a missing file keeps its given path. */
export async function resolveFileIdentity(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (error) {
    if (toErrnoCode(error) === 'ENOENT') return path;
    throw error;
  }
}

/**
 * Replaces an existing file's contents via a sibling temp file and a rename, so readers
 * never observe a half-written file. Symlinks are followed; mode, owner and group are kept.
 *
 * Two cases are written in place instead, which is not atomic: a file with other hard
 * links (a rename would detach them), and a file whose owner cannot be given to the temp
 * file because the process lacks the permission to chown.
 */
export async function replaceTextFile(path: string, text: string): Promise<void> {
  const target = await realpath(path);
  const { mode, uid, gid, nlink } = await stat(target);
  if (nlink > 1) {
    await writeFile(target, text, 'utf8');
    return;
  }

  const tempPath = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`);
  let ownerKept = false;
  try {
    await writeFile(tempPath, text, 'utf8');
    // Explicit chmod: the umask would otherwise trim the original permissions.
    await chmod(tempPath, mode & 0o7777);
    ownerKept = await keepOwner(tempPath, uid, gid);
    if (ownerKept) await rename(tempPath, target);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }

  if (!ownerKept) {
    await rm(tempPath, { force: true });
    await writeFile(target, text, 'utf8');
  }
}

// False when the owner differs and chown is not permitted.
async function keepOwner(path: string, uid: number, gid: number): Promise<boolean> {
  const current = await stat(path);
  if (current.uid === uid && current.gid === gid) return true;
  try {
    await chown(path, uid, gid);
    return true;
  } catch (error) {
    if (toErrnoCode(error) === 'EPERM') return false;
    throw error;
  }
}
