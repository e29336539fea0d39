/**
 * Advisory run lock
 *
 * `<state file>.lock` is created with exclusive-create; its existence means a
 * run is in progress. Contents are informational only.
 */

import { open, readFile, rm } from 'node:fs/promises';
import { hostname } from 'node:os';
import { ConcurrentRunError } from '../errors.js';
import { ensureDir } from '../utils/fs-safe.js';
import { dirname } from 'node:path';

export interface RunLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

export function lockFilePath(statePath: string): string {
  return `${statePath}.lock`;
}

/**
 * Take the lock for a state file
 *
 * @throws ConcurrentRunError when the lock file already exists
 */
export async function acquireLock(statePath: string): Promise<RunLock> {
  const lockPath = lockFilePath(statePath);
  await ensureDir(dirname(lockPath));

  const holder = `pid ${process.pid} on ${hostname()} since ${new Date().toISOString()}`;
  try {
    const handle = await open(lockPath, 'wx');
    try {
      await handle.writeFile(holder + '\n', 'utf-8');
    } finally {
      await handle.close();
    }
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
      const existing = await readFile(lockPath, 'utf-8').catch(() => '');
      throw new ConcurrentRunError(lockPath, existing.trim() || undefined);
    }
    throw err;
  }

  let released = false;
  return {
    lockPath,
    async release() {
      if (released) return;
      released = true;
      await rm(lockPath, { force: true });
    },
  };
}
