import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { ProvisionError, SandboxLockedError, errorMessage, isErrnoException } from '../errors.js';
import { isProcessAlive } from '../server/pid-file.js';

export interface RunLock {
  path: string;
  release(): void;
}

export function lockPathFor(sandboxDir: string): string {
  return `${sandboxDir.replace(/[\\/]+$/, '')}.lock`;
}

function readOwner(path: string): number | undefined {
  try {
    const pid = Number.parseInt(readFileSync(path, 'utf-8').trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Serializes runs against one sandbox path. The lock sits beside the sandbox
 * so that wiping the sandbox never drops it.
 */
export function acquireRunLock(sandboxDir: string, pid: number = process.pid): RunLock {
  const path = lockPathFor(sandboxDir);
  mkdirSync(dirname(path), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      writeFileSync(path, `${pid}\n`, { flag: 'wx' });
      return {
        path,
        release() {
          if (readOwner(path) === pid) rmSync(path, { force: true });
        },
      };
    } catch (e) {
      if (!isErrnoException(e) || e.code !== 'EEXIST') {
        throw new ProvisionError(`Cannot create run lock ${path}: ${errorMessage(e)}`, { cause: e });
      }
    }

    // A lock held by this same process is a concurrent run, not a stale one.
    const owner = readOwner(path);
    if (owner !== undefined && (owner === pid || isProcessAlive(owner))) {
      throw new SandboxLockedError(path, owner);
    }
    console.warn(`[sandbox] removing stale run lock ${path}${owner ? ` (pid ${owner})` : ''}`);
    rmSync(path, { force: true });
  }

  throw new ProvisionError(`Could not acquire run lock ${path}`);
}
