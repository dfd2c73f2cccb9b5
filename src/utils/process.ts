import { accessSync, constants } from 'fs';
import { delimiter, isAbsolute, join, resolve } from 'path';
import { constants as osConstants } from 'os';
import type { ChildProcess } from 'child_process';

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** Shell-style status: the exit code, or 128 + signal number. */
export function exitCodeOf(status: ExitStatus): number {
  if (status.code !== null) return status.code;
  if (status.signal) {
    const signo = osConstants.signals[status.signal];
    return 128 + (signo ?? 0);
  }
  return 1;
}

/** Resolves on 'exit', rejects if the process could not be spawned at all. */
export function waitForExit(child: ChildProcess): Promise<ExitStatus> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve({ code: child.exitCode, signal: child.signalCode });
  }
  return new Promise((resolveExit, reject) => {
    const onError = (err: Error) => {
      child.removeListener('exit', onExit);
      reject(err);
    };
    const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
      child.removeListener('error', onError);
      resolveExit({ code, signal });
    };
    child.once('error', onError);
    child.once('exit', onExit);
  });
}

/** Like `which`: first executable match on PATH, or undefined. */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const isExecutable = (path: string) => {
    try {
      accessSync(path, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  };

  if (name.includes('/')) {
    const path = isAbsolute(name) ? name : resolve(name);
    return isExecutable(path) ? path : undefined;
  }
  for (const dir of (env.PATH ?? '').split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    if (isExecutable(candidate)) return candidate;
  }
  return undefined;
}
