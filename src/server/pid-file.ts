import { readFileSync, rmSync, writeFileSync } from 'fs';
import { isErrnoException } from '../errors.js';

export function readPidFile(path: string): number | undefined {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch {
    return undefined;
  }
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const pid = Number(trimmed);
  return pid > 0 ? pid : undefined;
}

export function writePidFile(path: string, pid: number): void {
  writeFileSync(path, `${pid}\n`, 'utf-8');
}

export function removePidFile(path: string): void {
  rmSync(path, { force: true });
}

/**
 * An exited daemon whose new parent never reaps it still answers signal 0.
 * Linux only; elsewhere the state is unknown and treated as running.
 */
function isZombie(pid: number): boolean {
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, 'utf-8');
    return stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3) === 'Z';
  } catch {
    return false;
  }
}

/** Signal 0 check. EPERM means the process exists under another user. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch (e) {
    return isErrnoException(e) && e.code === 'EPERM';
  }
  return !isZombie(pid);
}
