import { connect } from 'net';
import { ServerNotReadyError, ServerStartError } from '../errors.js';
import { sleep } from '../utils/sleep.js';

export interface ReadinessOptions {
  host: string;
  port: number;
  timeoutMs: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  /** Checked between attempts; a dead server fails fast instead of timing out. */
  isAlive?: () => boolean;
}

export function canConnect(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise(resolve => {
    const socket = connect({ host, port });
    const done = (ok: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs, () => done(false));
    socket.once('connect', () => done(true));
    socket.once('error', () => done(false));
  });
}

/**
 * Polls a TCP connect with exponential backoff until the server accepts
 * connections. Returns the number of attempts made.
 */
export async function waitForReady(opts: ReadinessOptions): Promise<number> {
  const target = `${opts.host}:${opts.port}`;
  const deadline = Date.now() + opts.timeoutMs;
  let backoff = opts.initialBackoffMs;
  let attempts = 0;

  for (;;) {
    if (opts.isAlive && !opts.isAlive()) {
      throw new ServerStartError(`Server exited before accepting connections on ${target}`);
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) break;

    attempts++;
    if (await canConnect(opts.host, opts.port, Math.min(remaining, 1000))) {
      console.log(`[server] ready on ${target} after ${attempts} attempt(s)`);
      return attempts;
    }

    const wait = Math.min(backoff, deadline - Date.now());
    if (wait <= 0) break;
    await sleep(wait);
    backoff = Math.min(backoff * 2, opts.maxBackoffMs);
  }

  throw new ServerNotReadyError(target, opts.timeoutMs, attempts);
}

/** Blind wait for servers that give no ready signal. */
export async function settle(delayMs: number): Promise<void> {
  console.log(`[server] waiting ${delayMs}ms for server to settle`);
  await sleep(delayMs);
}
