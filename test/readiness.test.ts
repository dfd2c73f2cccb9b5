import { describe, it, expect, afterEach } from 'vitest';
import { createServer, type Server } from 'net';
import { canConnect, settle, waitForReady } from '../src/server/readiness.js';
import { ServerNotReadyError, ServerStartError } from '../src/errors.js';
import { freePort } from './helpers.js';

function listen(port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(socket => socket.end());
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise(resolve => server.close(() => resolve()));
}

describe('readiness', () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(close));
  });

  it('canConnect reports whether the port accepts connections', async () => {
    const port = await freePort();
    expect(await canConnect('127.0.0.1', port, 500)).toBe(false);
    servers.push(await listen(port));
    expect(await canConnect('127.0.0.1', port, 500)).toBe(true);
  });

  it('returns on the first attempt when the server is already listening', async () => {
    const port = await freePort();
    servers.push(await listen(port));

    const attempts = await waitForReady({
      host: '127.0.0.1', port, timeoutMs: 2000, initialBackoffMs: 20, maxBackoffMs: 100,
    });
    expect(attempts).toBe(1);
  });

  it('keeps probing until the server starts listening', async () => {
    const port = await freePort();
    setTimeout(() => {
      listen(port).then(s => servers.push(s), () => undefined);
    }, 150);

    const attempts = await waitForReady({
      host: '127.0.0.1', port, timeoutMs: 5000, initialBackoffMs: 20, maxBackoffMs: 50,
    });
    expect(attempts).toBeGreaterThan(1);
  });

  it('gives up with ServerNotReadyError after the timeout', async () => {
    const port = await freePort();
    const error = await waitForReady({
      host: '127.0.0.1', port, timeoutMs: 300, initialBackoffMs: 20, maxBackoffMs: 50,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServerNotReadyError);
    if (!(error instanceof ServerNotReadyError)) return;
    expect(error.code).toBe('SERVER_NOT_READY');
    expect(error.attempts).toBeGreaterThan(0);
    expect(error.message).toContain(`127.0.0.1:${port}`);
  });

  it('fails fast when the server process has died', async () => {
    const port = await freePort();
    const started = Date.now();
    await expect(waitForReady({
      host: '127.0.0.1', port, timeoutMs: 10_000, initialBackoffMs: 20, maxBackoffMs: 50, isAlive: () => false,
    })).rejects.toThrow(ServerStartError);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('settle waits at least the configured delay', async () => {
    const started = Date.now();
    await settle(60);
    expect(Date.now() - started).toBeGreaterThanOrEqual(55);
  });
});
