import { existsSync, mkdtempSync } from 'fs';
import { spawnSync } from 'child_process';
import { createServer } from 'net';
import { join } from 'path';
import { tmpdir } from 'os';
import { CoverageSession } from '../src/coverage/session.js';

export function tempDir(prefix = 'harness-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Pid of a process that has already exited. */
export function deadPid(): number {
  const result = spawnSync(process.execPath, ['-e', '']);
  if (result.pid === undefined) throw new Error('spawnSync returned no pid');
  return result.pid;
}

export async function waitForFile(path: string, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!existsSync(path)) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${path}`);
    await new Promise(resolve => setTimeout(resolve, 20));
  }
}

export function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error('no TCP address'));
        return;
      }
      server.close(() => resolve(address.port));
    });
  });
}

export function noCoverage(outputDir: string): CoverageSession {
  return new CoverageSession({
    enabled: false,
    command: 'coverage',
    args: [],
    resolveCommands: false,
    artifacts: [],
    env: {},
    outputDir,
  });
}

export const SUBJECT_CONFIG = `[ req ]
distinguished_name = req_dn
prompt = no

[ req_dn ]
C = CA
O = Harness Tests
CN = localhost
`;
