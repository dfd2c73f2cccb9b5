import { describe, it, expect, vi } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { Orchestrator, type OrchestratorOptions, type RunResult } from '../src/orchestrator/index.js';
import { ServerProcessHandle } from '../src/server/supervisor.js';
import { lockPathFor } from '../src/sandbox/lock.js';
import {
  CertificateError,
  HarnessError,
  ProcessNotFoundError,
  ProvisionError,
  SandboxLockedError,
  ServerNotReadyError,
  ServerStartError,
  ShutdownTimeoutError,
  TestExecutionError,
} from '../src/errors.js';
import type { TLSIdentity } from '../src/certs/types.js';
import { deadPid, tempDir } from './helpers.js';

function fakes() {
  const dir = join(tempDir('harness-orch-'), 'sandbox');
  const sandbox = { path: dir, files: [join(dir, 'test-server.ini')] };
  const identity: TLSIdentity = {
    keyPath: join(dir, 'host.key'),
    certPath: join(dir, 'host.cert'),
    bundlePath: join(dir, 'host.pem'),
    notBefore: new Date('2026-01-01T00:00:00Z'),
    notAfter: new Date('2027-01-01T00:00:00Z'),
  };
  const init = {
    processId: deadPid(),
    configPath: join(dir, 'test-server.ini'),
    pidFilePath: join(dir, 'test-server.pid'),
  };
  const handle = new ServerProcessHandle(init);

  const deps = {
    provisioner: { path: dir, provision: vi.fn(() => sandbox) },
    issuer: { issue: vi.fn(async () => identity) },
    supervisor: {
      start: vi.fn(async () => handle),
      stop: vi.fn(async () => undefined),
      kill: vi.fn(async () => undefined),
      recover: vi.fn<(configPath: string) => ServerProcessHandle>(() => {
        throw new ProcessNotFoundError(init.pidFilePath);
      }),
    },
    runner: { run: vi.fn(async () => ({ exitCode: 0, reportPath: join(dir, 'nosetests.xml') })) },
    coverage: { collect: vi.fn(() => [join(dir, '.coverage')]) },
    awaitReadiness: vi.fn<(handle: ServerProcessHandle) => Promise<void>>(async () => {}),
  };
  const opts: OrchestratorOptions = {
    templates: [{ source: '/srv/server/test.ini', target: 'test-server.ini', rewrites: [] }],
    subjectConfig: '/srv/test-certif-config',
    serverConfig: 'test-server.ini',
    testTarget: '/srv/tests',
    stopTimeoutMs: 1000,
    signals: [],
  };
  return { dir, sandbox, identity, init, handle, deps, opts };
}

describe('Orchestrator', () => {
  it('runs every phase in order and reports success', async () => {
    const { dir, sandbox, identity, handle, deps, opts } = fakes();
    const seen: string[] = [];

    const result = await new Orchestrator(deps, { ...opts, onTransition: s => seen.push(s) }).run();

    expect(result.states).toEqual([
      'Provisioning',
      'IssuingCertificate',
      'ServerStarting',
      'AwaitingReadiness',
      'TestingRunning',
      'ServerStopping',
      'Done',
    ]);
    expect(seen).toEqual(result.states);
    expect(result).toMatchObject({
      outcome: 'success',
      testExitStatus: 0,
      exitCode: 0,
      reportPath: join(dir, 'nosetests.xml'),
      coverageArtifactPaths: [join(dir, '.coverage')],
      sandbox,
      identity,
      warnings: [],
    });
    expect(result.error).toBeUndefined();
    expect(deps.provisioner.provision).toHaveBeenCalledWith(opts.templates);
    expect(deps.issuer.issue).toHaveBeenCalledWith(sandbox, '/srv/test-certif-config');
    expect(deps.supervisor.start).toHaveBeenCalledWith(join(dir, 'test-server.ini'));
    expect(deps.awaitReadiness).toHaveBeenCalledWith(handle);
    expect(deps.runner.run).toHaveBeenCalledWith('/srv/tests', dir);
    expect(deps.supervisor.stop).toHaveBeenCalledWith(handle, 1000);
    expect(deps.supervisor.kill).not.toHaveBeenCalled();
    expect(existsSync(lockPathFor(dir))).toBe(false);
  });

  it('propagates the suite exit status and still stops the server', async () => {
    const { dir, deps, opts } = fakes();
    deps.runner.run.mockResolvedValueOnce({ exitCode: 2, reportPath: join(dir, 'nosetests.xml') });

    const result = await new Orchestrator(deps, opts).run();

    expect(result.outcome).toBe('test-failure');
    expect(result.testExitStatus).toBe(2);
    expect(result.exitCode).toBe(2);
    expect(deps.supervisor.stop).toHaveBeenCalledTimes(1);
  });

  it('stops at a provisioning failure without issuing or starting anything', async () => {
    const { deps, opts } = fakes();
    deps.provisioner.provision.mockImplementationOnce(() => {
      throw new ProvisionError('Sandbox wipe failed: EACCES');
    });

    const result = await new Orchestrator(deps, opts).run();

    expect(result.states).toEqual(['Provisioning', 'Done']);
    expect(result.outcome).toBe('setup-failure');
    expect(result.exitCode).toBe(1);
    expect(result.testExitStatus).toBeNull();
    expect(result.error).toBeInstanceOf(ProvisionError);
    expect(deps.issuer.issue).not.toHaveBeenCalled();
    expect(deps.supervisor.start).not.toHaveBeenCalled();
  });

  it('never starts the server when certificate issuance fails', async () => {
    const { deps, opts } = fakes();
    deps.issuer.issue.mockRejectedValueOnce(new CertificateError('Signing tool not found: openssl'));

    const result = await new Orchestrator(deps, opts).run();

    expect(result.states).toEqual(['Provisioning', 'IssuingCertificate', 'Done']);
    expect(result.error?.code).toBe('CERTIFICATE_FAILED');
    expect(result.exitCode).toBe(1);
    expect(deps.supervisor.start).not.toHaveBeenCalled();
  });

  it('releases the server when it never becomes ready', async () => {
    const { handle, deps, opts } = fakes();
    deps.awaitReadiness.mockRejectedValueOnce(new ServerNotReadyError('127.0.0.1:5767', 15_000, 9));

    const result = await new Orchestrator(deps, opts).run();

    expect(result.states).toEqual([
      'Provisioning',
      'IssuingCertificate',
      'ServerStarting',
      'AwaitingReadiness',
      'ServerStopping',
      'Done',
    ]);
    expect(result.outcome).toBe('setup-failure');
    expect(result.exitCode).toBe(1);
    expect(result.error).toBeInstanceOf(ServerNotReadyError);
    expect(deps.runner.run).not.toHaveBeenCalled();
    expect(deps.supervisor.stop).toHaveBeenCalledWith(handle, 1000);
  });

  it('exits with the launch status when the suite cannot start', async () => {
    const { deps, opts } = fakes();
    deps.runner.run.mockRejectedValueOnce(new TestExecutionError(127, 'Cannot launch nosetests: ENOENT'));

    const result = await new Orchestrator(deps, opts).run();

    expect(result.outcome).toBe('test-failure');
    expect(result.exitCode).toBe(127);
    expect(result.testExitStatus).toBeNull();
    expect(deps.supervisor.stop).toHaveBeenCalledTimes(1);
  });

  it('kills a server that outlives the stop timeout and keeps the test status', async () => {
    const { handle, deps, opts } = fakes();
    deps.supervisor.stop.mockRejectedValueOnce(new ShutdownTimeoutError(4242, 1000));

    const result = await new Orchestrator(deps, opts).run();

    expect(deps.supervisor.kill).toHaveBeenCalledWith(handle);
    expect(result.exitCode).toBe(0);
    expect(result.outcome).toBe('success');
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toBeInstanceOf(ShutdownTimeoutError);
  });

  it('records a missing pid file at shutdown as a warning only', async () => {
    const { dir, deps, opts } = fakes();
    deps.supervisor.stop.mockRejectedValueOnce(new ProcessNotFoundError(join(dir, 'test-server.pid')));

    const result = await new Orchestrator(deps, opts).run();

    expect(deps.supervisor.kill).not.toHaveBeenCalled();
    expect(result.exitCode).toBe(0);
    expect(result.warnings.map(w => w.code)).toEqual(['PROCESS_NOT_FOUND']);
  });

  it('refuses to run while another live process holds the sandbox lock', async () => {
    const { dir, deps, opts } = fakes();
    writeFileSync(lockPathFor(dir), `${process.ppid}\n`);

    const result = await new Orchestrator(deps, opts).run();

    expect(result.error).toBeInstanceOf(SandboxLockedError);
    expect(result.exitCode).toBe(1);
    expect(deps.provisioner.provision).not.toHaveBeenCalled();
    expect(readFileSync(lockPathFor(dir), 'utf-8')).toBe(`${process.ppid}\n`);
  });

  it('runs without the lock when asked to', async () => {
    const { dir, deps, opts } = fakes();
    writeFileSync(lockPathFor(dir), `${process.ppid}\n`);

    const result = await new Orchestrator(deps, { ...opts, lock: false }).run();

    expect(result.outcome).toBe('success');
  });

  it('stops the server once and skips the suite when interrupted', async () => {
    const { handle, deps, opts } = fakes();
    deps.awaitReadiness.mockImplementationOnce(async () => {
      process.emit('SIGUSR2', 'SIGUSR2');
    });
    const listenersBefore = process.listenerCount('SIGUSR2');

    const result = await new Orchestrator(deps, { ...opts, signals: ['SIGUSR2'] }).run();

    expect(result.outcome).toBe('interrupted');
    expect(result.exitCode).toBe(130);
    expect(result.error).toBeInstanceOf(HarnessError);
    expect(deps.runner.run).not.toHaveBeenCalled();
    expect(deps.supervisor.stop).toHaveBeenCalledTimes(1);
    expect(deps.supervisor.stop).toHaveBeenCalledWith(handle, 1000);
    expect(process.listenerCount('SIGUSR2')).toBe(listenersBefore);
  });

  it('stops a server interrupted mid-start through its pid file', async () => {
    const { dir, init, handle, deps, opts } = fakes();
    const recovered = new ServerProcessHandle(init);
    deps.supervisor.recover.mockImplementationOnce(() => recovered);
    deps.supervisor.start.mockImplementationOnce(async () => {
      process.emit('SIGUSR2', 'SIGUSR2');
      return handle;
    });

    const result = await new Orchestrator(deps, { ...opts, signals: ['SIGUSR2'] }).run();

    expect(deps.supervisor.recover).toHaveBeenCalledWith(join(dir, 'test-server.ini'));
    expect(deps.supervisor.stop).toHaveBeenCalledTimes(1);
    expect(deps.supervisor.stop).toHaveBeenCalledWith(recovered, 1000);
    expect(deps.awaitReadiness).not.toHaveBeenCalled();
    expect(result.outcome).toBe('interrupted');
    expect(result.exitCode).toBe(130);
    expect(result.states).toEqual([
      'Provisioning',
      'IssuingCertificate',
      'ServerStarting',
      'ServerStopping',
      'Done',
    ]);
  });

  it('has nothing to stop when interrupted before the server recorded a pid', async () => {
    const { deps, opts } = fakes();
    deps.supervisor.start.mockImplementationOnce(async () => {
      process.emit('SIGUSR2', 'SIGUSR2');
      throw new ServerStartError('Server launcher exited with signal SIGINT');
    });

    const result = await new Orchestrator(deps, { ...opts, signals: ['SIGUSR2'] }).run();

    expect(deps.supervisor.recover).toHaveBeenCalledTimes(1);
    expect(deps.supervisor.stop).not.toHaveBeenCalled();
    expect(result.warnings).toEqual([]);
    expect(result.outcome).toBe('interrupted');
    expect(result.exitCode).toBe(130);
    expect(result.error).toBeInstanceOf(ServerStartError);
  });

  it('does not stop anything when the server fails to start', async () => {
    const { deps, opts } = fakes();
    deps.supervisor.start.mockRejectedValueOnce(new ServerStartError('Cannot spawn paster: ENOENT'));

    const result = await new Orchestrator(deps, opts).run();

    expect(result.states).toEqual(['Provisioning', 'IssuingCertificate', 'ServerStarting', 'Done']);
    expect(result.outcome).toBe('setup-failure');
    expect(deps.supervisor.recover).not.toHaveBeenCalled();
    expect(deps.supervisor.stop).not.toHaveBeenCalled();
  });

  it('refuses a second concurrent run on the same sandbox', async () => {
    const { dir, deps, opts } = fakes();
    const overlapping: Array<Promise<RunResult>> = [];
    deps.awaitReadiness.mockImplementationOnce(async () => {
      const second = new Orchestrator(deps, opts).run();
      overlapping.push(second);
      await second;
    });

    const first = await new Orchestrator(deps, opts).run();

    expect(first.outcome).toBe('success');
    const [result] = await Promise.all(overlapping);
    expect(result.error).toBeInstanceOf(SandboxLockedError);
    expect(deps.provisioner.provision).toHaveBeenCalledTimes(1);
    expect(existsSync(lockPathFor(dir))).toBe(false);
  });
});
