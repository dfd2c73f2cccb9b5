import { join } from 'path';
import {
  HarnessError,
  ProcessNotFoundError,
  ShutdownTimeoutError,
  TestExecutionError,
  toHarnessError,
} from '../errors.js';
import type { HarnessConfig } from '../config/index.js';
import { CoverageSession } from '../coverage/session.js';
import { CertificateIssuer, createSigningBackend } from '../certs/issuer.js';
import type { TLSIdentity } from '../certs/types.js';
import { SandboxProvisioner } from '../sandbox/provisioner.js';
import { acquireRunLock, type RunLock } from '../sandbox/lock.js';
import type { ConfigurationTemplate, SandboxDirectory } from '../sandbox/types.js';
import { ServerSupervisor, type ServerProcessHandle } from '../server/supervisor.js';
import { settle, waitForReady } from '../server/readiness.js';
import { TestRunner, type TestOutcome } from '../runner/test-runner.js';

export const EXIT_SETUP_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const RunStates = [
  'Idle',
  'Provisioning',
  'IssuingCertificate',
  'ServerStarting',
  'AwaitingReadiness',
  'TestingRunning',
  'ServerStopping',
  'Done',
] as const;
export type RunState = typeof RunStates[number];

export type RunOutcome = 'success' | 'test-failure' | 'setup-failure' | 'interrupted';

export interface RunResult {
  outcome: RunOutcome;
  /** Test process exit status; null when the suite never ran. */
  testExitStatus: number | null;
  /** What the harness process should exit with. */
  exitCode: number;
  reportPath?: string;
  coverageArtifactPaths: string[];
  sandbox?: SandboxDirectory;
  identity?: TLSIdentity;
  /** The error that ended the run early, if any. */
  error?: HarnessError;
  /** Cleanup problems. They never change `exitCode`. */
  warnings: HarnessError[];
  states: RunState[];
}

export interface OrchestratorDeps {
  provisioner: Pick<SandboxProvisioner, 'provision' | 'path'>;
  issuer: Pick<CertificateIssuer, 'issue'>;
  supervisor: Pick<ServerSupervisor, 'start' | 'stop' | 'kill' | 'recover'>;
  runner: Pick<TestRunner, 'run'>;
  coverage: Pick<CoverageSession, 'collect'>;
  awaitReadiness: (handle: ServerProcessHandle) => Promise<void>;
}

export interface OrchestratorOptions {
  templates: ConfigurationTemplate[];
  subjectConfig: string;
  /** Server config file name inside the sandbox. */
  serverConfig: string;
  testTarget: string;
  stopTimeoutMs: number;
  /** Hold `<sandbox>.lock` for the whole run. */
  lock?: boolean;
  /** Signals that trigger server release mid-run. Empty disables the handlers. */
  signals?: NodeJS.Signals[];
  onTransition?: (state: RunState) => void;
}

export class Orchestrator {
  private deps: OrchestratorDeps;
  private opts: OrchestratorOptions;
  private state: RunState = 'Idle';
  private states: RunState[] = [];
  private warnings: HarnessError[] = [];
  private interrupted = false;

  constructor(deps: OrchestratorDeps, opts: OrchestratorOptions) {
    this.deps = deps;
    this.opts = opts;
  }

  get currentState(): RunState {
    return this.state;
  }

  async run(): Promise<RunResult> {
    this.states = [];
    this.warnings = [];
    this.interrupted = false;

    let lock: RunLock | undefined;
    let sandbox: SandboxDirectory | undefined;
    let identity: TLSIdentity | undefined;
    let tests: TestOutcome | undefined;
    let error: HarnessError | undefined;

    try {
      this.transition('Provisioning');
      if (this.opts.lock ?? true) lock = acquireRunLock(this.deps.provisioner.path);
      sandbox = this.deps.provisioner.provision(this.opts.templates);

      this.transition('IssuingCertificate');
      identity = await this.deps.issuer.issue(sandbox, this.opts.subjectConfig);

      this.transition('ServerStarting');
      tests = await this.withServer(sandbox);
    } catch (e) {
      error = toHarnessError(e);
      console.error(`[harness] ${error.name}: ${error.message}`);
    } finally {
      lock?.release();
    }

    this.transition('Done');
    const coverageArtifactPaths = this.deps.coverage.collect();
    for (const w of this.warnings) {
      console.warn(`[harness] cleanup warning ${w.name}: ${w.message}`);
    }

    return {
      outcome: this.outcomeOf(tests, error),
      testExitStatus: tests?.exitCode ?? null,
      exitCode: this.exitCodeOf(tests, error),
      reportPath: tests?.reportPath,
      coverageArtifactPaths,
      sandbox,
      identity,
      error,
      warnings: [...this.warnings],
      states: [...this.states],
    };
  }

  /**
   * Scoped use of the server. Signal handlers go in before the launch so an
   * interrupt during startup still reaches a server that ends up running.
   */
  private async withServer(sandbox: SandboxDirectory): Promise<TestOutcome> {
    const configPath = join(sandbox.path, this.opts.serverConfig);
    let handle: ServerProcessHandle | undefined;
    let releasing: Promise<void> | undefined;
    let recovering: Promise<void> | undefined;
    const release = (): Promise<void> => {
      if (!handle) {
        // No handle yet: whatever the pid file names is ours to stop.
        recovering ??= this.releaseRecovered(configPath);
        return recovering;
      }
      const started = handle;
      releasing ??= this.releaseServer(started);
      return releasing;
    };
    const onSignal = (sig: NodeJS.Signals) => {
      console.warn(`[harness] ${sig} received, stopping server`);
      this.interrupted = true;
      release().catch(e => this.warnings.push(toHarnessError(e)));
    };
    const signals = this.opts.signals ?? ['SIGINT', 'SIGTERM'];
    for (const sig of signals) process.on(sig, onSignal);

    try {
      handle = await this.deps.supervisor.start(configPath);
      if (this.interrupted) throw new HarnessError('UNEXPECTED_ERROR', 'Run interrupted while the server was starting');

      this.transition('AwaitingReadiness');
      await this.deps.awaitReadiness(handle);
      if (this.interrupted) throw new HarnessError('UNEXPECTED_ERROR', 'Run interrupted before tests started');

      this.transition('TestingRunning');
      return await this.deps.runner.run(this.opts.testTarget, sandbox.path);
    } finally {
      if (handle || this.interrupted) {
        this.transition('ServerStopping');
        await recovering;
        // A server stopped through its pid file mid-start needs no second stop.
        if (!(handle && recovering && !handle.isAlive())) await release();
      }
      for (const sig of signals) process.removeListener(sig, onSignal);
    }
  }

  private async releaseRecovered(configPath: string): Promise<void> {
    let recovered: ServerProcessHandle;
    try {
      recovered = this.deps.supervisor.recover(configPath);
    } catch (e) {
      if (e instanceof ProcessNotFoundError) return;
      this.warnings.push(toHarnessError(e));
      return;
    }
    await this.releaseServer(recovered);
  }

  private async releaseServer(handle: ServerProcessHandle): Promise<void> {
    try {
      await this.deps.supervisor.stop(handle, this.opts.stopTimeoutMs);
    } catch (e) {
      const err = toHarnessError(e);
      this.warnings.push(err);
      if (err instanceof ShutdownTimeoutError) {
        try {
          await this.deps.supervisor.kill(handle);
        } catch (k) {
          this.warnings.push(toHarnessError(k));
        }
      }
    }
  }

  private transition(next: RunState): void {
    if (this.state === next) return;
    this.state = next;
    this.states.push(next);
    this.opts.onTransition?.(next);
  }

  private outcomeOf(tests: TestOutcome | undefined, error: HarnessError | undefined): RunOutcome {
    if (this.interrupted) return 'interrupted';
    if (tests) return tests.exitCode === 0 ? 'success' : 'test-failure';
    if (error instanceof TestExecutionError) return 'test-failure';
    return 'setup-failure';
  }

  private exitCodeOf(tests: TestOutcome | undefined, error: HarnessError | undefined): number {
    if (tests) return tests.exitCode;
    if (error instanceof TestExecutionError) return error.exitCode;
    if (this.interrupted) return EXIT_INTERRUPTED;
    return EXIT_SETUP_FAILURE;
  }
}

export interface CreateOrchestratorOptions {
  stdio?: 'inherit' | 'ignore';
  signals?: NodeJS.Signals[];
  lock?: boolean;
  onTransition?: (state: RunState) => void;
}

export function buildCoverageSession(config: HarnessConfig): CoverageSession {
  return new CoverageSession({
    ...config.coverage,
    outputDir: config.sandbox.dir,
    values: { root: config.baseDir, sandbox: config.sandbox.dir },
  });
}

export function buildSupervisor(
  config: HarnessConfig,
  coverage: CoverageSession,
  stdio?: 'inherit' | 'ignore',
): ServerSupervisor {
  const { server } = config;
  return new ServerSupervisor({
    command: server.command,
    args: server.args,
    cwd: config.sandbox.dir,
    pidFilePath: join(config.sandbox.dir, server.pidFile),
    daemon: server.daemon,
    testMode: server.testMode,
    startTimeoutMs: server.startTimeoutMs,
    coverage,
    stdio,
    values: { root: config.baseDir, sandbox: config.sandbox.dir, port: server.port },
  });
}

export function createOrchestrator(config: HarnessConfig, opts: CreateOrchestratorOptions = {}): Orchestrator {
  const coverage = buildCoverageSession(config);
  const { readiness, server } = config;

  return new Orchestrator(
    {
      provisioner: new SandboxProvisioner({ dir: config.sandbox.dir, values: { port: server.port } }),
      issuer: new CertificateIssuer({
        backend: createSigningBackend(config.certificate.backend, config.certificate.opensslPath),
        bits: config.certificate.bits,
        days: config.certificate.days,
        digest: config.certificate.digest,
        keyFile: config.certificate.keyFile,
        certFile: config.certificate.certFile,
        bundleFile: config.certificate.bundleFile,
      }),
      supervisor: buildSupervisor(config, coverage, opts.stdio),
      runner: new TestRunner({
        command: config.tests.command,
        args: config.tests.args,
        report: config.tests.report,
        coverage,
        env: server.testMode.enabled ? { [server.testMode.env]: 'true' } : {},
        stdio: opts.stdio,
      }),
      coverage,
      awaitReadiness: async handle => {
        if (readiness.strategy === 'delay') {
          await settle(readiness.settleDelayMs);
          return;
        }
        await waitForReady({ ...readiness, isAlive: () => handle.isAlive() });
      },
    },
    {
      templates: config.sandbox.templates,
      subjectConfig: config.certificate.subjectConfig,
      serverConfig: server.config,
      testTarget: config.tests.target,
      stopTimeoutMs: server.stopTimeoutMs,
      lock: opts.lock,
      signals: opts.signals,
      onTransition: opts.onTransition,
    },
  );
}
