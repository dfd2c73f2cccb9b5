import { spawn, type ChildProcess } from 'child_process';
import {
  ProcessNotFoundError,
  ServerStartError,
  ShutdownTimeoutError,
  errorMessage,
  isErrnoException,
} from '../errors.js';
import type { CoverageSession, WrappedCommand } from '../coverage/session.js';
import { expandArgs } from '../utils/template.js';
import type { PlaceholderValues } from '../utils/template.js';
import { waitForExit, type ExitStatus } from '../utils/process.js';
import { sleep } from '../utils/sleep.js';
import { isProcessAlive, readPidFile, removePidFile, writePidFile } from './pid-file.js';

const POLL_MS = 50;
const KILL_WAIT_MS = 5000;
const LATE_PID_GRACE_MS = 1000;

export interface ServerHandleInit {
  processId: number;
  configPath: string;
  pidFilePath: string;
}

/**
 * The run's only way to signal or wait on the server. When the harness
 * spawned the server itself the child process is held here; a daemonized
 * server is tracked by pid alone.
 */
export class ServerProcessHandle {
  readonly processId: number;
  readonly configPath: string;
  readonly pidFilePath: string;
  private child?: ChildProcess;
  private exitStatus?: ExitStatus;
  private exited?: Promise<ExitStatus>;

  constructor(init: ServerHandleInit, child?: ChildProcess) {
    this.processId = init.processId;
    this.configPath = init.configPath;
    this.pidFilePath = init.pidFilePath;
    if (child) {
      this.child = child;
      if (child.exitCode !== null || child.signalCode !== null) {
        this.exitStatus = { code: child.exitCode, signal: child.signalCode };
      }
      this.exited = new Promise<ExitStatus>(resolve => {
        if (this.exitStatus) return resolve(this.exitStatus);
        child.once('exit', (code, signal) => {
          this.exitStatus = { code, signal };
          resolve(this.exitStatus);
        });
      });
    }
  }

  get daemonized(): boolean {
    return this.child === undefined;
  }

  get exit(): ExitStatus | undefined {
    return this.exitStatus;
  }

  isAlive(): boolean {
    if (this.child) return this.exitStatus === undefined;
    return isProcessAlive(this.processId);
  }

  /** Owned servers run in their own process group; signal all of it. */
  signal(sig: NodeJS.Signals): void {
    const targets = this.child ? [-this.processId, this.processId] : [this.processId];
    for (const target of targets) {
      try {
        process.kill(target, sig);
        return;
      } catch (e) {
        if (!isErrnoException(e) || e.code !== 'ESRCH') throw e;
      }
    }
  }

  /** Resolves true once the process is gone, false when `timeoutMs` passes first. */
  async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exited) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<false>(resolve => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      });
      try {
        return await Promise.race([this.exited.then(() => true), timeout]);
      } finally {
        clearTimeout(timer);
      }
    }

    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (!this.isAlive()) return true;
      await sleep(POLL_MS);
    }
    return !this.isAlive();
  }
}

export interface ServerSupervisorOptions {
  command: string;
  args: string[];
  /** Working directory, normally the sandbox. */
  cwd: string;
  pidFilePath: string;
  daemon: {
    enabled: boolean;
    flag: string;
    pidFileFlag: string;
  };
  testMode: {
    enabled: boolean;
    env: string;
  };
  startTimeoutMs: number;
  coverage: CoverageSession;
  stdio?: 'inherit' | 'ignore';
  values?: PlaceholderValues;
}

export class ServerSupervisor {
  private opts: ServerSupervisorOptions;
  private active?: ServerProcessHandle;

  constructor(opts: ServerSupervisorOptions) {
    this.opts = opts;
  }

  get current(): ServerProcessHandle | undefined {
    return this.active;
  }

  /** Launches the server and returns without waiting for it to accept connections. */
  async start(configPath: string): Promise<ServerProcessHandle> {
    if (this.active?.isAlive()) {
      throw new ServerStartError(`Server already running as process ${this.active.processId}`);
    }
    this.checkLeftoverPidFile();

    const { daemon } = this.opts;
    const serverArgs = [
      ...expandArgs(this.opts.args, { config: configPath, pidFile: this.opts.pidFilePath, ...this.opts.values }),
      ...(daemon.enabled ? [daemon.flag, daemon.pidFileFlag, this.opts.pidFilePath] : []),
      configPath,
    ];

    const baseEnv: NodeJS.ProcessEnv = { ...process.env };
    if (this.opts.testMode.enabled) baseEnv[this.opts.testMode.env] = 'true';
    const env = this.opts.coverage.env(baseEnv);

    let wrapped: WrappedCommand;
    try {
      wrapped = this.opts.coverage.wrap(this.opts.command, serverArgs, env);
    } catch (e) {
      throw new ServerStartError(`Cannot launch ${this.opts.command}: ${errorMessage(e)}`, { cause: e });
    }

    console.log(`[server] starting ${wrapped.command} ${wrapped.args.join(' ')}`);
    const handle = daemon.enabled
      ? await this.startDaemon(wrapped.command, wrapped.args, env, configPath)
      : await this.startOwned(wrapped.command, wrapped.args, env, configPath);

    this.active = handle;
    console.log(`[server] started process ${handle.processId} (pid file ${handle.pidFilePath})`);
    return handle;
  }

  /**
   * SIGINT, then wait for exit. The pid file goes only after the process is
   * confirmed gone.
   */
  async stop(handle: ServerProcessHandle, timeoutMs: number): Promise<void> {
    const recorded = readPidFile(handle.pidFilePath);
    if (recorded === undefined) {
      throw new ProcessNotFoundError(handle.pidFilePath);
    }
    if (recorded !== handle.processId) {
      throw new ProcessNotFoundError(handle.pidFilePath, {
        details: { recorded, expected: handle.processId },
      });
    }

    if (handle.isAlive()) {
      console.log(`[server] sending SIGINT to process ${handle.processId}`);
      handle.signal('SIGINT');
      if (!(await handle.waitForExit(timeoutMs))) {
        throw new ShutdownTimeoutError(handle.processId, timeoutMs);
      }
    }

    removePidFile(handle.pidFilePath);
    if (this.active === handle) this.active = undefined;
    console.log(`[server] process ${handle.processId} stopped`);
  }

  /** Escalation after a stop timeout. */
  async kill(handle: ServerProcessHandle): Promise<void> {
    if (handle.isAlive()) {
      console.warn(`[server] sending SIGKILL to process ${handle.processId}`);
      handle.signal('SIGKILL');
      if (!(await handle.waitForExit(KILL_WAIT_MS))) {
        throw new ShutdownTimeoutError(handle.processId, KILL_WAIT_MS);
      }
    }
    removePidFile(handle.pidFilePath);
    if (this.active === handle) this.active = undefined;
  }

  /** Rebuilds a handle from a pid file left behind by a crashed run. */
  recover(configPath: string): ServerProcessHandle {
    const pid = readPidFile(this.opts.pidFilePath);
    if (pid === undefined) throw new ProcessNotFoundError(this.opts.pidFilePath);
    return new ServerProcessHandle({ processId: pid, configPath, pidFilePath: this.opts.pidFilePath });
  }

  private checkLeftoverPidFile(): void {
    const pid = readPidFile(this.opts.pidFilePath);
    if (pid === undefined) return;
    if (isProcessAlive(pid)) {
      throw new ServerStartError(
        `A server from an earlier run is still alive as process ${pid} (${this.opts.pidFilePath})`,
      );
    }
    console.warn(`[server] removing stale pid file ${this.opts.pidFilePath} (process ${pid})`);
    removePidFile(this.opts.pidFilePath);
  }

  private async startOwned(
    command: string,
    args: string[],
    env: NodeJS.ProcessEnv,
    configPath: string,
  ): Promise<ServerProcessHandle> {
    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd: this.opts.cwd,
        env,
        detached: true,
        stdio: ['ignore', this.opts.stdio ?? 'inherit', this.opts.stdio ?? 'inherit'],
      });
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', resolve);
        child.once('error', reject);
      });
    } catch (e) {
      throw new ServerStartError(`Cannot spawn ${command}: ${errorMessage(e)}`, { cause: e });
    }

    const pid = child.pid;
    if (pid === undefined) throw new ServerStartError(`Spawned ${command} has no process id`);
    writePidFile(this.opts.pidFilePath, pid);
    return new ServerProcessHandle({ processId: pid, configPath, pidFilePath: this.opts.pidFilePath }, child);
  }

  /** The launcher forks, writes the pid file and exits 0. */
  private async startDaemon(
    command: string,
    args: string[],
    env: NodeJS.ProcessEnv,
    configPath: string,
  ): Promise<ServerProcessHandle> {
    const deadline = Date.now() + this.opts.startTimeoutMs;
    let status: ExitStatus;
    try {
      const launcher = spawn(command, args, {
        cwd: this.opts.cwd,
        env,
        stdio: ['ignore', this.opts.stdio ?? 'inherit', this.opts.stdio ?? 'inherit'],
      });
      const timer = setTimeout(() => launcher.kill('SIGKILL'), this.opts.startTimeoutMs);
      try {
        status = await waitForExit(launcher);
      } finally {
        clearTimeout(timer);
      }
    } catch (e) {
      throw new ServerStartError(`Cannot spawn ${command}: ${errorMessage(e)}`, { cause: e });
    }
    if (status.code !== 0) {
      throw new ServerStartError(
        `Server launcher exited with ${status.code !== null ? `code ${status.code}` : `signal ${status.signal}`}`,
      );
    }

    while (Date.now() < deadline) {
      const pid = readPidFile(this.opts.pidFilePath);
      if (pid !== undefined) {
        if (!isProcessAlive(pid)) {
          throw new ServerStartError(`Daemonized server process ${pid} exited during startup`);
        }
        return new ServerProcessHandle({ processId: pid, configPath, pidFilePath: this.opts.pidFilePath });
      }
      await sleep(POLL_MS);
    }

    const late = await this.reapLateDaemon();
    throw new ServerStartError(
      `Server did not write ${this.opts.pidFilePath} within ${this.opts.startTimeoutMs}ms`
        + (late !== undefined ? `; killed late server process ${late}` : ''),
    );
  }

  /**
   * A daemon that records its pid after the start timeout has no handle to
   * stop it by. Give it one grace period, then kill whatever it recorded.
   */
  private async reapLateDaemon(): Promise<number | undefined> {
    await sleep(LATE_PID_GRACE_MS);
    const pid = readPidFile(this.opts.pidFilePath);
    if (pid === undefined) return undefined;

    let killed: number | undefined;
    if (isProcessAlive(pid)) {
      console.warn(`[server] killing process ${pid} that wrote its pid file after the start timeout`);
      try {
        process.kill(pid, 'SIGKILL');
        killed = pid;
      } catch (e) {
        if (!isErrnoException(e) || e.code !== 'ESRCH') {
          throw new ServerStartError(`Cannot kill late server process ${pid}: ${errorMessage(e)}`, { cause: e });
        }
      }
    }
    removePidFile(this.opts.pidFilePath);
    return killed;
  }
}
