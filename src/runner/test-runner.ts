import { spawn } from 'child_process';
import { resolve } from 'path';
import { TestExecutionError, errorMessage } from '../errors.js';
import type { CoverageSession, WrappedCommand } from '../coverage/session.js';
import { expandArgs } from '../utils/template.js';
import { exitCodeOf, waitForExit } from '../utils/process.js';

/** Shell convention for "command not found". */
export const EXIT_NOT_LAUNCHED = 127;

export interface TestOutcome {
  exitCode: number;
  /** Structured results file; may be absent if the suite crashed early. */
  reportPath: string;
}

export interface TestRunnerOptions {
  command: string;
  /** May reference `{target}` and `{report}`. */
  args: string[];
  /** Report file name, relative to the working directory. */
  report: string;
  coverage: CoverageSession;
  /** Extra environment for the test process (test mode flag). */
  env?: Record<string, string>;
  stdio?: 'inherit' | 'ignore';
}

export class TestRunner {
  private opts: TestRunnerOptions;

  constructor(opts: TestRunnerOptions) {
    this.opts = opts;
  }

  /**
   * Runs the suite under `targetDirectory` from `workingDirectory`. Failing
   * tests come back as a non-zero `exitCode`; only a launch failure throws.
   */
  async run(targetDirectory: string, workingDirectory: string): Promise<TestOutcome> {
    const reportPath = resolve(workingDirectory, this.opts.report);
    const args = expandArgs(this.opts.args, { target: targetDirectory, report: reportPath });
    const env = this.opts.coverage.env({ ...process.env, ...this.opts.env });

    let wrapped: WrappedCommand;
    try {
      wrapped = this.opts.coverage.wrap(this.opts.command, args, env);
    } catch (e) {
      throw new TestExecutionError(EXIT_NOT_LAUNCHED, `Cannot launch ${this.opts.command}: ${errorMessage(e)}`, { cause: e });
    }

    console.log(`[tests] running ${wrapped.command} ${wrapped.args.join(' ')}`);
    let exitCode: number;
    try {
      const child = spawn(wrapped.command, wrapped.args, {
        cwd: workingDirectory,
        env,
        stdio: ['ignore', this.opts.stdio ?? 'inherit', this.opts.stdio ?? 'inherit'],
      });
      exitCode = exitCodeOf(await waitForExit(child));
    } catch (e) {
      throw new TestExecutionError(EXIT_NOT_LAUNCHED, `Cannot launch ${wrapped.command}: ${errorMessage(e)}`, { cause: e });
    }

    if (exitCode === 0) {
      console.log('[tests] suite passed');
    } else {
      console.warn(`[tests] suite exited with code ${exitCode}`);
    }
    return { exitCode, reportPath };
  }
}
