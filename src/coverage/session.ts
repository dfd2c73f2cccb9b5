import { readdirSync } from 'fs';
import { join } from 'path';
import { expandArgs } from '../utils/template.js';
import type { PlaceholderValues } from '../utils/template.js';
import { findExecutable } from '../utils/process.js';

export interface CoverageSessionOptions {
  enabled: boolean;
  /** Launcher, e.g. `coverage` or `c8`. */
  command: string;
  args: string[];
  /**
   * Replace the wrapped command by its absolute PATH location. Launchers such
   * as `coverage run` take a script path, not a command name.
   */
  resolveCommands: boolean;
  /** File name globs, relative to `outputDir`. */
  artifacts: string[];
  env: Record<string, string>;
  /** Directory the wrapped processes write their data into. */
  outputDir: string;
  values?: PlaceholderValues;
}

export interface WrappedCommand {
  command: string;
  args: string[];
}

function globToRegExp(glob: string): RegExp {
  const source = glob
    .split('')
    .map(ch => {
      if (ch === '*') return '[^/]*';
      if (ch === '?') return '[^/]';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

/**
 * One instrumentation context for the whole run: the server and the test
 * runner go through the same launcher and environment so their data lands
 * in one place.
 */
export class CoverageSession {
  private opts: CoverageSessionOptions;

  constructor(opts: CoverageSessionOptions) {
    this.opts = opts;
  }

  get enabled(): boolean {
    return this.opts.enabled;
  }

  wrap(command: string, args: string[], env: NodeJS.ProcessEnv = process.env): WrappedCommand {
    if (!this.opts.enabled) return { command, args };

    let target = command;
    if (this.opts.resolveCommands) {
      const found = findExecutable(command, env);
      if (!found) throw new Error(`Executable not found on PATH: ${command}`);
      target = found;
    }
    const launcherArgs = expandArgs(this.opts.args, { output: this.opts.outputDir, ...this.opts.values });
    return { command: this.opts.command, args: [...launcherArgs, target, ...args] };
  }

  env(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
    if (!this.opts.enabled) return { ...base };
    return { ...base, ...this.opts.env };
  }

  collect(): string[] {
    if (!this.opts.enabled) return [];
    const matchers = this.opts.artifacts.map(globToRegExp);
    let entries: string[];
    try {
      entries = readdirSync(this.opts.outputDir);
    } catch {
      return [];
    }
    return entries
      .filter(name => matchers.some(re => re.test(name)))
      .sort()
      .map(name => join(this.opts.outputDir, name));
  }
}
