import { accessSync, constants, copyFileSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import { ProvisionError, errorMessage } from '../errors.js';
import { expandPlaceholders } from '../utils/template.js';
import type { PlaceholderValues } from '../utils/template.js';
import type { ConfigurationTemplate, SandboxDirectory } from './types.js';

export interface SandboxProvisionerOptions {
  /** Absolute sandbox location. Wiped on every provision. */
  dir: string;
  /** Values available to rewrite replacements, e.g. `{ port: 5767 }`. */
  values?: PlaceholderValues;
}

export class SandboxProvisioner {
  private dir: string;
  private values: PlaceholderValues;

  constructor(opts: SandboxProvisionerOptions) {
    this.dir = opts.dir;
    this.values = { sandbox: opts.dir, ...opts.values };
  }

  get path(): string {
    return this.dir;
  }

  provision(templates: ConfigurationTemplate[]): SandboxDirectory {
    const plan = this.plan(templates);

    this.step('wipe sandbox', () => rmSync(this.dir, { recursive: true, force: true }));
    this.step('create sandbox', () => mkdirSync(this.dir, { recursive: true }));
    this.step('check sandbox', () => {
      accessSync(this.dir, constants.W_OK);
      const leftovers = readdirSync(this.dir);
      if (leftovers.length > 0) {
        throw new Error(`not empty after wipe: ${leftovers.join(', ')}`);
      }
    });

    for (const { template, target } of plan) {
      const dest = join(this.dir, target);
      this.step(`copy ${template.source}`, () => copyFileSync(template.source, dest));
      if (template.rewrites && template.rewrites.length > 0) {
        this.step(`parametrize ${target}`, () => this.rewrite(dest, template));
      }
    }

    console.log(`[sandbox] provisioned ${this.dir} with ${plan.map(p => p.target).join(', ') || 'no templates'}`);
    return { path: this.dir, files: plan.map(p => p.target) };
  }

  private plan(templates: ConfigurationTemplate[]): Array<{ template: ConfigurationTemplate; target: string }> {
    const seen = new Set<string>();
    return templates.map(template => {
      const target = template.target ?? basename(template.source);
      if (seen.has(target)) {
        throw new ProvisionError(`Two templates map to sandbox file ${target}`);
      }
      seen.add(target);
      try {
        accessSync(template.source, constants.R_OK);
      } catch (e) {
        throw new ProvisionError(`Template ${template.source} is not readable: ${errorMessage(e)}`, { cause: e });
      }
      return { template, target };
    });
  }

  private rewrite(path: string, template: ConfigurationTemplate): void {
    let content = readFileSync(path, 'utf-8');
    for (const rule of template.rewrites ?? []) {
      if (!content.includes(rule.pattern)) {
        throw new Error(`pattern "${rule.pattern}" not found`);
      }
      const replacement = expandPlaceholders(rule.replacement, this.values);
      content = content.replaceAll(rule.pattern, () => replacement);
    }
    writeFileSync(path, content, 'utf-8');
  }

  private step(label: string, fn: () => void): void {
    try {
      fn();
    } catch (e) {
      if (e instanceof ProvisionError) throw e;
      throw new ProvisionError(`Sandbox ${label} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
