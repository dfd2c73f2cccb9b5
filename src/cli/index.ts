#!/usr/bin/env node
import { config } from 'dotenv';
import { Command } from 'commander';
import { existsSync, rmSync } from 'fs';
import { join } from 'path';
import { loadConfig, type HarnessConfig } from '../config/index.js';

// Load .env from the current directory before reading harness settings
config({ path: ['.env'] });
import { ConfigError, errorMessage, toHarnessError, ShutdownTimeoutError } from '../errors.js';
import { createOrchestrator, buildCoverageSession, buildSupervisor } from '../orchestrator/index.js';
import { SandboxProvisioner } from '../sandbox/provisioner.js';
import { acquireRunLock, lockPathFor } from '../sandbox/lock.js';
import { CertificateIssuer, createSigningBackend } from '../certs/issuer.js';

interface CommonOptions {
  config?: string;
}

/** Flags win over the environment; flags left unset keep it. */
function readConfig(opts: CommonOptions, overrides: Record<string, string | undefined> = {}): HarnessConfig {
  const env: NodeJS.ProcessEnv = { ...process.env };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) env[key] = value;
  }
  return loadConfig({ path: opts.config, env });
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (value.trim() === '' || !Number.isInteger(ms) || ms < 0) {
    throw new ConfigError(`--timeout must be a non-negative integer (ms), got "${value}"`);
  }
  return ms;
}

function fail(error: unknown): never {
  const err = toHarnessError(error);
  console.error(`[harness] ${err.name}: ${err.message}`);
  process.exit(1);
}

function issuerFor(cfg: HarnessConfig): CertificateIssuer {
  const cert = cfg.certificate;
  return new CertificateIssuer({
    backend: createSigningBackend(cert.backend, cert.opensslPath),
    bits: cert.bits,
    days: cert.days,
    digest: cert.digest,
    keyFile: cert.keyFile,
    certFile: cert.certFile,
    bundleFile: cert.bundleFile,
  });
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('vault-harness')
    .description('Disposable integration-test harness for the vault server')
    .version('1.0.0');

  program
    .command('run')
    .description('Provision a sandbox, start the server, run the suite and tear everything down')
    .option('-c, --config <path>', 'Harness config file (default: ./harness.yaml)')
    .option('--no-coverage', 'Run server and tests without coverage instrumentation')
    .option('--backend <name>', 'Certificate backend: openssl or forge')
    .option('--settle <ms>', 'Use a fixed settle delay instead of the TCP readiness check')
    .action(async (opts: CommonOptions & { coverage: boolean; backend?: string; settle?: string }) => {
      let cfg: HarnessConfig;
      try {
        cfg = readConfig(opts, {
          HARNESS_COVERAGE: opts.coverage ? undefined : 'false',
          HARNESS_CERT_BACKEND: opts.backend,
          HARNESS_READINESS: opts.settle !== undefined ? 'delay' : undefined,
          HARNESS_SETTLE_DELAY_MS: opts.settle,
        });
      } catch (e) {
        fail(e);
      }

      const result = await createOrchestrator(cfg).run();

      console.log(`\nOutcome:  ${result.outcome}`);
      if (result.testExitStatus !== null) console.log(`Tests:    exit ${result.testExitStatus}`);
      if (result.reportPath) console.log(`Report:   ${result.reportPath}`);
      if (result.coverageArtifactPaths.length > 0) {
        console.log(`Coverage: ${result.coverageArtifactPaths.join(', ')}`);
      }
      if (result.warnings.length > 0) console.log(`Warnings: ${result.warnings.length}`);
      process.exitCode = result.exitCode;
    });

  program
    .command('provision')
    .description('Wipe and seed the sandbox only')
    .option('-c, --config <path>', 'Harness config file')
    .action((opts: CommonOptions) => {
      try {
        const cfg = readConfig(opts);
        const lock = acquireRunLock(cfg.sandbox.dir);
        try {
          const provisioner = new SandboxProvisioner({ dir: cfg.sandbox.dir, values: { port: cfg.server.port } });
          const sandbox = provisioner.provision(cfg.sandbox.templates);
          console.log(sandbox.files.join('\n'));
        } finally {
          lock.release();
        }
      } catch (e) {
        fail(e);
      }
    });

  program
    .command('issue-cert')
    .description('Issue a fresh TLS identity into the existing sandbox')
    .option('-c, --config <path>', 'Harness config file')
    .option('--backend <name>', 'Certificate backend: openssl or forge')
    .action(async (opts: CommonOptions & { backend?: string }) => {
      try {
        const cfg = readConfig(opts, { HARNESS_CERT_BACKEND: opts.backend });
        if (!existsSync(cfg.sandbox.dir)) {
          throw new Error(`Sandbox ${cfg.sandbox.dir} does not exist; run "vault-harness provision" first`);
        }
        const identity = await issuerFor(cfg).issue({ path: cfg.sandbox.dir, files: [] }, cfg.certificate.subjectConfig);
        console.log(`Key:    ${identity.keyPath}`);
        console.log(`Cert:   ${identity.certPath}`);
        console.log(`Bundle: ${identity.bundlePath}`);
        console.log(`Valid:  ${identity.notBefore.toISOString()} .. ${identity.notAfter.toISOString()}`);
      } catch (e) {
        fail(e);
      }
    });

  program
    .command('stop')
    .description('Stop a server left running by an interrupted run, using its pid file')
    .option('-c, --config <path>', 'Harness config file')
    .option('--timeout <ms>', 'Grace period before SIGKILL')
    .action(async (opts: CommonOptions & { timeout?: string }) => {
      try {
        const cfg = readConfig(opts);
        const supervisor = buildSupervisor(cfg, buildCoverageSession(cfg));
        const timeout = opts.timeout !== undefined ? parseTimeout(opts.timeout) : cfg.server.stopTimeoutMs;
        const handle = supervisor.recover(join(cfg.sandbox.dir, cfg.server.config));
        try {
          await supervisor.stop(handle, timeout);
        } catch (e) {
          if (!(e instanceof ShutdownTimeoutError)) throw e;
          console.warn(`[server] ${errorMessage(e)}`);
          await supervisor.kill(handle);
        }
        console.log(`Server process ${handle.processId} stopped.`);
      } catch (e) {
        fail(e);
      }
    });

  program
    .command('clean')
    .description('Remove the sandbox directory')
    .option('-c, --config <path>', 'Harness config file')
    .action((opts: CommonOptions) => {
      try {
        const cfg = readConfig(opts);
        const lock = acquireRunLock(cfg.sandbox.dir);
        rmSync(cfg.sandbox.dir, { recursive: true, force: true });
        lock.release();
        console.log(`Removed ${cfg.sandbox.dir} (${lockPathFor(cfg.sandbox.dir)} released)`);
      } catch (e) {
        fail(e);
      }
    });

  return program;
}

// Run CLI when executed directly
const isMain = process.argv[1]?.endsWith('cli/index.ts')
  || process.argv[1]?.endsWith('cli/index.js')
  || process.argv[1]?.endsWith('vault-harness');

if (isMain) {
  buildProgram().parseAsync().catch(fail);
}
