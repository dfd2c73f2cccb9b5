import { z } from 'zod';
import { load as loadYaml } from 'js-yaml';
import { readFileSync, existsSync } from 'fs';
import { dirname, resolve, isAbsolute } from 'path';
import { ConfigError, errorMessage } from '../errors.js';

export const DEFAULT_CONFIG_FILE = 'harness.yaml';

const RewriteSchema = z.object({
  pattern: z.string().min(1),
  replacement: z.string(),
});

const TemplateSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1).optional(),
  rewrites: z.array(RewriteSchema).default([]),
});

const ConfigSchema = z.object({
  sandbox: z.object({
    dir: z.string().default('sandbox'),
    templates: z.array(TemplateSchema).default([
      {
        source: '../server/test.ini',
        target: 'test-server.ini',
        rewrites: [{ pattern: 'port = 5551', replacement: 'port = {port}' }],
      },
      { source: '../server/development.ini' },
    ]),
  }).default({}),
  certificate: z.object({
    backend: z.enum(['openssl', 'forge']).default('openssl'),
    opensslPath: z.string().default('openssl'),
    bits: z.number().int().min(512).default(2048),
    days: z.number().int().positive().default(365),
    digest: z.enum(['sha1', 'sha256', 'sha512']).default('sha256'),
    subjectConfig: z.string().default('test-certif-config'),
    keyFile: z.string().default('host.key'),
    certFile: z.string().default('host.cert'),
    bundleFile: z.string().default('host.pem'),
  }).default({}),
  server: z.object({
    command: z.string().default('paster'),
    args: z.array(z.string()).default(['serve', '-v']),
    config: z.string().default('test-server.ini'),
    pidFile: z.string().default('test-server.pid'),
    port: z.number().int().min(1).max(65535).default(5767),
    daemon: z.object({
      enabled: z.boolean().default(true),
      flag: z.string().default('--daemon'),
      pidFileFlag: z.string().default('--pid-file'),
    }).default({}),
    testMode: z.object({
      enabled: z.boolean().default(true),
      env: z.string().default('SFLVAULT_IN_TEST'),
    }).default({}),
    startTimeoutMs: z.number().int().positive().default(10_000),
    stopTimeoutMs: z.number().int().positive().default(10_000),
  }).default({}),
  readiness: z.object({
    strategy: z.enum(['tcp', 'delay']).default('tcp'),
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).optional(),
    settleDelayMs: z.number().int().nonnegative().default(3000),
    timeoutMs: z.number().int().positive().default(15_000),
    initialBackoffMs: z.number().int().positive().default(100),
    maxBackoffMs: z.number().int().positive().default(2000),
  }).default({}),
  tests: z.object({
    command: z.string().default('nosetests'),
    args: z.array(z.string()).default(['-w', '{target}', '-s', '--with-xunit', '--xunit-file', '{report}']),
    target: z.string().default('.'),
    report: z.string().default('nosetests.xml'),
  }).default({}),
  coverage: z.object({
    enabled: z.boolean().default(true),
    command: z.string().default('coverage'),
    args: z.array(z.string()).default(['run', '--rcfile={root}/coverage.conf']),
    resolveCommands: z.boolean().default(true),
    artifacts: z.array(z.string()).default(['.coverage', '.coverage.*']),
    env: z.record(z.string()).default({}),
  }).default({}),
});

type ParsedConfig = z.infer<typeof ConfigSchema>;

export type TemplateConfig = z.infer<typeof TemplateSchema>;
export type CertificateConfig = ParsedConfig['certificate'];
export type ServerConfig = ParsedConfig['server'];
export type TestsConfig = ParsedConfig['tests'];
export type CoverageConfig = ParsedConfig['coverage'];

export interface ReadinessConfig extends Omit<ParsedConfig['readiness'], 'port'> {
  port: number;
}

/** Parsed configuration with every path made absolute against `baseDir`. */
export interface HarnessConfig extends Omit<ParsedConfig, 'readiness'> {
  baseDir: string;
  readiness: ReadinessConfig;
}

/** Unset or blank means no override; anything else goes to the schema, which rejects NaN. */
function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  raw[key] = created;
  return created;
}

function setIfDefined(target: Record<string, unknown>, key: string, value: unknown): void {
  if (value !== undefined) target[key] = value;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  setIfDefined(section(raw, 'sandbox'), 'dir', env.HARNESS_SANDBOX_DIR || undefined);
  setIfDefined(section(raw, 'server'), 'port', envNumber(env.HARNESS_SERVER_PORT));
  setIfDefined(section(raw, 'readiness'), 'settleDelayMs', envNumber(env.HARNESS_SETTLE_DELAY_MS));
  setIfDefined(section(raw, 'readiness'), 'strategy', env.HARNESS_READINESS || undefined);
  setIfDefined(section(raw, 'coverage'), 'enabled', envBoolean(env.HARNESS_COVERAGE));
  setIfDefined(section(raw, 'certificate'), 'backend', env.HARNESS_CERT_BACKEND || undefined);
}

function readRawConfig(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Cannot read config ${path}: ${errorMessage(e)}`, { cause: e });
  }
  let doc: unknown;
  try {
    doc = loadYaml(text);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${path}: ${errorMessage(e)}`, { cause: e });
  }
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) throw new ConfigError(`Config ${path} must be a mapping`);
  return doc;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export interface LoadConfigOptions {
  /** Explicit config file. Missing file is an error when given. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseConfig(raw: Record<string, unknown>, baseDir: string, env: NodeJS.ProcessEnv = {}): HarnessConfig {
  applyEnvOverrides(raw, env);
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid harness config: ${formatIssues(result.error)}`, { details: result.error.issues });
  }
  const parsed = result.data;
  const abs = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));

  return {
    ...parsed,
    baseDir,
    sandbox: {
      dir: abs(parsed.sandbox.dir),
      templates: parsed.sandbox.templates.map(t => ({ ...t, source: abs(t.source) })),
    },
    certificate: { ...parsed.certificate, subjectConfig: abs(parsed.certificate.subjectConfig) },
    readiness: { ...parsed.readiness, port: parsed.readiness.port ?? parsed.server.port },
    tests: { ...parsed.tests, target: abs(parsed.tests.target) },
  };
}

export function loadConfig(opts: LoadConfigOptions = {}): HarnessConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;

  if (opts.path) {
    const path = resolve(cwd, opts.path);
    if (!existsSync(path)) throw new ConfigError(`Config file not found: ${path}`);
    return parseConfig(readRawConfig(path), dirname(path), env);
  }

  const implicit = resolve(cwd, DEFAULT_CONFIG_FILE);
  if (existsSync(implicit)) {
    return parseConfig(readRawConfig(implicit), cwd, env);
  }
  return parseConfig({}, cwd, env);
}
