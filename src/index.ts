export { loadConfig, parseConfig } from './config/index.js';
export type { HarnessConfig } from './config/index.js';
export { SandboxProvisioner } from './sandbox/provisioner.js';
export { acquireRunLock } from './sandbox/lock.js';
export { CertificateIssuer, createSigningBackend } from './certs/issuer.js';
export { OpenSslBackend } from './certs/openssl.js';
export { ForgeBackend } from './certs/forge.js';
export { CoverageSession } from './coverage/session.js';
export { ServerSupervisor, ServerProcessHandle } from './server/supervisor.js';
export { waitForReady, settle } from './server/readiness.js';
export { TestRunner } from './runner/test-runner.js';
export { Orchestrator, createOrchestrator } from './orchestrator/index.js';
export type { RunResult, RunState } from './orchestrator/index.js';
export * from './errors.js';
