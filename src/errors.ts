export type HarnessErrorCode =
  | 'CONFIG_INVALID'
  | 'PROVISION_FAILED'
  | 'SANDBOX_LOCKED'
  | 'CERTIFICATE_FAILED'
  | 'SERVER_START_FAILED'
  | 'SERVER_NOT_READY'
  | 'PROCESS_NOT_FOUND'
  | 'SHUTDOWN_TIMEOUT'
  | 'TEST_EXECUTION_FAILED'
  | 'UNEXPECTED_ERROR';

export interface HarnessErrorOptions {
  cause?: unknown;
  details?: unknown;
}

export class HarnessError extends Error {
  public readonly code: HarnessErrorCode;

  public readonly details?: unknown;

  constructor(code: HarnessErrorCode, message: string, options: HarnessErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string, options?: HarnessErrorOptions) {
    super('CONFIG_INVALID', message, options);
  }
}

/** Sandbox directory could not be wiped, created or seeded. Fatal. */
export class ProvisionError extends HarnessError {
  constructor(message: string, options?: HarnessErrorOptions, code: HarnessErrorCode = 'PROVISION_FAILED') {
    super(code, message, options);
  }
}

export class SandboxLockedError extends ProvisionError {
  public readonly ownerPid: number;

  constructor(lockPath: string, ownerPid: number) {
    super(`Sandbox is locked by running process ${ownerPid} (${lockPath})`, { details: { lockPath } }, 'SANDBOX_LOCKED');
    this.ownerPid = ownerPid;
  }
}

export class CertificateError extends HarnessError {
  constructor(message: string, options?: HarnessErrorOptions) {
    super('CERTIFICATE_FAILED', message, options);
  }
}

export class ServerStartError extends HarnessError {
  constructor(message: string, options?: HarnessErrorOptions) {
    super('SERVER_START_FAILED', message, options);
  }
}

export class ServerNotReadyError extends HarnessError {
  public readonly attempts: number;

  constructor(target: string, timeoutMs: number, attempts: number, options?: HarnessErrorOptions) {
    super('SERVER_NOT_READY', `Server at ${target} not accepting connections after ${timeoutMs}ms (${attempts} attempts)`, options);
    this.attempts = attempts;
  }
}

export class ProcessNotFoundError extends HarnessError {
  public readonly pidFilePath: string;

  constructor(pidFilePath: string, options?: HarnessErrorOptions) {
    super('PROCESS_NOT_FOUND', `No server process recorded in ${pidFilePath}`, options);
    this.pidFilePath = pidFilePath;
  }
}

export class ShutdownTimeoutError extends HarnessError {
  public readonly processId: number;

  constructor(processId: number, timeoutMs: number) {
    super('SHUTDOWN_TIMEOUT', `Server process ${processId} still alive ${timeoutMs}ms after SIGINT`);
    this.processId = processId;
  }
}

/**
 * Carries a test exit status. A non-zero status is an expected outcome and
 * never skips server teardown.
 */
export class TestExecutionError extends HarnessError {
  public readonly exitCode: number;

  constructor(exitCode: number, message: string, options?: HarnessErrorOptions) {
    super('TEST_EXECUTION_FAILED', message, options);
    this.exitCode = exitCode;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export const toHarnessError = (error: unknown): HarnessError => {
  if (error instanceof HarnessError) {
    return error;
  }
  return new HarnessError('UNEXPECTED_ERROR', errorMessage(error), { cause: error });
};

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
