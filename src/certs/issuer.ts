import { X509Certificate } from 'crypto';
import { chmodSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { CertificateError, errorMessage } from '../errors.js';
import type { SandboxDirectory } from '../sandbox/types.js';
import { readSubjectConfig } from './subject.js';
import { ForgeBackend } from './forge.js';
import { OpenSslBackend } from './openssl.js';
import type { Digest, SigningBackend, TLSIdentity } from './types.js';

export const OWNER_READ_ONLY = 0o400;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CertificateIssuerOptions {
  backend: SigningBackend;
  bits: number;
  days: number;
  digest: Digest;
  keyFile?: string;
  certFile?: string;
  bundleFile?: string;
}

export function createSigningBackend(kind: 'openssl' | 'forge', opensslPath?: string): SigningBackend {
  return kind === 'forge' ? new ForgeBackend() : new OpenSslBackend(opensslPath);
}

function restrict(path: string): void {
  try {
    chmodSync(path, OWNER_READ_ONLY);
  } catch (e) {
    throw new CertificateError(`Cannot restrict permissions of ${path}: ${errorMessage(e)}`, { cause: e });
  }
}

function assertOwnerReadOnly(path: string): void {
  const mode = statSync(path).mode & 0o777;
  if (mode !== OWNER_READ_ONLY) {
    throw new CertificateError(`${path} has mode ${mode.toString(8)}, expected 400`);
  }
}

export class CertificateIssuer {
  private opts: Required<CertificateIssuerOptions>;

  constructor(opts: CertificateIssuerOptions) {
    this.opts = {
      ...opts,
      keyFile: opts.keyFile ?? 'host.key',
      certFile: opts.certFile ?? 'host.cert',
      bundleFile: opts.bundleFile ?? 'host.pem',
    };
  }

  /**
   * key → chmod 400 → self-signed cert → cert+key bundle → chmod 400.
   * Each step reads the previous step's file.
   */
  async issue(sandbox: SandboxDirectory, subjectConfig: string): Promise<TLSIdentity> {
    const { backend, bits, days, digest } = this.opts;
    const subject = readSubjectConfig(subjectConfig);
    const keyPath = join(sandbox.path, this.opts.keyFile);
    const certPath = join(sandbox.path, this.opts.certFile);
    const bundlePath = join(sandbox.path, this.opts.bundleFile);

    // An earlier identity is read-only; clear it so the backends can write.
    for (const path of [keyPath, certPath, bundlePath]) {
      try {
        rmSync(path, { force: true });
      } catch (e) {
        throw new CertificateError(`Cannot remove previous identity file ${path}: ${errorMessage(e)}`, { cause: e });
      }
    }

    console.log(`[certs] issuing ${bits}-bit ${digest} certificate for CN=${subject.commonName} (${days} days, ${backend.name})`);

    await backend.generateKey(keyPath, bits);
    restrict(keyPath);

    await backend.selfSign({ keyPath, certPath, subject, days, digest });

    let certPem: string;
    let keyPem: string;
    try {
      certPem = readFileSync(certPath, 'utf-8');
      keyPem = readFileSync(keyPath, 'utf-8');
      const joined = certPem.endsWith('\n') ? certPem : `${certPem}\n`;
      writeFileSync(bundlePath, joined + keyPem, { mode: 0o600 });
    } catch (e) {
      throw new CertificateError(`Cannot assemble identity bundle ${bundlePath}: ${errorMessage(e)}`, { cause: e });
    }
    restrict(bundlePath);

    assertOwnerReadOnly(keyPath);
    assertOwnerReadOnly(bundlePath);

    const { notBefore, notAfter } = readValidity(certPem);
    const drift = notAfter.getTime() - notBefore.getTime() - days * DAY_MS;
    if (Math.abs(drift) > backend.validitySlackMs) {
      throw new CertificateError(
        `Certificate validity ${notBefore.toISOString()}..${notAfter.toISOString()} is not ${days} days`,
      );
    }

    return { keyPath, certPath, bundlePath, notBefore, notAfter };
  }
}

export function readValidity(certPem: string): { notBefore: Date; notAfter: Date } {
  try {
    const cert = new X509Certificate(certPem);
    return { notBefore: new Date(cert.validFrom), notAfter: new Date(cert.validTo) };
  } catch (e) {
    throw new CertificateError(`Issued certificate is unreadable: ${errorMessage(e)}`, { cause: e });
  }
}
