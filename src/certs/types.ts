import type { SubjectConfig } from './subject.js';

export type Digest = 'sha1' | 'sha256' | 'sha512';

export interface SelfSignRequest {
  keyPath: string;
  certPath: string;
  subject: SubjectConfig;
  days: number;
  digest: Digest;
}

/** Produces PEM files on disk. Failures surface as CertificateError. */
export interface SigningBackend {
  readonly name: string;
  /** How far the issued validity window may drift from whole days. */
  readonly validitySlackMs: number;
  generateKey(keyPath: string, bits: number): Promise<void>;
  selfSign(req: SelfSignRequest): Promise<void>;
}

export interface TLSIdentity {
  keyPath: string;
  certPath: string;
  /** Certificate followed by key. */
  bundlePath: string;
  notBefore: Date;
  notAfter: Date;
}
