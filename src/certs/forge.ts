import forge from 'node-forge';
import { randomBytes } from 'crypto';
import { readFileSync, writeFileSync } from 'fs';
import { CertificateError, errorMessage } from '../errors.js';
import type { Digest, SelfSignRequest, SigningBackend } from './types.js';
import type { SubjectField } from './subject.js';

const SHORT_NAMES = new Set(['CN', 'C', 'L', 'ST', 'O', 'OU']);
const LONG_NAMES = new Set([
  'commonName', 'countryName', 'localityName', 'stateOrProvinceName',
  'organizationName', 'organizationalUnitName', 'emailAddress',
]);

const DAY_MS = 24 * 60 * 60 * 1000;

function toCertificateField(field: SubjectField): forge.pki.CertificateField {
  if (SHORT_NAMES.has(field.name)) return { shortName: field.name, value: field.value };
  if (LONG_NAMES.has(field.name)) return { name: field.name, value: field.value };
  throw new CertificateError(`Unsupported subject field ${field.name}`);
}

function messageDigest(digest: Digest): forge.md.MessageDigest {
  switch (digest) {
    case 'sha1': return forge.md.sha1.create();
    case 'sha256': return forge.md.sha256.create();
    case 'sha512': return forge.md.sha512.create();
  }
}

/** In-process signing through node-forge; needs no external tool. */
export class ForgeBackend implements SigningBackend {
  readonly name = 'forge';
  readonly validitySlackMs = 0;
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async generateKey(keyPath: string, bits: number): Promise<void> {
    try {
      const keys = forge.pki.rsa.generateKeyPair({ bits, e: 0x10001 });
      writeFileSync(keyPath, forge.pki.privateKeyToPem(keys.privateKey), { mode: 0o600 });
    } catch (e) {
      throw new CertificateError(`RSA key generation failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  async selfSign(req: SelfSignRequest): Promise<void> {
    const attrs = req.subject.fields.map(toCertificateField);
    try {
      const privateKey = forge.pki.privateKeyFromPem(readFileSync(req.keyPath, 'utf-8'));
      const cert = forge.pki.createCertificate();
      cert.publicKey = forge.pki.rsa.setPublicKey(privateKey.n, privateKey.e);
      cert.serialNumber = `01${randomBytes(8).toString('hex')}`;

      // X.509 times carry whole seconds.
      const notBefore = new Date(Math.floor(this.now().getTime() / 1000) * 1000);
      cert.validity.notBefore = notBefore;
      cert.validity.notAfter = new Date(notBefore.getTime() + req.days * DAY_MS);
      cert.setSubject(attrs);
      cert.setIssuer(attrs);
      cert.sign(privateKey, messageDigest(req.digest));

      writeFileSync(req.certPath, forge.pki.certificateToPem(cert));
    } catch (e) {
      throw new CertificateError(`Self-signing failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
