import { execFile } from 'child_process';
import { promisify } from 'util';
import { CertificateError, errorMessage, isErrnoException } from '../errors.js';
import type { SelfSignRequest, SigningBackend } from './types.js';

const execFileAsync = promisify(execFile);

export class OpenSslBackend implements SigningBackend {
  readonly name = 'openssl';
  // `req -x509` may read the clock separately for notBefore and notAfter.
  readonly validitySlackMs = 1000;
  private binary: string;

  constructor(binary: string = 'openssl') {
    this.binary = binary;
  }

  async generateKey(keyPath: string, bits: number): Promise<void> {
    await this.exec(['genrsa', '-out', keyPath, String(bits)]);
  }

  async selfSign(req: SelfSignRequest): Promise<void> {
    await this.exec([
      'req', '-new', '-x509',
      '-config', req.subject.path,
      '-nodes',
      `-${req.digest}`,
      '-days', String(req.days),
      '-key', req.keyPath,
      '-out', req.certPath,
    ]);
  }

  private async exec(args: string[]): Promise<void> {
    try {
      await execFileAsync(this.binary, args, { encoding: 'utf-8', timeout: 60_000 });
    } catch (e) {
      if (isErrnoException(e) && e.code === 'ENOENT') {
        throw new CertificateError(`Signing tool not found: ${this.binary}`, { cause: e });
      }
      const stderr = typeof e === 'object' && e !== null && 'stderr' in e ? String(e.stderr).trim() : '';
      throw new CertificateError(`${this.binary} ${args[0]} failed: ${stderr || errorMessage(e)}`, { cause: e });
    }
  }
}
