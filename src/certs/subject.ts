import { readFileSync } from 'fs';
import { CertificateError, errorMessage } from '../errors.js';

export interface SubjectField {
  name: string;
  value: string;
}

export interface SubjectConfig {
  path: string;
  /** Distinguished name fields in file order, numeric prefixes (`0.O`) stripped. */
  fields: SubjectField[];
  commonName: string;
}

type Sections = Map<string, Array<[string, string]>>;

function parseSections(text: string): Sections {
  const sections: Sections = new Map([['', []]]);
  let current = '';
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/\s+#.*$/, '').replace(/^#.*$/, '').trim();
    if (!line) continue;
    const header = line.match(/^\[\s*([^\]]+?)\s*\]$/);
    if (header) {
      current = header[1];
      if (!sections.has(current)) sections.set(current, []);
      continue;
    }
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim().replace(/^"(.*)"$/, '$1');
    sections.get(current)?.push([key, value]);
  }
  return sections;
}

function lookup(entries: Array<[string, string]> | undefined, key: string): string | undefined {
  return entries?.find(([k]) => k === key)?.[1];
}

/**
 * Reads the OpenSSL `req` config used for self-signing. Signing must run
 * without prompts, so `prompt = no` and a common name are required.
 */
export function readSubjectConfig(path: string): SubjectConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new CertificateError(`Subject config ${path} is not readable: ${errorMessage(e)}`, { cause: e });
  }

  const sections = parseSections(text);
  const req = sections.get('req');
  if (!req) throw new CertificateError(`Subject config ${path} has no [ req ] section`);

  if (lookup(req, 'prompt')?.toLowerCase() !== 'no') {
    throw new CertificateError(`Subject config ${path} must set "prompt = no" in [ req ]`);
  }

  const dnName = lookup(req, 'distinguished_name');
  if (!dnName) throw new CertificateError(`Subject config ${path} has no distinguished_name in [ req ]`);
  const dn = sections.get(dnName);
  if (!dn) throw new CertificateError(`Subject config ${path} references missing section [ ${dnName} ]`);

  const fields = dn
    .map(([name, value]) => ({ name: name.replace(/^\d+\./, ''), value }))
    .filter(f => f.value !== '');
  const commonName = fields.find(f => f.name === 'CN' || f.name === 'commonName')?.value;
  if (!commonName) throw new CertificateError(`Subject config ${path} has no CN in [ ${dnName} ]`);

  return { path, fields, commonName };
}
