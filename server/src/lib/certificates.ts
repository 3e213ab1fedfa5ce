import { execFile } from 'node:child_process';
import { access, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import type { ProxyConfig } from '../config.js';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
}

export type CertificateGenerator = (certPath: string, keyPath: string) => Promise<void>;

export const CERT_FILE = 'proxy.crt';
export const KEY_FILE = 'proxy.key';

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

export const generateWithOpenssl: CertificateGenerator = async (certPath, keyPath) => {
  await execFileAsync('openssl', [
    'req',
    '-x509',
    '-newkey',
    'rsa:2048',
    '-nodes',
    '-keyout',
    keyPath,
    '-out',
    certPath,
    '-days',
    '3650',
    '-subj',
    '/CN=chamber-proxy',
  ]);
};

/**
 * Resolves the listener's certificate: configured PEM files when given,
 * otherwise a self-signed pair kept in the cert directory and created on
 * first use.
 */
export async function loadTlsMaterial(
  tls: ProxyConfig['tls'],
  generate: CertificateGenerator = generateWithOpenssl,
): Promise<TlsMaterial> {
  if ('certPath' in tls) {
    const [cert, key] = await Promise.all([readFile(tls.certPath), readFile(tls.keyPath)]);
    return { cert, key };
  }

  const certPath = path.join(tls.certDir, CERT_FILE);
  const keyPath = path.join(tls.certDir, KEY_FILE);
  if (!(await exists(certPath)) || !(await exists(keyPath))) {
    await mkdir(tls.certDir, { recursive: true });
    logger.info({ certPath }, 'tls_certificate_generating');
    await generate(certPath, keyPath);
  }
  const [cert, key] = await Promise.all([readFile(certPath), readFile(keyPath)]);
  return { cert, key };
}
