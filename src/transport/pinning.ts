/**
 * TLS certificate and public-key pinning.
 *
 * Pinning is applied on top of normal CA validation: a pinned host must
 * present a certificate that is both trusted and matches a pin. Pinned
 * certificates are also added to the trusted roots, so a self-signed
 * pinned certificate validates.
 */

import { X509Certificate, createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { Agent } from 'node:https';
import { checkServerIdentity, rootCertificates, type PeerCertificate } from 'node:tls';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { TlsPinningPolicy } from '../types/tls.js';

/**
 * SHA-256 of the certificate's DER-encoded SubjectPublicKeyInfo,
 * formatted `sha256/<hex>`.
 */
export function computePublicKeyHash(certificate: Uint8Array | string): string {
  const cert = new X509Certificate(typeof certificate === 'string' ? certificate : Buffer.from(certificate));
  const spki = cert.publicKey.export({ type: 'spki', format: 'der' });
  return `sha256/${createHash('sha256').update(spki).digest('hex')}`;
}

/**
 * Validates server certificates against a {@link TlsPinningPolicy}.
 */
export class CertificatePinner {
  private readonly policy: TlsPinningPolicy;
  private readonly logger: Logger;
  private readonly hosts: Set<string>;
  private readonly hashes: Set<string>;
  private pinnedDer: Buffer[] = [];
  private pinnedPem: string[] = [];

  constructor(policy: TlsPinningPolicy, logger: Logger = new NoopLogger()) {
    this.policy = policy;
    this.logger = logger;
    this.hosts = new Set(policy.pinnedHosts.map((h) => h.toLowerCase()));
    this.hashes = new Set(policy.pinnedPublicKeyHashes ?? []);
  }

  get enabled(): boolean {
    return this.policy.enabled ?? true;
  }

  get allowFallback(): boolean {
    return this.policy.allowFallback ?? false;
  }

  /**
   * Loads pinned certificates from bytes and files. Unreadable entries
   * are logged and skipped.
   */
  async load(): Promise<void> {
    const der: Buffer[] = [];
    const pem: string[] = [];

    const sources: Array<{ label: string; read: () => Promise<Buffer> }> = [
      ...(this.policy.pinnedCertificates ?? []).map((bytes, i) => ({
        label: `pinnedCertificates[${i}]`,
        read: async () => Buffer.from(bytes),
      })),
      ...(this.policy.pinnedCertificatePaths ?? []).map((path) => ({
        label: path,
        read: () => readFile(path),
      })),
    ];

    for (const source of sources) {
      try {
        const cert = new X509Certificate(await source.read());
        der.push(cert.raw);
        pem.push(cert.toString());
      } catch (error) {
        this.logger.warn('Could not load pinned certificate', {
          source: source.label,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.pinnedDer = der;
    this.pinnedPem = pem;
  }

  /**
   * Decides whether a certificate presented by `host` is acceptable.
   * Hosts outside the pinned set are not checked.
   */
  verify(host: string, certificateDer: Uint8Array): boolean {
    if (!this.enabled || !this.hosts.has(host.toLowerCase())) {
      return true;
    }

    const presented = Buffer.from(certificateDer);
    if (this.pinnedDer.some((pinned) => pinned.equals(presented))) {
      return true;
    }

    if (this.hashes.size > 0) {
      try {
        const hash = computePublicKeyHash(presented);
        if (this.hashes.has(hash)) {
          return true;
        }
        this.logger.warn('Server public key hash not pinned', { host, hash });
      } catch (error) {
        this.logger.warn('Public key validation failed', {
          host,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return this.allowFallback;
  }

  /**
   * HTTPS agent enforcing this policy. Call {@link load} first.
   */
  createAgent(): Agent {
    if (!this.enabled) {
      return new Agent({ keepAlive: true });
    }

    return new Agent({
      keepAlive: true,
      ca: this.pinnedPem.length > 0 ? [...rootCertificates, ...this.pinnedPem] : undefined,
      checkServerIdentity: (hostname: string, cert: PeerCertificate): Error | undefined => {
        if (!this.verify(hostname, cert.raw)) {
          return new Error(`Certificate pinning failed for ${hostname}`);
        }
        return checkServerIdentity(hostname, cert);
      },
    });
  }
}

/**
 * Loads a pinner for the policy and returns its agent.
 */
export async function createPinnedAgent(policy: TlsPinningPolicy, logger?: Logger): Promise<Agent> {
  const pinner = new CertificatePinner(policy, logger);
  await pinner.load();
  return pinner.createAgent();
}
