/**
 * TLS pinning policy attached to a request descriptor.
 */
export interface TlsPinningPolicy {
  /** Whether pinning is active. Defaults to true. */
  enabled?: boolean;
  /**
   * Accept the connection when no pin matches. Defaults to false.
   * Pins are checked after certificate-authority validation, so a
   * certificate no trusted or pinned root signs is still refused.
   */
  allowFallback?: boolean;
  /** Hostnames pinning applies to; other hosts bypass it. */
  pinnedHosts: readonly string[];
  /** Pinned SubjectPublicKeyInfo hashes, formatted `sha256/<hex>`. */
  pinnedPublicKeyHashes?: readonly string[];
  /** Pinned certificates as DER or PEM bytes. */
  pinnedCertificates?: readonly Uint8Array[];
  /** Files holding pinned certificates (DER or PEM). */
  pinnedCertificatePaths?: readonly string[];
}

/**
 * Supplies the pinning policy for hosts that require one.
 */
export interface TlsPolicyProvider {
  getPolicy(): TlsPinningPolicy | Promise<TlsPinningPolicy>;
}
