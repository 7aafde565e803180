/**
 * Digest algorithms accepted for message imprints.
 * Values are the names understood by the `crypto` module.
 */
export enum DigestAlgorithm {
  SHA1 = 'sha1',
  SHA256 = 'sha256',
  SHA384 = 'sha384',
  SHA512 = 'sha512',
}

/**
 * Object identifiers of the digest algorithms (RFC 3370 / RFC 5754)
 */
export const DIGEST_ALGORITHM_OIDS: Record<DigestAlgorithm, string> = {
  [DigestAlgorithm.SHA1]: '1.3.14.3.2.26',
  [DigestAlgorithm.SHA256]: '2.16.840.1.101.3.4.2.1',
  [DigestAlgorithm.SHA384]: '2.16.840.1.101.3.4.2.2',
  [DigestAlgorithm.SHA512]: '2.16.840.1.101.3.4.2.3',
};

/**
 * WebCrypto names, used when signing with pkijs
 */
export const DIGEST_ALGORITHM_WEBCRYPTO_NAMES: Record<DigestAlgorithm, string> = {
  [DigestAlgorithm.SHA1]: 'SHA-1',
  [DigestAlgorithm.SHA256]: 'SHA-256',
  [DigestAlgorithm.SHA384]: 'SHA-384',
  [DigestAlgorithm.SHA512]: 'SHA-512',
};

export function digestAlgorithmFromOid(oid: string): DigestAlgorithm | null {
  for (const algorithm of Object.values(DigestAlgorithm)) {
    if (DIGEST_ALGORITHM_OIDS[algorithm] === oid) {
      return algorithm;
    }
  }
  return null;
}
