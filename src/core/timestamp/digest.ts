import * as crypto from 'crypto';
import { DigestAlgorithm } from '../domain/enums';

/**
 * Digest of the exact bytes that get timestamped
 */
export function computeDigest(algorithm: DigestAlgorithm, data: Buffer): Buffer {
  return crypto.createHash(algorithm).update(data).digest();
}
