import { promises as fs } from 'fs';
import * as pkijs from 'pkijs';
import { DigestAlgorithm } from '../domain/enums';
import { ensureCryptoEngine, toArrayBuffer } from './crypto-engine';

/**
 * Everything the client and verifier need to know about one TSA
 */
export interface TsaProfile {
  url: string;
  digestAlgorithm: DigestAlgorithm;

  /**
   * Certificates a token signer must be, or be issued by
   */
  trustAnchors: pkijs.Certificate[];

  policyId?: string;
}

const PEM_CERTIFICATE =
  /-----BEGIN CERTIFICATE-----([A-Za-z0-9+/=\s]+)-----END CERTIFICATE-----/g;

/**
 * Parse one DER certificate or any number of PEM certificates
 */
export function parseTrustAnchors(data: Buffer): pkijs.Certificate[] {
  ensureCryptoEngine();

  const text = data.toString('latin1');
  const blocks = [...text.matchAll(PEM_CERTIFICATE)];

  if (blocks.length === 0) {
    return [pkijs.Certificate.fromBER(toArrayBuffer(data))];
  }

  return blocks.map((block) =>
    pkijs.Certificate.fromBER(
      toArrayBuffer(Buffer.from(block[1].replace(/\s+/g, ''), 'base64')),
    ),
  );
}

/**
 * PEM armour for a certificate
 */
export function certificateToPem(certificate: pkijs.Certificate): string {
  const base64 = Buffer.from(certificate.toSchema(true).toBER(false)).toString('base64');
  const lines = base64.match(/.{1,64}/g) ?? [];
  return ['-----BEGIN CERTIFICATE-----', ...lines, '-----END CERTIFICATE-----', ''].join('\n');
}

export function certificateDer(certificate: pkijs.Certificate): Buffer {
  return Buffer.from(certificate.toSchema(true).toBER(false));
}

export async function loadTsaProfile(options: {
  url: string;
  certificateFile: string;
  digestAlgorithm: DigestAlgorithm;
  policyId?: string;
}): Promise<TsaProfile> {
  const data = await fs.readFile(options.certificateFile);
  const trustAnchors = parseTrustAnchors(data);

  return {
    url: options.url,
    digestAlgorithm: options.digestAlgorithm,
    trustAnchors,
    policyId: options.policyId,
  };
}
