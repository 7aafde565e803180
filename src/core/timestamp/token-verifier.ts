import * as asn1js from 'asn1js';
import * as pkijs from 'pkijs';
import { DIGEST_ALGORITHM_OIDS } from '../domain/enums';
import { toArrayBuffer } from './crypto-engine';
import { computeDigest } from './digest';
import { TimestampTokenInfo, readTimestampToken } from './rfc3161';
import { TsaProfile, certificateDer } from './tsa-profile';

/**
 * Time attested by a verified token
 */
export interface TimestampDetails {
  genTime: Date;
  serialNumber: string;
  policy: string;
  hashAlgorithm: string;
}

export type TokenVerification =
  | { valid: true; timestamp: TimestampDetails }
  | { valid: false; reason: string; timestamp?: TimestampDetails };

/**
 * Checks a stored token against the payload bytes it is supposed to cover:
 * the imprint must equal the payload digest, the CMS signature must hold and
 * the signer must be a trust anchor or be issued by one.
 */
export class TokenVerifier {
  constructor(private readonly profile: TsaProfile) {}

  async verify(token: Buffer, payloadBytes: Buffer): Promise<TokenVerification> {
    let info: TimestampTokenInfo;
    try {
      info = readTimestampToken(token);
    } catch (error) {
      return {
        valid: false,
        reason: `Token is not a timestamp token: ${errorMessage(error)}`,
      };
    }

    const algorithm = this.profile.digestAlgorithm;
    const timestamp: TimestampDetails = {
      genTime: info.genTime,
      serialNumber: info.serialNumber,
      policy: info.policy,
      hashAlgorithm: info.hashAlgorithm ?? info.hashAlgorithmOid,
    };

    if (info.hashAlgorithmOid !== DIGEST_ALGORITHM_OIDS[algorithm]) {
      return {
        valid: false,
        reason: `Token imprint uses ${timestamp.hashAlgorithm}, expected ${algorithm}`,
        timestamp,
      };
    }

    if (!info.messageImprint.equals(computeDigest(algorithm, payloadBytes))) {
      return {
        valid: false,
        reason: 'Token imprint does not match the stored payload',
        timestamp,
      };
    }

    const signer = findSignerCertificate(info.signedData, this.profile.trustAnchors);
    if (!signer) {
      return { valid: false, reason: 'Token signer certificate not found', timestamp };
    }

    if (!(await this.isAnchored(signer))) {
      return {
        valid: false,
        reason: 'Token signer is not trusted',
        timestamp,
      };
    }

    let signatureValid: boolean;
    try {
      withPrimitiveContent(info.signedData);
      signatureValid = await info.signedData.verify({
        signer: 0,
        data: toArrayBuffer(payloadBytes),
        trustedCerts: [signer],
        checkChain: false,
      });
    } catch (error) {
      return {
        valid: false,
        reason: `Token signature check failed: ${errorMessage(error)}`,
        timestamp,
      };
    }

    if (!signatureValid) {
      return { valid: false, reason: 'Token signature does not verify', timestamp };
    }

    return { valid: true, timestamp };
  }

  private async isAnchored(signer: pkijs.Certificate): Promise<boolean> {
    const signerDer = certificateDer(signer);

    for (const anchor of this.profile.trustAnchors) {
      if (certificateDer(anchor).equals(signerDer)) {
        return true;
      }
      if (!signer.issuer.isEqual(anchor.subject)) {
        continue;
      }
      try {
        if (await signer.verify(anchor)) {
          return true;
        }
      } catch {
        // unsupported key or signature algorithm on this anchor; try the next
        continue;
      }
    }

    return false;
  }
}

function findSignerCertificate(
  signedData: pkijs.SignedData,
  anchors: pkijs.Certificate[],
): pkijs.Certificate | null {
  const signerInfo = signedData.signerInfos[0];
  if (!signerInfo || !(signerInfo.sid instanceof pkijs.IssuerAndSerialNumber)) {
    return null;
  }

  const sid = signerInfo.sid;
  const embedded = (signedData.certificates ?? []).filter(
    (certificate): certificate is pkijs.Certificate =>
      certificate instanceof pkijs.Certificate,
  );

  return (
    [...embedded, ...anchors].find(
      (certificate) =>
        certificate.issuer.isEqual(sid.issuer) &&
        integerHex(certificate.serialNumber) === integerHex(sid.serialNumber),
    ) ?? null
  );
}

/**
 * SignedData.verify only reads a primitive OCTET STRING eContent; tokens may
 * carry it constructed (BER). Re-encoding leaves the signed attributes as is.
 */
function withPrimitiveContent(signedData: pkijs.SignedData): void {
  const eContent = signedData.encapContentInfo.eContent;
  if (eContent) {
    signedData.encapContentInfo.eContent = new asn1js.OctetString({
      valueHex: eContent.getValue(),
    });
  }
}

function integerHex(value: asn1js.Integer): string {
  return Buffer.from(value.valueBlock.valueHexView).toString('hex');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
