import * as crypto from 'crypto';
import * as asn1js from 'asn1js';
import * as pkijs from 'pkijs';
import {
  DigestAlgorithm,
  DIGEST_ALGORITHM_OIDS,
  digestAlgorithmFromOid,
} from '../domain/enums';
import { ensureCryptoEngine, toArrayBuffer } from './crypto-engine';

export const OID_SIGNED_DATA = '1.2.840.113549.1.7.2';
export const OID_TST_INFO = '1.2.840.113549.1.9.16.1.4';

/**
 * PKIStatus values (RFC 3161 section 2.4.2)
 */
export enum TimestampStatus {
  GRANTED = 0,
  GRANTED_WITH_MODS = 1,
  REJECTION = 2,
  WAITING = 3,
  REVOCATION_WARNING = 4,
  REVOCATION_NOTIFICATION = 5,
}

/**
 * PKIFailureInfo bit positions
 */
const FAILURE_INFO_BITS: Record<number, string> = {
  0: 'badAlg',
  2: 'badRequest',
  5: 'badDataFormat',
  14: 'timeNotAvailable',
  15: 'unacceptedPolicy',
  16: 'unacceptedExtension',
  17: 'addInfoNotAvailable',
  25: 'systemFailure',
};

export interface TimeStampRequestOptions {
  algorithm: DigestAlgorithm;
  digest: Buffer;
  nonce: Buffer;
  certReq?: boolean;
  policyId?: string;
}

export interface TimeStampReply {
  status: number;
  statusText: string[];
  failures: string[];
  token: Buffer | null;
}

/**
 * Fields of a TimeStampToken that callers act upon
 */
export interface TimestampTokenInfo {
  signedData: pkijs.SignedData;
  genTime: Date;
  policy: string;
  serialNumber: string;
  hashAlgorithmOid: string;
  hashAlgorithm: DigestAlgorithm | null;
  messageImprint: Buffer;
  nonce: Buffer | null;
}

/**
 * 64-bit positive nonce with a non-zero leading byte, so its INTEGER
 * encoding is exactly these bytes
 */
export function randomNonce(): Buffer {
  const nonce = crypto.randomBytes(8);
  nonce[0] = (nonce[0] & 0x7f) | 0x01;
  return nonce;
}

/**
 * DER-encode a TimeStampReq
 */
export function encodeTimeStampRequest(options: TimeStampRequestOptions): Buffer {
  const request = new pkijs.TimeStampReq({
    version: 1,
    messageImprint: new pkijs.MessageImprint({
      hashAlgorithm: new pkijs.AlgorithmIdentifier({
        algorithmId: DIGEST_ALGORITHM_OIDS[options.algorithm],
        algorithmParams: new asn1js.Null(),
      }),
      hashedMessage: new asn1js.OctetString({
        valueHex: toArrayBuffer(options.digest),
      }),
    }),
    nonce: new asn1js.Integer({ valueHex: toArrayBuffer(options.nonce) }),
    certReq: options.certReq ?? true,
  });

  if (options.policyId) {
    request.reqPolicy = options.policyId;
  }

  return Buffer.from(request.toSchema().toBER(false));
}

/**
 * Decode a DER TimeStampResp. Throws when the bytes are not one.
 */
export function decodeTimeStampResponse(der: Buffer): TimeStampReply {
  const response = pkijs.TimeStampResp.fromBER(toArrayBuffer(der));

  return {
    status: response.status.status,
    statusText: (response.status.statusStrings ?? []).map(
      (text) => text.valueBlock.value,
    ),
    failures: response.status.failInfo
      ? decodeFailureInfo(Buffer.from(response.status.failInfo.valueBlock.valueHexView))
      : [],
    token: response.timeStampToken
      ? Buffer.from(response.timeStampToken.toSchema().toBER(false))
      : null,
  };
}

export function isGranted(reply: TimeStampReply): boolean {
  return (
    reply.status === TimestampStatus.GRANTED ||
    reply.status === TimestampStatus.GRANTED_WITH_MODS
  );
}

/**
 * Human-readable reason for a refused request
 */
export function describeRefusal(reply: TimeStampReply): string {
  const status = TimestampStatus[reply.status] ?? `status ${reply.status}`;
  const details = [...reply.statusText, ...reply.failures];
  return details.length > 0 ? `${status}: ${details.join(', ')}` : status;
}

/**
 * Decode a DER TimeStampToken (CMS SignedData wrapping a TSTInfo).
 * Throws when the bytes are not one.
 */
export function readTimestampToken(token: Buffer): TimestampTokenInfo {
  ensureCryptoEngine();

  const contentInfo = pkijs.ContentInfo.fromBER(toArrayBuffer(token));
  if (contentInfo.contentType !== OID_SIGNED_DATA) {
    throw new Error(`Token content type is ${contentInfo.contentType}, expected SignedData`);
  }

  const signedData = new pkijs.SignedData({ schema: contentInfo.content });
  const encapsulated = signedData.encapContentInfo;
  if (encapsulated.eContentType !== OID_TST_INFO || !encapsulated.eContent) {
    throw new Error('Token does not encapsulate a TSTInfo');
  }

  const tstInfo = pkijs.TSTInfo.fromBER(encapsulated.eContent.getValue());
  const hashAlgorithmOid = tstInfo.messageImprint.hashAlgorithm.algorithmId;

  return {
    signedData,
    genTime: tstInfo.genTime,
    policy: tstInfo.policy,
    serialNumber: Buffer.from(tstInfo.serialNumber.valueBlock.valueHexView).toString('hex'),
    hashAlgorithmOid,
    hashAlgorithm: digestAlgorithmFromOid(hashAlgorithmOid),
    messageImprint: Buffer.from(tstInfo.messageImprint.hashedMessage.valueBlock.valueHexView),
    nonce: tstInfo.nonce ? Buffer.from(tstInfo.nonce.valueBlock.valueHexView) : null,
  };
}

function decodeFailureInfo(bits: Buffer): string[] {
  const failures: string[] = [];
  for (const [position, name] of Object.entries(FAILURE_INFO_BITS)) {
    const bit = Number(position);
    const byte = bits[bit >> 3];
    if (byte !== undefined && (byte >> (7 - (bit & 7))) & 1) {
      failures.push(name);
    }
  }
  return failures;
}
