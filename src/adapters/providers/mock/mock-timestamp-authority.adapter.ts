import * as asn1js from 'asn1js';
import * as pkijs from 'pkijs';
import {
  OID_SIGNED_DATA,
  OID_TST_INFO,
  TimestampAuthority,
  TimestampStatus,
  TimestampTransportError,
  certificateToPem,
  ensureCryptoEngine,
  toArrayBuffer,
} from '../../../core';

const OID_COMMON_NAME = '2.5.4.3';
const OID_EXT_KEY_USAGE = '2.5.29.37';
const OID_KP_TIME_STAMPING = '1.3.6.1.5.5.7.3.8';

export interface MockTimestampAuthorityOptions {
  commonName?: string;
  policyId?: string;
}

type NextReply =
  | { kind: 'reject'; status: TimestampStatus; text: string; failureBit?: number }
  | { kind: 'fail'; error: Error }
  | { kind: 'garbage' }
  | { kind: 'tamper' };

/**
 * In-process RFC 3161 TSA for tests.
 *
 * Signs real tokens with a freshly generated RSA key and a self-signed
 * time-stamping certificate. The next reply can be scripted to be a
 * rejection, a transport failure, undecodable bytes or a token over a
 * different digest.
 */
export class MockTimestampAuthority implements TimestampAuthority {
  readonly name = 'mock-tsa';
  readonly requests: Buffer[] = [];

  private readonly script: NextReply[] = [];
  private serial = 0;

  private constructor(
    readonly certificate: pkijs.Certificate,
    private readonly privateKey: CryptoKey,
    private readonly policyId: string,
  ) {}

  static async create(
    options: MockTimestampAuthorityOptions = {},
  ): Promise<MockTimestampAuthority> {
    ensureCryptoEngine();

    const keys = await globalThis.crypto.subtle.generateKey(
      {
        name: 'RSASSA-PKCS1-v1_5',
        modulusLength: 2048,
        publicExponent: new Uint8Array([1, 0, 1]),
        hash: 'SHA-256',
      },
      true,
      ['sign', 'verify'],
    );

    const certificate = await createCertificate(
      options.commonName ?? 'Test Timestamp Authority',
      keys,
    );

    return new MockTimestampAuthority(
      certificate,
      keys.privateKey,
      options.policyId ?? '1.3.6.1.4.1.99999.1',
    );
  }

  get certificatePem(): string {
    return certificateToPem(this.certificate);
  }

  /**
   * Refuse the next request with a PKIStatus and status text
   */
  rejectNext(status: TimestampStatus, text: string, failureBit?: number): void {
    this.script.push({ kind: 'reject', status, text, failureBit });
  }

  /**
   * Fail the next exchange as if the TSA were unreachable
   */
  failNext(error: Error = new Error('connection refused')): void {
    this.script.push({ kind: 'fail', error });
  }

  /**
   * Answer the next request with bytes that are not a TimeStampResp
   */
  garbageNext(): void {
    this.script.push({ kind: 'garbage' });
  }

  /**
   * Grant the next request with a token over a different digest
   */
  tamperNext(): void {
    this.script.push({ kind: 'tamper' });
  }

  async exchange(request: Buffer): Promise<Buffer> {
    this.requests.push(Buffer.from(request));
    const next = this.script.shift();

    if (next?.kind === 'fail') {
      throw new TimestampTransportError(next.error.message, this.name);
    }
    if (next?.kind === 'garbage') {
      return Buffer.from('not a timestamp reply');
    }
    if (next?.kind === 'reject') {
      const status: number = next.status;
      return encodeResponse(
        new pkijs.TimeStampResp({
          status: new pkijs.PKIStatusInfo({
            status,
            statusStrings: [new asn1js.Utf8String({ value: next.text })],
            failInfo:
              next.failureBit === undefined ? undefined : failureInfo(next.failureBit),
          }),
        }),
      );
    }

    const parsed = pkijs.TimeStampReq.fromBER(toArrayBuffer(request));
    const imprint =
      next?.kind === 'tamper'
        ? new pkijs.MessageImprint({
            hashAlgorithm: parsed.messageImprint.hashAlgorithm,
            hashedMessage: new asn1js.OctetString({
              valueHex: toArrayBuffer(
                Buffer.alloc(parsed.messageImprint.hashedMessage.valueBlock.valueHexView.length, 0xab),
              ),
            }),
          })
        : parsed.messageImprint;

    const token = await this.sign(
      new pkijs.TSTInfo({
        version: 1,
        policy: parsed.reqPolicy ?? this.policyId,
        messageImprint: imprint,
        serialNumber: new asn1js.Integer({ value: ++this.serial }),
        genTime: new Date(),
        nonce: parsed.nonce,
      }),
      parsed.certReq ?? false,
    );

    const granted: number = TimestampStatus.GRANTED;
    return encodeResponse(
      new pkijs.TimeStampResp({
        status: new pkijs.PKIStatusInfo({ status: granted }),
        timeStampToken: token,
      }),
    );
  }

  private async sign(
    tstInfo: pkijs.TSTInfo,
    includeCertificate: boolean,
  ): Promise<pkijs.ContentInfo> {
    const content = tstInfo.toSchema().toBER(false);
    const signedData = new pkijs.SignedData({
      version: 3,
      encapContentInfo: new pkijs.EncapsulatedContentInfo({
        eContentType: OID_TST_INFO,
        eContent: new asn1js.OctetString({ valueHex: content }),
      }),
      signerInfos: [
        new pkijs.SignerInfo({
          version: 1,
          sid: new pkijs.IssuerAndSerialNumber({
            issuer: this.certificate.issuer,
            serialNumber: this.certificate.serialNumber,
          }),
        }),
      ],
      certificates: includeCertificate ? [this.certificate] : undefined,
    });

    // the constructor re-wraps eContent as a constructed string; emit DER
    signedData.encapContentInfo.eContent = new asn1js.OctetString({ valueHex: content });

    await signedData.sign(this.privateKey, 0, 'SHA-256');

    return new pkijs.ContentInfo({
      contentType: OID_SIGNED_DATA,
      content: signedData.toSchema(true),
    });
  }
}

async function createCertificate(
  commonName: string,
  keys: CryptoKeyPair,
): Promise<pkijs.Certificate> {
  const certificate = new pkijs.Certificate();
  certificate.version = 2;
  certificate.serialNumber = new asn1js.Integer({ value: 1 });

  const name = () =>
    new pkijs.AttributeTypeAndValue({
      type: OID_COMMON_NAME,
      value: new asn1js.Utf8String({ value: commonName }),
    });
  certificate.issuer.typesAndValues.push(name());
  certificate.subject.typesAndValues.push(name());

  certificate.notBefore.value = new Date(Date.now() - 60 * 60 * 1000);
  certificate.notAfter.value = new Date(Date.now() + 365 * 24 * 60 * 60 * 1000);

  const extKeyUsage = new pkijs.ExtKeyUsage({
    keyPurposes: [OID_KP_TIME_STAMPING],
  });
  certificate.extensions = [
    new pkijs.Extension({
      extnID: OID_EXT_KEY_USAGE,
      critical: true,
      extnValue: extKeyUsage.toSchema().toBER(false),
      parsedValue: extKeyUsage,
    }),
  ];

  await certificate.subjectPublicKeyInfo.importKey(keys.publicKey);
  await certificate.sign(keys.privateKey, 'SHA-256');

  return certificate;
}

function failureInfo(bit: number): asn1js.BitString {
  const bytes = Buffer.alloc((bit >> 3) + 1);
  bytes[bit >> 3] = 0x80 >> (bit & 7);
  return new asn1js.BitString({
    valueHex: toArrayBuffer(bytes),
    unusedBits: 7 - (bit & 7),
  });
}

function encodeResponse(response: pkijs.TimeStampResp): Buffer {
  return Buffer.from(response.toSchema().toBER(false));
}
