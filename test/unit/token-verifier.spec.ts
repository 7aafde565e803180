import * as asn1js from 'asn1js';
import * as pkijs from 'pkijs';
import {
  DigestAlgorithm,
  OID_SIGNED_DATA,
  OID_TST_INFO,
  MockTimestampAuthority,
  TimestampClient,
  TokenVerifier,
  TsaProfile,
  certificateToPem,
  parseTrustAnchors,
  readTimestampToken,
} from '../../src';

describe('TokenVerifier', () => {
  let tsa: MockTimestampAuthority;
  let otherTsa: MockTimestampAuthority;
  let profile: TsaProfile;
  let token: Buffer;

  const payload = Buffer.from('{"host":"10.0.0.1","port":22,"state":"open"}');

  beforeAll(async () => {
    tsa = await MockTimestampAuthority.create();
    otherTsa = await MockTimestampAuthority.create({ commonName: 'Other Authority' });
    profile = {
      url: 'http://tsa.test/tsr',
      digestAlgorithm: DigestAlgorithm.SHA256,
      trustAnchors: [tsa.certificate],
    };

    const receipt = await new TimestampClient(tsa, profile).requestTimestamp(payload);
    token = receipt.token;
  });

  it('should accept a token over the stored payload', async () => {
    const result = await new TokenVerifier(profile).verify(token, payload);

    expect(result.valid).toBe(true);
    expect(result.timestamp).toMatchObject({
      policy: '1.3.6.1.4.1.99999.1',
      hashAlgorithm: 'sha256',
    });
    expect(result.timestamp?.genTime).toBeInstanceOf(Date);
  });

  it('should give the same answer every time', async () => {
    const verifier = new TokenVerifier(profile);

    const first = await verifier.verify(token, payload);
    const second = await verifier.verify(token, payload);

    expect(second).toEqual(first);
  });

  it('should accept an anchor loaded from PEM', async () => {
    const anchors = parseTrustAnchors(Buffer.from(certificateToPem(tsa.certificate)));

    const result = await new TokenVerifier({ ...profile, trustAnchors: anchors }).verify(
      token,
      payload,
    );

    expect(result.valid).toBe(true);
  });

  it('should issue tokens with a primitive encapsulated content', () => {
    const eContent = readTimestampToken(token).signedData.encapContentInfo.eContent;

    expect(eContent?.idBlock.isConstructed).toBe(false);
  });

  it('should accept a token whose content is a constructed octet string', async () => {
    const { signedData } = readTimestampToken(token);
    const content = signedData.encapContentInfo.eContent?.getValue() ?? new ArrayBuffer(0);
    signedData.encapContentInfo = new pkijs.EncapsulatedContentInfo({
      eContentType: OID_TST_INFO,
      eContent: new asn1js.OctetString({ valueHex: content }),
    });
    const berToken = Buffer.from(
      new pkijs.ContentInfo({
        contentType: OID_SIGNED_DATA,
        content: signedData.toSchema(true),
      })
        .toSchema()
        .toBER(false),
    );

    const reparsed = readTimestampToken(berToken).signedData.encapContentInfo.eContent;
    expect(reparsed?.idBlock.isConstructed).toBe(true);

    const result = await new TokenVerifier(profile).verify(berToken, payload);

    expect(result.valid).toBe(true);
  });

  it('should reject a token for different bytes', async () => {
    const result = await new TokenVerifier(profile).verify(
      token,
      Buffer.from('{"host":"10.0.0.1","port":22,"state":"closed"}'),
    );

    expect(result).toMatchObject({
      valid: false,
      reason: 'Token imprint does not match the stored payload',
    });
  });

  it('should reject a token made with another digest algorithm', async () => {
    const result = await new TokenVerifier({
      ...profile,
      digestAlgorithm: DigestAlgorithm.SHA512,
    }).verify(token, payload);

    expect(result).toMatchObject({
      valid: false,
      reason: 'Token imprint uses sha256, expected sha512',
    });
  });

  it('should reject a token signed by an untrusted authority', async () => {
    const result = await new TokenVerifier({
      ...profile,
      trustAnchors: [otherTsa.certificate],
    }).verify(token, payload);

    expect(result).toMatchObject({
      valid: false,
      reason: 'Token signer is not trusted',
    });
  });

  it('should report bytes that are not a token', async () => {
    const result = await new TokenVerifier(profile).verify(
      Buffer.from('not a token'),
      payload,
    );

    expect(result.valid).toBe(false);
    expect(result.valid ? '' : result.reason).toMatch(/^Token is not a timestamp token: /);
    expect(result.timestamp).toBeUndefined();
  });
});
