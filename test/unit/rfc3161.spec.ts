import * as pkijs from 'pkijs';
import {
  DigestAlgorithm,
  MockTimestampAuthority,
  TimestampStatus,
  computeDigest,
  decodeTimeStampResponse,
  describeRefusal,
  encodeTimeStampRequest,
  isGranted,
  randomNonce,
  readTimestampToken,
  toArrayBuffer,
} from '../../src';

describe('RFC 3161 encoding', () => {
  let tsa: MockTimestampAuthority;

  beforeAll(async () => {
    tsa = await MockTimestampAuthority.create();
  });

  describe('randomNonce', () => {
    it('should produce 8 bytes with a positive, non-zero leading byte', () => {
      for (let i = 0; i < 20; i++) {
        const nonce = randomNonce();
        expect(nonce).toHaveLength(8);
        expect(nonce[0]).toBeGreaterThanOrEqual(0x01);
        expect(nonce[0]).toBeLessThanOrEqual(0x7f);
      }
    });
  });

  describe('encodeTimeStampRequest', () => {
    it('should carry imprint, nonce, certReq and policy', () => {
      const digest = computeDigest(DigestAlgorithm.SHA256, Buffer.from('{"row":"X"}'));
      const nonce = Buffer.from('0102030405060708', 'hex');

      const der = encodeTimeStampRequest({
        algorithm: DigestAlgorithm.SHA256,
        digest,
        nonce,
        policyId: '1.2.3.4',
      });
      const parsed = pkijs.TimeStampReq.fromBER(toArrayBuffer(der));

      expect(parsed.version).toBe(1);
      expect(parsed.messageImprint.hashAlgorithm.algorithmId).toBe('2.16.840.1.101.3.4.2.1');
      expect(
        Buffer.from(parsed.messageImprint.hashedMessage.valueBlock.valueHexView),
      ).toEqual(digest);
      expect(Buffer.from(parsed.nonce?.valueBlock.valueHexView ?? [])).toEqual(nonce);
      expect(parsed.certReq).toBe(true);
      expect(parsed.reqPolicy).toBe('1.2.3.4');
    });
  });

  describe('decodeTimeStampResponse', () => {
    it('should decode a granted reply and its token', async () => {
      const digest = computeDigest(DigestAlgorithm.SHA256, Buffer.from('payload'));
      const nonce = Buffer.from('1122334455667788', 'hex');
      const request = encodeTimeStampRequest({
        algorithm: DigestAlgorithm.SHA256,
        digest,
        nonce,
      });

      const reply = decodeTimeStampResponse(await tsa.exchange(request));

      expect(reply.status).toBe(TimestampStatus.GRANTED);
      expect(isGranted(reply)).toBe(true);
      expect(reply.token).not.toBeNull();

      const info = readTimestampToken(reply.token ?? Buffer.alloc(0));
      expect(info.hashAlgorithm).toBe(DigestAlgorithm.SHA256);
      expect(info.messageImprint).toEqual(digest);
      expect(info.nonce).toEqual(nonce);
      expect(info.policy).toBe('1.3.6.1.4.1.99999.1');
      expect(info.genTime).toBeInstanceOf(Date);
    });

    it('should decode a rejection with its text and failure info', async () => {
      tsa.rejectNext(TimestampStatus.REJECTION, 'bad algorithm', 0);

      const reply = decodeTimeStampResponse(await tsa.exchange(Buffer.from('ignored')));

      expect(reply.status).toBe(TimestampStatus.REJECTION);
      expect(isGranted(reply)).toBe(false);
      expect(reply.statusText).toEqual(['bad algorithm']);
      expect(reply.failures).toEqual(['badAlg']);
      expect(reply.token).toBeNull();
      expect(describeRefusal(reply)).toBe('REJECTION: bad algorithm, badAlg');
    });

    it('should throw on bytes that are not a reply', () => {
      expect(() => decodeTimeStampResponse(Buffer.from('not a timestamp reply'))).toThrow();
    });
  });

  describe('describeRefusal', () => {
    it('should name the status when there are no details', () => {
      expect(
        describeRefusal({ status: 3, statusText: [], failures: [], token: null }),
      ).toBe('WAITING');
    });

    it('should fall back to the number for unknown statuses', () => {
      expect(
        describeRefusal({ status: 9, statusText: [], failures: [], token: null }),
      ).toBe('status 9');
    });
  });

  describe('readTimestampToken', () => {
    it('should throw on bytes that are not a token', () => {
      expect(() => readTimestampToken(Buffer.from([0x30, 0x03, 0x02, 0x01, 0x01]))).toThrow();
    });
  });
});
