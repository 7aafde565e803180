import * as asn1js from 'asn1js';
import * as pkijs from 'pkijs';
import {
  DigestAlgorithm,
  MockTimestampAuthority,
  TimestampAuthority,
  TimestampClient,
  TimestampRequestError,
  TimestampStatus,
  TsaProfile,
  computeDigest,
  toArrayBuffer,
} from '../../src';

describe('TimestampClient', () => {
  let tsa: MockTimestampAuthority;
  let profile: TsaProfile;
  let sleep: jest.Mock<Promise<void>, [number]>;
  let client: TimestampClient;

  const payload = Buffer.from('{"row":"X"}');

  beforeAll(async () => {
    tsa = await MockTimestampAuthority.create();
  });

  beforeEach(() => {
    tsa.requests.length = 0;
    profile = {
      url: 'http://tsa.test/tsr',
      digestAlgorithm: DigestAlgorithm.SHA256,
      trustAnchors: [tsa.certificate],
    };
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    client = new TimestampClient(tsa, profile, { sleep });
  });

  it('should obtain a token over the payload digest', async () => {
    const receipt = await client.requestTimestamp(payload);

    expect(receipt.algorithm).toBe(DigestAlgorithm.SHA256);
    expect(receipt.digest).toEqual(computeDigest(DigestAlgorithm.SHA256, payload));
    expect(receipt.attempts).toBe(1);
    expect(receipt.policy).toBe('1.3.6.1.4.1.99999.1');
    expect(receipt.token.length).toBeGreaterThan(0);
    expect(tsa.requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should use the configured digest algorithm', async () => {
    client = new TimestampClient(
      tsa,
      { ...profile, digestAlgorithm: DigestAlgorithm.SHA512 },
      { sleep },
    );

    const receipt = await client.requestTimestamp(payload);

    expect(client.digestAlgorithm).toBe(DigestAlgorithm.SHA512);
    expect(receipt.digest).toHaveLength(64);
    expect(receipt.digest).toEqual(computeDigest(DigestAlgorithm.SHA512, payload));
  });

  it('should request the configured policy', async () => {
    client = new TimestampClient(tsa, { ...profile, policyId: '1.2.3.4' }, { sleep });

    const receipt = await client.requestTimestamp(payload);

    expect(receipt.policy).toBe('1.2.3.4');
  });

  describe('transport failures', () => {
    it('should retry with backoff and succeed', async () => {
      tsa.failNext();
      tsa.failNext();

      const receipt = await client.requestTimestamp(payload);

      expect(receipt.attempts).toBe(3);
      expect(sleep.mock.calls).toEqual([[500], [1000]]);
      expect(tsa.requests).toHaveLength(3);
    });

    it('should give up after the configured attempts', async () => {
      tsa.failNext();
      tsa.failNext();
      tsa.failNext();

      await expect(client.requestTimestamp(payload)).rejects.toMatchObject({
        name: 'TimestampRequestError',
        reason: 'transport',
        attempts: 3,
        message: 'Could not reach mock-tsa: connection refused',
      });
    });

    it('should not retry errors that are not transport failures', async () => {
      const exchange = jest.fn<Promise<Buffer>, [Buffer]>().mockRejectedValue(new Error('boom'));
      const broken: TimestampAuthority = { name: 'stub', exchange };
      client = new TimestampClient(broken, profile, { sleep });

      await expect(client.requestTimestamp(payload)).rejects.toMatchObject({
        reason: 'transport',
        attempts: 1,
        message: 'Could not reach stub: boom',
      });
      expect(exchange).toHaveBeenCalledTimes(1);
    });
  });

  describe('unusable replies', () => {
    it('should fail at once when the TSA refuses', async () => {
      tsa.rejectNext(TimestampStatus.REJECTION, 'policy not accepted', 15);

      const error = await client.requestTimestamp(payload).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimestampRequestError);
      expect(error).toMatchObject({
        reason: 'rejected',
        attempts: 1,
        message: 'Timestamp request refused (REJECTION: policy not accepted, unacceptedPolicy)',
      });
      expect(tsa.requests).toHaveLength(1);
    });

    it('should report bytes that are not a TimeStampResp', async () => {
      tsa.garbageNext();

      await expect(client.requestTimestamp(payload)).rejects.toMatchObject({
        reason: 'malformed',
        message: 'Reply from mock-tsa is not a TimeStampResp',
      });
    });

    it('should reject a token over a different digest', async () => {
      tsa.tamperNext();

      await expect(client.requestTimestamp(payload)).rejects.toMatchObject({
        reason: 'mismatch',
        message: 'Token message imprint does not match the request',
      });
    });

    it('should reject a token signed by an authority that is not a trust anchor', async () => {
      const anchorOnly = await MockTimestampAuthority.create({ commonName: 'Anchor Authority' });
      client = new TimestampClient(
        tsa,
        { ...profile, trustAnchors: [anchorOnly.certificate] },
        { sleep },
      );

      const error = await client.requestTimestamp(payload).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimestampRequestError);
      expect(error).toMatchObject({
        reason: 'untrusted',
        attempts: 1,
        message: 'Token from mock-tsa failed verification: Token signer is not trusted',
      });
      expect(tsa.requests).toHaveLength(1);
    });

    it('should reject a token that does not echo the nonce', async () => {
      const rewriting: TimestampAuthority = {
        name: 'rewriting',
        exchange: (request) => {
          const parsed = pkijs.TimeStampReq.fromBER(toArrayBuffer(request));
          parsed.nonce = new asn1js.Integer({ value: 7 });
          return tsa.exchange(Buffer.from(parsed.toSchema().toBER(false)));
        },
      };
      client = new TimestampClient(rewriting, profile, { sleep });

      await expect(client.requestTimestamp(payload)).rejects.toMatchObject({
        reason: 'mismatch',
        message: 'Token nonce does not match the request',
      });
    });
  });
});
