import {
  CorrelationService,
  DigestAlgorithm,
  IngestionProcessor,
  MessageFate,
  MessageFateEvent,
  MockCorrelationStore,
  MockTimestampAuthority,
  NotFoundError,
  PayloadValidator,
  PersistenceError,
  TimestampClient,
  TimestampStatus,
  TokenVerifier,
  TsaProfile,
  VerificationService,
  computeDigest,
  readTimestampToken,
} from '../../src';

describe('Ingestion pipeline integration', () => {
  let tsa: MockTimestampAuthority;
  let profile: TsaProfile;
  let store: MockCorrelationStore;
  let timestampClient: TimestampClient;
  let processor: IngestionProcessor;
  let verification: VerificationService;
  let correlation: CorrelationService;
  let fates: MessageFateEvent[];
  let sleep: jest.Mock<Promise<void>, [number]>;

  const message = (text: string) => Buffer.from(text, 'utf8');

  beforeAll(async () => {
    tsa = await MockTimestampAuthority.create();
    profile = {
      url: 'http://tsa.test/tsr',
      digestAlgorithm: DigestAlgorithm.SHA256,
      trustAnchors: [tsa.certificate],
    };
  });

  beforeEach(() => {
    tsa.requests.length = 0;
    store = new MockCorrelationStore();
    fates = [];
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    timestampClient = new TimestampClient(tsa, profile, { sleep });
    processor = new IngestionProcessor({
      validator: new PayloadValidator(),
      timestampClient,
      store,
      persistRetry: { maxAttempts: 3, delayMs: 250 },
      hooks: {
        onMessageFate: (event) => {
          fates.push(event);
        },
      },
      sleep,
    });
    verification = new VerificationService(store, new TokenVerifier(profile));
    correlation = new CorrelationService(store);
  });

  afterEach(() => {
    store.clear();
  });

  describe('End-to-End Processing', () => {
    it('should persist a record and token that verify', async () => {
      const result = await processor.processMessage(
        message('{"correlationId":"abc-123","payload":{"row":"X"}}'),
      );

      expect(result.fate).toBe(MessageFate.PERSISTED);
      expect(result.correlationId).toBe('abc-123');
      expect(result.scanRecordId).toBe('mock-1');
      expect([...result.stageDurations.keys()]).toEqual([
        'validation',
        'deduplication',
        'timestamp',
        'persist',
      ]);

      const record = await correlation.getScanRecordByCorrelationId('abc-123');
      expect(record.payload).toEqual({ row: 'X' });

      const token = await correlation.getTimestampToken('abc-123');
      expect(token.token.length).toBeGreaterThan(0);

      await expect(verification.verify('abc-123')).resolves.toMatchObject({
        correlationId: 'abc-123',
        valid: true,
      });
      expect(fates).toEqual([
        expect.objectContaining({ fate: MessageFate.PERSISTED, correlationId: 'abc-123' }),
      ]);
    });

    it('should digest exactly the bytes it stores', async () => {
      await processor.processMessage(
        message('{"correlationId":"u-1","payload":{ "b": "ü", "a": 1.50 }}'),
      );

      const record = await correlation.getScanRecordByCorrelationId('u-1');
      const token = await correlation.getTimestampToken('u-1');
      const info = readTimestampToken(token.token);

      expect(record.payloadBytes).toEqual(Buffer.from('{"a":1.5,"b":"ü"}', 'utf8'));
      expect(info.messageImprint).toEqual(
        computeDigest(DigestAlgorithm.SHA256, record.payloadBytes),
      );
    });

    it('should give the same verification result twice', async () => {
      await processor.processMessage(
        message('{"correlationId":"abc-123","payload":{"row":"X"}}'),
      );

      const first = await verification.verify('abc-123');
      const second = await verification.verify('abc-123');

      expect(second).toEqual(first);
    });
  });

  describe('Dropped messages', () => {
    it('should store nothing when the TSA refuses', async () => {
      tsa.rejectNext(TimestampStatus.REJECTION, 'unaccepted policy', 15);

      const result = await processor.processMessage(
        message('{"correlationId":"abc-123","payload":{"row":"X"}}'),
      );

      expect(result.fate).toBe(MessageFate.TIMESTAMP_FAILED);
      await expect(correlation.getScanRecordByCorrelationId('abc-123')).rejects.toBeInstanceOf(
        NotFoundError,
      );
      expect(await store.getStatistics()).toEqual({
        scanRecordCount: 0,
        timestampTokenCount: 0,
      });
    });

    it('should store nothing when the token signer is not trusted', async () => {
      const stranger = await MockTimestampAuthority.create({ commonName: 'Stranger Authority' });
      processor = new IngestionProcessor({
        validator: new PayloadValidator(),
        timestampClient: new TimestampClient(stranger, profile, { sleep }),
        store,
        sleep,
      });

      const result = await processor.processMessage(
        message('{"correlationId":"abc-123","payload":{"row":"X"}}'),
      );

      expect(result.fate).toBe(MessageFate.TIMESTAMP_FAILED);
      expect(result.error).toMatchObject({ reason: 'untrusted' });
      expect(await store.countScanRecords()).toBe(0);
      expect(await store.countTimestampTokens()).toBe(0);
    });

    it('should store nothing for an invalid message', async () => {
      const result = await processor.processMessage(message('{"correlationId":"abc-123"}'));

      expect(result.fate).toBe(MessageFate.INVALID);
      expect(result.error?.name).toBe('ValidationError');
      expect(tsa.requests).toHaveLength(0);
      expect(await store.countScanRecords()).toBe(0);
    });

    it('should not spend a token on a redelivered message', async () => {
      const bytes = message('{"correlationId":"abc-123","payload":{"row":"X"}}');

      await processor.processMessage(bytes);
      const second = await processor.processMessage(bytes);

      expect(second.fate).toBe(MessageFate.DUPLICATE);
      expect(tsa.requests).toHaveLength(1);
      expect(await store.countTimestampTokens()).toBe(1);
    });
  });

  describe('Persistence', () => {
    it('should retry a failed write', async () => {
      store.failNextWrites(1);

      const result = await processor.processMessage(
        message('{"correlationId":"abc-123","payload":{"row":"X"}}'),
      );

      expect(result.fate).toBe(MessageFate.PERSISTED);
      expect(sleep).toHaveBeenCalledWith(250);
      await expect(verification.verify('abc-123')).resolves.toMatchObject({ valid: true });
    });

    it('should never leave a record without its token', async () => {
      jest
        .spyOn(store, 'createTimestampToken')
        .mockRejectedValue(new PersistenceError('disk full', 'createTimestampToken'));

      const error = await processor
        .processMessage(message('{"correlationId":"abc-123","payload":{"row":"X"}}'))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({
        message: 'Could not persist abc-123 after 3 attempts: disk full',
        operation: 'persist',
      });
      expect(await store.countScanRecords()).toBe(0);
      expect(fates).toHaveLength(0);
    });
  });

  describe('Verification', () => {
    it('should report an unknown correlation id as not found', async () => {
      await expect(verification.verify('does-not-exist')).rejects.toMatchObject({
        name: 'NotFoundError',
        entity: 'scan_record',
        key: 'does-not-exist',
      });
    });

    it('should report a record without a token as not found', async () => {
      await correlation.createScanRecord({ correlationId: 'abc-123', payload: { row: 'X' } });

      await expect(verification.verify('abc-123')).rejects.toMatchObject({
        name: 'NotFoundError',
        entity: 'timestamp_token',
      });
    });

    it('should return a negative result for a token over other bytes', async () => {
      await correlation.createScanRecord({ correlationId: 'abc-123', payload: { row: 'X' } });
      const receipt = await timestampClient.requestTimestamp(Buffer.from('{"row":"Y"}'));
      await correlation.createTimestampToken('abc-123', receipt.token);

      await expect(verification.verify('abc-123')).resolves.toMatchObject({
        correlationId: 'abc-123',
        valid: false,
        reason: 'Token imprint does not match the stored payload',
      });
    });
  });
});
