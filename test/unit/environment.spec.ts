import { ConfigService } from '@nestjs/config';
import {
  DigestAlgorithm,
  scanTrailConfigFromEnvironment,
  validateEnvironment,
} from '../../src';

describe('Environment configuration', () => {
  const required = {
    TSA_URL: 'http://tsa.test/tsr',
    TSA_CERTIFICATE_FILE: '/etc/scantrail/tsa.pem',
  };

  describe('validateEnvironment', () => {
    it('should apply defaults', () => {
      const env = validateEnvironment({ ...required });

      expect(env.PORT).toBe(4020);
      expect(env.TSA_DIGEST_ALGORITHM).toBe(DigestAlgorithm.SHA256);
      expect(env.TSA_MAX_ATTEMPTS).toBe(3);
      expect(env.INGEST_ENABLED).toBe(true);
      expect(env.INGEST_RECEIVE_TIMEOUT_MS).toBe(10000);
      expect(env.STORAGE_TYPE).toBe('typeorm');
    });

    it('should convert strings from the environment', () => {
      const env = validateEnvironment({
        ...required,
        DB_PORT: '6543',
        INGEST_ENABLED: 'false',
        DB_SYNCHRONIZE: 'true',
        TSA_DIGEST_ALGORITHM: 'sha512',
      });

      expect(env.DB_PORT).toBe(6543);
      expect(env.INGEST_ENABLED).toBe(false);
      expect(env.DB_SYNCHRONIZE).toBe(true);
      expect(env.TSA_DIGEST_ALGORITHM).toBe(DigestAlgorithm.SHA512);
    });

    it('should fail on a missing TSA URL', () => {
      expect(() =>
        validateEnvironment({ TSA_CERTIFICATE_FILE: '/etc/scantrail/tsa.pem' }),
      ).toThrow('TSA_URL must be a URL address');
    });

    it('should fail on an unknown digest algorithm', () => {
      expect(() => validateEnvironment({ ...required, TSA_DIGEST_ALGORITHM: 'md5' })).toThrow(
        /^Invalid environment: TSA_DIGEST_ALGORITHM must be one of the following values/,
      );
    });

    it('should fail on a malformed policy OID', () => {
      expect(() => validateEnvironment({ ...required, TSA_POLICY_ID: 'policy-1' })).toThrow(
        'TSA_POLICY_ID must be a dotted OID',
      );
    });
  });

  describe('scanTrailConfigFromEnvironment', () => {
    it('should build the module configuration', () => {
      const config = scanTrailConfigFromEnvironment(
        new ConfigService({
          ...required,
          STORAGE_TYPE: 'mock',
          TSA_MAX_ATTEMPTS: 5,
          TSA_RETRY_DELAY_MS: 250,
          INGEST_QUEUE_CAPACITY: 50,
        }),
      );

      expect(config.storage.type).toBe('mock');
      expect(config.tsa).toMatchObject({
        url: 'http://tsa.test/tsr',
        certificateFile: '/etc/scantrail/tsa.pem',
        digestAlgorithm: DigestAlgorithm.SHA256,
        retry: { maxAttempts: 5, initialDelayMs: 250 },
      });
      expect(config.ingestion).toMatchObject({ enabled: true, queueCapacity: 50 });
    });
  });
});
