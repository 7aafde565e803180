import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { DigestAlgorithm } from '../../../core';
import { ScanTrailModuleConfig } from '../scantrail.config';

const toBoolean = ({ obj, key }: { obj: Record<string, unknown>; key: string }) =>
  obj[key] === true || obj[key] === 'true';

/**
 * Environment variables read at startup
 */
export class EnvironmentVariables {
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 4020;

  // Timestamp authority
  @IsUrl({ require_tld: false, protocols: ['http', 'https'] })
  TSA_URL!: string;

  @IsString()
  @IsNotEmpty()
  TSA_CERTIFICATE_FILE!: string;

  @IsEnum(DigestAlgorithm)
  TSA_DIGEST_ALGORITHM: DigestAlgorithm = DigestAlgorithm.SHA256;

  @IsOptional()
  @Matches(/^\d+(\.\d+)+$/, { message: 'TSA_POLICY_ID must be a dotted OID' })
  TSA_POLICY_ID?: string;

  @IsOptional()
  @IsString()
  TSA_USERNAME?: string;

  @IsOptional()
  @IsString()
  TSA_PASSWORD?: string;

  @IsInt()
  @Min(1)
  TSA_TIMEOUT_MS: number = 30000;

  @IsInt()
  @Min(1)
  @Max(10)
  TSA_MAX_ATTEMPTS: number = 3;

  @IsInt()
  @Min(0)
  TSA_RETRY_DELAY_MS: number = 500;

  // Ingestion
  @Transform(toBoolean)
  @IsBoolean()
  INGEST_ENABLED: boolean = true;

  @IsInt()
  @Min(1)
  INGEST_RECEIVE_TIMEOUT_MS: number = 10000;

  @IsInt()
  @Min(1)
  INGEST_QUEUE_CAPACITY: number = 1000;

  @IsInt()
  @Min(1)
  INGEST_MAX_MESSAGE_BYTES: number = 1024 * 1024;

  // Storage
  @IsIn(['typeorm', 'mock'])
  STORAGE_TYPE: 'typeorm' | 'mock' = 'typeorm';

  @IsString()
  DB_HOST: string = 'localhost';

  @IsInt()
  DB_PORT: number = 5432;

  @IsString()
  DB_USERNAME: string = 'scantrail';

  @IsString()
  DB_PASSWORD: string = 'scantrail';

  @IsString()
  DB_NAME: string = 'scantrail';

  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE: boolean = false;

  @Transform(toBoolean)
  @IsBoolean()
  DB_LOGGING: boolean = false;
}

/**
 * `validate` hook for ConfigModule.forRoot: fails startup on bad values
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }

  return validated;
}

/**
 * Module configuration from validated environment variables
 */
export function scanTrailConfigFromEnvironment(
  config: ConfigService,
): ScanTrailModuleConfig {
  const get = <T>(key: keyof EnvironmentVariables, fallback: T): T =>
    config.get<T>(key) ?? fallback;

  const storageType = get<'typeorm' | 'mock'>('STORAGE_TYPE', 'typeorm');
  const tsaUrl = get('TSA_URL', '');
  const maxAttempts = get('TSA_MAX_ATTEMPTS', 3);

  new Logger('Configuration').log(
    `Storage ${storageType}, TSA ${tsaUrl}, ${maxAttempts} attempt(s) per token`,
  );

  return {
    storage: {
      type: storageType,
      options: {
        host: get('DB_HOST', 'localhost'),
        port: get('DB_PORT', 5432),
        username: get('DB_USERNAME', 'scantrail'),
        password: get('DB_PASSWORD', 'scantrail'),
        database: get('DB_NAME', 'scantrail'),
        synchronize: get('DB_SYNCHRONIZE', false),
        logging: get('DB_LOGGING', false),
      },
    },
    tsa: {
      url: tsaUrl,
      certificateFile: get('TSA_CERTIFICATE_FILE', ''),
      digestAlgorithm: get<DigestAlgorithm>('TSA_DIGEST_ALGORITHM', DigestAlgorithm.SHA256),
      policyId: config.get<string>('TSA_POLICY_ID'),
      username: config.get<string>('TSA_USERNAME'),
      password: config.get<string>('TSA_PASSWORD'),
      timeoutMs: get('TSA_TIMEOUT_MS', 30000),
      retry: {
        maxAttempts,
        initialDelayMs: get('TSA_RETRY_DELAY_MS', 500),
      },
    },
    ingestion: {
      enabled: get('INGEST_ENABLED', true),
      receiveTimeoutMs: get('INGEST_RECEIVE_TIMEOUT_MS', 10000),
      queueCapacity: get('INGEST_QUEUE_CAPACITY', 1000),
      maxMessageBytes: get('INGEST_MAX_MESSAGE_BYTES', 1024 * 1024),
    },
  };
}
