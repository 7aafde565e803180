import { Injectable, Inject } from '@nestjs/common';
import { DigestAlgorithm } from '../../../core';
import type { ScanTrailModuleConfig } from '../scantrail.config';
import { SCANTRAIL_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Read access to the module configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(SCANTRAIL_CONFIG)
    private readonly config: ScanTrailModuleConfig,
  ) {}

  getConfig(): ScanTrailModuleConfig {
    return this.config;
  }

  getDigestAlgorithm(): DigestAlgorithm {
    return this.config.tsa.digestAlgorithm ?? DigestAlgorithm.SHA256;
  }

  getTsaUrl(): string {
    return this.config.tsa.url;
  }

  getStorageType(): ScanTrailModuleConfig['storage']['type'] {
    return this.config.storage.type;
  }

  isIngestionEnabled(): boolean {
    return this.config.ingestion?.enabled !== false;
  }

  getMaxMessageBytes(): number {
    return this.config.ingestion?.maxMessageBytes ?? 1024 * 1024;
  }
}
