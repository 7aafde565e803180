import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  CorrelationService,
  IngestionLoop,
  IngestionLoopStatistics,
  StoreStatistics,
  TransportAdapter,
} from '../../../core';
import {
  ApiSystemInfo,
  ApiSystemStats,
} from '../../../_shared/swagger/decorators';
import {
  CORRELATION_SERVICE,
  INGESTION_LOOP,
  SERVICE_NAME,
  SERVICE_VERSION,
  TRANSPORT_ADAPTER,
} from '../constants';
import { ConfigurationService } from '../services/configuration.service';

/**
 * System Controller
 * Instance statistics and service information
 */
@ApiTags('System')
@Controller('system')
export class SystemController {
  constructor(
    @Inject(CORRELATION_SERVICE)
    private readonly correlationService: CorrelationService,
    @Inject(INGESTION_LOOP)
    private readonly ingestionLoop: IngestionLoop,
    @Inject(TRANSPORT_ADAPTER)
    private readonly transport: TransportAdapter,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get('stats')
  @ApiSystemStats()
  async stats(): Promise<
    StoreStatistics & { ingestion: IngestionLoopStatistics & { queued: number | null } }
  > {
    const storeStats = await this.correlationService.getStatistics();

    return {
      ...storeStats,
      ingestion: {
        ...this.ingestionLoop.getStatistics(),
        queued: this.transport.pending ? this.transport.pending() : null,
      },
    };
  }

  @Get('info')
  @ApiSystemInfo()
  info(): {
    service: string;
    version: string;
    node: string;
    digestAlgorithm: string;
    tsaUrl: string;
    storage: string;
  } {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      node: process.version,
      digestAlgorithm: this.configuration.getDigestAlgorithm(),
      tsaUrl: this.configuration.getTsaUrl(),
      storage: this.configuration.getStorageType(),
    };
  }
}
