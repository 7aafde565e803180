import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { CorrelationStore } from '../../../core';
import { CORRELATION_STORE } from '../constants';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
} from '../../../_shared/swagger/decorators';
import {
  IngestionRunnerService,
  IngestionRunnerState,
} from '../services/ingestion-runner.service';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(CORRELATION_STORE)
    private readonly store: CorrelationStore,
    private readonly ingestionRunner: IngestionRunnerService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<{
    status: string;
    timestamp: Date;
    uptime: number;
  }> {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: 'ready' | 'not_ready';
    checks: {
      database: boolean;
      ingestion: boolean;
    };
    details: {
      database: 'connected' | 'disconnected';
      ingestion: IngestionRunnerState;
      lastError?: string;
    };
  }> {
    const databaseHealthy = await this.store.isHealthy();
    const ingestionState = this.ingestionRunner.getState();
    const ingestionHealthy = ingestionState !== 'failed';

    return {
      status: databaseHealthy && ingestionHealthy ? 'ready' : 'not_ready',
      checks: {
        database: databaseHealthy,
        ingestion: ingestionHealthy,
      },
      details: {
        database: databaseHealthy ? 'connected' : 'disconnected',
        ingestion: ingestionState,
        lastError: this.ingestionRunner.getLastError(),
      },
    };
  }
}
