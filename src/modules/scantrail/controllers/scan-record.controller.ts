import {
  Controller,
  Get,
  Post,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  UseFilters,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CorrelationService, ScanRecord } from '../../../core';
import {
  ApiCreateScanRecord,
  ApiGetScanRecord,
  ApiListScanRecords,
} from '../../../_shared/swagger/decorators';
import {
  CreateScanRecordRequestDto,
  ListScanRecordsDto,
} from '../../../_shared/dto';
import { CORRELATION_SERVICE } from '../constants';
import { DomainExceptionFilter } from '../filters';

/**
 * Scan Record Controller
 */
@ApiTags('Scan Records')
@Controller('scan-records')
@UseFilters(DomainExceptionFilter)
export class ScanRecordController {
  private readonly logger = new Logger(ScanRecordController.name);

  constructor(
    @Inject(CORRELATION_SERVICE)
    private readonly correlationService: CorrelationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateScanRecord()
  async createScanRecord(
    @Body() dto: CreateScanRecordRequestDto,
  ): Promise<ScanRecord> {
    const record = await this.correlationService.createScanRecord({
      correlationId: dto.correlationId,
      payload: dto.payload,
      probe: dto.probe,
      scannedAt: dto.scannedAt ? new Date(dto.scannedAt) : undefined,
    });

    this.logger.log(`Scan record created: ${record.correlationId}`);
    return record;
  }

  @Get()
  @ApiListScanRecords()
  async listScanRecords(@Query() query: ListScanRecordsDto): Promise<ScanRecord[]> {
    return this.correlationService.listScanRecords(query.offset, query.limit, query.q);
  }

  @Get('correlation/:correlationId')
  @ApiGetScanRecord({ byCorrelationId: true })
  async getByCorrelationId(
    @Param('correlationId') correlationId: string,
  ): Promise<ScanRecord> {
    return this.correlationService.getScanRecordByCorrelationId(correlationId);
  }

  @Get(':id')
  @ApiGetScanRecord()
  async getScanRecord(@Param('id') id: string): Promise<ScanRecord> {
    return this.correlationService.getScanRecord(id);
  }
}
