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
import {
  CorrelationService,
  TimestampToken,
  VerificationResult,
  VerificationService,
} from '../../../core';
import {
  ApiCreateTimestampToken,
  ApiGetTimestampToken,
  ApiListTimestampTokens,
  ApiVerifyTimestampToken,
} from '../../../_shared/swagger/decorators';
import {
  CreateTimestampTokenRequestDto,
  ListTimestampTokensDto,
} from '../../../_shared/dto';
import { CORRELATION_SERVICE, VERIFICATION_SERVICE } from '../constants';
import { DomainExceptionFilter } from '../filters';

/**
 * Timestamp Token Controller
 */
@ApiTags('Timestamp Tokens')
@Controller('timestamp-tokens')
@UseFilters(DomainExceptionFilter)
export class TimestampTokenController {
  private readonly logger = new Logger(TimestampTokenController.name);

  constructor(
    @Inject(CORRELATION_SERVICE)
    private readonly correlationService: CorrelationService,
    @Inject(VERIFICATION_SERVICE)
    private readonly verificationService: VerificationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateTimestampToken()
  async createTimestampToken(
    @Body() dto: CreateTimestampTokenRequestDto,
  ): Promise<TimestampToken> {
    const token = await this.correlationService.createTimestampToken(
      dto.correlationId,
      Buffer.from(dto.token, 'base64'),
    );

    this.logger.log(`Timestamp token stored: ${token.correlationId}`);
    return token;
  }

  @Get()
  @ApiListTimestampTokens()
  async listTimestampTokens(
    @Query() query: ListTimestampTokensDto,
  ): Promise<TimestampToken[]> {
    return this.correlationService.listTimestampTokens(query.offset, query.limit);
  }

  @Get(':correlationId')
  @ApiGetTimestampToken()
  async getTimestampToken(
    @Param('correlationId') correlationId: string,
  ): Promise<TimestampToken> {
    return this.correlationService.getTimestampToken(correlationId);
  }

  @Get(':correlationId/verify')
  @ApiVerifyTimestampToken()
  async verifyTimestampToken(
    @Param('correlationId') correlationId: string,
  ): Promise<VerificationResult> {
    return this.verificationService.verify(correlationId);
  }
}
