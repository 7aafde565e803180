import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  RawBodyRequest,
  Req,
  ServiceUnavailableException,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Request } from 'express';
import { QueueTransportAdapter } from '../../../adapters/transport/queue';
import { ApiSubmitProbeMessage } from '../../../_shared/swagger/decorators';
import { PROBE_QUEUE } from '../constants';
import { RawBodyInterceptor } from '../interceptors';
import { BodySizeGuard } from '../middleware';

/**
 * Probe Message Controller
 *
 * HTTP intake for probe messages: the raw body is handed to the queue
 * transport as is; validation happens in the ingestion loop. Unavailable
 * when another transport has been configured.
 */
@ApiTags('Probes')
@Controller('probes')
export class ProbeMessageController {
  private readonly logger = new Logger(ProbeMessageController.name);

  constructor(
    @Inject(PROBE_QUEUE)
    private readonly queue: QueueTransportAdapter | null,
  ) {}

  @Post('messages')
  @HttpCode(HttpStatus.ACCEPTED)
  @UseGuards(BodySizeGuard)
  @UseInterceptors(RawBodyInterceptor)
  @ApiSubmitProbeMessage()
  submit(@Req() request: RawBodyRequest<Request>): {
    accepted: true;
    queued: number;
  } {
    if (!this.queue) {
      throw new ServiceUnavailableException('HTTP intake is not enabled');
    }

    const body = request.rawBody;
    if (!body || body.length === 0) {
      throw new BadRequestException('Message body is empty');
    }

    if (!this.queue.push(body)) {
      this.logger.warn(`Ingestion queue full, refused ${body.length} byte message`);
      throw new ServiceUnavailableException('Ingestion queue is full');
    }

    return { accepted: true, queued: this.queue.pending() };
  }
}
