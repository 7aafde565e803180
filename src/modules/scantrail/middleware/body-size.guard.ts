import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  RawBodyRequest,
} from '@nestjs/common';
import { Request } from 'express';
import { SCANTRAIL_CONFIG } from '../constants';
import type { ScanTrailModuleConfig } from '../scantrail.config';

/**
 * Body Size Guard
 *
 * Rejects probe messages larger than `ingestion.maxMessageBytes` with 413,
 * checking Content-Length first and then the captured body.
 */
@Injectable()
export class BodySizeGuard implements CanActivate {
  private readonly maxBodySize: number;

  constructor(
    @Inject(SCANTRAIL_CONFIG)
    config: ScanTrailModuleConfig,
  ) {
    this.maxBodySize = config.ingestion?.maxMessageBytes ?? 1024 * 1024;
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();

    const contentLength = request.headers['content-length'];
    if (contentLength) {
      const size = parseInt(contentLength, 10);
      if (!isNaN(size) && size > this.maxBodySize) {
        this.reject(size);
      }
    }

    const body: unknown = request.body;
    const size = request.rawBody
      ? request.rawBody.length
      : Buffer.isBuffer(body)
        ? body.length
        : typeof body === 'string'
          ? Buffer.byteLength(body)
          : 0;

    if (size > this.maxBodySize) {
      this.reject(size);
    }

    return true;
  }

  getMaxBodySize(): number {
    return this.maxBodySize;
  }

  private reject(actualSize: number): never {
    throw new HttpException(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        message: `Payload too large. Maximum size is ${formatBytes(this.maxBodySize)}.`,
        error: 'Payload Too Large',
        maxSize: this.maxBodySize,
        actualSize,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));

  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}
