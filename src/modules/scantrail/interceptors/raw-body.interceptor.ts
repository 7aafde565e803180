import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RawBodyRequest,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Makes `request.rawBody` hold the exact request bytes, so probe messages are
 * queued as sent rather than as re-serialized by the JSON body parser
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();
    if (!request.rawBody) {
      request.rawBody = this.recoverBody(request);
    }

    return next.handle();
  }

  private recoverBody(request: Request): Buffer | undefined {
    const body: unknown = request.body;

    if (Buffer.isBuffer(body)) {
      return body;
    }
    if (typeof body === 'string') {
      return Buffer.from(body, 'utf8');
    }

    const declaredLength = parseInt(request.headers['content-length'] ?? '0', 10);
    if (body && typeof body === 'object' && declaredLength > 0) {
      // Parsed without a raw copy; the re-serialized form is equivalent once
      // the payload is canonicalized
      return Buffer.from(JSON.stringify(body), 'utf8');
    }
    return undefined;
  }
}
