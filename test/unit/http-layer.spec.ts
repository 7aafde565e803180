import { HttpException, HttpStatus } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import {
  BodySizeGuard,
  DuplicateCorrelationError,
  MissingScanRecordError,
  NotFoundError,
  ScanTrailModuleConfig,
  ValidationError,
  toHttpException,
} from '../../src';

describe('HTTP layer', () => {
  describe('toHttpException', () => {
    it('should map lookups of unknown keys to 404', () => {
      const exception = toHttpException(new NotFoundError('scan_record', 'abc-123'));

      expect(exception.getStatus()).toBe(HttpStatus.NOT_FOUND);
      expect(exception.getResponse()).toEqual({
        statusCode: 404,
        message: 'Scan record not found: abc-123',
        error: 'Not Found',
      });
    });

    it('should map duplicates to 409 and orphan tokens to 422', () => {
      expect(
        toHttpException(new DuplicateCorrelationError('abc-123', 'scan_record')).getStatus(),
      ).toBe(HttpStatus.CONFLICT);
      expect(toHttpException(new MissingScanRecordError('abc-123')).getStatus()).toBe(
        HttpStatus.UNPROCESSABLE_ENTITY,
      );
    });

    it('should map validation errors to 400 with their issues', () => {
      const exception = toHttpException(
        new ValidationError('Invalid payload', ['payload must be an object']),
      );

      expect(exception.getStatus()).toBe(HttpStatus.BAD_REQUEST);
      expect(exception.getResponse()).toEqual({
        statusCode: 400,
        message: ['payload must be an object'],
        error: 'Bad Request',
      });
    });

    it('should hide anything else behind a 500', () => {
      expect(toHttpException(new Error('secret detail')).getResponse()).toEqual({
        statusCode: 500,
        message: 'Internal Server Error',
      });
    });
  });

  describe('BodySizeGuard', () => {
    const config = (maxMessageBytes: number): ScanTrailModuleConfig => ({
      storage: { type: 'mock' },
      tsa: { url: 'http://tsa.test/tsr' },
      ingestion: { maxMessageBytes },
    });

    const contextFor = (request: object) => new ExecutionContextHost([request]);

    it('should admit a body within the limit', () => {
      const guard = new BodySizeGuard(config(16));

      expect(
        guard.canActivate(
          contextFor({ headers: { 'content-length': '10' }, rawBody: Buffer.alloc(10) }),
        ),
      ).toBe(true);
    });

    it('should refuse a declared length over the limit', () => {
      const guard = new BodySizeGuard(config(16));

      let thrown: unknown;
      try {
        guard.canActivate(contextFor({ headers: { 'content-length': '20' } }));
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(HttpException);
      expect(thrown instanceof HttpException ? thrown.getStatus() : null).toBe(
        HttpStatus.PAYLOAD_TOO_LARGE,
      );
      expect(thrown instanceof HttpException ? thrown.getResponse() : null).toEqual({
        statusCode: 413,
        message: 'Payload too large. Maximum size is 16 Bytes.',
        error: 'Payload Too Large',
        maxSize: 16,
        actualSize: 20,
      });
    });

    it('should refuse a captured body over the limit', () => {
      const guard = new BodySizeGuard(config(2048));

      expect(() =>
        guard.canActivate(contextFor({ headers: {}, rawBody: Buffer.alloc(5000) })),
      ).toThrow('Payload too large. Maximum size is 2 KB.');
    });

    it('should default to 1 MiB', () => {
      const guard = new BodySizeGuard({ storage: { type: 'mock' }, tsa: { url: 'x' } });

      expect(guard.getMaxBodySize()).toBe(1024 * 1024);
    });
  });
});
