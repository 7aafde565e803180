import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with dependency status',
      description:
        'Ready when the correlation store answers and the ingestion loop has not failed',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              database: { type: 'boolean', example: true },
              ingestion: { type: 'boolean', example: true },
            },
          },
          details: {
            type: 'object',
            properties: {
              database: { type: 'string', example: 'connected' },
              ingestion: {
                type: 'string',
                enum: ['idle', 'running', 'stopped', 'failed', 'disabled'],
              },
              lastError: { type: 'string' },
            },
          },
        },
      },
    }),
  );
};
