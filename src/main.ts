import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { SERVICE_VERSION } from './modules';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    rawBody: true,
  });
  const logger = new Logger('Bootstrap');

  app.useBodyParser('json', {
    limit: process.env.INGEST_MAX_MESSAGE_BYTES ?? '1mb',
  });
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Scantrail')
    .setDescription(
      'Stores probe scan results with RFC 3161 timestamp tokens and verifies them on request.',
    )
    .setVersion(SERVICE_VERSION)
    .addTag('Scan Records', 'Stored probe results')
    .addTag('Timestamp Tokens', 'Timestamp tokens and their verification')
    .addTag('Probes', 'HTTP intake for probe messages')
    .addTag('System', 'Statistics and service information')
    .addTag('Health', 'Liveness and readiness')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 4020;
  await app.listen(port);
  logger.log(`Scantrail is running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
