import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import type { AppConfig } from './config/configuration';
import logger from './logs/logger';
import { LoggerService } from './logs/logger.service';

// Background dispatches record their own failures; anything reaching these
// handlers is a defect.
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.stack : String(reason),
  });
  process.exit(1);
});
process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { trace: err.stack });
  process.exit(1);
});

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });
  configureApp(app);

  // Swagger/OpenAPI Documentation
  const config = new DocumentBuilder()
    .setTitle('Demand Letter Service API')
    .setDescription(
      'Upload a template and data file, poll the generation job, download the document, and chat',
    )
    .setVersion('1.0.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  // Closes the database connection on SIGTERM/SIGINT
  app.enableShutdownHooks();

  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const port = configService.get('port', { infer: true });
  await app.listen(port, '0.0.0.0');

  const loggerService = app.get(LoggerService);
  loggerService.log(`Application is running on: http://localhost:${port}`);
  loggerService.log(`API Documentation: http://localhost:${port}/api/docs`);
}

bootstrap().catch((err: unknown) => {
  logger.error('Fatal error during bootstrap', {
    trace: err instanceof Error ? err.stack : String(err),
  });
  process.exit(1);
});
