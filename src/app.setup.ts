import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import type { AppConfig } from './config/configuration';
import logger from './logs/logger';
import { LoggerService } from './logs/logger.service';

/** Middleware, pipes and filters shared by the server and the e2e suite. */
export function configureApp(app: INestApplication): void {
  const loggerService = app.get(LoggerService);
  app.useLogger(loggerService);
  app.useGlobalFilters(new AllExceptionsFilter(loggerService));

  // Security
  app.use(helmet());

  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  logger.level = configService.get('logLevel', { infer: true });
  app.enableCors({
    origin: configService.get('corsOrigin', { infer: true }),
    credentials: true,
  });

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
}
