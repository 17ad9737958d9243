import { Injectable, ConsoleLogger } from '@nestjs/common';
import logger from './logger';

/**
 * Routes Nest's logger calls (including every `new Logger(Context)`) into winston.
 */
@Injectable()
export class LoggerService extends ConsoleLogger {
  constructor() {
    super();
  }

  log(message: string, context?: string) {
    logger.info(message, { context });
  }

  error(message: string, trace?: string, context?: string) {
    logger.error(message, { trace, context });
  }

  warn(message: string, context?: string) {
    logger.warn(message, { context });
  }

  debug(message: string, context?: string) {
    logger.debug(message, { context });
  }

  verbose(message: string, context?: string) {
    logger.verbose(message, { context });
  }
}
