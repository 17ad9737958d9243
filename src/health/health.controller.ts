import { Controller, Get, HttpStatus, Logger, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { errorMessage } from '../common/errors';
import { WebhookDispatcherService } from '../documents/webhook-dispatcher.service';
import { JobStoreService } from '../store/job-store.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly jobStore: JobStoreService,
    private readonly dispatcher: WebhookDispatcherService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Database round trip and dispatch backlog' })
  @ApiResponse({
    status: 200,
    description: 'Service is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        database: { type: 'string', example: 'up' },
        inFlightDispatches: { type: 'number', example: 0 },
        timestamp: { type: 'string' },
      },
    },
  })
  @ApiResponse({ status: 503, description: 'Database unreachable' })
  async health(@Res({ passthrough: true }) res: Response) {
    try {
      await this.jobStore.ping();
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Health check failed: ${message}`);
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
      return {
        status: 'unhealthy',
        database: 'down',
        message,
        timestamp: new Date().toISOString(),
      };
    }
    return {
      status: 'healthy',
      database: 'up',
      inFlightDispatches: this.dispatcher.inFlight,
      timestamp: new Date().toISOString(),
    };
  }
}
