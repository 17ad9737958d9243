import { HttpService } from '@nestjs/axios';
import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import { firstValueFrom } from 'rxjs';
import type { AppConfig } from '../config/configuration';
import { DispatchFailure, errorMessage } from '../common/errors';
import { JobStoreService } from '../store/job-store.service';

export interface DocumentPayload {
  txtContent: string;
  csvContent: string;
}

type DispatchOutcome = { document: Buffer } | { reason: string };

/**
 * Sends uploads to the document-generation webhook in detached tasks and
 * records each outcome on the job exactly once.
 *
 * The webhook call has no timeout. Tasks live only in this process: a
 * restart drops them and their jobs stay `processing`.
 */
@Injectable()
export class WebhookDispatcherService implements OnApplicationShutdown {
  private readonly logger = new Logger(WebhookDispatcherService.name);
  private readonly pool: pLimit.Limit;
  private readonly tasks = new Set<Promise<void>>();
  private readonly webhooks: AppConfig['webhooks'];

  constructor(
    private readonly httpService: HttpService,
    private readonly jobStore: JobStoreService,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.webhooks = configService.get('webhooks', { infer: true });
    this.pool = pLimit(configService.get('dispatch', { infer: true }).concurrency);
  }

  /** Dispatches queued or running right now. */
  get inFlight(): number {
    return this.tasks.size;
  }

  /** Schedules the webhook call and returns without waiting for it. */
  dispatch(jobId: number, payload: DocumentPayload): void {
    const task: Promise<void> = this.pool(() => this.run(jobId, payload)).finally(
      () => {
        this.tasks.delete(task);
      },
    );
    this.tasks.add(task);
  }

  /** Resolves once every scheduled dispatch has recorded its outcome. */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  onApplicationShutdown() {
    if (this.tasks.size > 0) {
      this.logger.warn(
        `Shutting down with ${this.tasks.size} document dispatch(es) in flight; their jobs will remain processing`,
      );
    }
  }

  docxFilename(jobId: number): string {
    return `${this.webhooks.docxFilenamePrefix}_${jobId}.docx`;
  }

  private async run(jobId: number, payload: DocumentPayload): Promise<void> {
    this.logger.log(`Dispatching job ${jobId} to document webhook`);
    const startedAt = Date.now();

    let outcome: DispatchOutcome;
    try {
      outcome = { document: await this.requestDocument(payload) };
    } catch (error) {
      outcome = {
        reason:
          error instanceof DispatchFailure
            ? error.message
            : `Document webhook request failed: ${errorMessage(error)}`,
      };
    }

    try {
      if ('document' in outcome) {
        await this.jobStore.completeJob(
          jobId,
          this.docxFilename(jobId),
          outcome.document,
        );
      } else {
        await this.jobStore.failJob(jobId, outcome.reason);
      }
    } catch (error) {
      this.logger.error(
        `Could not record dispatch outcome for job ${jobId}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return;
    }

    this.logger.log(
      `Dispatch for job ${jobId} finished in ${Date.now() - startedAt}ms`,
    );
  }

  private async requestDocument(payload: DocumentPayload): Promise<Buffer> {
    const form = new FormData();
    form.append(
      'txt_file',
      new Blob([payload.txtContent], { type: 'text/plain' }),
      'document.txt',
    );
    form.append(
      'csv_file',
      new Blob([payload.csvContent], { type: 'text/csv' }),
      'data.csv',
    );

    const response = await firstValueFrom(
      this.httpService.post<Uint8Array>(this.webhooks.documentUrl, form, {
        responseType: 'arraybuffer',
        timeout: 0,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        validateStatus: () => true,
      }),
    );

    if (response.status < 200 || response.status >= 300) {
      throw new DispatchFailure(
        `Document webhook responded with HTTP ${response.status}`,
      );
    }
    const document = Buffer.from(response.data);
    if (document.length === 0) {
      throw new DispatchFailure('Document webhook returned an empty document');
    }
    return document;
  }
}
