import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { UploadValidationException } from '../common/errors';
import {
  extensionOf,
  sanitizeFilename,
} from '../common/utils/sanitize-filename';
import { JobStoreService } from '../store/job-store.service';
import { WebhookDispatcherService } from './webhook-dispatcher.service';

export interface UploadedFiles {
  txt_file?: Express.Multer.File[];
  csv_file?: Express.Multer.File[];
}

// ignoreBOM keeps a leading BOM in the payload forwarded to the webhook
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function decodeText(file: Express.Multer.File): string {
  try {
    return utf8.decode(file.buffer);
  } catch {
    throw new UploadValidationException(
      'Uploaded files must be UTF-8 encoded text',
    );
  }
}

@Injectable()
export class UploadService {
  private readonly logger = new Logger(UploadService.name);
  private readonly maxBytes: number;

  constructor(
    private readonly jobStore: JobStoreService,
    private readonly dispatcher: WebhookDispatcherService,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.maxBytes = configService.get('upload', { infer: true }).maxBytes;
  }

  /**
   * Validates the pair, records a `processing` job and hands it to the
   * dispatcher. Resolves as soon as the job row exists.
   */
  async ingest(files: UploadedFiles): Promise<number> {
    const txtFile = files.txt_file?.[0];
    const csvFile = files.csv_file?.[0];

    if (!txtFile || !csvFile) {
      throw new UploadValidationException('Both TXT and CSV files are required');
    }
    if (!txtFile.originalname || !csvFile.originalname) {
      throw new UploadValidationException('Please select both files');
    }
    if (
      extensionOf(txtFile.originalname) !== 'txt' ||
      extensionOf(csvFile.originalname) !== 'csv'
    ) {
      throw new UploadValidationException(
        'Invalid file types. Only TXT and CSV files are allowed',
      );
    }
    if (txtFile.buffer.length === 0 || csvFile.buffer.length === 0) {
      throw new UploadValidationException('Uploaded files must not be empty');
    }
    if (txtFile.buffer.length + csvFile.buffer.length > this.maxBytes) {
      throw new UploadValidationException(
        `Combined upload size exceeds ${this.maxBytes} bytes`,
      );
    }

    const txtContent = decodeText(txtFile);
    const csvContent = decodeText(csvFile);

    const jobId = await this.jobStore.createJob({
      txtFilename: sanitizeFilename(txtFile.originalname) || 'document.txt',
      csvFilename: sanitizeFilename(csvFile.originalname) || 'data.csv',
      txtContent,
      csvContent,
    });

    this.dispatcher.dispatch(jobId, { txtContent, csvContent });
    this.logger.log(`Upload accepted as job ${jobId}`);
    return jobId;
  }
}
