import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import pLimit from 'p-limit';
import pRetry from 'p-retry';
import {
  IsNull,
  QueryFailedError,
  Repository,
  SelectQueryBuilder,
} from 'typeorm';
import type { AppConfig } from '../config/configuration';
import { ChatMessage } from './entities/chat-message.entity';
import {
  isJobStatus,
  JobStatus,
  JobSummary,
  UploadJob,
} from './entities/upload-job.entity';

export interface NewJob {
  txtFilename: string;
  csvFilename: string;
  txtContent: string;
  csvContent: string;
}

export const JOB_SORT_KEYS = [
  'upload_timestamp',
  'id',
  'txt_filename',
  'csv_filename',
  'status',
] as const;

export type JobSortKey = (typeof JOB_SORT_KEYS)[number];

export interface JobFilter {
  status?: JobStatus;
  filenameContains?: string;
  from?: Date;
  to?: Date;
  sort?: JobSortKey;
  order?: 'ASC' | 'DESC';
  limit?: number;
  offset?: number;
}

export type StatusCounts = Record<JobStatus, number>;

const SUMMARY_COLUMNS = [
  'job.id',
  'job.txt_filename',
  'job.csv_filename',
  'job.docx_filename',
  'job.error_message',
  'job.upload_timestamp',
  'job.updated_at',
  'job.status',
];

const LOCK_ERROR_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_BUSY_SNAPSHOT',
  'SQLITE_LOCKED',
]);

export function isLockContention(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError
  ) {
    return LOCK_ERROR_CODES.has(String(driverError.code));
  }
  return false;
}

/** SQLite stores CreateDateColumn values as UTC `YYYY-MM-DD HH:MM:SS`. */
function toSqliteDatetime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

/**
 * Single owner of the `upload_jobs` and `chat_history` tables.
 *
 * Every mutation is one SQL statement, so SQLite commits it as its own
 * transaction. Mutations are funnelled through a one-slot queue (the file's
 * write lock is global anyway) and retried when another connection holds
 * the lock. Reads bypass the queue.
 */
@Injectable()
export class JobStoreService {
  private readonly logger = new Logger(JobStoreService.name);
  private readonly writeQueue = pLimit(1);
  private readonly writeRetries: number;
  private readonly filenameCaseSensitive: boolean;

  constructor(
    @InjectRepository(UploadJob)
    private readonly jobs: Repository<UploadJob>,
    @InjectRepository(ChatMessage)
    private readonly chats: Repository<ChatMessage>,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.writeRetries = configService.get('database', {
      infer: true,
    }).writeRetries;
    this.filenameCaseSensitive = configService.get('history', {
      infer: true,
    }).filenameCaseSensitive;
  }

  async createJob(job: NewJob): Promise<number> {
    const result = await this.write('createJob', () =>
      this.jobs.insert({
        txt_filename: job.txtFilename,
        csv_filename: job.csvFilename,
        txt_content: job.txtContent,
        csv_content: job.csvContent,
        status: 'processing',
      }),
    );
    const id: unknown = result.identifiers[0]?.id;
    if (typeof id !== 'number') {
      throw new Error('Job insert did not return a generated id');
    }
    this.logger.log(`Job ${id} created (${job.txtFilename}, ${job.csvFilename})`);
    return id;
  }

  /**
   * Attaches the artifact and moves the job to `completed`.
   * Returns false (and writes nothing) when the job is unknown or terminal.
   */
  async completeJob(
    id: number,
    docxFilename: string,
    docxContent: Buffer,
  ): Promise<boolean> {
    const applied = await this.write('completeJob', async () => {
      if (!(await this.isProcessing(id))) return false;
      await this.jobs.update(
        { id, status: 'processing' },
        {
          status: 'completed',
          docx_filename: docxFilename,
          docx_content: docxContent,
        },
      );
      return true;
    });
    if (applied) {
      this.logger.log(`Job ${id} completed (${docxContent.length} bytes)`);
    } else {
      this.logger.warn(`Ignored completion for job ${id}: not processing`);
    }
    return applied;
  }

  async failJob(id: number, reason: string): Promise<boolean> {
    const applied = await this.write('failJob', async () => {
      if (!(await this.isProcessing(id))) return false;
      await this.jobs.update(
        { id, status: 'processing' },
        { status: 'failed', error_message: reason },
      );
      return true;
    });
    if (applied) {
      this.logger.warn(`Job ${id} failed: ${reason}`);
    } else {
      this.logger.warn(`Ignored failure for job ${id}: not processing`);
    }
    return applied;
  }

  async getJob(id: number): Promise<UploadJob | null> {
    return this.jobs.findOne({ where: { id } });
  }

  async listJobs(
    filter: JobFilter = {},
  ): Promise<{ jobs: JobSummary[]; total: number }> {
    const sort = filter.sort ?? 'upload_timestamp';
    const order = filter.order ?? 'DESC';

    const query = this.filtered(filter)
      .select(SUMMARY_COLUMNS)
      .orderBy(`job.${sort}`, order)
      .addOrderBy('job.id', order)
      .take(filter.limit ?? 100)
      .skip(filter.offset ?? 0);

    const [rows, total] = await query.getManyAndCount();
    const jobs = rows.map(
      (row): JobSummary => ({
        id: row.id,
        txt_filename: row.txt_filename,
        csv_filename: row.csv_filename,
        docx_filename: row.docx_filename,
        error_message: row.error_message,
        upload_timestamp: row.upload_timestamp,
        updated_at: row.updated_at,
        status: row.status,
      }),
    );
    return { jobs, total };
  }

  /** Per-status totals for `filter`; the status criterion itself is ignored. */
  async countJobsByStatus(
    filter: Omit<JobFilter, 'status'> = {},
  ): Promise<StatusCounts> {
    const rows = await this.filtered({ ...filter, status: undefined })
      .select('job.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('job.status')
      .getRawMany<{ status: unknown; count: unknown }>();

    const counts: StatusCounts = { processing: 0, completed: 0, failed: 0 };
    for (const row of rows) {
      if (isJobStatus(row.status)) counts[row.status] = Number(row.count);
    }
    return counts;
  }

  async createChat(userMessage: string): Promise<number> {
    const result = await this.write('createChat', () =>
      this.chats.insert({ user_message: userMessage, bot_response: null }),
    );
    const id: unknown = result.identifiers[0]?.id;
    if (typeof id !== 'number') {
      throw new Error('Chat insert did not return a generated id');
    }
    return id;
  }

  /** Writes the reply once; later calls for the same row are ignored. */
  async fillChatResponse(id: number, botResponse: string): Promise<boolean> {
    return this.write('fillChatResponse', async () => {
      const row = await this.chats.findOne({
        select: { id: true, bot_response: true },
        where: { id },
      });
      if (!row || row.bot_response !== null) return false;
      await this.chats.update(
        { id, bot_response: IsNull() },
        { bot_response: botResponse },
      );
      return true;
    });
  }

  async listChats(): Promise<ChatMessage[]> {
    return this.chats.find({ order: { id: 'ASC' } });
  }

  async ping(): Promise<void> {
    await this.jobs.query('SELECT 1');
  }

  private async isProcessing(id: number): Promise<boolean> {
    const job = await this.jobs.findOne({
      select: { id: true, status: true },
      where: { id },
    });
    return job?.status === 'processing';
  }

  private filtered(filter: JobFilter): SelectQueryBuilder<UploadJob> {
    const query = this.jobs.createQueryBuilder('job');

    if (filter.status) {
      query.andWhere('job.status = :status', { status: filter.status });
    }
    if (filter.filenameContains) {
      if (this.filenameCaseSensitive) {
        query.andWhere(
          '(instr(job.txt_filename, :needle) > 0' +
            ' OR instr(job.csv_filename, :needle) > 0' +
            ' OR instr(job.docx_filename, :needle) > 0)',
          { needle: filter.filenameContains },
        );
      } else {
        query.andWhere(
          "(LOWER(job.txt_filename) LIKE :pattern ESCAPE '\\'" +
            " OR LOWER(job.csv_filename) LIKE :pattern ESCAPE '\\'" +
            " OR LOWER(job.docx_filename) LIKE :pattern ESCAPE '\\')",
          {
            pattern: `%${escapeLike(filter.filenameContains.toLowerCase())}%`,
          },
        );
      }
    }
    if (filter.from) {
      query.andWhere('job.upload_timestamp >= :from', {
        from: toSqliteDatetime(filter.from),
      });
    }
    if (filter.to) {
      query.andWhere('job.upload_timestamp <= :to', {
        to: toSqliteDatetime(filter.to),
      });
    }
    return query;
  }

  private write<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.writeQueue(() =>
      pRetry(
        async () => {
          try {
            return await fn();
          } catch (error) {
            if (isLockContention(error)) throw error;
            throw new pRetry.AbortError(
              error instanceof Error ? error : String(error),
            );
          }
        },
        {
          retries: this.writeRetries,
          minTimeout: 50,
          maxTimeout: 1000,
          onFailedAttempt: (error) => {
            this.logger.warn(
              `${operation}: store locked, attempt ${error.attemptNumber} (${error.retriesLeft} retries left)`,
            );
          },
        },
      ),
    );
  }
}
