import { Injectable } from '@nestjs/common';
import { JobNotFoundException, JobNotReadyException } from '../common/errors';
import { JobStoreService } from '../store/job-store.service';
import { JobStatusDto } from './dto';

export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export interface Artifact {
  filename: string;
  content: Buffer;
}

@Injectable()
export class DocumentsService {
  constructor(private readonly jobStore: JobStoreService) {}

  async getStatus(jobId: number): Promise<JobStatusDto> {
    const job = await this.jobStore.getJob(jobId);
    if (!job) throw new JobNotFoundException(jobId);

    switch (job.status) {
      case 'completed':
        return { status: job.status, filename: job.docx_filename };
      case 'failed':
        return {
          status: job.status,
          filename: null,
          error: job.error_message ?? 'Document generation failed',
        };
      case 'processing':
        return { status: job.status, filename: null };
    }
  }

  /** The finished artifact; 409 while processing, 404 when failed or unknown. */
  async getArtifact(jobId: number): Promise<Artifact> {
    const job = await this.jobStore.getJob(jobId);
    if (!job || job.status === 'failed') throw new JobNotFoundException(jobId);
    if (job.status === 'processing') throw new JobNotReadyException(jobId);

    if (!job.docx_content || !job.docx_filename) {
      throw new JobNotFoundException(jobId);
    }
    return { filename: job.docx_filename, content: job.docx_content };
  }
}
