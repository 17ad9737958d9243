import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type { JobStatus } from '../../store/entities/upload-job.entity';
import { JOB_STATUSES } from '../../store/entities/upload-job.entity';

export class UploadAcceptedDto {
  @ApiProperty({ example: true })
  success!: true;

  @ApiProperty({ description: 'Identifier to poll with', example: 42 })
  job_id!: number;
}

export class JobStatusDto {
  @ApiProperty({ enum: JOB_STATUSES })
  status!: JobStatus;

  @ApiProperty({
    type: String,
    nullable: true,
    description: 'Artifact filename, set once the job has completed',
    example: 'demand_letter_42.docx',
  })
  filename!: string | null;

  @ApiPropertyOptional({ description: 'Failure reason for failed jobs' })
  error?: string;
}
