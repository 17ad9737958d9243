import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import {
  JOB_STATUSES,
  JobStatus,
} from '../../store/entities/upload-job.entity';
import { JOB_SORT_KEYS, JobSortKey } from '../../store/job-store.service';

export class HistoryQueryDto {
  @ApiPropertyOptional({ enum: JOB_STATUSES })
  @IsOptional()
  @IsIn(JOB_STATUSES)
  status?: JobStatus;

  @ApiPropertyOptional({
    description: 'Substring of the txt, csv or docx filename',
  })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  filename?: string;

  @ApiPropertyOptional({ description: 'Uploaded at or after (ISO 8601)' })
  @IsOptional()
  @IsISO8601({ strict: true })
  from?: string;

  @ApiPropertyOptional({ description: 'Uploaded at or before (ISO 8601)' })
  @IsOptional()
  @IsISO8601({ strict: true })
  to?: string;

  @ApiPropertyOptional({ enum: JOB_SORT_KEYS, default: 'upload_timestamp' })
  @IsOptional()
  @IsIn(JOB_SORT_KEYS)
  sort?: JobSortKey;

  @ApiPropertyOptional({ enum: ['asc', 'desc'], default: 'desc' })
  @IsOptional()
  @IsIn(['asc', 'desc'])
  order?: 'asc' | 'desc';

  @ApiPropertyOptional({ default: 100, minimum: 1, maximum: 500 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;

  @ApiPropertyOptional({ default: 0, minimum: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}

export class JobSummaryDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  txt_filename!: string;

  @ApiProperty()
  csv_filename!: string;

  @ApiProperty({ type: String, nullable: true })
  docx_filename!: string | null;

  @ApiProperty({ type: String, nullable: true })
  error_message!: string | null;

  @ApiProperty()
  upload_timestamp!: Date;

  @ApiProperty()
  updated_at!: Date;

  @ApiProperty({ enum: JOB_STATUSES })
  status!: JobStatus;
}

export class StatusCountsDto {
  @ApiProperty()
  processing!: number;

  @ApiProperty()
  completed!: number;

  @ApiProperty()
  failed!: number;
}

export class HistoryPageDto {
  @ApiProperty({ type: [JobSummaryDto] })
  jobs!: JobSummaryDto[];

  @ApiProperty({ description: 'Jobs matching the filter, ignoring paging' })
  total!: number;

  @ApiProperty({
    type: StatusCountsDto,
    description: 'Per-status totals for the filter without its status criterion',
  })
  counts!: StatusCountsDto;
}
