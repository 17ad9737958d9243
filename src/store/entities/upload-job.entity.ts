import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

export const JOB_STATUSES = ['processing', 'completed', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

@Entity('upload_jobs')
export class UploadJob {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  txt_filename!: string;

  @Column({ type: 'varchar', length: 255 })
  csv_filename!: string;

  @Column({ type: 'text' })
  txt_content!: string;

  @Column({ type: 'text' })
  csv_content!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  docx_filename!: string | null;

  // Only written together with status = 'completed'
  @Column({ type: 'blob', nullable: true })
  docx_content!: Buffer | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Index()
  @CreateDateColumn()
  upload_timestamp!: Date;

  @UpdateDateColumn()
  updated_at!: Date;

  @Index()
  @Column({ type: 'varchar', length: 20, default: 'processing' })
  status!: JobStatus;
}

/** Listing projection: everything except the three payload columns. */
export type JobSummary = Omit<
  UploadJob,
  'txt_content' | 'csv_content' | 'docx_content'
>;
