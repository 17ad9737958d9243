import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  StreamableFile,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import {
  ApiBody,
  ApiConsumes,
  ApiOperation,
  ApiProduces,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { DocumentsService, DOCX_MIME_TYPE } from './documents.service';
import { JobStatusDto, UploadAcceptedDto } from './dto';
import { UploadService } from './upload.service';
import type { UploadedFiles as UploadedFilePair } from './upload.service';

@ApiTags('documents')
@Controller()
export class DocumentsController {
  constructor(
    private readonly uploadService: UploadService,
    private readonly documentsService: DocumentsService,
  ) {}

  @Post('upload')
  @HttpCode(HttpStatus.ACCEPTED)
  @UseInterceptors(
    FileFieldsInterceptor(
      [
        { name: 'txt_file', maxCount: 1 },
        { name: 'csv_file', maxCount: 1 },
      ],
    ),
  )
  @ApiOperation({
    summary: 'Upload a template and its data file for document generation',
    description:
      'Creates a job and returns its id immediately; generation runs in the background.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: ['txt_file', 'csv_file'],
      properties: {
        txt_file: { type: 'string', format: 'binary' },
        csv_file: { type: 'string', format: 'binary' },
      },
    },
  })
  @ApiResponse({ status: 202, type: UploadAcceptedDto })
  @ApiResponse({ status: 400, description: 'Missing, empty or invalid files' })
  @ApiResponse({ status: 413, description: 'A file exceeds the size limit' })
  async upload(
    @UploadedFiles() files: UploadedFilePair | undefined,
  ): Promise<UploadAcceptedDto> {
    const jobId = await this.uploadService.ingest(files ?? {});
    return { success: true, job_id: jobId };
  }

  @Get('check_status/:job_id')
  @ApiOperation({ summary: 'Poll the status of a job' })
  @ApiResponse({ status: 200, type: JobStatusDto })
  @ApiResponse({ status: 404, description: 'Unknown job' })
  getStatus(
    @Param('job_id', ParseIntPipe) jobId: number,
  ): Promise<JobStatusDto> {
    return this.documentsService.getStatus(jobId);
  }

  @Get('download/:job_id')
  @ApiOperation({ summary: 'Download the generated document' })
  @ApiProduces(DOCX_MIME_TYPE)
  @ApiResponse({ status: 200, description: 'The generated .docx' })
  @ApiResponse({ status: 404, description: 'Unknown or failed job' })
  @ApiResponse({ status: 409, description: 'Job is still processing' })
  async download(
    @Param('job_id', ParseIntPipe) jobId: number,
  ): Promise<StreamableFile> {
    const artifact = await this.documentsService.getArtifact(jobId);
    return new StreamableFile(artifact.content, {
      type: DOCX_MIME_TYPE,
      disposition: `attachment; filename="${artifact.filename}"`,
      length: artifact.content.length,
    });
  }
}
