import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';

/** Rejected upload; raised before any job row exists. */
export class UploadValidationException extends BadRequestException {}

export class JobNotFoundException extends NotFoundException {
  constructor(readonly jobId: number) {
    super('File not found');
  }
}

export class JobNotReadyException extends ConflictException {
  constructor(readonly jobId: number) {
    super('File is not ready yet');
  }
}

export class ChatDispatchException extends BadGatewayException {}

/**
 * Outcome of a document dispatch that did not produce an artifact.
 * Recorded on the job as its failure reason; never surfaced to a request.
 */
export class DispatchFailure extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'DispatchFailure';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
