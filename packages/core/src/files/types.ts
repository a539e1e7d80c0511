import type { FileStatus } from './file-status.js';

/** Maximum length of the error message stored on a file record. */
export const MAX_FILE_ERROR_MESSAGE_LENGTH = 1000;

/**
 * An uploaded CNAB file as tracked by the pipeline.
 */
export interface IngestFile {
  id: string;
  name: string;
  sizeBytes: number;
  objectKey: string;
  status: FileStatus;
  errorMessage: string | undefined;
  uploadedAt: Date;
  processedAt: Date | undefined;
}

export interface NewIngestFile {
  id: string;
  name: string;
  sizeBytes: number;
  objectKey: string;
  uploadedAt: Date;
}

export function truncateErrorMessage(message: string, maxLength = MAX_FILE_ERROR_MESSAGE_LENGTH): string {
  return message.length <= maxLength ? message : message.slice(0, maxLength);
}
