import type { Result } from 'neverthrow';
import { z } from 'zod';

import { parseJsonMessage } from './parse-json-message.js';

export const FileProcessingMessageSchema = z.object({
  fileId: z.string().uuid(),
  objectKey: z.string().trim().min(1),
  fileName: z.string().trim().min(1),
  uploadedAt: z.string().datetime({ offset: true }),
  correlationId: z.string().trim().min(1),
});

export type FileProcessingMessage = z.infer<typeof FileProcessingMessageSchema>;

export function parseFileProcessingMessage(body: string | undefined): Result<FileProcessingMessage, Error> {
  return parseJsonMessage(body, FileProcessingMessageSchema, 'file processing message');
}

export function serializeFileProcessingMessage(message: FileProcessingMessage): string {
  return JSON.stringify(message);
}
