import { InvalidStatusTransitionError } from '../errors/index.js';

export const FILE_STATUSES = ['Uploaded', 'Processing', 'Processed', 'Rejected'] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

export type TerminalFileStatus = Extract<FileStatus, 'Processed' | 'Rejected'>;

const ALLOWED_TRANSITIONS: Record<FileStatus, readonly FileStatus[]> = {
  Uploaded: ['Processing'],
  Processing: ['Processed', 'Rejected'],
  Processed: [],
  Rejected: [],
};

export function isFileStatus(value: string): value is FileStatus {
  return (FILE_STATUSES as readonly string[]).includes(value);
}

export function isTerminalStatus(status: FileStatus): status is TerminalFileStatus {
  return status === 'Processed' || status === 'Rejected';
}

export function canTransition(from: FileStatus, to: FileStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Guards a status change. An illegal transition is a programming error, so it throws.
 */
export function assertTransition(from: FileStatus, to: FileStatus, fileId?: string): void {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to, { fileId });
  }
}
