import type { StructuralIssue } from '@cnab-ingest/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export const CNAB_LINE_LENGTH = 80;
export const MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

const LF = 0x0a;
const CR = 0x0d;
const MAX_ASCII = 127;

export interface StructuralLimits {
  lineLength: number;
  maxFileSizeBytes: number;
}

export interface StructuralValidationOptions {
  /** Size announced by the object store; checked before any byte is read. */
  declaredSizeBytes?: number | undefined;
  /**
   * Receives every line, without its terminator, in file order. The buffer may be
   * a view over a chunk that is reused afterwards: copy it to keep it.
   */
  onLine?: ((line: Buffer, lineNumber: number) => void) | undefined;
}

export interface StructuralSummary {
  lineCount: number;
  sizeBytes: number;
}

/**
 * Checks the byte layout of a CNAB file in a single pass: size limit, exact line
 * length, ASCII-only content and at least one line. Every violation is collected
 * rather than stopping at the first one; only an oversized file stops early.
 */
export class StructuralValidator {
  private readonly limits: StructuralLimits;

  constructor(limits: Partial<StructuralLimits> = {}) {
    this.limits = {
      lineLength: limits.lineLength ?? CNAB_LINE_LENGTH,
      maxFileSizeBytes: limits.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES,
    };
  }

  async validate(
    source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
    options: StructuralValidationOptions = {}
  ): Promise<Result<StructuralSummary, StructuralIssue[]>> {
    const { lineLength, maxFileSizeBytes } = this.limits;

    if (options.declaredSizeBytes !== undefined && options.declaredSizeBytes > maxFileSizeBytes) {
      return err([
        { category: 'structural', kind: 'FileTooLarge', maxBytes: maxFileSizeBytes, sizeBytes: options.declaredSizeBytes },
      ]);
    }

    const issues: StructuralIssue[] = [];
    let lineCount = 0;
    let sizeBytes = 0;
    let pending: Buffer[] = [];

    const checkLine = (raw: Buffer): void => {
      lineCount += 1;
      const line = raw.length > 0 && raw[raw.length - 1] === CR ? raw.subarray(0, raw.length - 1) : raw;

      if (line.length === 0) {
        issues.push({ category: 'structural', kind: 'EmptyLine', expected: lineLength, line: lineCount });
        return;
      }

      if (line.length !== lineLength) {
        issues.push({
          category: 'structural',
          kind: 'LineLength',
          actual: line.length,
          expected: lineLength,
          line: lineCount,
        });
      }

      // Only the first offending byte of a line is reported
      for (let i = 0; i < line.length; i++) {
        const byte = line[i];
        if (byte !== undefined && byte > MAX_ASCII) {
          issues.push({ category: 'structural', kind: 'NonAscii', byteCode: byte, line: lineCount, position: i + 1 });
          break;
        }
      }

      options.onLine?.(line, lineCount);
    };

    for await (const chunk of source) {
      sizeBytes += chunk.byteLength;
      if (sizeBytes > maxFileSizeBytes) {
        return err([{ category: 'structural', kind: 'FileTooLarge', maxBytes: maxFileSizeBytes, sizeBytes: undefined }]);
      }

      const bytes = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
      let start = 0;
      let newline = bytes.indexOf(LF, start);
      while (newline !== -1) {
        const tail = bytes.subarray(start, newline);
        checkLine(pending.length > 0 ? Buffer.concat([...pending, tail]) : tail);
        pending = [];
        start = newline + 1;
        newline = bytes.indexOf(LF, start);
      }
      if (start < bytes.length) {
        // Copied: the producer may reuse the chunk once we ask for the next one
        pending.push(Buffer.from(bytes.subarray(start)));
      }
    }

    if (pending.length > 0) {
      checkLine(Buffer.concat(pending));
    }

    if (lineCount === 0) {
      issues.push({ category: 'structural', kind: 'EmptyFile' });
    }

    return issues.length > 0 ? err(issues) : ok({ lineCount, sizeBytes });
  }
}
