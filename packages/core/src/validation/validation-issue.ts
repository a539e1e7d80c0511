/**
 * Problems found while checking a file. Structural issues concern the byte layout of the
 * whole file; content issues concern the field values of a single line. Both end in a
 * rejected file and neither is retryable.
 */
export type StructuralIssue =
  | { category: 'structural'; kind: 'FileTooLarge'; maxBytes: number; sizeBytes: number | undefined }
  | { category: 'structural'; kind: 'EmptyFile' }
  | { category: 'structural'; kind: 'EmptyLine'; expected: number; line: number }
  | { category: 'structural'; actual: number; expected: number; kind: 'LineLength'; line: number }
  | { category: 'structural'; byteCode: number; kind: 'NonAscii'; line: number; position: number };

export type ContentIssue =
  | { category: 'content'; kind: 'InvalidTypeCode'; line: number; value: string }
  | { category: 'content'; kind: 'InvalidDate'; line: number; value: string }
  | { category: 'content'; kind: 'FutureDate'; line: number; value: string }
  | { category: 'content'; kind: 'InvalidAmount'; line: number; value: string }
  | { category: 'content'; kind: 'NonPositiveAmount'; line: number }
  | { category: 'content'; kind: 'InvalidCustomerId'; line: number; value: string }
  | { category: 'content'; kind: 'InvalidCardId'; line: number; value: string }
  | { category: 'content'; kind: 'InvalidTime'; line: number; value: string }
  | { category: 'content'; kind: 'MissingOwnerName'; line: number }
  | { category: 'content'; kind: 'MissingStoreName'; line: number };

export type ValidationIssue = StructuralIssue | ContentIssue;

export const MAX_REPORTED_ISSUES = 5;

export function formatIssue(issue: ValidationIssue): string {
  switch (issue.kind) {
    case 'FileTooLarge':
      return issue.sizeBytes === undefined
        ? `File size exceeds maximum ${issue.maxBytes} bytes`
        : `File size ${issue.sizeBytes} bytes exceeds maximum ${issue.maxBytes} bytes`;
    case 'EmptyFile':
      return 'File contains no transaction lines';
    case 'EmptyLine':
      return `Line ${issue.line}: Empty line (expected ${issue.expected} bytes)`;
    case 'LineLength':
      return `Line ${issue.line}: Expected ${issue.expected} bytes, found ${issue.actual} bytes`;
    case 'NonAscii':
      return `Line ${issue.line}: Non-ASCII character (code ${issue.byteCode}) at position ${issue.position}`;
    case 'InvalidTypeCode':
      return `Line ${issue.line}: Invalid transaction type '${issue.value}' (expected 1-9)`;
    case 'InvalidDate':
      return `Line ${issue.line}: Invalid date '${issue.value}' (expected YYYYMMDD)`;
    case 'FutureDate':
      return `Line ${issue.line}: Date ${issue.value} is in the future`;
    case 'InvalidAmount':
      return `Line ${issue.line}: Invalid amount '${issue.value}' (expected 10 digits in cents)`;
    case 'NonPositiveAmount':
      return `Line ${issue.line}: Amount must be greater than zero`;
    case 'InvalidCustomerId':
      return `Line ${issue.line}: Invalid customer id '${issue.value}' (expected 11 digits)`;
    case 'InvalidCardId':
      return `Line ${issue.line}: Invalid card id '${issue.value}' (expected 12 characters of 0-9, A-Z, a-z or *)`;
    case 'InvalidTime':
      return `Line ${issue.line}: Invalid time '${issue.value}' (expected HHMMSS)`;
    case 'MissingOwnerName':
      return `Line ${issue.line}: Owner name is empty`;
    case 'MissingStoreName':
      return `Line ${issue.line}: Store name is empty`;
  }
}

/**
 * Joins the first few formatted issues for storage on the file record.
 */
export function summarizeIssues(issues: readonly ValidationIssue[], limit = MAX_REPORTED_ISSUES): string {
  const shown = issues.slice(0, limit).map(formatIssue).join('; ');
  const hidden = issues.length - limit;
  return hidden > 0 ? `${shown} (and ${hidden} more)` : shown;
}
