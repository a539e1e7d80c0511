import type { ContentIssue, ParsedTransaction } from '@cnab-ingest/core';
import { centsToAmount } from '@cnab-ingest/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

/** Zero-based [start, end) byte ranges of the CNAB record. */
export const CNAB_FIELDS = {
  typeCode: [0, 1],
  date: [1, 9],
  amount: [9, 19],
  customerId: [19, 30],
  cardId: [30, 42],
  time: [42, 48],
  ownerName: [48, 62],
  storeName: [62, 80],
} as const satisfies Record<string, readonly [number, number]>;

type CnabField = keyof typeof CNAB_FIELDS;

const DIGITS = /^\d+$/;
const CARD_ID = /^[0-9A-Za-z*]{12}$/;
const MIN_YEAR = 1900;

function field(line: string, name: CnabField): string {
  const [start, end] = CNAB_FIELDS[name];
  return line.slice(start, end);
}

function isDigits(value: string, length: number): boolean {
  return value.length === length && DIGITS.test(value);
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * YYYYMMDD to YYYY-MM-DD, or undefined when it is not a calendar date.
 */
export function parseCnabDate(value: string): string | undefined {
  if (!isDigits(value, 8)) return undefined;

  const year = Number(value.slice(0, 4));
  const month = Number(value.slice(4, 6));
  const day = Number(value.slice(6, 8));
  if (year < MIN_YEAR || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }

  return `${value.slice(0, 4)}-${value.slice(4, 6)}-${value.slice(6, 8)}`;
}

/**
 * HHMMSS to HH:MM:SS, or undefined when it is not a time of day.
 */
export function parseCnabTime(value: string): string | undefined {
  if (!isDigits(value, 6)) return undefined;

  const hours = Number(value.slice(0, 2));
  const minutes = Number(value.slice(2, 4));
  const seconds = Number(value.slice(4, 6));
  if (hours > 23 || minutes > 59 || seconds > 59) return undefined;

  return `${value.slice(0, 2)}:${value.slice(2, 4)}:${value.slice(4, 6)}`;
}

/** The UTC calendar date of an instant, as YYYY-MM-DD. */
export function toIsoDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

/**
 * Decodes one structurally valid line. Every field is checked, so a line can
 * yield several issues.
 *
 * @param today - YYYY-MM-DD; dates after it are rejected
 */
export function parseLine(line: string, lineNumber: number, today: string): Result<ParsedTransaction, ContentIssue[]> {
  const issues: ContentIssue[] = [];

  const rawType = field(line, 'typeCode');
  const typeCode = Number(rawType);
  if (!isDigits(rawType, 1) || typeCode < 1 || typeCode > 9) {
    issues.push({ category: 'content', kind: 'InvalidTypeCode', line: lineNumber, value: rawType });
  }

  const rawDate = field(line, 'date');
  const occurredOn = parseCnabDate(rawDate);
  if (occurredOn === undefined) {
    issues.push({ category: 'content', kind: 'InvalidDate', line: lineNumber, value: rawDate });
  } else if (occurredOn > today) {
    issues.push({ category: 'content', kind: 'FutureDate', line: lineNumber, value: occurredOn });
  }

  const rawAmount = field(line, 'amount');
  if (!isDigits(rawAmount, 10)) {
    issues.push({ category: 'content', kind: 'InvalidAmount', line: lineNumber, value: rawAmount });
  } else if (Number(rawAmount) === 0) {
    issues.push({ category: 'content', kind: 'NonPositiveAmount', line: lineNumber });
  }

  const customerId = field(line, 'customerId');
  if (!isDigits(customerId, 11)) {
    issues.push({ category: 'content', kind: 'InvalidCustomerId', line: lineNumber, value: customerId });
  }

  const cardId = field(line, 'cardId');
  if (!CARD_ID.test(cardId)) {
    issues.push({ category: 'content', kind: 'InvalidCardId', line: lineNumber, value: cardId });
  }

  const rawTime = field(line, 'time');
  const occurredAt = parseCnabTime(rawTime);
  if (occurredAt === undefined) {
    issues.push({ category: 'content', kind: 'InvalidTime', line: lineNumber, value: rawTime });
  }

  const ownerName = field(line, 'ownerName').trim();
  if (ownerName.length === 0) {
    issues.push({ category: 'content', kind: 'MissingOwnerName', line: lineNumber });
  }

  const storeName = field(line, 'storeName').trim();
  if (storeName.length === 0) {
    issues.push({ category: 'content', kind: 'MissingStoreName', line: lineNumber });
  }

  if (issues.length > 0 || occurredOn === undefined || occurredAt === undefined) {
    return err(issues);
  }

  return ok({
    lineNumber,
    typeCode,
    occurredOn,
    occurredAt,
    amount: centsToAmount(rawAmount),
    customerId,
    cardId,
    store: { name: storeName, ownerName },
  });
}

/**
 * Parses every line; the file is accepted only if no line has an issue.
 */
export function parseLines(
  lines: readonly string[],
  today: string,
  firstLineNumber = 1
): Result<ParsedTransaction[], ContentIssue[]> {
  const transactions: ParsedTransaction[] = [];
  const issues: ContentIssue[] = [];

  lines.forEach((line, index) => {
    const result = parseLine(line, firstLineNumber + index, today);
    if (result.isOk()) {
      transactions.push(result.value);
    } else {
      issues.push(...result.error);
    }
  });

  return issues.length > 0 ? err(issues) : ok(transactions);
}
