import { describe, expect, it } from 'vitest';

import { buildCnabLine } from '../../../testing/cnab-fixtures.js';
import { parseCnabDate, parseCnabTime, parseLine, parseLines, toIsoDate } from '../line-parser.js';

const TODAY = '2024-03-01';

describe('parseLine', () => {
  it('decodes every field at its fixed offset', () => {
    const result = parseLine(buildCnabLine(), 7, TODAY);

    const parsed = result._unsafeUnwrap();
    expect(parsed).toMatchObject({
      lineNumber: 7,
      typeCode: 3,
      occurredOn: '2024-01-15',
      occurredAt: '15:34:53',
      customerId: '09620676017',
      cardId: '4753****3153',
      store: { name: 'BAR DO JOAO', ownerName: 'JOAO MACEDO' },
    });
    expect(parsed.amount.toFixed(2)).toBe('142.00');
  });

  it('trims padding on both name fields but keeps inner spaces', () => {
    const line = buildCnabLine({ ownerName: '  MARIA  JOSE', storeName: ' MERCEARIA IRMAOS' });

    expect(parseLine(line, 1, TODAY)._unsafeUnwrap().store).toEqual({
      name: 'MERCEARIA IRMAOS',
      ownerName: 'MARIA  JOSE',
    });
  });

  it('accepts a date equal to today', () => {
    const line = buildCnabLine({ date: '20240301' });

    expect(parseLine(line, 1, TODAY).isOk()).toBe(true);
  });

  it.each([
    ['0', { kind: 'InvalidTypeCode', value: '0' }],
    ['A', { kind: 'InvalidTypeCode', value: 'A' }],
  ])('rejects type code %s', (typeCode, issue) => {
    const result = parseLine(buildCnabLine({ typeCode }), 2, TODAY);

    expect(result._unsafeUnwrapErr()).toEqual([{ category: 'content', line: 2, ...issue }]);
  });

  it('rejects a date in the future', () => {
    const result = parseLine(buildCnabLine({ date: '20240302' }), 1, TODAY);

    expect(result._unsafeUnwrapErr()).toEqual([{ category: 'content', kind: 'FutureDate', line: 1, value: '2024-03-02' }]);
  });

  it('rejects a zero amount', () => {
    const result = parseLine(buildCnabLine({ amountCents: '0000000000' }), 1, TODAY);

    expect(result._unsafeUnwrapErr()).toEqual([{ category: 'content', kind: 'NonPositiveAmount', line: 1 }]);
  });

  it('collects every bad field of a line', () => {
    const line = buildCnabLine({
      date: '20230230',
      amountCents: '00000-1000',
      customerId: '0962067601X',
      cardId: '4753-***3153',
      time: '246000',
      ownerName: '',
      storeName: '',
    });

    expect(parseLine(line, 4, TODAY)._unsafeUnwrapErr()).toEqual([
      { category: 'content', kind: 'InvalidDate', line: 4, value: '20230230' },
      { category: 'content', kind: 'InvalidAmount', line: 4, value: '00000-1000' },
      { category: 'content', kind: 'InvalidCustomerId', line: 4, value: '0962067601X' },
      { category: 'content', kind: 'InvalidCardId', line: 4, value: '4753-***3153' },
      { category: 'content', kind: 'InvalidTime', line: 4, value: '246000' },
      { category: 'content', kind: 'MissingOwnerName', line: 4 },
      { category: 'content', kind: 'MissingStoreName', line: 4 },
    ]);
  });
});

describe('parseLines', () => {
  it('returns transactions in file order when every line is valid', () => {
    const lines = [buildCnabLine({ typeCode: '6' }), buildCnabLine({ typeCode: '1' })];

    const parsed = parseLines(lines, TODAY)._unsafeUnwrap();

    expect(parsed.map((transaction) => [transaction.lineNumber, transaction.typeCode])).toEqual([
      [1, 6],
      [2, 1],
    ]);
  });

  it('rejects the whole file when any line has an issue', () => {
    const lines = [buildCnabLine(), buildCnabLine({ typeCode: '0' }), buildCnabLine({ amountCents: '0000000000' })];

    expect(parseLines(lines, TODAY)._unsafeUnwrapErr()).toEqual([
      { category: 'content', kind: 'InvalidTypeCode', line: 2, value: '0' },
      { category: 'content', kind: 'NonPositiveAmount', line: 3 },
    ]);
  });
});

describe('date and time fields', () => {
  it('validates calendar dates including leap days', () => {
    expect(parseCnabDate('20240229')).toBe('2024-02-29');
    expect(parseCnabDate('20230229')).toBeUndefined();
    expect(parseCnabDate('18991231')).toBeUndefined();
    expect(parseCnabDate('20241301')).toBeUndefined();
  });

  it('validates times of day', () => {
    expect(parseCnabTime('000000')).toBe('00:00:00');
    expect(parseCnabTime('235959')).toBe('23:59:59');
    expect(parseCnabTime('120060')).toBeUndefined();
  });

  it('takes the UTC date of an instant', () => {
    expect(toIsoDate(new Date('2024-03-01T23:30:00.000-03:00'))).toBe('2024-03-02');
  });
});
