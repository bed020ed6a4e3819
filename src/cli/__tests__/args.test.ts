import { optionalPath, parseBoolish, parseIntish, parseReportFormat } from '../args';

describe('parseBoolish', () => {
  test('treats a bare flag as true', () => {
    expect(parseBoolish(true, false)).toBe(true);
    expect(parseBoolish('', false)).toBe(true);
  });

  test('accepts common spellings', () => {
    expect(parseBoolish('YES', false)).toBe(true);
    expect(parseBoolish(' on ', false)).toBe(true);
    expect(parseBoolish('0', true)).toBe(false);
    expect(parseBoolish('off', true)).toBe(false);
  });

  test('falls back to the default for absent or unknown values', () => {
    expect(parseBoolish(undefined, true)).toBe(true);
    expect(parseBoolish(null, false)).toBe(false);
    expect(parseBoolish('maybe', true)).toBe(true);
  });
});

describe('parseIntish', () => {
  test('truncates numbers and ignores garbage', () => {
    expect(parseIntish('12')).toBe(12);
    expect(parseIntish('3.9')).toBe(3);
    expect(parseIntish('abc')).toBeUndefined();
    expect(parseIntish('')).toBeUndefined();
    expect(parseIntish(undefined)).toBeUndefined();
  });
});

describe('parseReportFormat / optionalPath', () => {
  test('defaults to markdown', () => {
    expect(parseReportFormat('JSON')).toBe('json');
    expect(parseReportFormat('md')).toBe('md');
    expect(parseReportFormat(undefined)).toBe('md');
  });

  test('drops blank paths', () => {
    expect(optionalPath('  ')).toBeUndefined();
    expect(optionalPath(' out.json ')).toBe('out.json');
    expect(optionalPath(undefined)).toBeUndefined();
  });
});
