import { formatMultiplicity, isConsistent, isExactlyOne, parseMultiplicity } from '../multiplicity';

describe('parseMultiplicity', () => {
  test('ranges and single values', () => {
    expect(parseMultiplicity('1..*')).toEqual({ ok: true, value: { lower: 1, upper: null } });
    expect(parseMultiplicity('2')).toEqual({ ok: true, value: { lower: 2, upper: 2 } });
    expect(parseMultiplicity('*')).toEqual({ ok: true, value: { lower: 0, upper: null } });
    expect(parseMultiplicity(' 0 .. 3 ')).toEqual({ ok: true, value: { lower: 0, upper: 3 } });
  });

  test('absent text', () => {
    expect(parseMultiplicity('')).toEqual({ ok: false, reason: 'absent' });
    expect(parseMultiplicity('   ')).toEqual({ ok: false, reason: 'absent' });
  });

  test('syntax errors', () => {
    for (const text of ['a', '1..', '..2', '-1', '1..x', '*..1', '1.5', '1...2']) {
      expect(parseMultiplicity(text)).toEqual({ ok: false, reason: 'syntax' });
    }
  });

  test('inverted bounds parse but are inconsistent', () => {
    const r = parseMultiplicity('3..1');
    expect(r).toEqual({ ok: true, value: { lower: 3, upper: 1 } });
    if (r.ok) expect(isConsistent(r.value)).toBe(false);
  });
});

describe('multiplicity helpers', () => {
  test('isExactlyOne', () => {
    expect(isExactlyOne({ lower: 1, upper: 1 })).toBe(true);
    expect(isExactlyOne({ lower: 1, upper: null })).toBe(false);
  });

  test('formatMultiplicity', () => {
    expect(formatMultiplicity({ lower: 0, upper: null })).toBe('0..*');
    expect(formatMultiplicity({ lower: 2, upper: 2 })).toBe('2..2');
  });
});
