import { describe, it, expect } from 'vitest';
import { formatTimestamp, parseTimestamp } from '../../../src/lib/normalizer/timestamp.js';

describe('formatTimestamp', () => {
  it('should canonicalize ISO 8601 date-times', () => {
    expect(formatTimestamp('2020-03-01T10:00:00')).toBe('2020-03-01 10:00:00');
    expect(formatTimestamp('2020-03-01 10:00')).toBe('2020-03-01 10:00:00');
    expect(formatTimestamp('2020-3-1T7:05:09')).toBe('2020-03-01 07:05:09');
  });

  it('should drop fractions and zone designators, keeping wall-clock time', () => {
    expect(formatTimestamp('2020-03-01T10:00:00.123Z')).toBe('2020-03-01 10:00:00');
    expect(formatTimestamp('2020-03-01T10:00:00-03:00')).toBe('2020-03-01 10:00:00');
  });

  it('should fill midnight for dates without a time', () => {
    expect(formatTimestamp('2020-03-01')).toBe('2020-03-01 00:00:00');
    expect(formatTimestamp('2020/03/01')).toBe('2020-03-01 00:00:00');
  });

  it('should read NN/NN/YYYY month first by default', () => {
    expect(formatTimestamp('03/01/2020 10:30')).toBe('2020-03-01 10:30:00');
  });

  it('should read NN/NN/YYYY day first when asked', () => {
    expect(formatTimestamp('01/03/2020', { dayFirst: true })).toBe('2020-03-01 00:00:00');
    expect(formatTimestamp('01.03.2020 08:15:00', { dayFirst: true })).toBe('2020-03-01 08:15:00');
  });

  it('should always read dotted dates day first', () => {
    expect(formatTimestamp('01.03.2020')).toBe('2020-03-01 00:00:00');
    expect(formatTimestamp('31.12.2020 23:00')).toBe('2020-12-31 23:00:00');
    expect(formatTimestamp('12.31.2020')).toBe('');
  });

  it('should convert 12-hour times', () => {
    expect(formatTimestamp('2020-03-01 10:00:00 PM')).toBe('2020-03-01 22:00:00');
    expect(formatTimestamp('03/01/2020 10:00 PM')).toBe('2020-03-01 22:00:00');
    expect(formatTimestamp('2020-03-01 12:15 am')).toBe('2020-03-01 00:15:00');
    expect(formatTimestamp('2020-03-01 12:15 PM')).toBe('2020-03-01 12:15:00');
    expect(formatTimestamp('2020-03-01 13:00 PM')).toBe('');
  });

  it('should read English month names', () => {
    expect(formatTimestamp('1 Mar 2020')).toBe('2020-03-01 00:00:00');
    expect(formatTimestamp('01-March-2020 07:30')).toBe('2020-03-01 07:30:00');
    expect(formatTimestamp('March 1, 2020 10:00')).toBe('2020-03-01 10:00:00');
    expect(formatTimestamp('Sept 2nd 2021, 8:05 pm')).toBe('2021-09-02 20:05:00');
    expect(formatTimestamp('1 Foo 2020')).toBe('');
  });

  it('should read compact YYYYMMDD dates', () => {
    expect(formatTimestamp('20200301')).toBe('2020-03-01 00:00:00');
    expect(formatTimestamp('20200301 10:00')).toBe('2020-03-01 10:00:00');
    expect(formatTimestamp('20201301')).toBe('');
  });

  it('should swap day and month when the first field cannot be a month', () => {
    expect(formatTimestamp('25/12/2020')).toBe('2020-12-25 00:00:00');
  });

  it('should return blank for unparseable or absent values', () => {
    expect(formatTimestamp('')).toBe('');
    expect(formatTimestamp('NaT')).toBe('');
    expect(formatTimestamp('not a date')).toBe('');
    expect(formatTimestamp('2020-02-30')).toBe('');
    expect(formatTimestamp('2020-03-01 24:00:00')).toBe('');
    expect(formatTimestamp(1583056800)).toBe('');
  });

  it('should accept leap days only in leap years', () => {
    expect(formatTimestamp('2020-02-29')).toBe('2020-02-29 00:00:00');
    expect(formatTimestamp('2019-02-29')).toBe('');
  });
});

describe('parseTimestamp', () => {
  it('should return the date-time fields', () => {
    expect(parseTimestamp('2021-12-31T23:59:58')).toEqual({
      year: 2021,
      month: 12,
      day: 31,
      hour: 23,
      minute: 59,
      second: 58,
    });
  });

  it('should return undefined for text it cannot read', () => {
    expect(parseTimestamp('yesterday')).toBeUndefined();
  });
});
