import { describe, it, expect } from 'vitest';
import { formatPhone, formatPhoneColumn } from '../../../src/lib/normalizer/phone.js';
import { PhoneFormatError } from '../../../src/utils/errors.js';

describe('formatPhone', () => {
  it('should format a national Brazilian mobile number', () => {
    expect(formatPhone('16981773421')).toBe('+5516981773421');
  });

  it('should accept punctuation and spacing', () => {
    expect(formatPhone('(16) 98177-3421')).toBe('+5516981773421');
    expect(formatPhone(' 16 98177 3421 ')).toBe('+5516981773421');
  });

  it('should keep an explicit country code', () => {
    expect(formatPhone('+55 16 98177-3421')).toBe('+5516981773421');
    expect(formatPhone('+1 213-373-4253')).toBe('+12133734253');
  });

  it('should produce +55 followed by digits for Brazilian numbers', () => {
    const numbers = ['16981773421', '(11) 3456-7890', '21 99876-5432', '+55 (31) 3222-1100'];
    for (const number of numbers) {
      expect(formatPhone(number)).toMatch(/^\+55\d+$/);
    }
  });

  it('should use the given region for numbers without a country code', () => {
    expect(formatPhone('213-373-4253', 'US')).toBe('+12133734253');
  });

  it('should return blank values unchanged', () => {
    expect(formatPhone('')).toBe('');
    expect(formatPhone('   ')).toBe('   ');
  });

  it('should throw PhoneFormatError for text that is not a phone number', () => {
    expect(() => formatPhone('abc')).toThrow(PhoneFormatError);
    expect(() => formatPhone('12')).toThrow(PhoneFormatError);
  });
});

describe('formatPhoneColumn', () => {
  it('should format every cell into a text column', () => {
    const column = formatPhoneColumn({ kind: 'text', values: ['16981773421', ''] });
    expect(column).toEqual({ kind: 'text', values: ['+5516981773421', ''] });
  });

  it('should read numeric cells as digits', () => {
    const column = formatPhoneColumn({ kind: 'numeric', values: [16981773421, Number.NaN] });
    expect(column).toEqual({ kind: 'text', values: ['+5516981773421', ''] });
  });

  it('should stop at the first invalid number and report its row', () => {
    try {
      formatPhoneColumn({ kind: 'text', values: ['16981773421', 'not-a-phone', 'abc'] });
      expect.unreachable('formatPhoneColumn should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(PhoneFormatError);
      if (error instanceof PhoneFormatError) {
        expect(error.row).toBe(1);
        expect(error.value).toBe('not-a-phone');
      }
    }
  });
});
