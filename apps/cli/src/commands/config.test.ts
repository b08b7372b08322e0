import { ValidationError } from '@pack-doctor/core';
import { describe, expect, it } from 'vitest';

import { convertValue, isValidKey } from './config.js';

describe('config command', () => {
  it('knows the stored keys', () => {
    expect(isValidKey('packFormat')).toBe(true);
    expect(isValidKey('autoFix')).toBe(false);
  });

  it('converts values to the stored types', () => {
    expect(convertValue('packFormat', '15')).toBe(15);
    expect(convertValue('indent', '2')).toBe(2);
    expect(convertValue('backup', 'false')).toBe(false);
    expect(convertValue('description', 'My swords')).toBe('My swords');
  });

  it('rejects values the schema does not accept', () => {
    expect(() => convertValue('packFormat', 'eight')).toThrow(ValidationError);
    expect(() => convertValue('indent', '11')).toThrow(ValidationError);
    expect(() => convertValue('maxAttempts', '0')).toThrow(ValidationError);
    expect(() => convertValue('backup', 'maybe')).toThrow(ValidationError);
  });
});
