import { describe, expect, it } from 'vitest';
import { USER_COLORS } from '../constants';
import { asRecord, generateColor, readInteger, truncate } from './utils';

describe('asRecord', () => {
  it('copies plain objects', () => {
    const source = { code: 'abc123' };
    const record = asRecord(source);
    expect(record).toEqual({ code: 'abc123' });
    expect(record).not.toBe(source);
  });

  it('returns an empty record for arrays, null and primitives', () => {
    expect(asRecord([1, 2])).toEqual({});
    expect(asRecord(null)).toEqual({});
    expect(asRecord('join')).toEqual({});
  });
});

describe('truncate', () => {
  it('trims before cutting', () => {
    expect(truncate('   hello world   ', 5)).toBe('hello');
  });

  it('counts emoji as single characters', () => {
    expect(truncate('🎉🎉🎉', 2)).toBe('🎉🎉');
  });

  it('stringifies numbers and drops other values', () => {
    expect(truncate(1234, 3)).toBe('123');
    expect(truncate(undefined, 10)).toBe('');
    expect(truncate({ text: 'x' }, 10)).toBe('');
  });
});

describe('readInteger', () => {
  it('accepts integers and numeric strings', () => {
    expect(readInteger(7)).toBe(7);
    expect(readInteger(' 12 ')).toBe(12);
  });

  it('rejects fractions and non-numeric input', () => {
    expect(readInteger(1.5)).toBeNull();
    expect(readInteger('12a')).toBeNull();
    expect(readInteger(null)).toBeNull();
  });
});

describe('generateColor', () => {
  it('returns deterministic colors for the same seed', () => {
    expect(generateColor('conn-123')).toBe(generateColor('conn-123'));
  });

  it('picks from the shared palette', () => {
    expect(USER_COLORS).toContain(generateColor('conn-456'));
  });
});
