import { describe, it, expect } from 'vitest';
import { decimalFixedPoint } from './decimalFixedPoint.js';
import { SCALE } from './fixedPoint.js';

describe('decimalFixedPoint.parse', () => {
  it('reads signed decimal integers', () => {
    expect(decimalFixedPoint.parse('D 123456, D -654321')).toEqual({ lng: 123456 / SCALE, lat: -654321 / SCALE });
  });

  it('reads the upper 32-bit half as negative', () => {
    expect(decimalFixedPoint.parse('d 4294312975, D123456')).toEqual({ lng: -654321 / SCALE, lat: 123456 / SCALE });
  });

  it('rejects input without the D marker or with fractions', () => {
    expect(decimalFixedPoint.parse('123456, -654321')).toBeNull();
    expect(decimalFixedPoint.parse('D 1.5, D 2')).toBeNull();
  });
});

describe('decimalFixedPoint.format', () => {
  it('prints negatives as their unsigned wraparound', () => {
    const parsed = decimalFixedPoint.parse('D 123456, D -654321');
    expect(parsed).not.toBeNull();
    if (!parsed) return;
    expect(decimalFixedPoint.format(parsed)).toBe('D 123456, D 4294312975');
  });

  it('rounds to the nearest unit', () => {
    expect(decimalFixedPoint.format({ lng: 27.5, lat: -27.5 })).toBe('D 25344000, D 4269623296');
    expect(decimalFixedPoint.format({ lng: 1.6 / SCALE, lat: 1.4 / SCALE })).toBe('D 2, D 1');
  });

  it('round-trips through the wrapped form', () => {
    const coordinate = { lng: -109.5, lat: 27.25 };
    const text = decimalFixedPoint.format(coordinate);
    expect(text).toBe('D 4194052096, D 25113600');
    expect(decimalFixedPoint.parse(text)).toEqual(coordinate);
  });
});
