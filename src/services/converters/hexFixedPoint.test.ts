import { describe, it, expect } from 'vitest';
import { hexFixedPoint, hexFixedPointCStyle } from './hexFixedPoint.js';
import { SCALE } from './fixedPoint.js';

describe('hexFixedPoint.parse', () => {
  it('reads values below the thresholds as positive degrees', () => {
    expect(hexFixedPoint.parse('182b800, 4f1a000')).toEqual({ lng: 27.5, lat: 90 });
  });

  it('reads the upper half as negative degrees', () => {
    expect(hexFixedPoint.parse('FE7D4800 fb0e6000')).toEqual({ lng: -27.5, lat: -90 });
  });

  it('applies a separate threshold to each axis', () => {
    const parsed = hexFixedPoint.parse('9e34000, 9e34000');
    expect(parsed).toEqual({ lng: 180, lat: (0x9e34000 - 2 ** 32) / SCALE });
  });

  it('rejects prefixed, oversized and non-hex input', () => {
    expect(hexFixedPoint.parse('0x10, 0x20')).toBeNull();
    expect(hexFixedPoint.parse('123456789, 1')).toBeNull();
    expect(hexFixedPoint.parse('g1, 2')).toBeNull();
  });
});

describe('hexFixedPoint.format', () => {
  it('prints lowercase two\'s-complement hex', () => {
    expect(hexFixedPoint.format({ lng: 27.5, lat: -90 })).toBe('182b800, fb0e6000');
  });

  it('truncates toward zero so tiny negatives stay at zero', () => {
    expect(hexFixedPoint.format({ lng: -0.0000001, lat: 0.0000001 })).toBe('0, 0');
  });

  it('round-trips within one fixed-point unit', () => {
    const text = hexFixedPoint.format({ lng: 109.2345678, lat: -27.1234567 });
    expect(text).toBe('6001c71, fe82938f');
    const parsed = hexFixedPoint.parse(text);
    expect(parsed?.lng).toBe(100670577 / SCALE);
    expect(parsed?.lat).toBe(-24996977 / SCALE);
    expect(parsed?.lng).toBeCloseTo(109.2345678, 5);
  });

  it('round-trips values past the 180° threshold through the negative branch', () => {
    const parsed = hexFixedPoint.parse(hexFixedPoint.format({ lng: -179.5, lat: -89.5 }));
    expect(parsed).toEqual({ lng: -179.5, lat: -89.5 });
  });
});

describe('hexFixedPointCStyle', () => {
  it('requires the 0x prefix on both numbers', () => {
    expect(hexFixedPointCStyle.parse('0X182B800, 0x4f1a000')).toEqual({ lng: 27.5, lat: 90 });
    expect(hexFixedPointCStyle.parse('182b800, 4f1a000')).toBeNull();
    expect(hexFixedPointCStyle.parse('0x182b800, 4f1a000')).toBeNull();
  });

  it('prefixes the lowercase hex output', () => {
    expect(hexFixedPointCStyle.format({ lng: -27.5, lat: 90 })).toBe('0xfe7d4800, 0x4f1a000');
  });
});
