/**
 * Fixed-point helpers shared by the hex, decimal and parcel-id dialects.
 *
 * Degrees are scaled to units of 1/256 arc-second and carried in 32 bits.
 * Values above the encoded magnitude of 180° (longitude) or 90° (latitude)
 * are the two's-complement negative half.
 */

/** 1/256 arc-second units per degree */
export const SCALE = 60 * 60 * 256;

export const UINT32_RANGE = 2 ** 32;

/** 180 * SCALE */
export const LNG_THRESHOLD = 0x9e34000;

/** 90 * SCALE */
export const LAT_THRESHOLD = 0x4f1a000;

export type Axis = 'lng' | 'lat';

export function thresholdFor(axis: Axis): number {
  return axis === 'lng' ? LNG_THRESHOLD : LAT_THRESHOLD;
}

/** Read a raw integer as signed degrees */
export function fromFixed(raw: number, axis: Axis): number {
  if (raw <= thresholdFor(axis)) {
    return raw / SCALE;
  }
  return (raw - UINT32_RANGE) / SCALE;
}

/** Wrap a scaled integer into the unsigned 32-bit range */
export function toUint32(scaled: number): number {
  const wrapped = scaled % UINT32_RANGE;
  return wrapped < 0 ? wrapped + UINT32_RANGE : wrapped + 0;
}

/** Scale and truncate toward zero */
export function truncateScaled(degrees: number): number {
  return Math.trunc(degrees * SCALE);
}

/** Scale and round half up */
export function roundScaled(degrees: number): number {
  return Math.floor(degrees * SCALE + 0.5);
}
