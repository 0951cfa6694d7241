import { createPairConverter, type ComponentCodec } from './pairConverter.js';
import { SCALE } from './fixedPoint.js';

/**
 * Parcel ID layout, per 32-bit component:
 *   bit 31     hemisphere (set for W / S)
 *   bits 3-30  scaled magnitude, low 8 bits cleared, shifted left 3
 *   bits 0-7   extended area field (only ever present on input)
 */

const HEMISPHERE_BIT = 0x80000000;
const MAGNITUDE_MASK = 0x7fffffff;
const EXTENDED_MASK = 0xff;
const SHIFT = 3;

function isNegative(value: number): boolean {
  return value < 0 || Object.is(value, -0);
}

export function packParcelComponent(value: number): number {
  const magnitude = Math.round(Math.abs(value) * SCALE);
  const coarse = ((magnitude & ~EXTENDED_MASK) << SHIFT) & MAGNITUDE_MASK;
  return (coarse | (isNegative(value) ? HEMISPHERE_BIT : 0)) >>> 0;
}

export function unpackParcelComponent(raw: number): number {
  const negative = (raw & HEMISPHERE_BIT) !== 0;
  const body = raw & MAGNITUDE_MASK;
  const extended = body & EXTENDED_MASK;
  const scaled = extended !== 0
    ? (((body & ~EXTENDED_MASK) >>> SHIFT) & ~EXTENDED_MASK) | extended
    : body >>> SHIFT;
  const magnitude = scaled / SCALE;
  return negative ? -magnitude : magnitude;
}

const parcelComponent: ComponentCodec = {
  pattern: '(?:0x)?[0-9a-f]{1,8}',
  decode: (token) => unpackParcelComponent(parseInt(token.replace(/^0x/i, ''), 16)),
  encode: (value) => packParcelComponent(value).toString(16).toUpperCase(),
};

/** "PID C15C000, 80000000" */
export const parcelId = createPairConverter({
  id: 'parcelId',
  name: 'Parcel ID',
  lng: parcelComponent,
  lat: parcelComponent,
  marker: { pattern: 'PID', text: 'PID' },
});
