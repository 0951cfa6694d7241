import { createPairConverter, type ComponentCodec } from './pairConverter.js';
import { toFixedDigits } from '../../utils/number.js';

const DECIMAL_PATTERN = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)`;

export function decodeDecimal(token: string): number | null {
  const value = parseFloat(token);
  return Number.isFinite(value) ? value : null;
}

export const decimalComponent: ComponentCodec = {
  pattern: DECIMAL_PATTERN,
  decode: decodeDecimal,
  encode: (value) => toFixedDigits(value, 7),
};

/** "-27.1234567, 109.2345678" (longitude first) */
export const decimalDegrees = createPairConverter({
  id: 'decimalDegrees',
  name: 'Decimal Degrees',
  lng: decimalComponent,
  lat: decimalComponent,
});
