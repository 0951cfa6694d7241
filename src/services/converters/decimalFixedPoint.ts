import { createPairConverter, type ComponentCodec } from './pairConverter.js';
import { fromFixed, roundScaled, toUint32, type Axis } from './fixedPoint.js';

const MARKER = /^D\s*/i;

/**
 * Input may be signed; output always goes through the 32-bit wraparound,
 * so negative values print as their unsigned two's-complement form.
 */
function decimalFixedComponent(axis: Axis): ComponentCodec {
  return {
    pattern: String.raw`D\s*[+-]?\d{1,10}`,
    decode: (token) => fromFixed(parseInt(token.replace(MARKER, ''), 10), axis),
    encode: (value) => `D ${toUint32(roundScaled(value))}`,
  };
}

/** "D 123456, D 4294312975" */
export const decimalFixedPoint = createPairConverter({
  id: 'decimalFixedPoint',
  name: 'Decimal Fixed-Point',
  lng: decimalFixedComponent('lng'),
  lat: decimalFixedComponent('lat'),
});
