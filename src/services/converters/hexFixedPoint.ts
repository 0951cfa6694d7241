import { createPairConverter, type ComponentCodec } from './pairConverter.js';
import { fromFixed, toUint32, truncateScaled, type Axis } from './fixedPoint.js';

const HEX_DIGITS = '[0-9a-f]{1,8}';

export function encodeHex(value: number): string {
  return toUint32(truncateScaled(value)).toString(16);
}

function hexComponent(axis: Axis, prefix: boolean): ComponentCodec {
  return {
    pattern: prefix ? `0x${HEX_DIGITS}` : HEX_DIGITS,
    decode: (token) => fromFixed(parseInt(prefix ? token.slice(2) : token, 16), axis),
    encode: (value) => (prefix ? `0x${encodeHex(value)}` : encodeHex(value)),
  };
}

/** "9e34000, 4f1a000" */
export const hexFixedPoint = createPairConverter({
  id: 'hex',
  name: 'Hex',
  lng: hexComponent('lng', false),
  lat: hexComponent('lat', false),
});

/** "0x9e34000, 0x4f1a000" */
export const hexFixedPointCStyle = createPairConverter({
  id: 'hexCStyle',
  name: 'Hex (C)',
  lng: hexComponent('lng', true),
  lat: hexComponent('lat', true),
});
