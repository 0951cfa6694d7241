import { createPairConverter, type ComponentCodec } from './pairConverter.js';
import { toFixedDigits } from '../../utils/number.js';

const TOKEN = /^(\d+(?:\.\d+)?)\s*([NSEW])$/i;

/** Unsigned magnitude followed by a hemisphere letter */
function suffixComponent(positive: string, negative: string): ComponentCodec {
  return {
    pattern: String.raw`\d+(?:\.\d+)?\s*[${positive}${negative}]`,
    decode(token) {
      const match = TOKEN.exec(token);
      if (!match) return null;
      const magnitude = parseFloat(match[1]);
      return match[2].toUpperCase() === negative ? -magnitude : magnitude;
    },
    encode: (value) => `${toFixedDigits(Math.abs(value), 8)}${value >= 0 ? positive : negative}`,
  };
}

/** "109.23456780E 27.12345670N" */
export const wolframAlpha = createPairConverter({
  id: 'wolframAlpha',
  name: 'Wolfram Alpha',
  lng: suffixComponent('E', 'W'),
  lat: suffixComponent('N', 'S'),
  separator: ' ',
});
