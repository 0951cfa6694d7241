import type { Coordinate, FormatConverter } from '../../types/index.js';
import { toFixedDigits } from '../../utils/number.js';

const QUARTER_TURN = Math.acos(0);

function toRadianDisplay(degrees: number): string {
  return toFixedDigits((degrees / 90) * QUARTER_TURN, 7);
}

/** Display only: nothing is ever parsed as radians. */
export const radian: FormatConverter = Object.freeze({
  id: 'radian',
  name: 'Radian',
  parse: (_text: string): Coordinate | null => null,
  format: (coordinate: Coordinate): string =>
    `${toRadianDisplay(coordinate.lng)}, ${toRadianDisplay(coordinate.lat)}`,
});
