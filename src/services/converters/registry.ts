import type { ConverterId, FormatConverter, FormatSelector } from '../../types/index.js';
import { decimalDegrees } from './decimalDegrees.js';
import { wolframAlpha } from './wolframAlpha.js';
import { hexFixedPoint, hexFixedPointCStyle } from './hexFixedPoint.js';
import { decimalFixedPoint } from './decimalFixedPoint.js';
import { dms, dmsLfv, naviDisplay } from './dms.js';
import { radian } from './radian.js';
import { parcelId } from './parcelId.js';

/**
 * Detection priority, loosest grammar first. Reordering changes which
 * dialect wins for inputs more than one grammar accepts.
 */
export const CONVERTERS: readonly FormatConverter[] = Object.freeze([
  decimalDegrees,
  wolframAlpha,
  hexFixedPoint,
  hexFixedPointCStyle,
  decimalFixedPoint,
  dms,
  dmsLfv,
  naviDisplay,
  radian,
  parcelId,
]);

export function listConverters(): readonly FormatConverter[] {
  return CONVERTERS;
}

export function listFormatNames(): string[] {
  return CONVERTERS.map((converter) => converter.name);
}

export function getConverter(id: ConverterId): FormatConverter | undefined {
  return CONVERTERS.find((converter) => converter.id === id);
}

/**
 * Resolve a registry index, converter id or display name
 * (names match case-insensitively).
 */
export function findConverter(selector: FormatSelector): FormatConverter | undefined {
  if (typeof selector === 'number') {
    return Number.isInteger(selector) ? CONVERTERS[selector] : undefined;
  }
  const key = selector.trim();
  const byId = CONVERTERS.find((converter) => converter.id === key);
  if (byId) return byId;
  const lower = key.toLowerCase();
  return CONVERTERS.find((converter) => converter.name.toLowerCase() === lower);
}
