/**
 * Coordinate dialect converters
 *
 * Every converter is a frozen singleton; the registry order is the
 * auto-detection priority.
 */

export { CONVERTERS, listConverters, listFormatNames, getConverter, findConverter } from './registry.js';

export { decimalDegrees } from './decimalDegrees.js';
export { wolframAlpha } from './wolframAlpha.js';
export { hexFixedPoint, hexFixedPointCStyle } from './hexFixedPoint.js';
export { decimalFixedPoint } from './decimalFixedPoint.js';
export { dms, dmsLfv, naviDisplay } from './dms.js';
export { radian } from './radian.js';
export { parcelId } from './parcelId.js';

// Low-level utilities (for testing or advanced use)
export { createPairConverter } from './pairConverter.js';
export type { ComponentCodec, PairConverterOptions } from './pairConverter.js';
export { SCALE, LNG_THRESHOLD, LAT_THRESHOLD, fromFixed, toUint32 } from './fixedPoint.js';
export { packParcelComponent, unpackParcelComponent } from './parcelId.js';
export { normalizeDms, splitDegrees, dmsToDegrees } from './dms.js';
export type { DmsParts } from './dms.js';
