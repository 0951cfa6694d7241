/**
 * Coordinate dialect converter
 *
 * Converts a coordinate between decimal degrees, DMS dialects, fixed-point
 * hex/decimal and parcel-id encodings, and detects which dialect a string
 * is written in.
 */

// Types
export type {
  Coordinate,
  ConverterId,
  FormatConverter,
  FormatSelector,
  DetectResult,
  DetectedCoordinate,
  UnrecognizedInput,
} from './types/index.js';
export { CONVERTER_IDS, coordinateSchema } from './types/index.js';

// Public API
export { detectAndParse, formatAll, formatOne, AutoDetectSession } from './services/autoDetect/index.js';
export type { SessionState } from './services/autoDetect/index.js';
export {
  CONVERTERS,
  listConverters,
  listFormatNames,
  getConverter,
  findConverter,
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
} from './services/converters/index.js';

// Errors
export {
  createError,
  isCoordinateError,
  unrecognized,
  unknownFormat,
  invalidCoordinate,
  notResolved,
} from './utils/errors.js';
export type { CoordinateError, CoordinateErrorCode } from './utils/errors.js';
