import { z } from 'zod';
import type { CoordinateError } from '../utils/errors.js';

/**
 * Types for the coordinate dialect converter
 *
 * Terminology:
 * - Coordinate: canonical (lng, lat) pair in signed degrees
 * - Converter: stateless codec between a Coordinate and one textual dialect
 * - Registry: the ordered list of converters; order is detection priority
 */

// =============================================================================
// Coordinates
// =============================================================================

/**
 * Canonical coordinate in degrees. Hemisphere markers W and S map to
 * negative values. Nothing is clamped to the usual geographic ranges.
 */
export interface Coordinate {
  lng: number;
  lat: number;
}

export const coordinateSchema = z.object({
  lng: z.number().finite(),
  lat: z.number().finite(),
});

// =============================================================================
// Converters
// =============================================================================

export const CONVERTER_IDS = [
  'decimalDegrees',
  'wolframAlpha',
  'hex',
  'hexCStyle',
  'decimalFixedPoint',
  'dms',
  'dmsLfv',
  'naviDisplay',
  'radian',
  'parcelId',
] as const;

export type ConverterId = (typeof CONVERTER_IDS)[number];

export interface FormatConverter {
  readonly id: ConverterId;
  readonly name: string;
  /** Returns null when the text is not in this dialect */
  parse(text: string): Coordinate | null;
  format(coordinate: Coordinate): string;
}

/** Converter id, display name, or registry index; `string & {}` keeps id completion */
export type FormatSelector = ConverterId | (string & {}) | number;

// =============================================================================
// Detection results
// =============================================================================

export interface DetectedCoordinate {
  ok: true;
  id: ConverterId;
  name: string;
  coordinate: Coordinate;
}

export interface UnrecognizedInput {
  ok: false;
  error: CoordinateError;
}

export type DetectResult = DetectedCoordinate | UnrecognizedInput;
