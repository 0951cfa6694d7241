import {
  coordinateSchema,
  type Coordinate,
  type DetectResult,
  type FormatSelector,
} from '../../types/index.js';
import { CONVERTERS, findConverter } from '../converters/registry.js';
import { invalidCoordinate, unknownFormat, unrecognized } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('coords');

/**
 * Try every converter in registry order and take the first that parses.
 * A converter rejecting the input is the normal "try the next one" case.
 */
export function detectAndParse(text: string): DetectResult {
  for (const converter of CONVERTERS) {
    const coordinate = converter.parse(text);
    if (coordinate) {
      log.debug(`matched ${converter.id}`, coordinate);
      return { ok: true, id: converter.id, name: converter.name, coordinate };
    }
  }
  log.debug('no converter matched', JSON.stringify(text));
  return { ok: false, error: unrecognized(text) };
}

function assertFinite(coordinate: Coordinate): Coordinate {
  const result = coordinateSchema.safeParse(coordinate);
  if (!result.success) {
    throw invalidCoordinate(result.error.issues);
  }
  return result.data;
}

/** Render the coordinate in every dialect, index-aligned with listFormatNames() */
export function formatAll(coordinate: Coordinate): string[] {
  const checked = assertFinite(coordinate);
  return CONVERTERS.map((converter) => converter.format(checked));
}

export function formatOne(selector: FormatSelector, coordinate: Coordinate): string {
  const converter = findConverter(selector);
  if (!converter) {
    throw unknownFormat(selector);
  }
  return converter.format(assertFinite(coordinate));
}
