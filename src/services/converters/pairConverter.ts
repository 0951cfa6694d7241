import type { ConverterId, Coordinate, FormatConverter } from '../../types/index.js';

/**
 * Codec for one half of a coordinate pair.
 * `pattern` is a regex source for a single token, with no capture groups.
 */
export interface ComponentCodec {
  pattern: string;
  decode(token: string): number | null;
  encode(value: number): string;
}

export interface PairConverterOptions {
  id: ConverterId;
  name: string;
  lng: ComponentCodec;
  lat: ComponentCodec;
  /** Leading marker shared by both components, e.g. "PID" */
  marker?: { pattern: string; text: string };
  /** Output separator between the two components */
  separator?: string;
}

const PAIR_SEPARATOR = String.raw`\s*(?:,\s*|\s+)`;

/**
 * Build a converter for dialects of the shape "<lng><sep><lat>".
 * The grammar is compiled once here; parse and format are pure.
 */
export function createPairConverter(options: PairConverterOptions): FormatConverter {
  const { id, name, lng, lat, marker, separator = ', ' } = options;
  const markerSource = marker ? `${marker.pattern}\\s*` : '';
  const grammar = new RegExp(
    String.raw`^\s*${markerSource}(${lng.pattern})${PAIR_SEPARATOR}(${lat.pattern})\s*$`,
    'i'
  );
  const outputPrefix = marker ? `${marker.text} ` : '';

  return Object.freeze({
    id,
    name,
    parse(text: string): Coordinate | null {
      const match = grammar.exec(text);
      if (!match) return null;
      const lngValue = lng.decode(match[1]);
      const latValue = lat.decode(match[2]);
      if (lngValue === null || latValue === null) return null;
      return { lng: lngValue, lat: latValue };
    },
    format(coordinate: Coordinate): string {
      return `${outputPrefix}${lng.encode(coordinate.lng)}${separator}${lat.encode(coordinate.lat)}`;
    },
  });
}
