import type { AppConfig } from './config.js';
import { coordinateSchema, type Coordinate, type FormatSelector } from './types/index.js';
import { CONVERTERS, listFormatNames } from './services/converters/index.js';
import { detectAndParse, formatAll, formatOne } from './services/autoDetect/index.js';
import { isCoordinateError } from './utils/errors.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

interface CliOptions {
  list: boolean;
  help: boolean;
  format?: string;
  lng?: string;
  lat?: string;
  text: string;
  /** Set when an option is missing its value */
  error?: string;
}

const VALUE_OPTIONS = { '--format': 'format', '--lng': 'lng', '--lat': 'lat' } as const;

function isValueOption(arg: string): arg is keyof typeof VALUE_OPTIONS {
  return Object.hasOwn(VALUE_OPTIONS, arg);
}

export const USAGE = [
  'Usage: coords [options] <coordinate text>',
  '',
  'Options:',
  '  --format <id|name|index>  Print a single rendering',
  '  --lng <deg> --lat <deg>   Format the given values instead of detecting',
  '  --list                    List the supported formats',
  '  --help                    Show this message',
].join('\n');

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { list: false, help: false, text: '' };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isValueOption(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        options.error ??= `Missing value for ${arg}`;
        continue;
      }
      options[VALUE_OPTIONS[arg]] = value;
      i++;
      continue;
    }
    switch (arg) {
      case '--list':
        options.list = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        positional.push(arg);
    }
  }

  options.text = positional.join(' ').trim();
  return options;
}

/** Numeric strings select by registry index */
function toSelector(raw: string): FormatSelector {
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : raw;
}

function explicitCoordinate(options: CliOptions): Coordinate | string {
  const result = coordinateSchema.safeParse({
    lng: options.lng === undefined ? undefined : Number(options.lng),
    lat: options.lat === undefined ? undefined : Number(options.lat),
  });
  if (!result.success) {
    return 'Both --lng and --lat must be finite numbers';
  }
  return result.data;
}

/**
 * Run the command line and return the exit code.
 */
export function runCli(args: string[], config: AppConfig, io: CliIO): number {
  const options = parseArgs(args);

  if (options.error) {
    io.err(options.error);
    return 1;
  }

  if (options.help) {
    io.out(USAGE);
    return 0;
  }

  if (options.list) {
    CONVERTERS.forEach((converter, index) => io.out(`${index}\t${converter.id}\t${converter.name}`));
    return 0;
  }

  let coordinate: Coordinate;
  if (options.lng !== undefined || options.lat !== undefined) {
    const explicit = explicitCoordinate(options);
    if (typeof explicit === 'string') {
      io.err(explicit);
      return 1;
    }
    coordinate = explicit;
  } else {
    if (!options.text) {
      io.err(USAGE);
      return 1;
    }
    const detected = detectAndParse(options.text);
    if (!detected.ok) {
      io.err(`${detected.error.message}: ${options.text}`);
      return 1;
    }
    io.out(`Detected: ${detected.name}`);
    coordinate = detected.coordinate;
  }

  const selected = options.format ?? config.COORDS_DEFAULT_FORMAT;
  try {
    if (selected !== undefined) {
      io.out(formatOne(toSelector(selected), coordinate));
      return 0;
    }
    const names = listFormatNames();
    formatAll(coordinate).forEach((value, index) => io.out(`${names[index]}: ${value}`));
    return 0;
  } catch (err) {
    if (isCoordinateError(err)) {
      io.err(err.message);
      return 1;
    }
    throw err;
  }
}
