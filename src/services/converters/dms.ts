import type { Coordinate, FormatConverter } from '../../types/index.js';
import { toFixedDigits } from '../../utils/number.js';

/**
 * Degrees/minutes/seconds dialects.
 *
 * The generic converter normalizes punctuation away first and then tries
 * four layouts: hemisphere flag in front or trailing, longitude or latitude
 * first. LFV and NaviDisplay each accept exactly one layout.
 */

// =============================================================================
// Shared decomposition
// =============================================================================

export interface DmsParts {
  negative: boolean;
  degrees: number;
  minutes: number;
  seconds: number;
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Split signed degrees into whole degrees, whole minutes and seconds
 * rounded to `secondDigits`. Minutes are rounded to 8 places before
 * truncation; a rounded 60 carries upward.
 */
export function splitDegrees(value: number, secondDigits: number): DmsParts {
  const negative = value < 0;
  const abs = Math.abs(value);
  let degrees = Math.trunc(abs);
  const exactMinutes = roundTo((abs - degrees) * 60, 8);
  let minutes = Math.trunc(exactMinutes);
  let seconds = roundTo(Math.max(0, (exactMinutes - minutes) * 60), secondDigits);
  if (seconds >= 60) {
    seconds -= 60;
    minutes += 1;
  }
  if (minutes >= 60) {
    minutes -= 60;
    degrees += 1;
  }
  return { negative, degrees, minutes, seconds };
}

export function dmsToDegrees(degrees: number, minutes: number, seconds: number, negative: boolean): number {
  const value = degrees + minutes / 60 + seconds / 3600;
  return negative ? -value : value;
}

function isNegativeFlag(flag: string): boolean {
  return flag === 'W' || flag === 'S' || flag === '-';
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** Seconds with `digits` decimals and at least two integer digits */
function padSeconds(seconds: number, digits: number): string {
  return seconds.toFixed(digits).padStart(digits + 3, '0');
}

// =============================================================================
// Generic DMS
// =============================================================================

/**
 * Reduce the input to digits, '.', signs and lone hemisphere letters,
 * separated by single spaces.
 */
export function normalizeDms(text: string): string {
  return text
    .toUpperCase()
    .replace(/[A-Z]{2,}/g, ' ')
    .replace(/[^0-9.+\-NSEW]+/g, ' ')
    .trim();
}

type Order = 'lngFirst' | 'latFirst';
type FlagPosition = 'front' | 'trailing';

interface DmsLayout {
  order: Order;
  flag: FlagPosition;
  pattern: RegExp;
}

const LNG_FLAG = '([EW+-])';
const LAT_FLAG = '([NS+-])';
/** Seconds may use a space in place of the decimal point */
const TRIPLE = String.raw`(\d+) (\d+) (\d+(?:[. ]\d+)?)`;

function buildLayout(order: Order, flag: FlagPosition): DmsLayout {
  const [firstFlag, secondFlag] = order === 'lngFirst' ? [LNG_FLAG, LAT_FLAG] : [LAT_FLAG, LNG_FLAG];
  const source = flag === 'front'
    ? `^${firstFlag} ?${TRIPLE} ${secondFlag} ?${TRIPLE}$`
    : `^${TRIPLE} ?${firstFlag} ${TRIPLE} ?${secondFlag}$`;
  return { order, flag, pattern: new RegExp(source) };
}

const LAYOUTS: readonly DmsLayout[] = [
  buildLayout('lngFirst', 'front'),
  buildLayout('latFirst', 'front'),
  buildLayout('lngFirst', 'trailing'),
  buildLayout('latFirst', 'trailing'),
];

/** Groups for one component, in flag/d/m/s order */
function componentValue(flag: string, d: string, m: string, s: string): number {
  return dmsToDegrees(
    parseInt(d, 10),
    parseInt(m, 10),
    parseFloat(s.replace(' ', '.')),
    isNegativeFlag(flag)
  );
}

function matchLayout(layout: DmsLayout, normalized: string): Coordinate | null {
  const match = layout.pattern.exec(normalized);
  if (!match) return null;

  const g = match.slice(1);
  const [first, second] = layout.flag === 'front'
    ? [componentValue(g[0], g[1], g[2], g[3]), componentValue(g[4], g[5], g[6], g[7])]
    : [componentValue(g[3], g[0], g[1], g[2]), componentValue(g[7], g[4], g[5], g[6])];

  return layout.order === 'lngFirst' ? { lng: first, lat: second } : { lng: second, lat: first };
}

function formatGenericComponent(value: number, positive: string, negative: string): string {
  const parts = splitDegrees(value, 1);
  const hemisphere = parts.negative ? negative : positive;
  return `${hemisphere}${toFixedDigits(parts.degrees, 0)} ${pad2(parts.minutes)}'${padSeconds(parts.seconds, 1)}"`;
}

/** "E109 16'36.9\", N27 07'32.5\"" */
export const dms: FormatConverter = Object.freeze({
  id: 'dms',
  name: 'DMS',
  parse(text: string): Coordinate | null {
    const normalized = normalizeDms(text);
    for (const layout of LAYOUTS) {
      const coordinate = matchLayout(layout, normalized);
      if (coordinate) return coordinate;
    }
    return null;
  },
  format(coordinate: Coordinate): string {
    return `${formatGenericComponent(coordinate.lng, 'E', 'W')}, ${formatGenericComponent(coordinate.lat, 'N', 'S')}`;
  },
});

// =============================================================================
// LFV: "N27 07 32 460 W109 16 36 880"
// =============================================================================

const LFV_COMPONENT = String.raw`\s?(\d+)\s+(\d+)\s+(\d+)\s+(\d+)`;
const LFV_PATTERN = new RegExp(String.raw`^\s*([NS])${LFV_COMPONENT}\s+([EW])${LFV_COMPONENT}\s*$`, 'i');

function lfvComponent(flag: string, d: string, m: string, whole: string, fraction: string): number {
  return dmsToDegrees(
    parseInt(d, 10),
    parseInt(m, 10),
    parseFloat(`${whole}.${fraction}`),
    isNegativeFlag(flag.toUpperCase())
  );
}

function formatLfvComponent(value: number, positive: string, negative: string): string {
  const parts = splitDegrees(value, 3);
  const hemisphere = parts.negative ? negative : positive;
  const seconds = padSeconds(parts.seconds, 3).replace('.', ' ');
  return `${hemisphere}${toFixedDigits(parts.degrees, 0)} ${pad2(parts.minutes)} ${seconds}`;
}

export const dmsLfv: FormatConverter = Object.freeze({
  id: 'dmsLfv',
  name: 'DMS (LFV)',
  parse(text: string): Coordinate | null {
    const match = LFV_PATTERN.exec(text);
    if (!match) return null;
    const [, latFlag, latD, latM, latS, latF, lngFlag, lngD, lngM, lngS, lngF] = match;
    return {
      lng: lfvComponent(lngFlag, lngD, lngM, lngS, lngF),
      lat: lfvComponent(latFlag, latD, latM, latS, latF),
    };
  },
  format(coordinate: Coordinate): string {
    return `${formatLfvComponent(coordinate.lat, 'N', 'S')} ${formatLfvComponent(coordinate.lng, 'E', 'W')}`;
  },
});

// =============================================================================
// NaviDisplay: "N27°07′32.5″\tW109°16′36.9″"
// =============================================================================

const NAVI_COMPONENT = String.raw`(\d+)°(\d+)′(\d+(?:\.\d+)?)″`;
const NAVI_PATTERN = new RegExp(String.raw`^\s*([NS])${NAVI_COMPONENT}\s+([EW])${NAVI_COMPONENT}\s*$`, 'i');

function naviComponent(flag: string, d: string, m: string, s: string): number {
  return dmsToDegrees(parseInt(d, 10), parseInt(m, 10), parseFloat(s), isNegativeFlag(flag.toUpperCase()));
}

function formatNaviComponent(value: number, positive: string, negative: string): string {
  const parts = splitDegrees(value, 1);
  const hemisphere = parts.negative ? negative : positive;
  return `${hemisphere}${toFixedDigits(parts.degrees, 0)}°${pad2(parts.minutes)}′${padSeconds(parts.seconds, 1)}″`;
}

export const naviDisplay: FormatConverter = Object.freeze({
  id: 'naviDisplay',
  name: 'DMS (NaviDisplay)',
  parse(text: string): Coordinate | null {
    const match = NAVI_PATTERN.exec(text);
    if (!match) return null;
    const [, latFlag, latD, latM, latS, lngFlag, lngD, lngM, lngS] = match;
    return {
      lng: naviComponent(lngFlag, lngD, lngM, lngS),
      lat: naviComponent(latFlag, latD, latM, latS),
    };
  },
  format(coordinate: Coordinate): string {
    return `${formatNaviComponent(coordinate.lat, 'N', 'S')}\t${formatNaviComponent(coordinate.lng, 'E', 'W')}`;
  },
});
