/** toFixed switches to exponent notation from 1e21 upward */
const EXPONENT_THRESHOLD = 1e21;

/**
 * Fixed-point rendering that never falls back to exponent notation.
 * Doubles at or above 1e21 are integers, so their digits come from BigInt.
 */
export function toFixedDigits(value: number, digits: number): string {
  if (Math.abs(value) < EXPONENT_THRESHOLD) {
    return value.toFixed(digits);
  }
  const whole = BigInt(value).toString();
  return digits > 0 ? `${whole}.${'0'.repeat(digits)}` : whole;
}
