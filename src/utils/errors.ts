import type { ZodIssue } from 'zod';

export type CoordinateErrorCode =
  | 'UNRECOGNIZED_FORMAT'
  | 'UNKNOWN_FORMAT'
  | 'INVALID_COORDINATE'
  | 'NOT_RESOLVED';

export interface CoordinateError extends Error {
  code: CoordinateErrorCode;
  details?: unknown;
}

export function createError(message: string, code: CoordinateErrorCode, details?: unknown): CoordinateError {
  return Object.assign(new Error(message), { code, details });
}

export function isCoordinateError(err: unknown): err is CoordinateError {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function unrecognized(input: string): CoordinateError {
  return createError('Coordinate format not recognized', 'UNRECOGNIZED_FORMAT', { input });
}

export function unknownFormat(selector: string | number): CoordinateError {
  return createError(`Unknown coordinate format: ${selector}`, 'UNKNOWN_FORMAT', { selector });
}

export function invalidCoordinate(issues: ZodIssue[]): CoordinateError {
  return createError('Invalid coordinate', 'INVALID_COORDINATE', issues);
}

export function notResolved(): CoordinateError {
  return createError('No coordinate has been detected yet', 'NOT_RESOLVED');
}
