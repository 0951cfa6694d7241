import { describe, it, expect } from 'vitest';
import { AutoDetectSession } from './session.js';
import { isCoordinateError } from '../../utils/errors.js';

describe('AutoDetectSession', () => {
  it('starts idle', () => {
    expect(new AutoDetectSession().current).toEqual({ status: 'idle' });
  });

  it('moves to resolved on a successful detection', () => {
    const session = new AutoDetectSession();
    session.detect('-109.5, 27.25');
    expect(session.current).toEqual({
      status: 'resolved',
      id: 'decimalDegrees',
      name: 'Decimal Degrees',
      coordinate: { lng: -109.5, lat: 27.25 },
    });
    expect(session.formatAll()[4]).toBe('D 4194052096, D 25113600');
  });

  it('drops back to idle when the next input is unrecognized', () => {
    const session = new AutoDetectSession();
    session.detect('-109.5, 27.25');
    const result = session.detect('not a coordinate');
    expect(result.ok).toBe(false);
    expect(session.current).toEqual({ status: 'idle' });
  });

  it('refuses to format before anything is resolved', () => {
    const session = new AutoDetectSession();
    try {
      session.formatAll();
      expect.unreachable();
    } catch (err) {
      expect(isCoordinateError(err) && err.code).toBe('NOT_RESOLVED');
    }
  });

  it('replaces the coordinate wholesale on each detection', () => {
    const session = new AutoDetectSession();
    session.detect('-109.5, 27.25');
    session.detect('PID C15C000, 8C15C000');
    expect(session.current).toMatchObject({ id: 'parcelId', coordinate: { lng: 27.5, lat: -27.5 } });
  });

  it('can be reset', () => {
    const session = new AutoDetectSession();
    session.detect('1, 2');
    session.reset();
    expect(session.current).toEqual({ status: 'idle' });
  });
});
