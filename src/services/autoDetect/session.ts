import type { ConverterId, Coordinate, DetectResult } from '../../types/index.js';
import { notResolved } from '../../utils/errors.js';
import { detectAndParse, formatAll } from './dispatcher.js';

export type SessionState =
  | { status: 'idle' }
  | { status: 'resolved'; id: ConverterId; name: string; coordinate: Coordinate };

/**
 * Holds the most recently detected coordinate for one caller.
 * Callers sharing a session must serialize detect() and formatAll().
 */
export class AutoDetectSession {
  private state: SessionState = { status: 'idle' };

  get current(): SessionState {
    return this.state;
  }

  detect(text: string): DetectResult {
    const result = detectAndParse(text);
    this.state = result.ok
      ? { status: 'resolved', id: result.id, name: result.name, coordinate: result.coordinate }
      : { status: 'idle' };
    return result;
  }

  formatAll(): string[] {
    if (this.state.status !== 'resolved') {
      throw notResolved();
    }
    return formatAll(this.state.coordinate);
  }

  reset(): void {
    this.state = { status: 'idle' };
  }
}
