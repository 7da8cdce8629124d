import type { Clock } from '../../src/modules/auth/clock';

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string = '2026-01-01T00:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(at: Date | string): void {
    this.current = new Date(at).getTime();
  }
}

/** 2026-01-01T00:00:00Z in Unix seconds, the default ManualClock start. */
export const T0 = 1767225600;
