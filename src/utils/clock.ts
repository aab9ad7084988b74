/**
 * Time source shared by the scheduler, heartbeat runner and sub-agents.
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number | Date = 0) {
    this.current = typeof start === "number" ? start : start.getTime();
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number | Date): void {
    this.current = typeof ms === "number" ? ms : ms.getTime();
  }
}
