/**
 * Timer and idle-slot capability supplied by the host.
 * Everything in the core reads time and defers work through this interface.
 */
export type CancelFn = () => void;

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
}

export interface Scheduler extends Clock {
  /** Run `fn` once after `delayMs`. */
  scheduleOnce(delayMs: number, fn: () => void): CancelFn;
  /** Run `fn` in the next idle / post-frame slot. */
  scheduleIdle(fn: () => void): CancelFn;
}

/**
 * Default scheduler on top of `performance.now()` and `setTimeout`.
 * Hosts with a real post-frame hook should call `IdleTaskScheduler.runSlot`
 * from that hook as well; the timer-based idle slot is the fallback.
 */
export class TimerScheduler implements Scheduler {
  private readonly idleDelayMs: number;

  constructor(opts?: { idleDelayMs?: number }) {
    this.idleDelayMs = opts?.idleDelayMs && opts.idleDelayMs > 0 ? opts.idleDelayMs : 0;
  }

  public now(): number {
    return performance.now();
  }

  public scheduleOnce(delayMs: number, fn: () => void): CancelFn {
    const handle = setTimeout(fn, Math.max(0, delayMs));
    return () => clearTimeout(handle);
  }

  public scheduleIdle(fn: () => void): CancelFn {
    return this.scheduleOnce(this.idleDelayMs, fn);
  }
}
