// src/engine/clock.ts
//
// Time source shared by live sessions (elapsed time between actions) and replay
// playback (delays between delivered actions). Outcomes never depend on it; only
// pacing does.

export type CancelTimer = () => void;

export interface Clock {
  /** Milliseconds on this clock's own timeline. */
  now(): number;

  /** Run `fn` once, `delayMs` from now. The returned function cancels it. */
  schedule(delayMs: number, fn: () => void): CancelTimer;
}

/**
 * Wall-clock time, for a process serving a real player.
 */
export class RealClock implements Clock {
  now(): number {
    return Date.now();
  }

  schedule(delayMs: number, fn: () => void): CancelTimer {
    const timer = setTimeout(fn, Math.max(0, delayMs));
    return () => clearTimeout(timer);
  }
}

type Pending = {
  id: number;
  at: number;
  fn: () => void;
};

/**
 * Scripted clock. Time moves only through advance()/runAll(), so playback can be
 * stepped, fast-forwarded, or run instantly.
 */
export class VirtualClock implements Clock {
  private t: number;
  private nextId = 0;
  private pending: Pending[] = [];

  constructor(start = 0) {
    this.t = start;
  }

  now(): number {
    return this.t;
  }

  schedule(delayMs: number, fn: () => void): CancelTimer {
    const entry: Pending = { id: this.nextId++, at: this.t + Math.max(0, delayMs), fn };
    this.pending.push(entry);
    return () => {
      this.pending = this.pending.filter((p) => p.id !== entry.id);
    };
  }

  /** Number of callbacks still waiting. */
  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Move time forward by `ms`, firing due callbacks in time order (ties in
   * scheduling order). Callbacks scheduled while advancing fire too if they
   * fall inside the window.
   */
  advance(ms: number): void {
    const target = this.t + Math.max(0, ms);

    for (;;) {
      const due = this.takeNextDue(target);
      if (!due) break;
      this.t = due.at;
      due.fn();
    }

    this.t = target;
  }

  /**
   * Fire everything, including callbacks scheduled by other callbacks, jumping
   * time to each one. Stops after `maxSteps` callbacks.
   */
  runAll(maxSteps = 100_000): void {
    for (let i = 0; i < maxSteps; i++) {
      const due = this.takeNextDue(Number.POSITIVE_INFINITY);
      if (!due) return;
      this.t = due.at;
      due.fn();
    }
    throw new Error(`VirtualClock.runAll: still busy after ${maxSteps} callbacks`);
  }

  private takeNextDue(limit: number): Pending | null {
    let best: Pending | null = null;
    for (const p of this.pending) {
      if (p.at > limit) continue;
      if (!best || p.at < best.at || (p.at === best.at && p.id < best.id)) best = p;
    }
    if (best) {
      const id = best.id;
      this.pending = this.pending.filter((p) => p.id !== id);
    }
    return best;
  }
}
