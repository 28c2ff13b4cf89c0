export type TimerHandle = ReturnType<typeof setTimeout> | number;

export interface Clock {
  now(): number;
  date(): Date;
  setTimeout(callback: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
  setInterval(callback: () => void, ms: number): TimerHandle;
  clearInterval(handle: TimerHandle): void;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  date(): Date {
    return new Date();
  }

  setTimeout(callback: () => void, ms: number): TimerHandle {
    return setTimeout(callback, ms);
  }

  clearTimeout(handle: TimerHandle): void {
    clearTimeout(handle);
  }

  setInterval(callback: () => void, ms: number): TimerHandle {
    return setInterval(callback, ms);
  }

  clearInterval(handle: TimerHandle): void {
    clearInterval(handle);
  }
}

interface ManualTimer {
  callback: () => void;
  dueTime: number;
  intervalMs?: number;
}

/**
 * Clock driven by the caller. Timers fire synchronously from `advance`/`setTime`
 * in due-time order; an interval fires once per elapsed period.
 */
export class ManualClock implements Clock {
  private currentTime: number;
  private timers: Map<number, ManualTimer> = new Map();
  private nextTimerId: number = 1;

  constructor(startTime: number = 0) {
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  date(): Date {
    return new Date(this.currentTime);
  }

  setTime(time: number): void {
    if (time < this.currentTime) {
      throw new Error('Cannot move time backwards');
    }
    this.runTimersUntil(time);
    this.currentTime = time;
  }

  advance(ms: number): void {
    this.setTime(this.currentTime + ms);
  }

  setTimeout(callback: () => void, ms: number): TimerHandle {
    const id = this.nextTimerId++;
    this.timers.set(id, { callback, dueTime: this.currentTime + ms });
    return id;
  }

  clearTimeout(handle: TimerHandle): void {
    if (typeof handle === 'number') {
      this.timers.delete(handle);
    }
  }

  setInterval(callback: () => void, ms: number): TimerHandle {
    const id = this.nextTimerId++;
    this.timers.set(id, { callback, dueTime: this.currentTime + ms, intervalMs: ms });
    return id;
  }

  clearInterval(handle: TimerHandle): void {
    this.clearTimeout(handle);
  }

  pendingTimerCount(): number {
    return this.timers.size;
  }

  private runTimersUntil(target: number): void {
    for (;;) {
      const next = this.nextDueTimer(target);
      if (!next) return;

      const [id, timer] = next;
      this.currentTime = timer.dueTime;

      if (timer.intervalMs !== undefined && timer.intervalMs > 0) {
        timer.dueTime += timer.intervalMs;
      } else {
        this.timers.delete(id);
      }
      timer.callback();
    }
  }

  private nextDueTimer(target: number): [number, ManualTimer] | undefined {
    let found: [number, ManualTimer] | undefined;
    for (const entry of this.timers) {
      if (entry[1].dueTime > target) continue;
      if (!found || entry[1].dueTime < found[1].dueTime) {
        found = entry;
      }
    }
    return found;
  }
}
