/**
 * Reconnect Scheduler
 *
 * One-shot delayed callbacks on the event loop. A handle fires at most
 * once and never repeats. The scheduler does not track devices: callers
 * cancel the previous handle before arming a new one for the same device.
 */

import { TimerHandle } from './types';

export interface ReconnectScheduler {
  /** Arm a one-shot callback after delayMs */
  arm(deviceId: string, delayMs: number, callback: () => void): TimerHandle;
  /** Cancel a handle. No-op for fired, cancelled or unknown handles. */
  cancel(handle: TimerHandle): void;
  /** Number of armed handles that have neither fired nor been cancelled */
  readonly pendingCount: number;
}

/** Scheduler backed by Node timers */
export class TimerScheduler implements ReconnectScheduler {
  private timers: Map<number, ReturnType<typeof setTimeout>> = new Map();
  private nextId = 1;

  arm(deviceId: string, delayMs: number, callback: () => void): TimerHandle {
    const handle: TimerHandle = { deviceId, id: this.nextId++ };
    const timer = setTimeout(() => {
      this.timers.delete(handle.id);
      callback();
    }, delayMs);
    this.timers.set(handle.id, timer);
    return handle;
  }

  cancel(handle: TimerHandle): void {
    const timer = this.timers.get(handle.id);
    if (timer === undefined) return;
    clearTimeout(timer);
    this.timers.delete(handle.id);
  }

  get pendingCount(): number {
    return this.timers.size;
  }
}
