/**
 * Device State Store
 *
 * Maps device path -> DeviceRecord. The only place records are created,
 * changed or removed. Timer handles live here but are armed and cancelled
 * by the dispatcher through the scheduler.
 */

import { DeviceRecord, TimerHandle } from './types';

export class DeviceStateStore {
  private records: Map<string, DeviceRecord> = new Map();

  get(deviceId: string): Readonly<DeviceRecord> | undefined {
    return this.records.get(deviceId);
  }

  has(deviceId: string): boolean {
    return this.records.has(deviceId);
  }

  /**
   * Record a Connected=true observation. Creates the record if absent and
   * drops any timer handle (the caller has already cancelled it).
   */
  markConnected(deviceId: string, now: number): void {
    const record = this.records.get(deviceId);
    if (record) {
      record.lastConnectTime = now;
      delete record.pendingTimer;
    } else {
      this.records.set(deviceId, { lastConnectTime: now });
    }
  }

  /** Attach the armed timer to an existing record. Returns false if there is none. */
  setPendingTimer(deviceId: string, handle: TimerHandle): boolean {
    const record = this.records.get(deviceId);
    if (!record) return false;
    record.pendingTimer = handle;
    return true;
  }

  /** Delete the record, returning what it held */
  remove(deviceId: string): DeviceRecord | undefined {
    const record = this.records.get(deviceId);
    this.records.delete(deviceId);
    return record;
  }

  /** Drop every record, returning the timer handles they still held */
  clear(): TimerHandle[] {
    const handles: TimerHandle[] = [];
    for (const record of this.records.values()) {
      if (record.pendingTimer) handles.push(record.pendingTimer);
    }
    this.records.clear();
    return handles;
  }

  get size(): number {
    return this.records.size;
  }

  deviceIds(): string[] {
    return Array.from(this.records.keys());
  }
}
