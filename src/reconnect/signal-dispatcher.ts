/**
 * Signal Dispatcher
 *
 * Entry point for PropertiesChanged notifications. Classifies each
 * Connected transition and drives the per-device state machine:
 *
 *   Idle --connect--> Idle (lastConnectTime = now, pending timer cancelled)
 *   Idle --disconnect within window--> DebouncePending (timer armed)
 *   Idle --disconnect after window--> record deleted
 *   DebouncePending --timer fires--> Attempting --> Idle (record already gone)
 *
 * Every arm is preceded by a cancel of the device's previous handle, so a
 * device never has more than one pending attempt.
 */

import type { Logger } from 'pino';
import { getLogger } from '../logger';
import { DeviceStateStore } from './device-state-store';
import { ReconnectProcedure } from './reconnect-procedure';
import { ReconnectScheduler } from './reconnect-scheduler';
import { ReconnectStats, createReconnectStats } from './reconnect-stats';
import {
  Clock,
  CONNECTED_PROPERTY,
  DEFAULT_DEBOUNCE_WINDOW_MS,
  DEVICE_INTERFACE,
  systemClock,
} from './types';

export interface SignalDispatcherOptions {
  store: DeviceStateStore;
  scheduler: ReconnectScheduler;
  procedure: ReconnectProcedure;
  debounceWindowMs?: number;
  clock?: Clock;
  stats?: ReconnectStats;
  logger?: Logger;
}

export class SignalDispatcher {
  readonly debounceWindowMs: number;

  private store: DeviceStateStore;
  private scheduler: ReconnectScheduler;
  private procedure: ReconnectProcedure;
  private clock: Clock;
  private stats: ReconnectStats;
  private log: Logger;

  constructor(options: SignalDispatcherOptions) {
    this.store = options.store;
    this.scheduler = options.scheduler;
    this.procedure = options.procedure;
    this.debounceWindowMs = options.debounceWindowMs ?? DEFAULT_DEBOUNCE_WINDOW_MS;
    this.clock = options.clock ?? systemClock;
    this.stats = options.stats ?? createReconnectStats();
    this.log = options.logger ?? getLogger('Dispatcher');
  }

  onPropertyChange(deviceId: string, interfaceName: string, changedProperties: Readonly<Record<string, unknown>>): void {
    if (interfaceName !== DEVICE_INTERFACE) return;
    if (!Object.prototype.hasOwnProperty.call(changedProperties, CONNECTED_PROPERTY)) return;

    const connected = changedProperties[CONNECTED_PROPERTY];
    if (typeof connected !== 'boolean') {
      this.log.debug({ device: deviceId }, `Ignoring non-boolean ${CONNECTED_PROPERTY} on ${deviceId}`);
      return;
    }

    this.stats.notifications++;
    this.log.debug({ device: deviceId, connected }, `${deviceId} ${CONNECTED_PROPERTY}=${connected}`);

    if (connected) {
      this.onConnected(deviceId);
    } else {
      this.onDisconnected(deviceId);
    }
  }

  /** Cancel every pending attempt and forget all devices */
  shutdown(): void {
    const handles = this.store.clear();
    for (const handle of handles) {
      this.scheduler.cancel(handle);
    }
    if (handles.length > 0) {
      this.stats.attemptsCancelled += handles.length;
      this.log.debug(`Cancelled ${handles.length} pending reconnect(s)`);
    }
  }

  private onConnected(deviceId: string): void {
    this.stats.connectsObserved++;
    if (this.cancelPending(deviceId)) {
      this.log.debug({ device: deviceId }, `${deviceId} came back on its own, pending reconnect cancelled`);
    }
    this.store.markConnected(deviceId, this.clock());
  }

  private onDisconnected(deviceId: string): void {
    const now = this.clock();
    const record = this.store.get(deviceId);

    if (record && now - record.lastConnectTime < this.debounceWindowMs) {
      this.stats.flakyDisconnects++;
      this.cancelPending(deviceId);
      const handle = this.scheduler.arm(deviceId, this.debounceWindowMs, () => this.fire(deviceId));
      this.store.setPendingTimer(deviceId, handle);
      this.stats.attemptsScheduled++;
      this.log.debug(
        { device: deviceId },
        `${deviceId} dropped ${now - record.lastConnectTime}ms after connecting, reconnect in ${this.debounceWindowMs}ms`,
      );
      return;
    }

    this.stats.normalDisconnects++;
    this.cancelPending(deviceId);
    this.store.remove(deviceId);
    this.log.debug({ device: deviceId }, `${deviceId} disconnected normally`);
  }

  /** Cancel the device's pending timer, if any. Returns whether one was cancelled. */
  private cancelPending(deviceId: string): boolean {
    const handle = this.store.get(deviceId)?.pendingTimer;
    if (!handle) return false;
    this.scheduler.cancel(handle);
    this.stats.attemptsCancelled++;
    return true;
  }

  private fire(deviceId: string): void {
    void this.procedure.run(deviceId).catch((err: unknown) => {
      this.log.error({ device: deviceId, err }, `Reconnect attempt for ${deviceId} failed unexpectedly`);
    });
  }
}
