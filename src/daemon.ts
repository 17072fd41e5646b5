/**
 * ReconnectDaemon
 *
 * Wires the BlueZ client to the flaky-disconnect state machine.
 * Owns the device store, the scheduler and the counters for one bus
 * connection. Re-emits 'connectSucceeded' and 'connectFailed' from the
 * reconnect procedure.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { getLogger } from './logger';
import { BluezClient } from './bus/bluez-client';
import { PropertyChangeNotification } from './bus/signal-parser';
import { ConnectError } from './errors';
import { DeviceStateStore } from './reconnect/device-state-store';
import { ReconnectProcedure } from './reconnect/reconnect-procedure';
import { ReconnectScheduler, TimerScheduler } from './reconnect/reconnect-scheduler';
import { ReconnectStats, createReconnectStats } from './reconnect/reconnect-stats';
import { SignalDispatcher } from './reconnect/signal-dispatcher';
import { Clock, DEFAULT_DEBOUNCE_WINDOW_MS } from './reconnect/types';

export interface ReconnectDaemonOptions {
  client: BluezClient;
  debounceWindowMs?: number;
  clock?: Clock;
  scheduler?: ReconnectScheduler;
  logger?: Logger;
}

export class ReconnectDaemon extends EventEmitter {
  readonly debounceWindowMs: number;

  private client: BluezClient;
  private store = new DeviceStateStore();
  private scheduler: ReconnectScheduler;
  private stats: ReconnectStats = createReconnectStats();
  private procedure: ReconnectProcedure;
  private dispatcher: SignalDispatcher;
  private log: Logger;
  private running = false;

  constructor(options: ReconnectDaemonOptions) {
    super();
    this.client = options.client;
    this.debounceWindowMs = options.debounceWindowMs ?? DEFAULT_DEBOUNCE_WINDOW_MS;
    this.scheduler = options.scheduler ?? new TimerScheduler();
    this.log = options.logger ?? getLogger('Daemon');

    this.procedure = new ReconnectProcedure({
      store: this.store,
      query: this.client,
      connector: this.client,
      stats: this.stats,
      logger: options.logger,
    });
    this.procedure.on('connectSucceeded', (deviceId: string) => this.emit('connectSucceeded', deviceId));
    this.procedure.on('connectFailed', (deviceId: string, err: ConnectError) => this.emit('connectFailed', deviceId, err));

    this.dispatcher = new SignalDispatcher({
      store: this.store,
      scheduler: this.scheduler,
      procedure: this.procedure,
      debounceWindowMs: this.debounceWindowMs,
      clock: options.clock,
      stats: this.stats,
      logger: options.logger,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Devices with a live record (recently connected or awaiting a reconnect) */
  trackedDevices(): string[] {
    return this.store.deviceIds();
  }

  /** Armed reconnect timers across all devices */
  get pendingReconnects(): number {
    return this.scheduler.pendingCount;
  }

  getStats(): ReconnectStats {
    return { ...this.stats };
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.client.subscribe((notification) => this.onNotification(notification));
    this.running = true;
    this.log.info(`Watching ${this.client.service} for flaky disconnects (window ${this.debounceWindowMs}ms)`);
  }

  /** Cancel pending reconnects and drop the bus subscription */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.dispatcher.shutdown();

    try {
      await this.client.unsubscribe();
    } catch (err) {
      this.log.warn({ err }, 'Failed to remove match rule');
    }

    const s = this.stats;
    this.log.info(
      `Stopped: ${s.flakyDisconnects} flaky / ${s.normalDisconnects} normal disconnects, `
      + `${s.connectRequests} reconnects (${s.connectSuccesses} ok, ${s.connectFailures} failed)`,
    );
  }

  private onNotification(notification: PropertyChangeNotification): void {
    this.dispatcher.onPropertyChange(notification.path, notification.interfaceName, notification.changed);
  }
}
