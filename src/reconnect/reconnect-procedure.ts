/**
 * Reconnect Procedure
 *
 * Body of the debounce timer. Runs once per fired timer:
 *   1. drop the device's record (before any bus call)
 *   2. read Connected/Trusted back from the bus
 *   3. issue Connect() unless the device is already connected or untrusted
 *
 * Connect() is not awaited; its completion is logged and emitted as
 * 'connectSucceeded' (deviceId) or 'connectFailed' (deviceId, ConnectError).
 * Nothing here re-arms a timer or re-creates a record.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { getLogger } from '../logger';
import { ConnectError, QueryError } from '../errors';
import { DeviceStateStore } from './device-state-store';
import { ReconnectStats, createReconnectStats } from './reconnect-stats';
import { AsyncConnectInvoker, AttemptOutcome, CapabilityQueryClient, DeviceFlags } from './types';

export interface ReconnectProcedureOptions {
  store: DeviceStateStore;
  query: CapabilityQueryClient;
  connector: AsyncConnectInvoker;
  stats?: ReconnectStats;
  logger?: Logger;
}

export class ReconnectProcedure extends EventEmitter {
  private store: DeviceStateStore;
  private query: CapabilityQueryClient;
  private connector: AsyncConnectInvoker;
  private stats: ReconnectStats;
  private log: Logger;

  constructor(options: ReconnectProcedureOptions) {
    super();
    this.store = options.store;
    this.query = options.query;
    this.connector = options.connector;
    this.stats = options.stats ?? createReconnectStats();
    this.log = options.logger ?? getLogger('Reconnect');
  }

  async run(deviceId: string): Promise<AttemptOutcome> {
    this.store.remove(deviceId);
    this.stats.attemptsRun++;

    let flags: DeviceFlags;
    try {
      flags = await this.query.getFlags(deviceId);
    } catch (err) {
      const error = QueryError.from(deviceId, err);
      this.stats.queryFailures++;
      this.log.error(
        { device: deviceId, errorName: error.errorName },
        `Failed to read properties of ${deviceId}: ${error.errorName}: ${error.message}`,
      );
      return 'query-failed';
    }

    if (flags.connected) {
      this.stats.skippedConnected++;
      this.log.debug({ device: deviceId }, `${deviceId} already reconnected, nothing to do`);
      return 'already-connected';
    }

    if (!flags.trusted) {
      this.stats.skippedUntrusted++;
      this.log.debug({ device: deviceId }, `${deviceId} is not trusted, not reconnecting`);
      return 'untrusted';
    }

    this.stats.connectRequests++;
    this.log.info({ device: deviceId }, `Reconnecting ${deviceId}`);
    void this.connector.connect(deviceId)
      .then(
        () => this.onConnectSucceeded(deviceId),
        (err: unknown) => this.onConnectFailed(ConnectError.from(deviceId, err)),
      )
      .catch((err: unknown) => {
        this.log.error({ device: deviceId, err }, `Completion handler for ${deviceId} threw`);
      });
    return 'connect-requested';
  }

  private onConnectSucceeded(deviceId: string): void {
    this.stats.connectSuccesses++;
    this.log.info({ device: deviceId }, `Reconnected ${deviceId}`);
    this.emit('connectSucceeded', deviceId);
  }

  private onConnectFailed(error: ConnectError): void {
    this.stats.connectFailures++;
    this.log.error(
      { device: error.deviceId, errorName: error.errorName },
      `Failed to connect ${error.deviceId}: ${error.errorName}: ${error.message}`,
    );
    this.emit('connectFailed', error.deviceId, error);
  }
}
