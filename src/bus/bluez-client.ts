/**
 * BlueZ Client
 *
 * The daemon's only contact with the bus:
 *   - subscribe(): AddMatch for PropertiesChanged from org.bluez, all paths
 *   - getFlags(): Properties.GetAll(org.bluez.Device1) -> Connected/Trusted
 *   - connect(): Device1.Connect(), settling when BlueZ replies
 *
 * Works on raw dbus-next Messages so it doesn't need introspection data
 * and can run against an in-process bus stand-in.
 */

import { Message } from 'dbus-next';
import type { Logger } from 'pino';
import { z } from 'zod';
import { getLogger } from '../logger';
import { QueryError } from '../errors';
import { AsyncConnectInvoker, CapabilityQueryClient, DEVICE_INTERFACE, DeviceFlags } from '../reconnect/types';
import {
  PROPERTIES_INTERFACE,
  PropertyChangeNotification,
  isPropertiesChanged,
  parsePropertiesChanged,
  parseVariantDict,
  propertiesChangedMatchRule,
} from './signal-parser';

export const BLUEZ_SERVICE = 'org.bluez';

const DBUS_SERVICE = 'org.freedesktop.DBus';
const DBUS_PATH = '/org/freedesktop/DBus';

/** The part of dbus-next's MessageBus this client uses */
export interface BusTransport {
  call(message: Message): Promise<Message | null>;
  on(event: 'message', listener: (message: Message) => void): unknown;
  removeListener(event: 'message', listener: (message: Message) => void): unknown;
  disconnect(): void;
}

export type NotificationListener = (notification: PropertyChangeNotification) => void;

export interface BluezClientOptions {
  bus: BusTransport;
  service?: string;
  logger?: Logger;
}

const deviceFlagsSchema = z.object({
  Connected: z.boolean(),
  Trusted: z.boolean(),
});

export class BluezClient implements CapabilityQueryClient, AsyncConnectInvoker {
  readonly service: string;

  private bus: BusTransport;
  private log: Logger;
  private listener: NotificationListener | null = null;
  private readonly matchRule: string;

  constructor(options: BluezClientOptions) {
    this.bus = options.bus;
    this.service = options.service ?? BLUEZ_SERVICE;
    this.log = options.logger ?? getLogger('BlueZ');
    this.matchRule = propertiesChangedMatchRule(this.service);
  }

  /** Whether a subscription is active */
  get subscribed(): boolean {
    return this.listener !== null;
  }

  async getFlags(deviceId: string): Promise<DeviceFlags> {
    const reply = await this.bus.call(new Message({
      destination: this.service,
      path: deviceId,
      interface: PROPERTIES_INTERFACE,
      member: 'GetAll',
      signature: 's',
      body: [DEVICE_INTERFACE],
    }));

    const properties = parseVariantDict(reply?.body[0]);
    if (!properties) {
      throw new QueryError(deviceId, {
        errorName: 'InvalidReply',
        message: `GetAll(${DEVICE_INTERFACE}) returned no property dictionary`,
      });
    }

    const flags = deviceFlagsSchema.safeParse(properties);
    if (!flags.success) {
      throw new QueryError(deviceId, {
        errorName: 'InvalidReply',
        message: `${DEVICE_INTERFACE} is missing boolean Connected/Trusted`,
      });
    }

    return { connected: flags.data.Connected, trusted: flags.data.Trusted };
  }

  async connect(deviceId: string): Promise<void> {
    await this.bus.call(new Message({
      destination: this.service,
      path: deviceId,
      interface: DEVICE_INTERFACE,
      member: 'Connect',
    }));
  }

  /** Start delivering PropertiesChanged notifications to listener */
  async subscribe(listener: NotificationListener): Promise<void> {
    if (this.listener) {
      throw new Error('[BlueZ] Already subscribed');
    }
    await this.callBusDaemon('AddMatch');
    this.listener = listener;
    this.bus.on('message', this.onMessage);
    this.log.debug(`Subscribed: ${this.matchRule}`);
  }

  async unsubscribe(): Promise<void> {
    if (!this.listener) return;
    this.bus.removeListener('message', this.onMessage);
    this.listener = null;
    await this.callBusDaemon('RemoveMatch');
  }

  private async callBusDaemon(member: 'AddMatch' | 'RemoveMatch'): Promise<void> {
    await this.bus.call(new Message({
      destination: DBUS_SERVICE,
      path: DBUS_PATH,
      interface: DBUS_SERVICE,
      member,
      signature: 's',
      body: [this.matchRule],
    }));
  }

  private onMessage = (message: Message): void => {
    if (!this.listener || !isPropertiesChanged(message)) return;

    const notification = parsePropertiesChanged(message);
    if (!notification) {
      this.log.debug(`Dropping malformed ${message.member} from ${message.path || '(no path)'}`);
      return;
    }
    this.listener(notification);
  };
}
