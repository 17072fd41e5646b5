/**
 * Bus error types
 *
 * Both kinds are non-fatal: they abandon the current reconnect attempt
 * for one device and nothing else.
 */

import { DBusError } from 'dbus-next';

/** Name + message pulled out of whatever the bus rejected with */
export interface BusErrorDetail {
  /** D-Bus error name (e.g. org.bluez.Error.Failed), or the JS error name */
  errorName: string;
  message: string;
}

export function toBusErrorDetail(err: unknown): BusErrorDetail {
  if (err instanceof DBusError) {
    return { errorName: err.type, message: err.text };
  }
  if (err instanceof Error) {
    return { errorName: err.name, message: err.message };
  }
  return { errorName: 'Error', message: String(err) };
}

abstract class DeviceBusError extends Error {
  readonly deviceId: string;
  readonly errorName: string;

  constructor(deviceId: string, detail: BusErrorDetail, options?: { cause?: unknown }) {
    super(detail.message, options);
    this.deviceId = deviceId;
    this.errorName = detail.errorName;
  }
}

/** Reading the device's properties failed (bus unreachable, device gone, access denied) */
export class QueryError extends DeviceBusError {
  override readonly name = 'QueryError';

  static from(deviceId: string, err: unknown): QueryError {
    return err instanceof QueryError ? err : new QueryError(deviceId, toBusErrorDetail(err), { cause: err });
  }
}

/** Connect() completed with an error reply */
export class ConnectError extends DeviceBusError {
  override readonly name = 'ConnectError';

  static from(deviceId: string, err: unknown): ConnectError {
    return err instanceof ConnectError ? err : new ConnectError(deviceId, toBusErrorDetail(err), { cause: err });
  }
}
