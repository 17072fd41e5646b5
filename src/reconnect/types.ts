/**
 * Reconnect Types
 *
 * Shared shapes for the flaky-disconnect state machine.
 */

/** Bus interface whose Connected/Trusted flags drive the state machine */
export const DEVICE_INTERFACE = 'org.bluez.Device1';

/** Property whose transitions are watched */
export const CONNECTED_PROPERTY = 'Connected';

/** Default debounce window: a disconnect sooner than this after a connect is flaky */
export const DEFAULT_DEBOUNCE_WINDOW_MS = 3000;

/** Millisecond clock, injectable for tests */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Opaque handle to an armed one-shot timer */
export interface TimerHandle {
  readonly deviceId: string;
  readonly id: number;
}

/** Per-device transient state */
export interface DeviceRecord {
  /** ms timestamp of the most recent Connected=true */
  lastConnectTime: number;
  pendingTimer?: TimerHandle;
}

/** Device flags read back before a reconnect attempt */
export interface DeviceFlags {
  connected: boolean;
  trusted: boolean;
}

/** Reads the current flags for a device */
export interface CapabilityQueryClient {
  getFlags(deviceId: string): Promise<DeviceFlags>;
}

/** Issues Connect(); the promise settles when the bus replies */
export interface AsyncConnectInvoker {
  connect(deviceId: string): Promise<void>;
}

/** How a scheduled attempt ended (the connect itself completes later) */
export type AttemptOutcome = 'query-failed' | 'already-connected' | 'untrusted' | 'connect-requested';
