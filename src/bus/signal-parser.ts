/**
 * PropertiesChanged decoding
 *
 * Turns raw dbus-next messages into plain notifications. Variant
 * wrappers are stripped so the dispatcher only ever sees JS values.
 */

import { Message, MessageType, Variant } from 'dbus-next';
import { z } from 'zod';

export const PROPERTIES_INTERFACE = 'org.freedesktop.DBus.Properties';
export const PROPERTIES_CHANGED = 'PropertiesChanged';

export interface PropertyChangeNotification {
  /** Object path of the emitting object, e.g. /org/bluez/hci0/dev_AA_BB_CC_DD_EE_FF */
  path: string;
  interfaceName: string;
  changed: Record<string, unknown>;
  /** Not used by the state machine; kept for logging */
  invalidated: string[];
}

const variantDictSchema = z.record(z.string(), z.instanceof(Variant));

const propertiesChangedBodySchema = z.tuple([
  z.string(),
  variantDictSchema,
  z.array(z.string()),
]);

/** a{sv} -> { name: value } */
export function unwrapVariants(dict: Record<string, Variant>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [name, variant] of Object.entries(dict)) {
    result[name] = variant.value;
  }
  return result;
}

/** Parse an a{sv} reply body entry, or null if it isn't one */
export function parseVariantDict(value: unknown): Record<string, unknown> | null {
  const parsed = variantDictSchema.safeParse(value);
  return parsed.success ? unwrapVariants(parsed.data) : null;
}

export function isPropertiesChanged(message: Message): boolean {
  return message.type === MessageType.SIGNAL
    && message.interface === PROPERTIES_INTERFACE
    && message.member === PROPERTIES_CHANGED;
}

/**
 * Decode a PropertiesChanged signal.
 * Returns null for any other message, or a body that doesn't match (sa{sv}as).
 */
export function parsePropertiesChanged(message: Message): PropertyChangeNotification | null {
  if (!isPropertiesChanged(message) || !message.path) return null;

  const body = propertiesChangedBodySchema.safeParse(message.body);
  if (!body.success) return null;

  const [interfaceName, changed, invalidated] = body.data;
  return {
    path: message.path,
    interfaceName,
    changed: unwrapVariants(changed),
    invalidated,
  };
}

/** Match rule covering every BlueZ object, no path filter */
export function propertiesChangedMatchRule(sender: string): string {
  return `type='signal',sender='${sender}',interface='${PROPERTIES_INTERFACE}',member='${PROPERTIES_CHANGED}'`;
}
