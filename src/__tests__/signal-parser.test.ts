import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Message, MessageType, Variant } from 'dbus-next';
import {
  parsePropertiesChanged,
  parseVariantDict,
  propertiesChangedMatchRule,
  unwrapVariants,
} from '../bus/signal-parser';

const DEV = '/org/bluez/hci0/dev_AA_BB_CC_DD_EE_FF';

function signal(body: unknown[], member = 'PropertiesChanged'): Message {
  return new Message({
    type: MessageType.SIGNAL,
    path: DEV,
    interface: 'org.freedesktop.DBus.Properties',
    member,
    signature: 'sa{sv}as',
    body,
  });
}

describe('unwrapVariants', () => {
  it('replaces each variant with its value', () => {
    const result = unwrapVariants({
      Connected: new Variant('b', false),
      Alias: new Variant('s', 'Headphones'),
    });
    assert.deepEqual(result, { Connected: false, Alias: 'Headphones' });
  });
});

describe('parseVariantDict', () => {
  it('returns null for anything that is not a dictionary of variants', () => {
    assert.equal(parseVariantDict(undefined), null);
    assert.equal(parseVariantDict('Connected'), null);
    assert.equal(parseVariantDict({ Connected: true }), null);
  });

  it('unwraps a dictionary of variants', () => {
    assert.deepEqual(
      parseVariantDict({ Trusted: new Variant('b', true) }),
      { Trusted: true },
    );
  });
});

describe('parsePropertiesChanged', () => {
  it('decodes interface, changed values and invalidated names', () => {
    const notification = parsePropertiesChanged(signal([
      'org.bluez.Device1',
      { Connected: new Variant('b', true) },
      ['RSSI'],
    ]));

    assert.deepEqual(notification, {
      path: DEV,
      interfaceName: 'org.bluez.Device1',
      changed: { Connected: true },
      invalidated: ['RSSI'],
    });
  });

  it('ignores other signals', () => {
    assert.equal(parsePropertiesChanged(signal(['org.bluez.Device1', {}, []], 'InterfacesAdded')), null);
  });

  it('ignores method calls', () => {
    const call = new Message({
      path: DEV,
      interface: 'org.freedesktop.DBus.Properties',
      member: 'PropertiesChanged',
    });
    assert.equal(parsePropertiesChanged(call), null);
  });

  it('drops a body with the wrong shape', () => {
    assert.equal(parsePropertiesChanged(signal(['org.bluez.Device1', { Connected: true }, []])), null);
    assert.equal(parsePropertiesChanged(signal(['org.bluez.Device1'])), null);
  });
});

describe('propertiesChangedMatchRule', () => {
  it('matches PropertiesChanged from the sender on every path', () => {
    assert.equal(
      propertiesChangedMatchRule('org.bluez'),
      "type='signal',sender='org.bluez',interface='org.freedesktop.DBus.Properties',member='PropertiesChanged'",
    );
  });
});
