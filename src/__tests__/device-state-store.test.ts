import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DeviceStateStore } from '../reconnect/device-state-store';

const DEV = '/org/bluez/hci0/dev_AA_BB_CC_DD_EE_FF';

describe('DeviceStateStore', () => {
  it('creates a record on first connect', () => {
    const store = new DeviceStateStore();
    assert.equal(store.has(DEV), false);

    store.markConnected(DEV, 1000);

    assert.deepEqual(store.get(DEV), { lastConnectTime: 1000 });
    assert.equal(store.size, 1);
  });

  it('updates the timestamp and drops the timer handle on a later connect', () => {
    const store = new DeviceStateStore();
    store.markConnected(DEV, 1000);
    store.setPendingTimer(DEV, { deviceId: DEV, id: 7 });

    store.markConnected(DEV, 2500);

    assert.equal(store.get(DEV)?.lastConnectTime, 2500);
    assert.equal(store.get(DEV)?.pendingTimer, undefined);
    assert.deepEqual(store.get(DEV), { lastConnectTime: 2500 });
  });

  it('only attaches a timer to an existing record', () => {
    const store = new DeviceStateStore();
    assert.equal(store.setPendingTimer(DEV, { deviceId: DEV, id: 1 }), false);
    assert.equal(store.has(DEV), false);

    store.markConnected(DEV, 0);
    assert.equal(store.setPendingTimer(DEV, { deviceId: DEV, id: 1 }), true);
    assert.deepEqual(store.get(DEV)?.pendingTimer, { deviceId: DEV, id: 1 });
  });

  it('remove returns the record and leaves nothing behind', () => {
    const store = new DeviceStateStore();
    store.markConnected(DEV, 42);

    assert.deepEqual(store.remove(DEV), { lastConnectTime: 42 });
    assert.equal(store.has(DEV), false);
    assert.equal(store.remove(DEV), undefined);
  });

  it('clear returns the handles still held', () => {
    const store = new DeviceStateStore();
    store.markConnected('/dev/a', 0);
    store.markConnected('/dev/b', 0);
    store.setPendingTimer('/dev/b', { deviceId: '/dev/b', id: 3 });

    const handles = store.clear();

    assert.deepEqual(handles, [{ deviceId: '/dev/b', id: 3 }]);
    assert.equal(store.size, 0);
    assert.deepEqual(store.deviceIds(), []);
  });
});
