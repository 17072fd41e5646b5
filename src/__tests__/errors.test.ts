import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DBusError } from 'dbus-next';
import { ConnectError, QueryError, toBusErrorDetail } from '../errors';

const DEV = '/org/bluez/hci0/dev_AA_BB_CC_DD_EE_FF';

describe('toBusErrorDetail', () => {
  it('uses the D-Bus error name and text', () => {
    const detail = toBusErrorDetail(new DBusError('org.bluez.Error.NotReady', 'Resource Not Ready'));
    assert.deepEqual(detail, { errorName: 'org.bluez.Error.NotReady', message: 'Resource Not Ready' });
  });

  it('falls back to the JS error name', () => {
    assert.deepEqual(toBusErrorDetail(new TypeError('bad path')), { errorName: 'TypeError', message: 'bad path' });
  });

  it('stringifies anything else', () => {
    assert.deepEqual(toBusErrorDetail('socket closed'), { errorName: 'Error', message: 'socket closed' });
  });
});

describe('QueryError / ConnectError', () => {
  it('carry the device and the bus error', () => {
    const cause = new DBusError('org.bluez.Error.Failed', 'Operation already in progress');
    const error = ConnectError.from(DEV, cause);

    assert.equal(error.name, 'ConnectError');
    assert.equal(error.deviceId, DEV);
    assert.equal(error.errorName, 'org.bluez.Error.Failed');
    assert.equal(error.message, 'Operation already in progress');
    assert.equal(error.cause, cause);
  });

  it('are not wrapped twice', () => {
    const error = new QueryError(DEV, { errorName: 'InvalidReply', message: 'no flags' });
    assert.equal(QueryError.from(DEV, error), error);
  });
});
