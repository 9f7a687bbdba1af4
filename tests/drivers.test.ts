import { describe, it } from 'node:test';
import assert from 'node:assert';

import { getDriverDescriptor } from '../drivers';
import { icons } from '../icons';
import { defaultLircSocket, defaultRemotesDirectory, defaultTransmitDevice } from '../config';
import LircDriverDescriptor from '../plugins/lirc';
import RemoteFilesDriverDescriptor from '../plugins/remoteFiles';
import { LircDeviceTransmitter } from '../plugins/remoteFiles/transmitter';

describe('getDriverDescriptor', () => {
  it('creates the lirc back-end with defaults', () => {
    const descriptor = getDriverDescriptor({ backend: 'lirc' });

    assert.ok(descriptor instanceof LircDriverDescriptor);
    assert.strictEqual(descriptor.socketPath, defaultLircSocket);
    assert.strictEqual(descriptor.icons, icons);
  });

  it('passes the lirc socket through', () => {
    const descriptor = getDriverDescriptor({ backend: 'lirc', lircSocket: '/run/lirc/test' });

    assert.ok(descriptor instanceof LircDriverDescriptor);
    assert.strictEqual(descriptor.socketPath, '/run/lirc/test');
  });

  it('creates the remote files back-end with defaults', () => {
    const descriptor = getDriverDescriptor({ backend: 'remoteFiles' });

    assert.ok(descriptor instanceof RemoteFilesDriverDescriptor);
    assert.strictEqual(descriptor.remotesDirectory, defaultRemotesDirectory);
    assert.ok(descriptor.transmitter instanceof LircDeviceTransmitter);
    assert.strictEqual(descriptor.transmitter.devicePath, defaultTransmitDevice);
  });

  it('passes remote files settings through', () => {
    const descriptor = getDriverDescriptor({
      backend: 'remoteFiles',
      remotesDirectory: '/srv/remotes',
      transmitDevice: '/dev/lirc1',
      iconsDirectory: '/srv/icons',
    });

    assert.ok(descriptor instanceof RemoteFilesDriverDescriptor);
    assert.strictEqual(descriptor.remotesDirectory, '/srv/remotes');
    assert.ok(descriptor.transmitter instanceof LircDeviceTransmitter);
    assert.strictEqual(descriptor.transmitter.devicePath, '/dev/lirc1');
    assert.strictEqual(descriptor.icons.directory, '/srv/icons');
  });

  it('gives the back-ends distinct driver ids', () => {
    const lirc = getDriverDescriptor({ backend: 'lirc' });
    const files = getDriverDescriptor({ backend: 'remoteFiles' });

    assert.notStrictEqual(lirc.driverId, files.driverId);
  });
});
