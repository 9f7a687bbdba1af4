import { DeviceInfo, RemoteLayout, RemoteLayoutSize } from '../../types';
import { DeviceCommand, DeviceDriver, IrDeviceDriverDescriptor } from '../../plugins';
import { TransmissionError, describeError } from '../../errors';
import { IconResolver, icons as defaultIcons } from '../../icons';
import { defaultLircSocket } from '../../config';
import { mkCommands } from '../../utils';
import { LircClient } from './client';

export interface LircOptions {
  socketPath?: string;
  icons?: IconResolver;
}

export class LircDeviceCommand extends DeviceCommand {
  constructor(
    id: number,
    title: string,
    icon: Buffer,
    public readonly key: string,
    public readonly deviceId: string,
    private socketPath: string,
  ) {
    super(id, title, icon);
  }

  /**
   * Opens a connection of its own for each send. An unreachable daemon is
   * treated as an offline device: nothing is sent and nothing is thrown.
   */
  async execute() {
    let client: LircClient;
    try {
      client = await LircClient.connect(this.socketPath);
    } catch (e) {
      console.log(`[${this.deviceId}] lircd unavailable, dropping ${this.key}: ${describeError(e)}`);
      return;
    }

    try {
      await client.sendOnce(this.deviceId, this.key);
    } catch (e) {
      throw new TransmissionError(this.deviceId, this.key, e);
    } finally {
      client.close();
    }
  }
}

/**
 * Driver for one remote known to lircd. The daemon connection is made when
 * the driver is created; without it, or once lircd drops it, the driver is
 * not ready and has no commands.
 */
export class LircDeviceDriver extends DeviceDriver {
  constructor(
    deviceInfo: DeviceInfo,
    private client: LircClient | undefined,
    private socketPath: string,
    private icons: IconResolver,
  ) {
    super(deviceInfo);
  }

  static async create(deviceInfo: DeviceInfo, socketPath: string, icons: IconResolver) {
    try {
      const client = await LircClient.connect(socketPath);
      return new LircDeviceDriver(deviceInfo, client, socketPath, icons);
    } catch (e) {
      console.log(`[${deviceInfo.deviceId}] lircd unavailable, device not ready: ${describeError(e)}`);
      return new LircDeviceDriver(deviceInfo, undefined, socketPath, icons);
    }
  }

  async getCommands(): Promise<LircDeviceCommand[]> {
    if (!this.client?.connected) return [];

    const keys = await this.client.listRemoteKeys(this.deviceId);
    return mkCommands(keys, this.icons, (id, key, icon) =>
      new LircDeviceCommand(id, key, icon, key, this.deviceId, this.socketPath),
    );
  }

  // lircd has no notion of button placement
  remoteLayoutSize(): RemoteLayoutSize {
    return [0, 0];
  }

  remoteLayout(): RemoteLayout {
    return [];
  }

  async isDeviceReady() {
    return this.client?.connected ?? false;
  }

  async close() {
    this.client?.close();
    this.client = undefined;
  }
}

/**
 * LIRC driver
 *
 * Makes every remote loaded by lircd available as a device.
 */
export default class LircDriverDescriptor extends IrDeviceDriverDescriptor {
  socketPath: string;
  icons: IconResolver;

  constructor({ socketPath = defaultLircSocket, icons = defaultIcons }: LircOptions = {}) {
    super(
      '6f0d3a52-8c1e-4b7a-9e35-21d4c07b9a18',
      'IR Controlled Devices',
      'Driver for controlling IR devices through lircd',
    );
    this.socketPath = socketPath;
    this.icons = icons;
  }

  async getDevices(): Promise<DeviceInfo[]> {
    let client: LircClient;
    try {
      client = await LircClient.connect(this.socketPath);
    } catch (e) {
      this.log(`lircd unavailable, no devices: ${describeError(e)}`);
      return [];
    }

    try {
      const remotes = await client.listRemotes();
      return remotes.map(remote => ({ deviceId: remote, name: remote }));
    } finally {
      client.close();
    }
  }

  async createDeviceInstance(deviceId: string): Promise<LircDeviceDriver> {
    return LircDeviceDriver.create(await this.getDevice(deviceId), this.socketPath, this.icons);
  }
}
