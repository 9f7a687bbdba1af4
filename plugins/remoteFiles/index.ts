import path from 'path';
import { readFile, readdir } from 'fs/promises';
import { minimatch } from 'minimatch';

import { DeviceInfo, RemoteLayout, RemoteLayoutSize, throwDecoder } from '../../types';
import { DeviceCommand, DeviceDriver, IrDeviceDriverDescriptor } from '../../plugins';
import { DriverConstructionError, TransmissionError, describeError } from '../../errors';
import { IconResolver, icons as defaultIcons } from '../../icons';
import { defaultRemotesDirectory, defaultTransmitDevice } from '../../config';
import { fileStem, mkCommands } from '../../utils';
import { IrTransmitter, RemoteDefinition, TransmitChannel } from './types';
import { LircDeviceTransmitter } from './transmitter';
import { toPulses } from './codes';

export const remoteFilePattern = '*.remote';

export interface RemoteFilesOptions {
  remotesDirectory?: string;
  transmitter?: IrTransmitter;
  icons?: IconResolver;
}

export const remoteFilePath = (directory: string, deviceId: string) =>
  path.join(directory, `${deviceId}.remote`);

export const readRemoteDefinition = async (filepath: string): Promise<RemoteDefinition> => {
  const contents = await readFile(filepath, 'utf8');
  return throwDecoder(RemoteDefinition)(JSON.parse(contents), `Unable to decode remote definition ${filepath}`);
};

export class RemoteFileDeviceCommand extends DeviceCommand {
  constructor(
    id: number,
    title: string,
    icon: Buffer,
    public readonly key: string,
    public readonly deviceId: string,
    private code: unknown,
    private transmitter: IrTransmitter,
  ) {
    super(id, title, icon);
  }

  /**
   * A transmit device that cannot be opened is treated as an offline device:
   * nothing is sent and nothing is thrown.
   */
  async execute() {
    let pulses: number[];
    try {
      pulses = toPulses(this.code);
    } catch (e) {
      throw new TransmissionError(this.deviceId, this.key, e);
    }

    let channel: TransmitChannel;
    try {
      channel = await this.transmitter.open();
    } catch (e) {
      console.log(`[${this.deviceId}] transmitter unavailable, dropping ${this.key}: ${describeError(e)}`);
      return;
    }

    try {
      await channel.send(pulses);
    } catch (e) {
      throw new TransmissionError(this.deviceId, this.key, e);
    } finally {
      await channel.close();
    }
  }
}

/**
 * Driver for one remote definition file. The document is read once when the
 * driver is created, so a constructed driver is always ready.
 */
export class RemoteFileDeviceDriver extends DeviceDriver {
  constructor(
    deviceInfo: DeviceInfo,
    public readonly definition: RemoteDefinition,
    private transmitter: IrTransmitter,
    private icons: IconResolver,
  ) {
    super(deviceInfo);
  }

  static async load(deviceInfo: DeviceInfo, filepath: string, transmitter: IrTransmitter, icons: IconResolver) {
    try {
      const definition = await readRemoteDefinition(filepath);
      return new RemoteFileDeviceDriver(deviceInfo, definition, transmitter, icons);
    } catch (e) {
      throw new DriverConstructionError(deviceInfo.deviceId, e);
    }
  }

  async getCommands(): Promise<RemoteFileDeviceCommand[]> {
    const { keys } = this.definition;

    return mkCommands(Object.keys(keys), this.icons, (id, key, icon) =>
      new RemoteFileDeviceCommand(id, key, icon, key, this.deviceId, keys[key], this.transmitter),
    );
  }

  remoteLayoutSize(): RemoteLayoutSize {
    const { remote } = this.definition;
    return remote ? [remote.width, remote.height] : [0, 0];
  }

  // TODO: decode definition.remote.layout once its matrix format is settled
  remoteLayout(): RemoteLayout {
    return [];
  }

  async isDeviceReady() {
    return true;
  }
}

/**
 * Remote files driver
 *
 * Makes every <device id>.remote file in the remotes directory available as a
 * device and sends its codes through a LIRC transmit device.
 */
export default class RemoteFilesDriverDescriptor extends IrDeviceDriverDescriptor {
  remotesDirectory: string;
  transmitter: IrTransmitter;
  icons: IconResolver;

  constructor({
    remotesDirectory = defaultRemotesDirectory,
    transmitter = new LircDeviceTransmitter(defaultTransmitDevice),
    icons = defaultIcons,
  }: RemoteFilesOptions = {}) {
    super(
      'c41e7b09-2f6a-4d83-b5e0-7a9d18f3c624',
      'IR Remote Files',
      'Driver for controlling IR devices described by remote definition files',
    );
    this.remotesDirectory = remotesDirectory;
    this.transmitter = transmitter;
    this.icons = icons;
  }

  async getDevices(): Promise<DeviceInfo[]> {
    let filenames: string[];
    try {
      filenames = await readdir(this.remotesDirectory);
    } catch (e) {
      this.log(`Cannot list ${this.remotesDirectory}, no devices: ${describeError(e)}`);
      return [];
    }

    const remoteFiles = filenames.filter(minimatch.filter(remoteFilePattern)).sort();
    const devices: DeviceInfo[] = [];

    for (const filename of remoteFiles) {
      const deviceId = fileStem(filename);
      devices.push({ deviceId, name: await this.deviceName(deviceId) });
    }

    return devices;
  }

  async createDeviceInstance(deviceId: string): Promise<RemoteFileDeviceDriver> {
    const deviceInfo = await this.getDevice(deviceId);

    return RemoteFileDeviceDriver.load(
      deviceInfo,
      remoteFilePath(this.remotesDirectory, deviceId),
      this.transmitter,
      this.icons,
    );
  }

  // display name from the document, the file stem if it has none or is unreadable
  private async deviceName(deviceId: string) {
    try {
      const { name } = await readRemoteDefinition(remoteFilePath(this.remotesDirectory, deviceId));
      return name ?? deviceId;
    } catch {
      return deviceId;
    }
  }
}
