import { randomUUID } from 'crypto'
import { findFirst } from 'fp-ts/lib/Array'
import { fold } from 'fp-ts/lib/Option'
import { pipe } from 'fp-ts/lib/function'

import { AuthenticationMethod, DeviceInfo, RemoteLayout, RemoteLayoutSize } from './types'
import { DeviceNotFoundError } from './errors'

/**
 * A single command a device driver offers, e.g. one button of a remote.
 */
export abstract class DeviceCommand {
  constructor(
    public readonly id: number,
    public readonly title: string,
    public readonly icon: Buffer,
  ) {}

  /**
   * Send the command to the device.
   */
  abstract execute(): Promise<void>
}

export abstract class DeviceDriver {
  constructor(public readonly deviceInfo: DeviceInfo) {}

  get deviceId() {
    return this.deviceInfo.deviceId
  }

  get deviceName() {
    return this.deviceInfo.name
  }

  /**
   * Commands supported by this device.
   */
  abstract getCommands(): Promise<DeviceCommand[]>

  /**
   * [width, height] of the remote layout, [0, 0] if the device has none.
   */
  abstract remoteLayoutSize(): RemoteLayoutSize

  /**
   * The layout of the remote as a list of columns.
   */
  abstract remoteLayout(): RemoteLayout

  abstract isDeviceReady(): Promise<boolean>

  async execute(command: DeviceCommand): Promise<void> {
    await command.execute()
  }

  /**
   * Release whatever the driver holds on to. The driver is not usable afterwards.
   */
  async close(): Promise<void> { }

  log(...args: unknown[]) {
    console.log(`[${this.deviceId}]`, ...args)
  }
}

/**
 * Entry point of a driver plugin. The hub calls it to enumerate devices, pair
 * with them and to create drivers for them.
 */
export abstract class DeviceDriverDescriptor {
  constructor(
    public readonly driverId: string,
    public readonly displayName: string,
    public readonly description: string,
  ) {}

  abstract get authenticationMethod(): AuthenticationMethod

  abstract get requiresPairing(): boolean

  /**
   * Returns a list with the available device instances.
   */
  abstract getDevices(): Promise<DeviceInfo[]>

  /**
   * Start pairing with given device, resolves to the pairing request id and
   * whether the device provides a PIN.
   */
  abstract startPairing(device: DeviceInfo, remoteName: string): Promise<[string, boolean]>

  abstract finalizePairing(pairingRequest: string, credentials: string, deviceProvidesPin: boolean): Promise<boolean>

  abstract createDeviceInstance(deviceId: string): Promise<DeviceDriver>

  async getDevice(deviceId: string): Promise<DeviceInfo> {
    const devices = await this.getDevices()

    return pipe(
      findFirst((device: DeviceInfo) => device.deviceId === deviceId)(devices),
      fold(
        () => { throw new DeviceNotFoundError(deviceId) },
        device => device,
      ),
    )
  }

  log(...args: unknown[]) {
    console.log(`[${this.displayName}]`, ...args)
  }
}

/**
 * IR is unidirectional and unauthenticated, so pairing is a formality: every
 * request gets a fresh id, no PIN is involved and finalizing always succeeds.
 */
export abstract class IrDeviceDriverDescriptor extends DeviceDriverDescriptor {
  get authenticationMethod(): AuthenticationMethod {
    return 'NONE'
  }

  get requiresPairing() {
    return false
  }

  async startPairing(device: DeviceInfo, remoteName: string): Promise<[string, boolean]> {
    return [randomUUID(), false]
  }

  // request ids are not tracked, any id is accepted
  async finalizePairing(pairingRequest: string, credentials: string, deviceProvidesPin: boolean) {
    return true
  }
}
