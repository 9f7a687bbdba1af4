import { Backend, DriverConfig } from './types'
import { DeviceDriverDescriptor } from './plugins'
import { IconResolver, icons as defaultIcons } from './icons'
import { defaultTransmitDevice } from './config'
import LircDriverDescriptor from './plugins/lirc'
import RemoteFilesDriverDescriptor from './plugins/remoteFiles'
import { LircDeviceTransmitter } from './plugins/remoteFiles/transmitter'

type DescriptorFactory = (config: DriverConfig, icons: IconResolver) => DeviceDriverDescriptor

const factories: { [backend in Backend]: DescriptorFactory } = {
  lirc: (config, icons) => new LircDriverDescriptor({
    socketPath: config.lircSocket,
    icons,
  }),
  remoteFiles: (config, icons) => new RemoteFilesDriverDescriptor({
    remotesDirectory: config.remotesDirectory,
    transmitter: new LircDeviceTransmitter(config.transmitDevice ?? defaultTransmitDevice),
    icons,
  }),
}

/**
 * Plugin entry point: the hub calls this once at load time, the configured
 * back-end decides which descriptor it gets.
 */
export const getDriverDescriptor = (config: DriverConfig): DeviceDriverDescriptor => {
  const icons = config.iconsDirectory ? new IconResolver(config.iconsDirectory) : defaultIcons
  return factories[config.backend](config, icons)
}
