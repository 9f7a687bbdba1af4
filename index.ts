import { defaultApiPort, loadConfig } from './config';
import { getDriverDescriptor } from './drivers';
import { DriverApi } from './api';

export { getDriverDescriptor } from './drivers';
export { DeviceCommand, DeviceDriver, DeviceDriverDescriptor, IrDeviceDriverDescriptor } from './plugins';
export { IconResolver, icons } from './icons';
export * from './errors';
export * from './types';

/**
 * Loads the config, creates the configured driver and serves it over HTTP.
 */
const init = async () => {
  const config = await loadConfig();

  const descriptor = getDriverDescriptor(config);
  console.log(`Loaded driver ${descriptor.displayName} (${config.backend})`);

  const devices = await descriptor.getDevices();
  console.log(`Found ${devices.length} device(s): ${devices.map(d => d.deviceId).join(', ')}`);

  const api = new DriverApi(descriptor);
  const port = config.api?.port ?? defaultApiPort;
  await api.listen(port);

  console.log(`Initialization complete, API bound to port ${port}.`);
};

if (require.main === module) {
  init().catch(e => {
    console.error(e);
    process.exit(1);
  });
}
