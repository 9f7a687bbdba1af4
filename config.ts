import os from 'os'
import path from 'path'
import { cosmiconfig } from 'cosmiconfig'

import { DriverConfig, throwDecoder } from './types';

export const defaultLircSocket = '/var/run/lirc/lircd'
export const defaultTransmitDevice = '/dev/lirc0'
export const defaultRemotesDirectory = path.join(os.homedir(), '.config', 'irhub', 'remotes')
export const defaultApiPort = 8090

const explorer = cosmiconfig("irhub");

export const loadConfig = async (searchFrom?: string) => {
  const result = await explorer.search(searchFrom);

  if (!result) throw new Error("Unable to find irhub config file!")
  const { config, filepath } = result

  console.log(`Using configuration file: ${filepath}`)
  console.log('Decoding config...')
  const decoded = throwDecoder(DriverConfig)(config, `Error while decoding config, quitting...`)

  console.log('Successfully loaded config.')
  return decoded
}
