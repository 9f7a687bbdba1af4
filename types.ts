import * as t from 'io-ts'
import { pipe } from 'fp-ts/lib/function';
import { fold, left } from 'fp-ts/lib/Either';
import { reporter } from 'io-ts-reporters'

import { DecodeError } from './errors';

export const Backend = t.keyof({
  lirc: null,
  remoteFiles: null,
})
export type Backend = t.TypeOf<typeof Backend>

export const ApiConfig = t.type({
  port: t.number,
})
export type ApiConfig = t.TypeOf<typeof ApiConfig>

export const DriverConfig = t.intersection([
  t.type({
    backend: Backend,
  }),
  t.partial({
    // lircd command socket
    lircSocket: t.string,
    // directory holding one <device id>.remote file per device
    remotesDirectory: t.string,
    // LIRC transmit device the remote files back-end writes pulses to
    transmitDevice: t.string,
    iconsDirectory: t.string,
    api: ApiConfig,
  }),
])
export type DriverConfig = t.TypeOf<typeof DriverConfig>

export const DeviceInfo = t.type({
  deviceId: t.string,
  name: t.string,
})
export type DeviceInfo = t.TypeOf<typeof DeviceInfo>

export const AuthenticationMethod = t.keyof({
  NONE: null,
  PIN: null,
})
export type AuthenticationMethod = t.TypeOf<typeof AuthenticationMethod>

export const PairingRequest = t.type({
  deviceId: t.string,
  remoteName: t.string,
})
export type PairingRequest = t.TypeOf<typeof PairingRequest>

export const PairingCompletion = t.type({
  credentials: t.string,
  deviceProvidesPin: t.boolean,
})
export type PairingCompletion = t.TypeOf<typeof PairingCompletion>

/** [width, height] of the physical button grid */
export type RemoteLayoutSize = [number, number]

/** Button grid as a list of columns of command ids */
export type RemoteLayout = number[][]

export const throwDecoder = <A>(decoder: t.Decoder<unknown, A>) => (value: unknown, msg: string): A =>
  pipe(
    decoder.decode(value),
    fold(e => {
      console.error(msg)
      throw new DecodeError(msg, reporter(left(e)))
    }, a => a)
  )
