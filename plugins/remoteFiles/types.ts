import * as t from 'io-ts';

export const RemoteGrid = t.type({
  width: t.number,
  height: t.number,
  // format still undecided, kept as-is
  layout: t.unknown,
});
export type RemoteGrid = t.TypeOf<typeof RemoteGrid>;

// Code data stays opaque until a key is sent, see ./codes
export const RemoteDefinition = t.intersection([
  t.type({
    keys: t.record(t.string, t.unknown),
  }),
  t.partial({
    name: t.string,
    remote: RemoteGrid,
  }),
]);
export type RemoteDefinition = t.TypeOf<typeof RemoteDefinition>;

// pulse, space, pulse, ... in microseconds
export const RawCode = t.array(t.number);
export type RawCode = t.TypeOf<typeof RawCode>;

export const NecCode = t.type({
  protocol: t.literal('nec'),
  address: t.number,
  command: t.number,
});
export type NecCode = t.TypeOf<typeof NecCode>;

// Pronto hex, e.g. "0000 006D 0022 0002 0157 00AC ..."
export const ProntoCode = t.string;

export const KeyCode = t.union([RawCode, NecCode, ProntoCode]);
export type KeyCode = t.TypeOf<typeof KeyCode>;

export interface TransmitChannel {
  send(pulses: number[]): Promise<void>;
  close(): Promise<void>;
}

export interface IrTransmitter {
  /**
   * Acquire the transmit device. Rejects when the device is unavailable.
   */
  open(): Promise<TransmitChannel>;
}
