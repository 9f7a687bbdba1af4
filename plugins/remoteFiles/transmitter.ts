import { constants } from 'fs';
import { open } from 'fs/promises';

import { IrTransmitter, TransmitChannel } from './types';

/**
 * Pulse trains to a kernel LIRC transmit device (/dev/lircN) in
 * LIRC_MODE_PULSE: one write of unsigned 32 bit microsecond durations,
 * starting and ending with a pulse.
 */
export class LircDeviceTransmitter implements IrTransmitter {
  constructor(public readonly devicePath: string) {}

  // O_WRONLY alone: a missing device node must fail to open, not be created
  async open(): Promise<TransmitChannel> {
    const handle = await open(this.devicePath, constants.O_WRONLY);

    return {
      send: async (pulses: number[]) => {
        const buffer = Buffer.alloc(pulses.length * 4);
        pulses.forEach((duration, i) => buffer.writeUInt32LE(duration, i * 4));

        const { bytesWritten } = await handle.write(buffer);
        if (bytesWritten !== buffer.length)
          throw new Error(`Short write to ${this.devicePath}: ${bytesWritten} of ${buffer.length} bytes`);
      },
      close: () => handle.close(),
    };
  }
}
