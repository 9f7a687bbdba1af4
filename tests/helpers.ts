import net from 'net';
import os from 'os';
import path from 'path';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { setTimeout as sleep } from 'timers/promises';

import { IconResolver } from '../icons';
import { IrTransmitter, TransmitChannel } from '../plugins/remoteFiles/types';

export const unknownIcon = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00]);

export const tmpDir = (prefix: string) => mkdtemp(path.join(os.tmpdir(), `${prefix}-`));

export const removeDir = (dir: string) => rm(dir, { recursive: true, force: true });

/**
 * Icon directory holding only the fallback icon plus the given icons.
 */
export const iconDir = async (iconsByKey: { [key: string]: Buffer } = {}) => {
  const dir = await tmpDir('icons');
  await writeFile(path.join(dir, 'unknown.png'), unknownIcon);
  for (const key in iconsByKey) {
    await writeFile(path.join(dir, `${key}.png`), iconsByKey[key]);
  }
  return { dir, icons: new IconResolver(dir) };
};

/**
 * Polls until the check passes, for state that changes on socket events.
 */
export const waitFor = async (check: () => Promise<boolean>, attempts = 100) => {
  for (let i = 0; i < attempts; i++) {
    if (await check()) return;
    await sleep(10);
  }
  throw new Error(`Condition not met after ${attempts} attempts`);
};

export const lircReply = (command: string, success: boolean, data?: string[]) =>
  [
    'BEGIN',
    command,
    success ? 'SUCCESS' : 'ERROR',
    ...(data ? ['DATA', String(data.length), ...data] : []),
    'END',
  ].join('\n') + '\n';

/**
 * In-process stand-in for lircd, listening on a Unix socket in a temp dir.
 */
export class FakeLircd {
  server: net.Server;
  sockets = new Set<net.Socket>();
  sent: Array<[string, string]> = [];
  received: string[] = [];
  connections = 0;
  socketPath = '';
  dir = '';
  // broadcast sent to every new connection before any reply
  greeting = '';

  constructor(public remotes: { [remote: string]: string[] }) {
    this.server = net.createServer(socket => {
      this.connections++;
      this.sockets.add(socket);
      socket.on('close', () => this.sockets.delete(socket));
      socket.setEncoding('utf8');
      if (this.greeting) socket.write(this.greeting);

      let buffer = '';
      socket.on('data', (chunk: string) => {
        buffer += chunk;
        let newline = buffer.indexOf('\n');
        while (newline !== -1) {
          const line = buffer.slice(0, newline);
          buffer = buffer.slice(newline + 1);
          socket.write(this.handle(line));
          newline = buffer.indexOf('\n');
        }
      });
    });
  }

  handle(line: string): string {
    this.received.push(line);
    const [command, remote, key] = line.split(' ');

    switch (command) {
      case 'VERSION':
        return lircReply(line, true, ['0.10.1']);
      case 'LIST': {
        if (!remote) return lircReply(line, true, Object.keys(this.remotes));
        const keys = this.remotes[remote];
        if (!keys) return lircReply(line, false, [`unknown remote: "${remote}"`]);
        return lircReply(line, true, keys.map((k, i) => `${i.toString(16).padStart(16, '0')} ${k}`));
      }
      case 'SEND_ONCE': {
        const keys = this.remotes[remote];
        if (!keys || !keys.includes(key)) return lircReply(line, false, [`unknown command: "${key}"`]);
        this.sent.push([remote, key]);
        return lircReply(line, true);
      }
      default:
        return lircReply(line, false, [`unknown directive: "${command}"`]);
    }
  }

  async start() {
    this.dir = await tmpDir('lircd');
    this.socketPath = path.join(this.dir, 'lircd');
    await new Promise<void>(resolve => this.server.listen(this.socketPath, resolve));
    return this.socketPath;
  }

  // drops every client connection, as a restarting lircd would
  disconnectAll() {
    for (const socket of this.sockets) socket.destroy();
  }

  async stop() {
    this.disconnectAll();
    await new Promise<void>(resolve => this.server.close(() => resolve()));
    await removeDir(this.dir);
  }
}

/**
 * Transmitter that records pulse trains instead of sending them.
 */
export class MemoryTransmitter implements IrTransmitter {
  sent: number[][] = [];
  opened = 0;
  closed = 0;
  available = true;
  failWrites = false;

  async open(): Promise<TransmitChannel> {
    if (!this.available) throw new Error('ENOENT: no such file or directory');
    this.opened++;

    return {
      send: async (pulses: number[]) => {
        if (this.failWrites) throw new Error('EIO: i/o error');
        this.sent.push(pulses);
      },
      close: async () => {
        this.closed++;
      },
    };
  }
}
