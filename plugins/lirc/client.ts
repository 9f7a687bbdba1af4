import net from 'net';

import { DriverError, describeError } from '../../errors';
import { PendingReply, LircReply } from './types';
import { ReplyParser, parseKeyLine } from './utils';

export class LircConnectionError extends DriverError {
  constructor(public readonly socketPath: string, cause: unknown) {
    super(`Unable to connect to lircd at ${socketPath}: ${describeError(cause)}`, { cause });
  }
}

export class LircReplyError extends DriverError {
  constructor(public readonly command: string, public readonly data: string[]) {
    super(`lircd rejected "${command}": ${data.join(' ') || 'no reason given'}`);
  }
}

/**
 * Client for the lircd command socket. Commands are answered in the order
 * they were sent, so pending replies are kept in a FIFO queue.
 */
export class LircClient {
  private pending: PendingReply[] = [];
  private parser: ReplyParser;
  private closed = false;

  constructor(private socket: net.Socket, public readonly socketPath: string) {
    this.parser = new ReplyParser(this.handleReply);

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      try {
        this.parser.feed(chunk);
      } catch (e) {
        this.fail(e instanceof Error ? e : new Error(String(e)));
        socket.destroy();
      }
    });
    socket.on('error', e => this.fail(new LircConnectionError(socketPath, e)));
    socket.on('close', () => {
      this.closed = true;
      this.fail(new LircConnectionError(socketPath, 'connection closed'));
    });
  }

  static connect(socketPath: string): Promise<LircClient> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(socketPath);
      const onError = (e: Error) => reject(new LircConnectionError(socketPath, e));

      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new LircClient(socket, socketPath));
      });
    });
  }

  send(command: string): Promise<string[]> {
    if (this.closed) return Promise.reject(new LircConnectionError(this.socketPath, 'connection closed'));

    return new Promise((resolve, reject) => {
      this.pending.push({ command, resolve, reject });
      this.socket.write(`${command}\n`);
    });
  }

  /**
   * Names of the remotes lircd has loaded.
   */
  async listRemotes(): Promise<string[]> {
    const data = await this.send('LIST');
    return data.filter(Boolean);
  }

  /**
   * Key names of given remote, in the order lircd lists them.
   */
  async listRemoteKeys(remote: string): Promise<string[]> {
    const data = await this.send(`LIST ${remote}`);
    return data
      .map(parseKeyLine)
      .filter((key): key is string => key !== undefined);
  }

  async sendOnce(remote: string, key: string, repeat = 0): Promise<void> {
    await this.send(repeat > 0 ? `SEND_ONCE ${remote} ${key} ${repeat}` : `SEND_ONCE ${remote} ${key}`);
  }

  async version(): Promise<string> {
    const [version = ''] = await this.send('VERSION');
    return version;
  }

  get connected() {
    return !this.closed;
  }

  close() {
    this.closed = true;
    this.socket.destroy();
  }

  private handleReply = (reply: LircReply) => {
    const pending = this.pending.shift();
    if (!pending) return;

    if (reply.success) pending.resolve(reply.data);
    else pending.reject(new LircReplyError(pending.command, reply.data));
  };

  private fail(e: Error) {
    const pending = this.pending;
    this.pending = [];
    for (const { reject } of pending) reject(e);
  }
}
