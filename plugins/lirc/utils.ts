import { LircReply, ReplyCallback } from './types';

type ParserState =
  | { expect: 'begin' }
  | { expect: 'command' }
  | { expect: 'status'; command: string }
  | { expect: 'dataOrEnd'; command: string; success: boolean }
  | { expect: 'count'; command: string; success: boolean }
  | { expect: 'data'; command: string; success: boolean; remaining: number; data: string[] }
  | { expect: 'end'; reply: LircReply | undefined }

/**
 * Incremental parser for lircd replies
 *
 * https://www.lirc.org/html/lircd.html#lbAH
 *
 *   BEGIN
 *   <command>
 *   [SUCCESS|ERROR]
 *   [DATA
 *   n
 *   n lines of data]
 *   END
 *
 * Broadcast messages (SIGHUP) share the BEGIN/END framing but carry no status;
 * they are consumed without producing a reply.
 */
export class ReplyParser {
  private buffer = '';
  private state: ParserState = { expect: 'begin' };

  constructor(private onReply: ReplyCallback) {}

  feed = (chunk: string) => {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      this.line(line);
      newline = this.buffer.indexOf('\n');
    }
  };

  private line(line: string) {
    const state = this.state;

    switch (state.expect) {
      case 'begin':
        // anything outside a BEGIN/END block is noise
        if (line === 'BEGIN') this.state = { expect: 'command' };
        break;
      case 'command':
        this.state = line === 'SIGHUP'
          ? { expect: 'end', reply: undefined }
          : { expect: 'status', command: line };
        break;
      case 'status':
        if (line === 'SUCCESS' || line === 'ERROR') {
          this.state = { expect: 'dataOrEnd', command: state.command, success: line === 'SUCCESS' };
        } else if (line === 'END') {
          this.finish({ command: state.command, success: true, data: [] });
        } else {
          throw new Error(`Unexpected status line in lircd reply to ${state.command}: ${line}`);
        }
        break;
      case 'dataOrEnd':
        if (line === 'DATA') {
          this.state = { expect: 'count', command: state.command, success: state.success };
        } else if (line === 'END') {
          this.finish({ command: state.command, success: state.success, data: [] });
        } else {
          throw new Error(`Unexpected line in lircd reply to ${state.command}: ${line}`);
        }
        break;
      case 'count': {
        const remaining = parseInt(line, 10);
        if (isNaN(remaining)) throw new Error(`Invalid data length in lircd reply to ${state.command}: ${line}`);

        this.state = remaining === 0
          ? { expect: 'end', reply: { command: state.command, success: state.success, data: [] } }
          : { expect: 'data', command: state.command, success: state.success, remaining, data: [] };
        break;
      }
      case 'data': {
        const data = [...state.data, line];
        this.state = data.length === state.remaining
          ? { expect: 'end', reply: { command: state.command, success: state.success, data } }
          : { ...state, data };
        break;
      }
      case 'end':
        if (line !== 'END') throw new Error(`Expected END in lircd reply, got: ${line}`);
        if (state.reply) this.finish(state.reply);
        else this.state = { expect: 'begin' };
        break;
    }
  }

  private finish(reply: LircReply) {
    this.state = { expect: 'begin' };
    this.onReply(reply);
  }
}

/**
 * `LIST <remote>` lines are "<code> <key>", older daemons send the key only.
 */
export const parseKeyLine = (line: string): string | undefined => {
  const fields = line.trim().split(/\s+/).filter(Boolean);
  return fields.length > 1 ? fields[1] : fields[0];
};
