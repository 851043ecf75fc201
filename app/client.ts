import * as net from 'net';
import type { Duplex } from 'stream';
import { encode } from './encoder';
import { CommandError } from './errors';
import { RESPReader } from './reader';
import { DEFAULT_PORT, LOCALHOST, RESPType, type RESPValue } from './types';
import { array, fromNative, toNative, type Native, type Reply } from './values';

/**
 * Client for the key-value server. Requests go out as arrays of bulk strings;
 * Error replies are raised as `CommandError`. Calls may be issued
 * concurrently: they are sent one at a time and matched to replies in order.
 */
export class Client {
  private reader: RESPReader;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private stream: Duplex) {
    this.reader = new RESPReader(stream);
  }

  static connect(host = LOCALHOST, port = DEFAULT_PORT): Promise<Client> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port }, () => {
        socket.off('error', reject);
        resolve(new Client(socket));
      });
      socket.once('error', reject);
    });
  }

  /** Send one request value and return the raw reply. */
  send(request: RESPValue): Promise<RESPValue> {
    const result = this.queue.then(async () => {
      await this.reader.write(encode(request));
      return this.reader.read();
    });
    this.queue = result.catch(() => undefined);
    return result;
  }

  async execute(...args: Native[]): Promise<Reply> {
    const reply = await this.send(array(args.map(fromNative)));
    if (reply.type === RESPType.Error) {
      throw new CommandError(reply.message);
    }
    return toNative(reply);
  }

  get(key: string | Buffer): Promise<Reply> {
    return this.execute('GET', key);
  }

  set(key: string | Buffer, value: Native): Promise<Reply> {
    return this.execute('SET', key, value);
  }

  delete(key: string | Buffer): Promise<Reply> {
    return this.execute('DELETE', key);
  }

  flush(): Promise<Reply> {
    return this.execute('FLUSH');
  }

  mget(...keys: (string | Buffer)[]): Promise<Reply> {
    return this.execute('MGET', ...keys);
  }

  mset(...items: Native[]): Promise<Reply> {
    return this.execute('MSET', ...items);
  }

  ping(): Promise<Reply> {
    return this.execute('PING');
  }

  keys(pattern?: string): Promise<Reply> {
    return pattern === undefined ? this.execute('KEYS') : this.execute('KEYS', pattern);
  }

  close(): void {
    this.stream.end();
  }
}
