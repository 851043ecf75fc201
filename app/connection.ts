import type { Duplex } from 'stream';
import { encode } from './encoder';
import {
  CommandError,
  Disconnect,
  ProtocolError,
  errorMessage,
} from './errors';
import type { CommandDispatcher } from './handlers';
import { createLogger, type Logger } from './logger';
import { RESPReader } from './reader';
import type { RESPValue } from './types';
import { errorValue } from './values';

export type ConnectionState =
  | 'AWAITING_REQUEST'
  | 'DECODE'
  | 'DISPATCH'
  | 'ENCODE_REPLY'
  | 'CLOSED';

const log = createLogger('tagkv:conn');

/**
 * Serve one client: read a request, dispatch it, write exactly one reply,
 * until the peer disconnects. Decode and command errors are answered with an
 * Error reply and the loop carries on; only a disconnect or a transport fault
 * ends it.
 */
export class ConnectionHandler {
  state: ConnectionState = 'AWAITING_REQUEST';
  private reader: RESPReader;

  constructor(
    private stream: Duplex,
    private dispatcher: CommandDispatcher,
    private peer = 'unknown',
    private logger: Logger = log
  ) {
    this.reader = new RESPReader(stream);
  }

  async run(): Promise<void> {
    this.logger.info(`Connection received: ${this.peer}`);
    try {
      for (;;) {
        const reply = await this.next();
        if (reply === null) {
          break;
        }
        this.state = 'ENCODE_REPLY';
        await this.reader.write(this.encodeReply(reply));
        this.state = 'AWAITING_REQUEST';
      }
      if (!this.stream.destroyed) {
        this.stream.end();
      }
    } catch (e) {
      this.logger.error(`Transport error on ${this.peer}: ${errorMessage(e)}`);
      this.stream.destroy();
    } finally {
      this.state = 'CLOSED';
    }
  }

  private encodeReply(reply: RESPValue): Buffer {
    try {
      return encode(reply);
    } catch (e) {
      if (e instanceof CommandError) {
        return encode(errorValue(e.message));
      }
      throw e;
    }
  }

  // One decode-and-dispatch step. Null means the peer went away.
  private async next(): Promise<RESPValue | null> {
    let request: RESPValue;
    this.state = 'DECODE';
    try {
      request = await this.reader.read();
    } catch (e) {
      if (e instanceof Disconnect) {
        if (e.partial > 0) {
          this.logger.warn(`Client ${this.peer}: ${e.message}`);
        }
        this.logger.info(`Client disconnected: ${this.peer}`);
        return null;
      }
      if (e instanceof ProtocolError || e instanceof CommandError) {
        this.logger.debug(`Request error from ${this.peer}: ${e.message}`);
        return errorValue(e.message);
      }
      throw e;
    }

    this.state = 'DISPATCH';
    try {
      return await this.dispatcher.dispatch(request);
    } catch (e) {
      this.logger.error(`Command failed for ${this.peer}`, e);
      return errorValue(`internal error: ${errorMessage(e)}`);
    }
  }
}

export function handleConnection(
  stream: Duplex,
  dispatcher: CommandDispatcher,
  peer?: string
): Promise<void> {
  return new ConnectionHandler(stream, dispatcher, peer).run();
}
