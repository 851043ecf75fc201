import type { Duplex } from 'stream';
import RESPParser from './parser';
import { Disconnect } from './errors';
import type { RESPValue } from './types';

/**
 * Pull-style reader of RESP values from a byte stream (a TCP socket, or any
 * duplex in tests). `read` resolves with the next complete value, rejects with
 * the parser's error for a malformed one, and rejects with `Disconnect` once
 * the stream has ended and no complete value is left.
 */
export class RESPReader {
  private parser = new RESPParser();
  private waitingResolve: (() => void) | null = null;
  private closed = false;
  private error: Error | null = null;

  constructor(private stream: Duplex) {
    // a socket torn down while it queued for a pool slot fires no more events
    if (stream.destroyed || stream.readableEnded) {
      this.closed = true;
    }

    stream.on('data', (chunk: Buffer | string) => {
      this.parser.feed(chunk);
      this.wake();
    });

    stream.on('error', (err: Error) => {
      this.error = err;
      this.closed = true;
      this.wake();
    });

    stream.on('end', () => {
      this.closed = true;
      this.wake();
    });

    stream.on('close', () => {
      this.closed = true;
      this.wake();
    });
  }

  private wake(): void {
    if (this.waitingResolve) {
      const resolve = this.waitingResolve;
      this.waitingResolve = null;
      resolve();
    }
  }

  async read(): Promise<RESPValue> {
    for (;;) {
      const value = this.parser.parse();
      if (value !== null) {
        return value;
      }
      if (this.error) {
        const err = this.error;
        this.error = null;
        throw err;
      }
      if (this.closed) {
        throw new Disconnect(this.parser.buffered);
      }
      await new Promise<void>((resolve) => {
        this.waitingResolve = resolve;
      });
    }
  }

  /** Write raw bytes, resolving once the stream has accepted them. */
  write(data: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.stream.write(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
