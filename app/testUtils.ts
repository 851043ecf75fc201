import { Duplex, PassThrough } from 'stream';
import { ConnectionHandler } from './connection';
import { CommandDispatcher } from './handlers';
import type { Logger } from './logger';
import { KeyValueStore } from './store';

/** Two in-memory stream ends wired to each other, standing in for a socket. */
export function duplexPair(): [Duplex, Duplex] {
  const aToB = new PassThrough();
  const bToA = new PassThrough();
  return [
    Duplex.from({ readable: bToA, writable: aToB }),
    Duplex.from({ readable: aToB, writable: bToA }),
  ];
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface ServedConnection {
  client: Duplex;
  handler: ConnectionHandler;
  done: Promise<void>;
}

/** Start a connection handler on one end of a pair and hand back the other. */
export function serve(store: KeyValueStore = new KeyValueStore()): ServedConnection {
  const [client, server] = duplexPair();
  const handler = new ConnectionHandler(
    server,
    new CommandDispatcher(store),
    'test-peer',
    silentLogger
  );
  return { client, handler, done: handler.run() };
}
