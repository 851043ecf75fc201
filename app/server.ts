import * as net from 'net';
import { handleConnection } from './connection';
import { CommandDispatcher } from './handlers';
import { createLogger } from './logger';
import { ConnectionPool } from './pool';
import { KeyValueStore } from './store';
import {
  DEFAULT_MAX_CLIENTS,
  DEFAULT_PORT,
  LOCALHOST,
  type Config,
} from './types';

const log = createLogger('tagkv:server');

export function defaultConfig(): Config {
  return {
    host: LOCALHOST,
    port: DEFAULT_PORT,
    maxClients: DEFAULT_MAX_CLIENTS,
  };
}

/**
 * TCP listener. Owns the store, the dispatcher over it and the pool that
 * bounds how many connections are served at once.
 */
export class Server {
  readonly config: Config;
  readonly store = new KeyValueStore();
  private dispatcher = new CommandDispatcher(this.store);
  private pool: ConnectionPool;
  private server: net.Server;
  private sockets: Set<net.Socket> = new Set();

  constructor(config?: Partial<Config>) {
    this.config = { ...defaultConfig(), ...config };
    this.pool = new ConnectionPool(this.config.maxClients);
    this.server = net.createServer((connection: net.Socket) => {
      const peer = `${connection.remoteAddress}:${connection.remotePort}`;
      this.sockets.add(connection);
      connection.on('close', () => {
        this.sockets.delete(connection);
      });
      // a queued socket's own errors must not crash the process
      connection.on('error', (err) => {
        log.debug(`socket error from ${peer}: ${err.message}`);
      });
      void this.pool.spawn(() => handleConnection(connection, this.dispatcher, peer));
    });
  }

  /** Start listening; resolves with the bound address. */
  listen(): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`unexpected listen address: ${address}`));
          return;
        }
        log.info(`Listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /** Stop accepting and drop every open connection. */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      for (const socket of this.sockets) {
        socket.destroy();
      }
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
