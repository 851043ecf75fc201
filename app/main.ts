import { parseConfig } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { Server } from './server';

const log = createLogger('tagkv:main');

const parameters = process.argv.slice(2);

async function main(): Promise<void> {
  const server = new Server(parseConfig(parameters));
  await server.listen();

  const shutdown = (): void => {
    log.info('Shutting down');
    server.close().then(
      () => process.exit(0),
      (e: unknown) => {
        log.error(`Error during shutdown: ${errorMessage(e)}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((e: unknown) => {
  log.error(`Failed to start: ${errorMessage(e)}`);
  process.exit(1);
});
