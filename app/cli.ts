import { Client } from './client';
import { parseConfig } from './config';
import { errorMessage } from './errors';
import { runRepl } from './repl';

const { host, port } = parseConfig(process.argv.slice(2));

Client.connect(host, port)
  .then((client) => runRepl(client))
  .catch((e: unknown) => {
    console.error(`Unexpected error: ${errorMessage(e)}`);
    process.exit(1);
  });
