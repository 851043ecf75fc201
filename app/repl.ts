import * as readline from 'readline';
import type { Client } from './client';
import { CommandError } from './errors';
import type { Reply } from './values';

const EXIT_WORDS = new Set(['exit', 'quit']);

function _formatItems(items: string[], empty: string): string {
  if (!items.length) {
    return empty;
  }
  return items.map((item, i) => `${i + 1}) ${item}`).join('\n');
}

/** Render a reply the way redis-cli does, roughly. */
export function formatReply(reply: Reply): string {
  if (reply === null) {
    return '(nil)';
  }
  if (typeof reply === 'number') {
    return `(integer) ${reply}`;
  }
  if (typeof reply === 'string') {
    return reply;
  }
  if (Array.isArray(reply)) {
    return _formatItems(reply.map(formatReply), '(empty array)');
  }
  return _formatItems(
    Array.from(reply, ([k, v]) => `${formatReply(k)} => ${formatReply(v)}`),
    '(empty map)'
  );
}

/** Run one REPL line against the server and return what to print. */
export async function evaluate(client: Client, line: string): Promise<string> {
  const parts = line.trim().split(/\s+/);
  try {
    return formatReply(await client.execute(...parts));
  } catch (e) {
    if (e instanceof CommandError) {
      return `(error) ${e.message}`;
    }
    throw e;
  }
}

export async function runRepl(
  client: Client,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const rl = readline.createInterface({ input, output, prompt: '> ' });
  output.write("Welcome to the tagkv REPL! Type 'exit' or 'quit' to quit.\n");
  rl.prompt();
  try {
    for await (const line of rl) {
      const cmd = line.trim();
      if (EXIT_WORDS.has(cmd.toLowerCase())) {
        output.write('Goodbye!\n');
        break;
      }
      if (cmd) {
        output.write(`${await evaluate(client, cmd)}\n`);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    client.close();
  }
}
