import { CommandError } from './errors';
import type { KeyValueStore } from './store';
import { KVCommand, RESPType, type RESPValue } from './types';
import {
  array,
  bulkString,
  bytesOf,
  errorValue,
  integer,
  nullBulk,
  simpleString,
} from './values';

export type CommandHandler = (
  args: RESPValue[],
  store: KeyValueStore
) => Promise<RESPValue>;

const WHITESPACE = /[ \t\n\r\v\f]+/;

function _expectArgs(
  command: KVCommand,
  args: RESPValue[],
  min: number,
  max = min
): void {
  if (args.length < min || args.length > max) {
    throw CommandError.arity(command);
  }
}

function _key(value: RESPValue): Buffer {
  const key = bytesOf(value);
  if (key === null) {
    throw new CommandError('Key must be a string');
  }
  return key;
}

/**
 * Compile a glob (`*` any run, `?` one byte) into a regex over latin1 text.
 */
function _globToRegex(pattern: string): RegExp {
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${regexStr}$`, 's');
}

async function handleGetCommand(
  args: RESPValue[],
  store: KeyValueStore
): Promise<RESPValue> {
  _expectArgs(KVCommand.GET, args, 1);
  return (await store.get(_key(args[0]))) ?? nullBulk();
}

async function handleSetCommand(
  args: RESPValue[],
  store: KeyValueStore
): Promise<RESPValue> {
  _expectArgs(KVCommand.SET, args, 2);
  return integer(await store.set(_key(args[0]), args[1]));
}

async function handleDeleteCommand(
  args: RESPValue[],
  store: KeyValueStore
): Promise<RESPValue> {
  _expectArgs(KVCommand.DELETE, args, 1);
  return integer(await store.delete(_key(args[0])));
}

async function handleFlushCommand(
  args: RESPValue[],
  store: KeyValueStore
): Promise<RESPValue> {
  _expectArgs(KVCommand.FLUSH, args, 0);
  return integer(await store.flush());
}

async function handleMGetCommand(
  args: RESPValue[],
  store: KeyValueStore
): Promise<RESPValue> {
  const values = await store.mget(args.map(_key));
  return array(values.map((value) => value ?? nullBulk()));
}

async function handleMSetCommand(
  args: RESPValue[],
  store: KeyValueStore
): Promise<RESPValue> {
  if (args.length % 2 !== 0) {
    throw new CommandError('MSET requires an even number of arguments');
  }
  // keys are checked before the store is touched
  const pairs: [Buffer, RESPValue][] = [];
  for (let i = 0; i < args.length; i += 2) {
    pairs.push([_key(args[i]), args[i + 1]]);
  }
  return integer(await store.mset(pairs));
}

async function handlePingCommand(args: RESPValue[]): Promise<RESPValue> {
  _expectArgs(KVCommand.PING, args, 0, 1);
  if (args.length === 0) {
    return simpleString('PONG');
  }
  return bulkString(_key(args[0]));
}

async function handleEchoCommand(args: RESPValue[]): Promise<RESPValue> {
  _expectArgs(KVCommand.ECHO, args, 1);
  return args[0];
}

async function handleKeysCommand(
  args: RESPValue[],
  store: KeyValueStore
): Promise<RESPValue> {
  _expectArgs(KVCommand.KEYS, args, 0, 1);
  const pattern =
    args.length === 0 ? null : _globToRegex(_key(args[0]).toString('latin1'));
  const keys = await store.keys();
  return array(
    keys
      .filter((key) => pattern === null || pattern.test(key.toString('latin1')))
      .map((key) => bulkString(key))
  );
}

export function getCommands(): Map<string, CommandHandler> {
  return new Map<string, CommandHandler>([
    [KVCommand.GET, handleGetCommand],
    [KVCommand.SET, handleSetCommand],
    [KVCommand.DELETE, handleDeleteCommand],
    [KVCommand.FLUSH, handleFlushCommand],
    [KVCommand.MGET, handleMGetCommand],
    [KVCommand.MSET, handleMSetCommand],
    [KVCommand.PING, handlePingCommand],
    [KVCommand.ECHO, handleEchoCommand],
    [KVCommand.KEYS, handleKeysCommand],
  ]);
}

/** Turn a decoded request into a command name and its arguments. */
export function parseRequest(request: RESPValue): [string, RESPValue[]] {
  let tokens: RESPValue[];
  if (request.type === RESPType.Array) {
    tokens = request.value;
  } else if (request.type === RESPType.String) {
    tokens = request.value
      .toString('latin1')
      .split(WHITESPACE)
      .filter((token) => token.length > 0)
      .map((token) => simpleString(Buffer.from(token, 'latin1')));
  } else {
    throw new CommandError('Request must be list or simple string');
  }

  if (!tokens.length) {
    throw new CommandError('Missing command');
  }
  const name = bytesOf(tokens[0]);
  if (name === null) {
    throw new CommandError('Command name must be a string');
  }
  return [name.toString('utf-8').toUpperCase(), tokens.slice(1)];
}

/**
 * Resolves requests against the fixed command table and runs them on the
 * store it was given.
 */
export class CommandDispatcher {
  private commands: Map<string, CommandHandler> = getCommands();

  constructor(private store: KeyValueStore) {}

  /** Run a request; command-level failures come back as an Error value. */
  async dispatch(request: RESPValue): Promise<RESPValue> {
    try {
      const [command, args] = parseRequest(request);
      const handler = this.commands.get(command);
      if (!handler) {
        throw new CommandError(`Unrecognized command: ${command}`);
      }
      return await handler(args, this.store);
    } catch (e) {
      if (e instanceof CommandError) {
        return errorValue(e.message);
      }
      throw e;
    }
  }
}
