import { beforeEach, describe, expect, it } from 'vitest';
import { CommandDispatcher, parseRequest } from './handlers';
import { KeyValueStore } from './store';
import type { RESPValue } from './types';
import {
  array,
  bulkString,
  errorValue,
  integer,
  nullBulk,
  simpleString,
} from './values';

const cmd = (...parts: string[]): RESPValue => array(parts.map((p) => bulkString(p)));

describe('parseRequest', () => {
  it('upper-cases the command name', () => {
    expect(parseRequest(cmd('get', 'foo'))).toEqual(['GET', [bulkString('foo')]]);
  });

  it('splits a simple string on whitespace', () => {
    expect(parseRequest(simpleString('  set  k\tv '))).toEqual([
      'SET',
      [simpleString('k'), simpleString('v')],
    ]);
  });
});

describe('CommandDispatcher', () => {
  let store: KeyValueStore;
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    store = new KeyValueStore();
    dispatcher = new CommandDispatcher(store);
  });

  it('SET then GET returns the value', async () => {
    expect(await dispatcher.dispatch(cmd('SET', 'foo', 'bar'))).toEqual(integer(1));
    expect(await dispatcher.dispatch(cmd('GET', 'foo'))).toEqual(bulkString('bar'));
  });

  it('matches command names case-insensitively', async () => {
    await dispatcher.dispatch(cmd('set', 'foo', 'bar'));
    expect(await dispatcher.dispatch(cmd('gEt', 'foo'))).toEqual(bulkString('bar'));
  });

  it('accepts the simple string shorthand', async () => {
    expect(await dispatcher.dispatch(simpleString('SET foo bar'))).toEqual(integer(1));
    expect(await dispatcher.dispatch(simpleString('GET foo'))).toEqual(simpleString('bar'));
  });

  it('returns null for a missing key and an empty bulk for an empty value', async () => {
    expect(await dispatcher.dispatch(cmd('GET', 'nope'))).toEqual(nullBulk());
    await dispatcher.dispatch(cmd('SET', 'e', ''));
    expect(await dispatcher.dispatch(cmd('GET', 'e'))).toEqual(bulkString(''));
  });

  it('rejects requests that are not arrays or simple strings', async () => {
    expect(await dispatcher.dispatch(integer(5))).toEqual(
      errorValue('Request must be list or simple string')
    );
  });

  it('rejects empty requests', async () => {
    expect(await dispatcher.dispatch(array([]))).toEqual(errorValue('Missing command'));
    expect(await dispatcher.dispatch(simpleString('   '))).toEqual(
      errorValue('Missing command')
    );
  });

  it('rejects unknown commands by name', async () => {
    expect(await dispatcher.dispatch(cmd('nope'))).toEqual(
      errorValue('Unrecognized command: NOPE')
    );
  });

  it('checks arity and key shape', async () => {
    expect(await dispatcher.dispatch(cmd('GET'))).toEqual(
      errorValue("wrong number of arguments for 'get'")
    );
    expect(await dispatcher.dispatch(cmd('FLUSH', 'x'))).toEqual(
      errorValue("wrong number of arguments for 'flush'")
    );
    expect(await dispatcher.dispatch(array([bulkString('GET'), integer(1)]))).toEqual(
      errorValue('Key must be a string')
    );
  });

  it('DELETE returns 0 for absent keys and 1 for present ones', async () => {
    expect(await dispatcher.dispatch(cmd('DELETE', 'k'))).toEqual(integer(0));
    await dispatcher.dispatch(cmd('SET', 'k', 'v'));
    expect(await dispatcher.dispatch(cmd('DELETE', 'k'))).toEqual(integer(1));
    expect(await dispatcher.dispatch(cmd('GET', 'k'))).toEqual(nullBulk());
  });

  it('FLUSH returns the prior count and empties the store', async () => {
    expect(await dispatcher.dispatch(cmd('FLUSH'))).toEqual(integer(0));
    await dispatcher.dispatch(cmd('MSET', 'a', '1', 'b', '2', 'c', '3'));
    expect(await dispatcher.dispatch(cmd('FLUSH'))).toEqual(integer(3));
    expect(store.size).toBe(0);
  });

  it('MGET preserves order with nulls for missing keys', async () => {
    await dispatcher.dispatch(cmd('MSET', 'a', 'A', 'c', 'C'));
    expect(await dispatcher.dispatch(cmd('MGET', 'a', 'b', 'c'))).toEqual(
      array([bulkString('A'), nullBulk(), bulkString('C')])
    );
  });

  it('MSET with an odd argument count leaves the store unchanged', async () => {
    await dispatcher.dispatch(cmd('SET', 'a', 'orig'));
    expect(await dispatcher.dispatch(cmd('MSET', 'a', 'new', 'b'))).toEqual(
      errorValue('MSET requires an even number of arguments')
    );
    expect(store.size).toBe(1);
    expect(await dispatcher.dispatch(cmd('GET', 'a'))).toEqual(bulkString('orig'));
  });

  it('MSET counts pairs and lets the last duplicate win', async () => {
    expect(await dispatcher.dispatch(cmd('MSET', 'k', '1', 'k', '2'))).toEqual(integer(2));
    expect(await dispatcher.dispatch(cmd('GET', 'k'))).toEqual(bulkString('2'));
  });

  it('answers PING and ECHO', async () => {
    expect(await dispatcher.dispatch(cmd('PING'))).toEqual(simpleString('PONG'));
    expect(await dispatcher.dispatch(cmd('PING', 'hi'))).toEqual(bulkString('hi'));
    expect(await dispatcher.dispatch(cmd('ECHO', 'x'))).toEqual(bulkString('x'));
  });

  it('KEYS lists keys in insertion order, filtered by a glob', async () => {
    await dispatcher.dispatch(cmd('MSET', 'foo', '1', 'bar', '2', 'food', '3'));
    expect(await dispatcher.dispatch(cmd('KEYS'))).toEqual(
      array([bulkString('foo'), bulkString('bar'), bulkString('food')])
    );
    expect(await dispatcher.dispatch(cmd('KEYS', 'fo*'))).toEqual(
      array([bulkString('foo'), bulkString('food')])
    );
    expect(await dispatcher.dispatch(cmd('KEYS', 'b?r'))).toEqual(
      array([bulkString('bar')])
    );
  });
});
