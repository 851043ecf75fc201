import { beforeEach, describe, expect, it } from 'vitest';
import { KeyValueStore } from './store';
import { bulkString } from './values';

const key = (k: string): Buffer => Buffer.from(k);

describe('KeyValueStore', () => {
  let store: KeyValueStore;

  beforeEach(() => {
    store = new KeyValueStore();
  });

  it('returns null for unknown keys', async () => {
    expect(await store.get(key('missing'))).toBeNull();
  });

  it('set then get', async () => {
    expect(await store.set(key('foo'), bulkString('bar'))).toBe(1);
    expect(await store.get(key('foo'))).toEqual(bulkString('bar'));
  });

  it('keeps an empty value apart from a missing one', async () => {
    await store.set(key('empty'), bulkString(''));
    expect(await store.get(key('empty'))).toEqual(bulkString(''));
  });

  it('delete reports whether the key existed', async () => {
    expect(await store.delete(key('x'))).toBe(0);
    await store.set(key('x'), bulkString('1'));
    expect(await store.delete(key('x'))).toBe(1);
    expect(await store.get(key('x'))).toBeNull();
  });

  it('flush returns the prior entry count', async () => {
    expect(await store.flush()).toBe(0);
    await store.set(key('a'), bulkString('1'));
    await store.set(key('b'), bulkString('2'));
    expect(await store.flush()).toBe(2);
    expect(store.size).toBe(0);
  });

  it('mget preserves request order', async () => {
    await store.set(key('a'), bulkString('A'));
    await store.set(key('c'), bulkString('C'));
    expect(await store.mget([key('a'), key('b'), key('c')])).toEqual([
      bulkString('A'),
      null,
      bulkString('C'),
    ]);
  });

  it('mset applies pairs left to right', async () => {
    const count = await store.mset([
      [key('k'), bulkString('1')],
      [key('k'), bulkString('2')],
    ]);
    expect(count).toBe(2);
    expect(await store.get(key('k'))).toEqual(bulkString('2'));
    expect(store.size).toBe(1);
  });

  it('compares keys by bytes', async () => {
    await store.set(Buffer.from([0xff, 0x00]), bulkString('bin'));
    expect(await store.get(Buffer.from([0xff, 0x00]))).toEqual(bulkString('bin'));
    expect(await store.keys()).toEqual([Buffer.from([0xff, 0x00])]);
  });

  it('serializes concurrent writers without losing updates', async () => {
    await Promise.all(
      Array.from({ length: 50 }, (_, i) => store.set(key(`k${i}`), bulkString(`${i}`)))
    );
    expect(store.size).toBe(50);
  });
});
