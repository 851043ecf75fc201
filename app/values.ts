import { EncodingError } from './errors';
import { encode } from './encoder';
import {
  RESPType,
  type ArrayValue,
  type BulkStringValue,
  type ErrorValue,
  type IntegerValue,
  type MapValue,
  type RESPValue,
  type SimpleStringValue,
} from './types';

export function simpleString(value: Buffer | string): SimpleStringValue {
  return { type: RESPType.String, value: Buffer.from(value) };
}

export function errorValue(message: string): ErrorValue {
  return { type: RESPType.Error, message };
}

export function integer(value: number): IntegerValue {
  return { type: RESPType.Integer, value };
}

export function bulkString(value: Buffer | string): BulkStringValue {
  return { type: RESPType.Bulk, value: Buffer.from(value) };
}

export function nullBulk(): BulkStringValue {
  return { type: RESPType.Bulk, value: null };
}

export function array(value: RESPValue[]): ArrayValue {
  return { type: RESPType.Array, value };
}

/**
 * Build a map value. Keys are compared by their wire encoding; a repeated key
 * keeps its first position and takes the last value.
 */
export function mapOf(pairs: Iterable<[RESPValue, RESPValue]>): MapValue {
  const entries = new Map<string, [RESPValue, RESPValue]>();
  for (const [key, value] of pairs) {
    const id = encode(key).toString('latin1');
    const existing = entries.get(id);
    if (existing) {
      existing[1] = value;
    } else {
      entries.set(id, [key, value]);
    }
  }
  return { type: RESPType.Map, value: Array.from(entries.values()) };
}

/** The byte payload of a string-like value, or null for anything else. */
export function bytesOf(value: RESPValue): Buffer | null {
  switch (value.type) {
    case RESPType.String:
    case RESPType.Bulk:
      return value.value;
    default:
      return null;
  }
}

export type Native = string | Buffer | number | null | Native[];

export function fromNative(value: Native): RESPValue {
  if (value === null) {
    return nullBulk();
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new EncodingError(`unrecognized type: non-integer number ${value}`);
    }
    return integer(value);
  }
  if (Array.isArray(value)) {
    return array(value.map(fromNative));
  }
  return bulkString(value);
}

export type Reply = string | number | null | Reply[] | ReplyMap;
export interface ReplyMap extends Map<Reply, Reply> {}

/**
 * Client-side view of a reply: strings are decoded as UTF-8. Error values are
 * returned as their message; callers that care check the tag first.
 */
export function toNative(value: RESPValue): Reply {
  switch (value.type) {
    case RESPType.String:
      return value.value.toString('utf-8');
    case RESPType.Error:
      return value.message;
    case RESPType.Integer:
      return value.value;
    case RESPType.Bulk:
      return value.value === null ? null : value.value.toString('utf-8');
    case RESPType.Array:
      return value.value.map(toNative);
    case RESPType.Map:
      return new Map(
        value.value.map(([k, v]): [Reply, Reply] => [toNative(k), toNative(v)])
      );
  }
}
