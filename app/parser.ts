import { CommandError, ProtocolError } from './errors';
import { mapOf } from './values';
import { RESPType, type RESPValue } from './types';

const INCOMPLETE = Symbol('incomplete');
type Step<T> = T | typeof INCOMPLETE;

const LF = 0x0a;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Incremental RESP decoder. Bytes are appended with `feed`; `parse` returns
 * one complete value, or null while the buffer holds only part of one.
 *
 * A value is consumed only once it is complete. When a value turns out to be
 * malformed, the bytes read up to the fault (and the rest of the enclosing
 * value, when buffered) are consumed and the error is thrown, so the next
 * `parse` resumes after them.
 */
export default class RESPParser {
  private buffer: Buffer = Buffer.alloc(0);
  private cursor = 0;

  feed(data: Buffer | string): void {
    this.buffer = Buffer.concat([this.buffer, Buffer.from(data)]);
  }

  /** Bytes buffered but not yet consumed. */
  get buffered(): number {
    return this.buffer.length;
  }

  parse(): RESPValue | null {
    if (!this.buffer.length) {
      return null;
    }

    this.cursor = 0;
    let result: Step<RESPValue>;
    try {
      result = this.parseValue();
    } catch (e) {
      this.consume();
      throw e;
    }
    if (result === INCOMPLETE) {
      return null;
    }
    this.consume();
    return result;
  }

  private consume(): void {
    this.buffer = this.buffer.subarray(this.cursor);
    this.cursor = 0;
  }

  private parseValue(): Step<RESPValue> {
    if (this.cursor >= this.buffer.length) {
      return INCOMPLETE;
    }
    const tagByte = this.buffer[this.cursor++];
    const tag = String.fromCharCode(tagByte);

    switch (tag) {
      case RESPType.String:
        return this.parseSimpleString();
      case RESPType.Error:
        return this.parseError();
      case RESPType.Integer:
        return this.parseInteger();
      case RESPType.Bulk:
        return this.parseBulkString();
      case RESPType.Array:
        return this.parseArray();
      case RESPType.Map:
        return this.parseMap();
      default:
        this.dropLine(tagByte);
        throw new CommandError('bad request');
    }
  }

  // Drop the rest of a bad tag's line, as far as it is already buffered.
  // Bytes arriving later are parsed afresh.
  private dropLine(tagByte: number): void {
    if (tagByte === LF) {
      return;
    }
    const end = this.buffer.indexOf(LF, this.cursor);
    this.cursor = end === -1 ? this.buffer.length : end + 1;
  }

  private readLine(): Step<Buffer> {
    const endIndex = this.buffer.indexOf('\r\n', this.cursor);
    if (endIndex === -1) {
      return INCOMPLETE;
    }
    const line = this.buffer.subarray(this.cursor, endIndex);
    this.cursor = endIndex + 2;
    return line;
  }

  private readNumber(): Step<number> {
    const line = this.readLine();
    if (line === INCOMPLETE) {
      return INCOMPLETE;
    }
    const text = line.toString('latin1');
    const n = INTEGER_PATTERN.test(text) ? Number(text) : NaN;
    if (!Number.isSafeInteger(n)) {
      throw new ProtocolError(`invalid integer '${text}'`);
    }
    return n;
  }

  private readLength(kind: string): Step<number> {
    const n = this.readNumber();
    if (n !== INCOMPLETE && n < -1) {
      throw new ProtocolError(`invalid ${kind} length ${n}`);
    }
    return n;
  }

  private parseSimpleString(): Step<RESPValue> {
    const line = this.readLine();
    if (line === INCOMPLETE) {
      return INCOMPLETE;
    }
    return { type: RESPType.String, value: Buffer.from(line) };
  }

  private parseError(): Step<RESPValue> {
    const line = this.readLine();
    if (line === INCOMPLETE) {
      return INCOMPLETE;
    }
    return { type: RESPType.Error, message: line.toString('utf-8') };
  }

  private parseInteger(): Step<RESPValue> {
    const value = this.readNumber();
    if (value === INCOMPLETE) {
      return INCOMPLETE;
    }
    return { type: RESPType.Integer, value };
  }

  private parseBulkString(): Step<RESPValue> {
    const numBytes = this.readLength('bulk string');
    if (numBytes === INCOMPLETE) {
      return INCOMPLETE;
    }
    if (numBytes === -1) {
      return { type: RESPType.Bulk, value: null };
    }

    const valueStart = this.cursor;
    const valueEnd = valueStart + numBytes;
    // payload plus its trailing \r\n
    if (this.buffer.length < valueEnd + 2) {
      return INCOMPLETE;
    }
    this.cursor = valueEnd + 2;
    if (this.buffer[valueEnd] !== 0x0d || this.buffer[valueEnd + 1] !== LF) {
      throw new ProtocolError('bulk string not terminated by CRLF');
    }
    return {
      type: RESPType.Bulk,
      value: Buffer.from(this.buffer.subarray(valueStart, valueEnd)),
    };
  }

  private parseElements(count: number): Step<RESPValue[]> {
    const elements: RESPValue[] = [];
    for (let i = 0; i < count; i++) {
      let element: Step<RESPValue>;
      try {
        element = this.parseValue();
      } catch (e) {
        this.skipElements(count - i - 1);
        throw e;
      }
      if (element === INCOMPLETE) {
        return INCOMPLETE;
      }
      elements.push(element);
    }
    return elements;
  }

  /**
   * After a malformed element, step over the rest of the enclosing value so
   * the whole request earns a single error. If the rest is not buffered yet,
   * only the bytes up to the fault are dropped.
   */
  private skipElements(count: number): void {
    const faultAt = this.cursor;
    for (let i = 0; i < count; i++) {
      try {
        if (this.parseValue() === INCOMPLETE) {
          this.cursor = faultAt;
          return;
        }
      } catch (e) {
        // a malformed sibling has already skipped its own remainder
        if (!(e instanceof ProtocolError || e instanceof CommandError)) {
          throw e;
        }
      }
    }
  }

  private parseArray(): Step<RESPValue> {
    const numberOfElements = this.readLength('array');
    if (numberOfElements === INCOMPLETE) {
      return INCOMPLETE;
    }
    // *-1 is the null array; it reads back as a null bulk string
    if (numberOfElements === -1) {
      return { type: RESPType.Bulk, value: null };
    }

    const elements = this.parseElements(numberOfElements);
    if (elements === INCOMPLETE) {
      return INCOMPLETE;
    }
    return { type: RESPType.Array, value: elements };
  }

  private parseMap(): Step<RESPValue> {
    const numberOfPairs = this.readNumber();
    if (numberOfPairs === INCOMPLETE) {
      return INCOMPLETE;
    }
    if (numberOfPairs < 0) {
      throw new ProtocolError(`invalid map length ${numberOfPairs}`);
    }

    const elements = this.parseElements(numberOfPairs * 2);
    if (elements === INCOMPLETE) {
      return INCOMPLETE;
    }
    const pairs: [RESPValue, RESPValue][] = [];
    for (let i = 0; i < elements.length; i += 2) {
      pairs.push([elements[i], elements[i + 1]]);
    }
    return mapOf(pairs);
  }
}

/** Decode a buffer holding exactly one complete value. */
export function decode(data: Buffer | string): RESPValue {
  const parser = new RESPParser();
  parser.feed(data);
  const value = parser.parse();
  if (value === null) {
    throw new ProtocolError('incomplete value');
  }
  if (parser.buffered > 0) {
    throw new ProtocolError(`${parser.buffered} trailing bytes after value`);
  }
  return value;
}
