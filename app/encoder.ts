import { EncodingError } from './errors';
import { CRLF, RESPType, type RESPValue } from './types';

function _header(tag: RESPType, n: number): Buffer {
  return Buffer.from(`${tag}${n}${CRLF}`);
}

// Error replies are single-line; CR/LF would end the frame early.
function _sanitize(message: string): string {
  return message.replace(/[\r\n]/g, ' ');
}

function _writeBytes(chunks: Buffer[], value: Buffer): void {
  chunks.push(_header(RESPType.Bulk, value.length), value, Buffer.from(CRLF));
}

function _write(chunks: Buffer[], data: RESPValue): void {
  switch (data.type) {
    case RESPType.Bulk:
      if (data.value === null) {
        chunks.push(Buffer.from(`$-1${CRLF}`));
        return;
      }
      _writeBytes(chunks, data.value);
      return;
    // every textual payload goes out length-prefixed
    case RESPType.String:
      _writeBytes(chunks, data.value);
      return;
    case RESPType.Integer:
      if (!Number.isSafeInteger(data.value)) {
        throw new EncodingError(`unrecognized type: non-integer number ${data.value}`);
      }
      chunks.push(Buffer.from(`:${data.value}${CRLF}`));
      return;
    case RESPType.Error:
      chunks.push(Buffer.from(`-${_sanitize(data.message)}${CRLF}`));
      return;
    case RESPType.Array:
      chunks.push(_header(RESPType.Array, data.value.length));
      for (const item of data.value) {
        _write(chunks, item);
      }
      return;
    case RESPType.Map:
      chunks.push(_header(RESPType.Map, data.value.length));
      for (const [key, value] of data.value) {
        _write(chunks, key);
        _write(chunks, value);
      }
      return;
    default: {
      const unknown: never = data;
      throw new EncodingError(`unrecognized type: ${JSON.stringify(unknown)}`);
    }
  }
}

/** Serialize one value into its wire bytes. */
export function encode(data: RESPValue): Buffer {
  const chunks: Buffer[] = [];
  _write(chunks, data);
  return Buffer.concat(chunks);
}
